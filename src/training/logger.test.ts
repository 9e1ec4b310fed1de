import { configure, reset } from '@logtape/logtape'
import { afterEach, describe, expect, test } from 'vitest'
import { renderMessage } from '../formatters'
import { createMemorySink, RecordingLogger } from '../testing'
import { TrainingLogger } from './logger'

function setup(config: ConstructorParameters<typeof TrainingLogger>[0] = {}) {
	const sink = new RecordingLogger()
	return { sink, training: new TrainingLogger({ ...config, logger: sink }) }
}

describe('TrainingLogger', () => {
	test('logs generic training events', () => {
		const { sink, training } = setup()

		training.logTrainingEvent('run-1', 'custom', { note: 'warmup' })

		expect(sink.calls).toEqual([
			{
				level: 'info',
				message: 'Training event: custom',
				properties: { session_id: 'run-1', event_type: 'custom', note: 'warmup' },
			},
		])
	})

	test('logs generic model events', () => {
		const { sink, training } = setup()

		training.logModelEvent(7, 'exported')

		expect(sink.calls[0]?.message).toBe('Model event: exported')
		expect(sink.calls[0]?.properties).toEqual({ model_id: 7, event_type: 'exported' })
	})

	test('logs training start with hyperparameters and dataset', () => {
		const { sink, training } = setup()

		training.logTrainingStart('run-1', {
			modelName: 'classifier',
			hyperparameters: { learningRate: 0.001 },
			datasetInfo: { rows: 1000 },
			extra: { gpu: false },
		})

		expect(sink.calls[0]?.message).toBe('Training event: training_start')
		expect(sink.calls[0]?.properties).toEqual({
			session_id: 'run-1',
			event_type: 'training_start',
			model_name: 'classifier',
			hyperparameters: { learningRate: 0.001 },
			dataset_info: { rows: 1000 },
			gpu: false,
		})
	})

	test('omits hyperparameters when turned off', () => {
		const { sink, training } = setup({ config: { logHyperparameters: false } })

		training.logTrainingStart('run-1', {
			modelName: 'classifier',
			hyperparameters: { learningRate: 0.001 },
		})

		expect(sink.calls[0]?.properties).not.toHaveProperty('hyperparameters')
	})

	test('logs steps with metrics unless turned off', () => {
		const on = setup()
		const off = setup({ config: { logMetrics: false } })
		const step = { step: 10, epoch: 1, loss: 0.5, metrics: { accuracy: 0.8 } }

		on.training.logTrainingStep('run-1', step)
		off.training.logTrainingStep('run-1', step)

		expect(on.sink.calls[0]?.properties).toEqual({
			session_id: 'run-1',
			event_type: 'training_step',
			step: 10,
			epoch: 1,
			loss: 0.5,
			metrics: { accuracy: 0.8 },
		})
		expect(off.sink.calls[0]?.properties).not.toHaveProperty('metrics')
	})

	test('logs validation results', () => {
		const { sink, training } = setup()

		training.logValidation('run-1', {
			epoch: 2,
			validationLoss: 0.3,
			validationMetrics: { f1: 0.7 },
		})

		expect(sink.calls[0]?.properties).toEqual({
			session_id: 'run-1',
			event_type: 'validation',
			epoch: 2,
			validation_loss: 0.3,
			validation_metrics: { f1: 0.7 },
		})
	})

	test('omits validation metrics when turned off', () => {
		const { sink, training } = setup({ config: { logValidation: false } })

		training.logValidation('run-1', {
			epoch: 2,
			validationLoss: 0.3,
			validationMetrics: { f1: 0.7 },
		})

		expect(sink.calls[0]?.properties).not.toHaveProperty('validation_metrics')
	})

	test('logs checkpoints', () => {
		const { sink, training } = setup({ config: { logCheckpoints: false } })

		training.logCheckpoint('run-1', {
			checkpointPath: '/tmp/ckpt-2',
			epoch: 2,
			metrics: { loss: 0.3 },
		})

		expect(sink.calls[0]?.message).toBe('Training event: checkpoint_saved')
		expect(sink.calls[0]?.properties).toEqual({
			session_id: 'run-1',
			event_type: 'checkpoint_saved',
			checkpoint_path: '/tmp/ckpt-2',
			epoch: 2,
		})
	})

	test('logs training end', () => {
		const { sink, training } = setup()

		training.logTrainingEnd('run-1', {
			finalMetrics: { accuracy: 0.9 },
			trainingTime: 0,
		})
		training.logTrainingEnd('run-2')

		expect(sink.calls[0]?.properties).toEqual({
			session_id: 'run-1',
			event_type: 'training_end',
			final_metrics: { accuracy: 0.9 },
			training_time: 0,
		})
		expect(sink.calls[1]?.properties).toEqual({
			session_id: 'run-2',
			event_type: 'training_end',
		})
	})

	test('logs model save and load', () => {
		const { sink, training } = setup()

		training.logModelSave('m-1', {
			modelPath: '/models/m-1',
			modelInfo: { params: 1200 },
		})
		training.logModelLoad('m-1', { modelPath: '/models/m-1' })

		expect(sink.calls.map((call) => call.message)).toEqual([
			'Model event: model_saved',
			'Model event: model_loaded',
		])
		expect(sink.calls[0]?.properties).toEqual({
			model_id: 'm-1',
			event_type: 'model_saved',
			model_path: '/models/m-1',
			model_info: { params: 1200 },
		})
		expect(sink.calls[1]?.properties).toEqual({
			model_id: 'm-1',
			event_type: 'model_loaded',
			model_path: '/models/m-1',
		})
	})

	test('does nothing when disabled', () => {
		const { sink, training } = setup({ config: { enabled: false } })

		training.logTrainingStart('run-1', { modelName: 'classifier' })
		training.logModelLoad(1, { modelPath: '/models/1' })

		expect(sink.calls).toEqual([])
	})
})

describe('TrainingLogger default logger', () => {
	afterEach(async () => {
		await reset()
	})

	test('renders braces in event types verbatim', async () => {
		const memory = createMemorySink()
		await configure({
			reset: true,
			sinks: { memory: memory.sink },
			loggers: [
				{ category: ['training'], sinks: ['memory'], lowestLevel: 'info' },
				{ category: ['logtape', 'meta'], sinks: [], lowestLevel: 'warning' },
			],
		})
		const training = new TrainingLogger()

		training.logTrainingEvent('run-1', 'phase {warmup}')
		training.logModelEvent(7, '{event_type}')

		expect(memory.records.map(renderMessage)).toEqual([
			'Training event: phase {warmup}',
			'Model event: {event_type}',
		])
	})
})

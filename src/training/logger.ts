/**
 * Model training event logging.
 *
 * Every event is one info line on the `training` category:
 * `Training event: <type>` carrying `session_id` and `event_type`, or
 * `Model event: <type>` carrying `model_id` and `event_type`, followed by
 * the event's data.
 *
 * @example
 * ```typescript
 * const training = new TrainingLogger();
 * training.logTrainingStart("run-1", {
 *   modelName: "classifier",
 *   hyperparameters: { learningRate: 0.001, batchSize: 32 },
 * });
 * training.logTrainingStep("run-1", { step: 100, epoch: 1, loss: 0.42 });
 * training.logTrainingEnd("run-1", { finalMetrics: { accuracy: 0.91 }, trainingTime: 3600 });
 * ```
 *
 * @module training/logger
 */

import { getLogger } from '@logtape/logtape'
import {
	parseConfig,
	type TrainingLoggingConfig,
	type TrainingLoggingConfigInput,
	TrainingLoggingConfigSchema,
} from '../config/index.ts'
import { escapeMessageTemplate } from '../logging/template.ts'

export const TRAINING_EVENTS = {
	trainingStart: 'training_start',
	trainingStep: 'training_step',
	validation: 'validation',
	checkpointSaved: 'checkpoint_saved',
	trainingEnd: 'training_end',
	modelSaved: 'model_saved',
	modelLoaded: 'model_loaded',
} as const

export type TrainingEventType =
	(typeof TRAINING_EVENTS)[keyof typeof TRAINING_EVENTS]

/**
 * Where training lines go. A LogTape `Logger` satisfies it.
 * `message` is a LogTape template: braces from the event type arrive doubled.
 */
export interface TrainingLogSink {
	info(message: string, properties?: Record<string, unknown>): void
}

export type EventData = Readonly<Record<string, unknown>>
export type Metrics = Readonly<Record<string, number>>

interface WithExtra {
	/** Merged into the event data last */
	extra?: EventData
}

export interface TrainingStart extends WithExtra {
	modelName: string
	hyperparameters?: EventData
	datasetInfo?: EventData
}

export interface TrainingStep extends WithExtra {
	step: number
	epoch: number
	loss: number
	metrics?: Metrics
}

export interface ValidationResult extends WithExtra {
	epoch: number
	validationLoss: number
	validationMetrics?: Metrics
}

export interface Checkpoint extends WithExtra {
	checkpointPath: string
	epoch: number
	metrics?: Metrics
}

export interface TrainingEnd extends WithExtra {
	finalMetrics?: Metrics
	/** Seconds */
	trainingTime?: number
}

export interface ModelSave extends WithExtra {
	modelPath: string
	modelInfo?: EventData
}

export interface ModelLoad extends WithExtra {
	modelPath: string
}

export interface TrainingLoggerOptions {
	/** Defaults to the LogTape logger for category `training` */
	logger?: TrainingLogSink
	config?: TrainingLoggingConfigInput
}

function hasEntries(record: EventData | undefined): record is EventData {
	return record !== undefined && Object.keys(record).length > 0
}

export class TrainingLogger {
	readonly config: TrainingLoggingConfig
	private readonly logger: TrainingLogSink

	constructor(options: TrainingLoggerOptions = {}) {
		this.config = parseConfig(
			TrainingLoggingConfigSchema,
			options.config,
			'training logging',
		)
		this.logger = options.logger ?? getLogger(['training'])
	}

	logTrainingEvent(
		sessionId: string,
		eventType: TrainingEventType | (string & {}),
		data: EventData = {},
	): void {
		if (!this.config.enabled) return
		this.logger.info(`Training event: ${escapeMessageTemplate(eventType)}`, {
			session_id: sessionId,
			event_type: eventType,
			...data,
		})
	}

	logModelEvent(
		modelId: string | number,
		eventType: TrainingEventType | (string & {}),
		data: EventData = {},
	): void {
		if (!this.config.enabled) return
		this.logger.info(`Model event: ${escapeMessageTemplate(eventType)}`, {
			model_id: modelId,
			event_type: eventType,
			...data,
		})
	}

	logTrainingStart(sessionId: string, start: TrainingStart): void {
		const data: Record<string, unknown> = { model_name: start.modelName }
		if (this.config.logHyperparameters && hasEntries(start.hyperparameters)) {
			data.hyperparameters = start.hyperparameters
		}
		if (hasEntries(start.datasetInfo)) {
			data.dataset_info = start.datasetInfo
		}
		this.logTrainingEvent(sessionId, TRAINING_EVENTS.trainingStart, {
			...data,
			...start.extra,
		})
	}

	logTrainingStep(sessionId: string, step: TrainingStep): void {
		const data: Record<string, unknown> = {
			step: step.step,
			epoch: step.epoch,
			loss: step.loss,
		}
		if (this.config.logMetrics && hasEntries(step.metrics)) {
			data.metrics = step.metrics
		}
		this.logTrainingEvent(sessionId, TRAINING_EVENTS.trainingStep, {
			...data,
			...step.extra,
		})
	}

	logValidation(sessionId: string, result: ValidationResult): void {
		const data: Record<string, unknown> = {
			epoch: result.epoch,
			validation_loss: result.validationLoss,
		}
		if (this.config.logValidation && hasEntries(result.validationMetrics)) {
			data.validation_metrics = result.validationMetrics
		}
		this.logTrainingEvent(sessionId, TRAINING_EVENTS.validation, {
			...data,
			...result.extra,
		})
	}

	logCheckpoint(sessionId: string, checkpoint: Checkpoint): void {
		const data: Record<string, unknown> = {
			checkpoint_path: checkpoint.checkpointPath,
			epoch: checkpoint.epoch,
		}
		if (this.config.logCheckpoints && hasEntries(checkpoint.metrics)) {
			data.metrics = checkpoint.metrics
		}
		this.logTrainingEvent(sessionId, TRAINING_EVENTS.checkpointSaved, {
			...data,
			...checkpoint.extra,
		})
	}

	logTrainingEnd(sessionId: string, end: TrainingEnd = {}): void {
		const data: Record<string, unknown> = {}
		if (this.config.logMetrics && hasEntries(end.finalMetrics)) {
			data.final_metrics = end.finalMetrics
		}
		if (end.trainingTime !== undefined) {
			data.training_time = end.trainingTime
		}
		this.logTrainingEvent(sessionId, TRAINING_EVENTS.trainingEnd, {
			...data,
			...end.extra,
		})
	}

	logModelSave(modelId: string | number, save: ModelSave): void {
		const data: Record<string, unknown> = { model_path: save.modelPath }
		if (hasEntries(save.modelInfo)) {
			data.model_info = save.modelInfo
		}
		this.logModelEvent(modelId, TRAINING_EVENTS.modelSaved, {
			...data,
			...save.extra,
		})
	}

	logModelLoad(modelId: string | number, load: ModelLoad): void {
		this.logModelEvent(modelId, TRAINING_EVENTS.modelLoaded, {
			model_path: load.modelPath,
			...load.extra,
		})
	}
}

/**
 * Create a {@link TrainingLogger}.
 */
export function setupTrainingLogging(
	options: TrainingLoggerOptions = {},
): TrainingLogger {
	return new TrainingLogger(options)
}

/**
 * Model training event logging.
 *
 * @module training
 */

export {
	type Checkpoint,
	type EventData,
	type Metrics,
	type ModelLoad,
	type ModelSave,
	setupTrainingLogging,
	TRAINING_EVENTS,
	type TrainingEnd,
	type TrainingEventType,
	TrainingLogger,
	type TrainingLoggerOptions,
	type TrainingLogSink,
	type TrainingStart,
	type TrainingStep,
	type ValidationResult,
} from './logger.ts'

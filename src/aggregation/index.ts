/**
 * Application-wide logging presets.
 *
 * @module aggregation
 */

export {
	type LogRotationOptions,
	type PerformanceMonitoringOptions,
	type PresetOptions,
	type ProductionLoggingOptions,
	setupDevelopmentLogging,
	setupLogAggregation,
	setupLogRotation,
	setupPerformanceMonitoring,
	setupProductionLogging,
} from './presets.ts'

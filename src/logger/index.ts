export { type CrashReporter, SentryCrashReporter } from './CrashReporter';
export { captureStack, DriverLogger, SINK_CALL_DEPTH } from './DriverLogger';
export {
	createFormatter,
	ERROR_MARKER,
	FATAL_MARKER,
	type Formatter,
	FORMATTER_CALL_DEPTH,
	type FormatterOptions,
	stripMarker,
} from './format';
export * from './global';
export { swallow } from './helpers';
export {
	DEFAULT_CONFIG,
	type DriverLoggerOptions,
	type LogConfig,
	resolveSink,
	type TextWriter,
} from './LogConfig';
export {
	isSeverity,
	MAX_DEBUG_LENGTH,
	parseSeverity,
	Severity,
	severityName,
	shouldEmit,
} from './Severity';
export {
	categorySinks,
	ConsoleSink,
	ERROR_CATEGORY,
	type LogSink,
	type SinkFactory,
	StreamSink,
} from './sinks';

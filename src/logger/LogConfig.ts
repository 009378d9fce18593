import { LogConfigError } from '../model/Errors';
import { type CrashReporter, SentryCrashReporter } from './CrashReporter';
import type { Formatter } from './format';
import { attempt } from './helpers';
import { isSeverity, Severity } from './Severity';
import type { LogSink, SinkFactory } from './sinks';

/** Receives text bound for a standard stream. */
export type TextWriter = (text: string) => void;

/** Everything a logger reads on each call. Replaced whole, never mutated. */
export type LogConfig = Readonly<{
	threshold: Severity;
	debugEnabled: boolean;
	namePrefix: string;
	crashReportingEnabled: boolean;
	sink?: LogSink;
	sinkFactory?: SinkFactory;
	formatter?: Formatter;
	crashReporter: CrashReporter;
}>;

export type DriverLoggerOptions = {
	/** Minimum severity for gated calls. Defaults to `Severity.DEBUG`. */
	threshold?: Severity;
	/** Whether debug calls are eligible at all. Defaults to `true`. */
	debug?: boolean;
	/** Prepended to every message sent to the crash reporter. */
	namePrefix?: string;
	/** Forward ERROR+ lines to the crash reporter. Defaults to `false`. */
	crashReporting?: boolean;
	/** Fixed sink; wins over `sinkFactory` for every category. */
	sink?: LogSink;
	sinkFactory?: SinkFactory;
	formatter?: Formatter;
	/** Receives ERROR+ lines when crash reporting is on. Defaults to {@link SentryCrashReporter}. */
	crashReporter?: CrashReporter;
	/** Fallback output when no sink applies. Defaults to `process.stdout`. */
	stdout?: TextWriter;
	/** Crash diagnostics. Defaults to `process.stderr`. */
	stderr?: TextWriter;
};

export const DEFAULT_CONFIG: LogConfig = Object.freeze({
	threshold: Severity.DEBUG,
	debugEnabled: true,
	namePrefix: '',
	crashReportingEnabled: false,
	crashReporter: new SentryCrashReporter(),
});

/**
 * Check option values before they reach a snapshot.
 *
 * Configuration-time only: the setters and constructor call this, logging calls never do.
 *
 * @throws {LogConfigError} On a threshold outside DEBUG..FATAL, a formatter, factory or sink of the
 *   wrong shape.
 */
export function validateOptions(options: DriverLoggerOptions): void {
	if (options.threshold !== undefined && !isSeverity(options.threshold)) {
		throw new LogConfigError('threshold', `expected an integer 0-4, got ${String(options.threshold)}`);
	}
	if (options.formatter !== undefined && typeof options.formatter !== 'function') {
		throw new LogConfigError('formatter', 'expected a function');
	}
	if (options.sinkFactory !== undefined && typeof options.sinkFactory !== 'function') {
		throw new LogConfigError('sinkFactory', 'expected a function');
	}
	if (options.sink !== undefined && typeof options.sink.write !== 'function') {
		throw new LogConfigError('sink', 'expected an object with a write(callDepth, message) method');
	}
	if (options.crashReporter !== undefined && typeof options.crashReporter.capture !== 'function') {
		throw new LogConfigError('crashReporter', 'expected an object with a capture(message) method');
	}
}

/** Overlay the options that were given on `base`; `undefined` keeps the current value. */
export function applyOptions(base: LogConfig, options: DriverLoggerOptions): LogConfig {
	validateOptions(options);
	return Object.freeze({
		threshold: options.threshold ?? base.threshold,
		debugEnabled: options.debug ?? base.debugEnabled,
		namePrefix: options.namePrefix ?? base.namePrefix,
		crashReportingEnabled: options.crashReporting ?? base.crashReportingEnabled,
		sink: options.sink ?? base.sink,
		sinkFactory: options.sinkFactory ?? base.sinkFactory,
		formatter: options.formatter ?? base.formatter,
		crashReporter: options.crashReporter ?? base.crashReporter,
	});
}

/**
 * Pick the sink for a category: the fixed sink if set, else the factory's answer for a non-empty
 * category. `undefined` means the caller falls back to stdout; so does a factory that throws.
 */
export function resolveSink(config: LogConfig, category: string): LogSink | undefined {
	if (config.sink) return config.sink;
	const factory = config.sinkFactory;
	if (category !== '' && factory) {
		return attempt(() => factory(category), undefined);
	}
	return undefined;
}

import type { CrashReporter } from './CrashReporter';
import { DriverLogger } from './DriverLogger';
import type { Formatter } from './format';
import type { DriverLoggerOptions } from './LogConfig';
import type { Severity } from './Severity';
import type { LogSink, SinkFactory } from './sinks';

// The process-wide logger. Configure it once at startup, before the driver starts logging; each
// setter swaps the whole configuration so a call in progress keeps the snapshot it started with.
let instance = new DriverLogger();

export function getLogger(): DriverLogger {
	return instance;
}

/** Replace the process-wide logger with a fresh one built from `options`. */
export function resetLogger(options: DriverLoggerOptions = {}): DriverLogger {
	instance = new DriverLogger(options);
	return instance;
}

export function setLogger(sink: LogSink | undefined): void {
	instance.setLogger(sink);
}

export function setLoggerFunc(
	namePrefix: string,
	crashReporting: boolean,
	threshold: Severity,
	sinkFactory?: SinkFactory,
	formatter?: Formatter,
): void {
	instance.setLoggerFunc(namePrefix, crashReporting, threshold, sinkFactory, formatter);
}

export function setDebug(enabled: boolean): void {
	instance.setDebug(enabled);
}

export function setCrashReporter(reporter: CrashReporter | undefined): void {
	instance.setCrashReporter(reporter);
}

export function log(...args: unknown[]): void {
	instance.log(...args);
}

export function logln(...args: unknown[]): void {
	instance.logln(...args);
}

export function logf(format: string, ...args: unknown[]): void {
	instance.logf(format, ...args);
}

export function debug(...args: unknown[]): void {
	instance.debug(...args);
}

export function debugln(...args: unknown[]): void {
	instance.debugln(...args);
}

export function debugf(format: string, ...args: unknown[]): void {
	instance.debugf(format, ...args);
}

export function errorln(...args: unknown[]): void {
	instance.errorln(...args);
}

export function errorf(format: string, ...args: unknown[]): void {
	instance.errorf(format, ...args);
}

export function reportCrash(taskName: string, error?: unknown): void {
	instance.reportCrash(taskName, error);
}

export function runTask<T>(name: string, task: () => T | Promise<T>): Promise<T | undefined> {
	return instance.runTask(name, task);
}

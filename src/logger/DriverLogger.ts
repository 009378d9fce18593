import type { CrashReporter } from './CrashReporter';
import {
	type Formatter,
	FORMATTER_CALL_DEPTH,
	renderArgs,
	renderFormat,
	renderLine,
	stripMarker,
	withNewline,
} from './format';
import { attempt, swallow } from './helpers';
import {
	applyOptions,
	DEFAULT_CONFIG,
	type DriverLoggerOptions,
	type LogConfig,
	resolveSink,
	type TextWriter,
	validateOptions,
} from './LogConfig';
import { fitsDebugLimit, Severity, shouldEmit } from './Severity';
import { ERROR_CATEGORY, type LogSink, type SinkFactory } from './sinks';

/** Frames between the caller of a facade method and the sink. */
export const SINK_CALL_DEPTH = 2;

const defaultStdout: TextWriter = (text) => {
	process.stdout.write(text);
};
const defaultStderr: TextWriter = (text) => {
	process.stderr.write(text);
};

/**
 * Level-filtered logging facade for driver internals.
 *
 * Each call reads one configuration snapshot, checks the level gate, renders the content, runs it
 * through the formatter and hands the result to the sink for its category. Without a formatter the
 * raw content goes to stdout. ERROR lines are never filtered and, with crash reporting on, are also
 * forwarded to the crash reporter. Nothing a sink, formatter or reporter throws reaches the caller.
 *
 * @example
 *
 * ```ts
 * const logger = new DriverLogger({ threshold: Severity.INFO, formatter: createFormatter() });
 * logger.logf('connected to %s', host);
 * logger.errorln('socket closed:', err);
 * ```
 */
export class DriverLogger {
	private config: LogConfig;
	private readonly stdout: TextWriter;
	private readonly stderr: TextWriter;

	constructor(options: DriverLoggerOptions = {}) {
		this.config = applyOptions(DEFAULT_CONFIG, options);
		this.stdout = options.stdout ?? defaultStdout;
		this.stderr = options.stderr ?? defaultStderr;
	}

	/** The current configuration snapshot. */
	get settings(): LogConfig {
		return this.config;
	}

	// Configuration

	/** Route every category to `sink`; `undefined` restores category-based resolution. */
	setLogger(sink: LogSink | undefined): void {
		validateOptions({ sink });
		this.config = Object.freeze({ ...this.config, sink });
	}

	/**
	 * Replace the name prefix, crash-reporting switch, threshold, sink factory and formatter in one
	 * step. Omitted factory or formatter clear the current ones.
	 */
	setLoggerFunc(
		namePrefix: string,
		crashReporting: boolean,
		threshold: Severity,
		sinkFactory?: SinkFactory,
		formatter?: Formatter,
	): void {
		validateOptions({ threshold, sinkFactory, formatter });
		this.config = Object.freeze({
			...this.config,
			namePrefix,
			crashReportingEnabled: crashReporting,
			threshold,
			sinkFactory,
			formatter,
		});
	}

	/** Enable or mute debug calls regardless of the threshold. */
	setDebug(enabled: boolean): void {
		this.config = Object.freeze({ ...this.config, debugEnabled: enabled });
	}

	/** Replace the crash reporter; `undefined` restores the Sentry default. */
	setCrashReporter(reporter: CrashReporter | undefined): void {
		validateOptions({ crashReporter: reporter });
		this.config = Object.freeze({
			...this.config,
			crashReporter: reporter ?? DEFAULT_CONFIG.crashReporter,
		});
	}

	/** Overlay the given options; options left `undefined` keep their value. */
	configure(options: DriverLoggerOptions): void {
		this.config = applyOptions(this.config, options);
	}

	// INFO

	log(...args: unknown[]): void {
		const config = this.config;
		if (!shouldEmit(Severity.INFO, config.threshold)) return;
		this.write(config, Severity.INFO, '', renderArgs(args));
	}

	logln(...args: unknown[]): void {
		const config = this.config;
		if (!shouldEmit(Severity.INFO, config.threshold)) return;
		this.write(config, Severity.INFO, '', renderLine(args));
	}

	logf(format: string, ...args: unknown[]): void {
		const config = this.config;
		if (!shouldEmit(Severity.INFO, config.threshold)) return;
		this.write(config, Severity.INFO, '', renderFormat(format, args));
	}

	// DEBUG

	debug(...args: unknown[]): void {
		const config = this.config;
		if (!this.debugOpen(config)) return;
		this.writeDebug(config, renderArgs(args));
	}

	debugln(...args: unknown[]): void {
		const config = this.config;
		if (!this.debugOpen(config)) return;
		this.writeDebug(config, renderLine(args));
	}

	debugf(format: string, ...args: unknown[]): void {
		const config = this.config;
		if (!this.debugOpen(config)) return;
		this.writeDebug(config, renderFormat(format, args));
	}

	// ERROR: never filtered by the threshold

	errorln(...args: unknown[]): void {
		this.write(this.config, Severity.ERROR, ERROR_CATEGORY, renderLine(args));
	}

	errorf(format: string, ...args: unknown[]): void {
		this.write(this.config, Severity.ERROR, ERROR_CATEGORY, renderFormat(format, args));
	}

	/**
	 * Report a task that is terminating abnormally: log its name, dump the stack trace straight to
	 * stderr, then log the trace at ERROR. The stderr dump depends on no configuration.
	 *
	 * @param taskName Name of the exiting unit of work.
	 * @param error The failure, if any; its stack is used instead of the current one.
	 */
	reportCrash(taskName: string, error?: unknown): void {
		this.errorf('task[%s] is exiting...\n', taskName);
		const trace = captureStack(error);
		swallow(() => this.stderr(withNewline(trace)));
		this.errorln(trace);
	}

	/**
	 * Run a unit of work and report it through {@link reportCrash} if it throws or rejects.
	 *
	 * @returns The task's result, or `undefined` after a crash. Never rejects.
	 */
	async runTask<T>(name: string, task: () => T | Promise<T>): Promise<T | undefined> {
		try {
			return await task();
		} catch (error) {
			this.reportCrash(name, error);
			return undefined;
		}
	}

	private debugOpen(config: LogConfig): boolean {
		return config.debugEnabled && shouldEmit(Severity.DEBUG, config.threshold);
	}

	private writeDebug(config: LogConfig, content: string): void {
		if (fitsDebugLimit(content)) this.write(config, Severity.DEBUG, '', content);
	}

	private write(config: LogConfig, severity: Severity, category: string, content: string): void {
		const formatter = config.formatter;
		const formatted = formatter
			? attempt(() => formatter(severity, FORMATTER_CALL_DEPTH, '%s', content), undefined)
			: undefined;
		if (formatted === undefined) {
			swallow(() => this.stdout(`${content}\n`));
			return;
		}

		const reporter = config.crashReporter;
		if (severity >= Severity.ERROR && config.crashReportingEnabled) {
			const message = `${config.namePrefix}${stripMarker(formatted)}`;
			swallow(() => reporter.capture(message));
		}

		const sink = resolveSink(config, category);
		if (sink) swallow(() => sink.write(SINK_CALL_DEPTH, formatted));
		else swallow(() => this.stdout(`${formatted}\n`));
	}
}

/** Stack text of `error` when it carries one, else the stack at the caller. */
export function captureStack(error?: unknown): string {
	if (error instanceof Error && error.stack) return error.stack;
	const reason = error === undefined ? 'stack trace' : attempt(() => String(error), 'unknown error');
	const here = new Error(reason);
	return here.stack ?? `Error: ${reason}`;
}

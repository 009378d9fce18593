import type { Writable } from 'node:stream';
import { withNewline } from './format';

/**
 * A destination for rendered lines. `callDepth` is the number of frames to skip when the sink
 * reports a source location. A throw from `write` is dropped by the logger.
 */
export interface LogSink {
	write(callDepth: number, message: string): void;
}

/** Resolves the sink for a message category (`''` or `'error'`). */
export type SinkFactory = (category: string) => LogSink | undefined;

/** Category used by error-level calls. */
export const ERROR_CATEGORY = 'error';

/**
 * Writes each message to a stream, one line per message. Errors the stream emits (a full disk, a
 * closed file) are dropped.
 */
export class StreamSink implements LogSink {
	constructor(private readonly stream: Writable) {
		stream.on('error', () => {
			/* ignore write failures */
		});
	}

	write(_callDepth: number, message: string): void {
		this.stream.write(withNewline(message));
	}
}

/**
 * Writes through `console`: the error category goes to `console.error`, everything else to
 * `console.log`. A trailing newline is trimmed since `console` adds its own.
 */
export class ConsoleSink implements LogSink {
	constructor(private readonly category: string = '') {}

	write(_callDepth: number, message: string): void {
		const line = message.endsWith('\n') ? message.slice(0, -1) : message;
		// Note: looked up per call so tests can spy on the output
		if (this.category === ERROR_CATEGORY) console.error(line);
		else console.log(line);
	}
}

/**
 * Factory backed by a fixed table of sinks.
 *
 * @example
 *
 * ```ts
 * setLoggerFunc('db', false, Severity.INFO, categorySinks({ error: new StreamSink(errStream) }), fmt);
 * ```
 */
export function categorySinks(table: Readonly<Record<string, LogSink>>): SinkFactory {
	const sinks = new Map(Object.entries(table));
	return (category) => sinks.get(category);
}

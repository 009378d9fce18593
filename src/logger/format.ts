import { format, inspect } from 'node:util';
import { Severity, severityName } from './Severity';

/**
 * Renders the final line. Receives the numeric severity, the number of frames between the caller
 * and the formatter (for caller-location metadata), a printf-style format string and its
 * arguments.
 */
export type Formatter = (
	severity: Severity,
	callDepth: number,
	format: string,
	...args: unknown[]
) => string;

/** Frames between the caller of a facade method and the formatter. */
export const FORMATTER_CALL_DEPTH = 4;

export const ERROR_MARKER = '\u001b[031;1m[ERROR]\u001b[031;0m';
export const FATAL_MARKER = '\u001b[031;1m[FATAL]\u001b[031;0m';

// eslint-disable-next-line no-control-regex
const LEADING_MARKER = /^(?:\u001b\[[0-9;]*m)?\[(?:ERROR|FATAL)\](?:\u001b\[[0-9;]*m)? ?/;

/**
 * Remove one leading ERROR/FATAL marker (coloured or plain) and the space after it. Text without a
 * marker comes back unchanged.
 */
export function stripMarker(formatted: string): string {
	return formatted.replace(LEADING_MARKER, '');
}

function stringify(value: unknown): string {
	return typeof value === 'string' ? value : inspect(value);
}

/** Arguments joined by single spaces; strings verbatim, anything else inspected. */
export function renderArgs(args: readonly unknown[]): string {
	return args.map(stringify).join(' ');
}

/** Like {@link renderArgs}, terminated by a newline. */
export function renderLine(args: readonly unknown[]): string {
	return `${renderArgs(args)}\n`;
}

export function renderFormat(fmt: string, args: readonly unknown[]): string {
	return format(fmt, ...args);
}

/** Terminate with exactly one newline, keeping one that is already there. */
export function withNewline(text: string): string {
	return text.endsWith('\n') ? text : `${text}\n`;
}

export type FormatterOptions = {
	/** Colour the ERROR and FATAL markers with ANSI codes. Defaults to `true`. */
	color?: boolean;
	/** Add an ISO timestamp after the marker; pass a clock to control it. Defaults to `false`. */
	timestamp?: boolean | (() => Date);
};

/**
 * Build a formatter that emits `<marker> [<timestamp> ]<body>`, where the marker is `[DEBUG]`,
 * `[INFO]`, `[WARN]`, or the coloured {@link ERROR_MARKER} / {@link FATAL_MARKER}. The ERROR+
 * markers lead the line so crash reporting can strip them.
 *
 * @example
 *
 * ```ts
 * const fmt = createFormatter({ color: false });
 * fmt(Severity.INFO, 4, '%s', 'connected'); // "[INFO] connected"
 * ```
 */
export function createFormatter(options: FormatterOptions = {}): Formatter {
	const color = options.color ?? true;
	const clock =
		typeof options.timestamp === 'function'
			? options.timestamp
			: options.timestamp
				? () => new Date()
				: undefined;

	const marker = (severity: Severity): string => {
		if (color && severity === Severity.ERROR) return ERROR_MARKER;
		if (color && severity === Severity.FATAL) return FATAL_MARKER;
		return `[${severityName(severity)}]`;
	};

	return (severity, _callDepth, fmt, ...args) => {
		const stamp = clock ? `${clock().toISOString()} ` : '';
		return `${marker(severity)} ${stamp}${format(fmt, ...args)}`;
	};
}

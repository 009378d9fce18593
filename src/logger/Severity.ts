/**
 * Log severities, ordered from least severe (DEBUG) to most severe (FATAL). A message is emitted
 * when its severity is at or above the configured threshold.
 */
export const Severity = {
	DEBUG: 0,
	INFO: 1,
	WARN: 2,
	ERROR: 3,
	FATAL: 4,
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

/** Debug messages longer than this many code points are dropped. */
export const MAX_DEBUG_LENGTH = 256;

const NAMES: Record<Severity, string> = {
	[Severity.DEBUG]: 'DEBUG',
	[Severity.INFO]: 'INFO',
	[Severity.WARN]: 'WARN',
	[Severity.ERROR]: 'ERROR',
	[Severity.FATAL]: 'FATAL',
};

const BY_NAME = new Map<string, Severity>([
	['debug', Severity.DEBUG],
	['info', Severity.INFO],
	['warn', Severity.WARN],
	['warning', Severity.WARN],
	['error', Severity.ERROR],
	['fatal', Severity.FATAL],
]);

export function isSeverity(value: unknown): value is Severity {
	return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 4;
}

export function severityName(level: Severity): string {
	return NAMES[level];
}

/**
 * Parse a level name (case-insensitive) or its numeric value.
 *
 * @returns The severity, or `undefined` when the value names no level.
 */
export function parseSeverity(value: string | number | undefined): Severity | undefined {
	if (value === undefined) return undefined;
	if (typeof value === 'number') return isSeverity(value) ? value : undefined;
	const trimmed = value.trim();
	if (/^\d+$/.test(trimmed)) {
		const n = Number(trimmed);
		return isSeverity(n) ? n : undefined;
	}
	return BY_NAME.get(trimmed.toLowerCase());
}

/** A call at `level` proceeds unless the threshold is above it. */
export function shouldEmit(level: Severity, threshold: Severity): boolean {
	return !(threshold > level);
}

/** Length in code points, so a surrogate pair counts once. */
export function codePointLength(text: string): number {
	return Array.from(text).length;
}

/** Debug content is eligible when it fits in {@link MAX_DEBUG_LENGTH} code points. */
export function fitsDebugLimit(content: string): boolean {
	return codePointLength(content) <= MAX_DEBUG_LENGTH;
}

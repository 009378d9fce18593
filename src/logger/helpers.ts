/**
 * Invoke a function whose failure must never reach the logging caller, in a fire-and-forget
 * manner.
 *
 * Used for sink writes, crash-report forwarding and the stderr dump, where a broken destination
 * must not break the driver's control flow. The function runs synchronously; a throw is caught and
 * dropped, and a returned promise gets a rejection handler that drops its error too.
 *
 * The logger never `await`s the result.
 *
 * @example
 *
 * ```ts
 * swallow(() => reporter.capture(message));
 * ```
 *
 * @returns `true` when the function returned without throwing.
 */
export function swallow(fn: () => unknown): boolean {
	try {
		const maybePromise = fn();
		if (isThenable(maybePromise)) {
			maybePromise.then(undefined, () => {
				/* ignore async failures */
			});
		}
		return true;
	} catch {
		/* ignore */
		return false;
	}
}

/**
 * Evaluate a function and fall back to `fallback` if it throws.
 *
 * @typeParam T The value type produced by `fn`.
 */
export function attempt<T, F>(fn: () => T, fallback: F): T | F {
	try {
		return fn();
	} catch {
		return fallback;
	}
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
	return (
		typeof value === 'object' &&
		value !== null &&
		'then' in value &&
		typeof value.then === 'function'
	);
}

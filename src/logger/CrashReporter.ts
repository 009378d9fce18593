import { captureMessage } from '@sentry/node';

/**
 * Receives ERROR and FATAL lines for alerting. `capture` may return a promise; the logger never
 * waits for it and drops its failure.
 */
export interface CrashReporter {
	capture(message: string): void | PromiseLike<unknown>;
}

/**
 * Forwards messages to Sentry at `error` level through the globally initialised client. Call
 * `Sentry.init()` in the host application; without it Sentry drops the message.
 */
export class SentryCrashReporter implements CrashReporter {
	capture(message: string): void {
		captureMessage(message, 'error');
	}
}

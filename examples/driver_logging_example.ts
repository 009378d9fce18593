import { createWriteStream } from 'node:fs';
import {
	categorySinks,
	createFormatter,
	errorf,
	logf,
	resetLogger,
	runTask,
	setLoggerFunc,
	Severity,
	StreamSink,
} from '../src';

// Configuration
const ERROR_LOG = process.env.ERROR_LOG ?? 'driver-errors.log';

const runDriverLoggingExample = async () => {
	// Wire destinations once, before any logging
	resetLogger();
	setLoggerFunc(
		'orders-service:',
		process.env.SENTRY_DSN !== undefined,
		Severity.INFO,
		categorySinks({ error: new StreamSink(createWriteStream(ERROR_LOG, { flags: 'a' })) }),
		createFormatter({ timestamp: true }),
	);

	logf('dialing %s', 'localhost:27017');

	await runTask('cursor-reaper', async () => {
		errorf('cursor %d timed out', 42);
		throw new Error('reaper stopped');
	});

	logf('see %s for the crash report', ERROR_LOG);
};

void runDriverLoggingExample();

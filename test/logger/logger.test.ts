import { describe, test, expect, vi } from 'vitest';
import {
	DriverLogger,
	LogConfigError,
	SentryCrashReporter,
	Severity,
	type Formatter,
} from '../../src';
import { createTestLogger, stubSink, traceFormatter } from './_support';

describe('level gate', () => {
	const levels = [Severity.DEBUG, Severity.INFO, Severity.WARN, Severity.ERROR, Severity.FATAL];

	test('info calls are written iff the threshold is at most INFO', () => {
		for (const threshold of levels) {
			const { logger, out } = createTestLogger({ threshold });
			logger.log('a');
			logger.logln('b');
			logger.logf('%s', 'c');
			expect(out).toEqual(threshold <= Severity.INFO ? ['a\n', 'b\n\n', 'c\n'] : []);
		}
	});

	test('debug calls are written iff the threshold is DEBUG', () => {
		for (const threshold of levels) {
			const { logger, out } = createTestLogger({ threshold });
			logger.debug('a');
			logger.debugln('b');
			logger.debugf('%s', 'c');
			expect(out).toEqual(threshold === Severity.DEBUG ? ['a\n', 'b\n\n', 'c\n'] : []);
		}
	});

	test('error calls are written whatever the threshold', () => {
		for (const threshold of levels) {
			const { logger, out } = createTestLogger({ threshold });
			logger.errorln('x');
			logger.errorf('y=%d', 1);
			expect(out).toEqual(['x\n\n', 'y=1\n']);
		}
	});

	test('threshold INFO suppresses debug and lets info through', () => {
		const { logger, out, err } = createTestLogger({ threshold: Severity.INFO });

		logger.debug('x');
		expect(out).toEqual([]);
		expect(err).toEqual([]);

		logger.log('hello');
		expect(out).toEqual(['hello\n']);
	});

	test('setDebug(false) mutes debug calls only', () => {
		const { logger, out } = createTestLogger();
		logger.setDebug(false);

		logger.debug('hidden');
		logger.debugf('%s', 'hidden');
		logger.log('shown');
		expect(out).toEqual(['shown\n']);

		logger.setDebug(true);
		logger.debug('back');
		expect(out).toEqual(['shown\n', 'back\n']);
	});
});

describe('debug length cap', () => {
	test('accepts exactly 256 code points', () => {
		const { logger, out } = createTestLogger();
		logger.debug('x'.repeat(256));
		expect(out).toEqual([`${'x'.repeat(256)}\n`]);
	});

	test('drops 257 code points instead of truncating', () => {
		const { logger, out } = createTestLogger();
		logger.debug('x'.repeat(257));
		logger.debugf('%s', 'y'.repeat(300));
		expect(out).toEqual([]);
	});

	test('counts the trailing newline of debugln', () => {
		const { logger, out } = createTestLogger();
		logger.debugln('x'.repeat(255));
		logger.debugln('y'.repeat(256));
		expect(out).toEqual([`${'x'.repeat(255)}\n\n`]);
	});

	test('counts code points, not UTF-16 units', () => {
		const { logger, out } = createTestLogger();
		const smiles = '\u{1F600}'.repeat(256);
		logger.debug(smiles);
		expect(out).toEqual([`${smiles}\n`]);
	});

	test('does not apply to info calls', () => {
		const { logger, out } = createTestLogger();
		logger.log('z'.repeat(1000));
		expect(out).toHaveLength(1);
	});
});

describe('content rendering', () => {
	test('log joins arguments with spaces', () => {
		const { logger, out } = createTestLogger();
		logger.log('a', 1, { b: 2 });
		expect(out).toEqual(['a 1 { b: 2 }\n']);
	});

	test('stdout always gets one more newline than the content has', () => {
		const { logger, out } = createTestLogger();
		logger.logln('hello', 'world');
		logger.log('y\n');
		expect(out).toEqual(['hello world\n\n', 'y\n\n']);
	});

	test('logf applies printf-style formatting', () => {
		const { logger, out } = createTestLogger();
		logger.logf('%s=%d', 'x', 5);
		expect(out).toEqual(['x=5\n']);
	});
});

describe('formatter and sinks', () => {
	test('without a formatter the raw content goes to stdout and the sink is bypassed', () => {
		const { sink, write } = stubSink();
		const { logger, out } = createTestLogger({ sink });

		logger.log('raw');
		expect(out).toEqual(['raw\n']);
		expect(write).not.toHaveBeenCalled();
	});

	test('the formatter gets the severity, call depth 4 and a %s format', () => {
		const formatter = vi.fn<Formatter>(() => 'rendered');
		const { logger, out } = createTestLogger({ formatter });

		logger.logf('n=%d', 3);
		expect(formatter).toHaveBeenCalledWith(Severity.INFO, 4, '%s', 'n=3');
		expect(out).toEqual(['rendered\n']);
	});

	test('the formatted line goes to the fixed sink with call depth 2', () => {
		const { sink, write } = stubSink();
		const { logger, out } = createTestLogger({ sink, formatter: traceFormatter });

		logger.log('hi');
		logger.errorln('bad');
		expect(write.mock.calls).toEqual([
			[2, '1|4|%s|hi'],
			[2, '3|4|%s|bad\n'],
		]);
		expect(out).toEqual([]);
	});

	test('the factory serves the error category only', () => {
		const { sink: errorSink, write } = stubSink();
		const factory = vi.fn((category: string) => (category === 'error' ? errorSink : undefined));
		const { logger, out } = createTestLogger();
		logger.setLoggerFunc('', false, Severity.DEBUG, factory, traceFormatter);

		logger.log('info line');
		logger.errorf('code %d', 7);

		expect(factory).toHaveBeenCalledTimes(1);
		expect(factory).toHaveBeenCalledWith('error');
		expect(out).toEqual(['1|4|%s|info line\n']);
		expect(write).toHaveBeenCalledWith(2, '3|4|%s|code 7');
	});

	test('a fixed sink wins over the factory for every category', () => {
		const { sink, write } = stubSink();
		const factory = vi.fn(() => stubSink().sink);
		const { logger } = createTestLogger();
		logger.setLoggerFunc('', false, Severity.DEBUG, factory, traceFormatter);
		logger.setLogger(sink);

		logger.log('a');
		logger.errorln('b');
		expect(factory).not.toHaveBeenCalled();
		expect(write).toHaveBeenCalledTimes(2);

		logger.setLogger(undefined);
		logger.errorln('c');
		expect(factory).toHaveBeenCalledWith('error');
	});

	test('a failing sink never reaches the caller', () => {
		const sink = {
			write: () => {
				throw new Error('disk full');
			},
		};
		const { logger, out } = createTestLogger({ sink, formatter: traceFormatter });

		expect(() => logger.errorln('lost')).not.toThrow();
		expect(out).toEqual([]);
	});

	test('a throwing factory falls back to stdout', () => {
		const { logger, out } = createTestLogger();
		const factory = () => {
			throw new Error('no file');
		};
		logger.setLoggerFunc('', false, Severity.DEBUG, factory, traceFormatter);

		logger.errorln('x');
		expect(out).toEqual(['3|4|%s|x\n\n']);
	});

	test('a throwing formatter falls back to the raw content', () => {
		const formatter: Formatter = () => {
			throw new Error('bad template');
		};
		const { sink, write } = stubSink();
		const { logger, out } = createTestLogger({ sink, formatter });

		logger.log('plain');
		expect(out).toEqual(['plain\n']);
		expect(write).not.toHaveBeenCalled();
	});

	test('a call keeps the configuration it started with', () => {
		const { sink: second, write: secondWrite } = stubSink();
		const { logger, out } = createTestLogger();
		const formatter: Formatter = (_severity, _depth, _format, ...args) => {
			logger.setLogger(second);
			return String(args[0]);
		};
		logger.configure({ formatter });

		logger.log('first');
		expect(out).toEqual(['first\n']);
		expect(secondWrite).not.toHaveBeenCalled();

		logger.log('next');
		expect(secondWrite).toHaveBeenCalledWith(2, 'next');
	});
});

describe('configuration', () => {
	test('defaults let every severity through', () => {
		const logger = new DriverLogger();
		expect(logger.settings).toEqual({
			threshold: Severity.DEBUG,
			debugEnabled: true,
			namePrefix: '',
			crashReportingEnabled: false,
			crashReporter: expect.any(SentryCrashReporter),
		});
	});

	test('setLoggerFunc replaces prefix, switch, threshold, factory and formatter', () => {
		const factory = () => undefined;
		const logger = new DriverLogger({ formatter: traceFormatter });
		logger.setLoggerFunc('db:', true, Severity.WARN, factory);

		expect(logger.settings.namePrefix).toBe('db:');
		expect(logger.settings.crashReportingEnabled).toBe(true);
		expect(logger.settings.threshold).toBe(Severity.WARN);
		expect(logger.settings.sinkFactory).toBe(factory);
		expect(logger.settings.formatter).toBeUndefined();
	});

	test('configure keeps options that are not given', () => {
		const logger = new DriverLogger({ threshold: Severity.ERROR, namePrefix: 'a:' });
		logger.configure({ debug: false });

		expect(logger.settings.threshold).toBe(Severity.ERROR);
		expect(logger.settings.namePrefix).toBe('a:');
		expect(logger.settings.debugEnabled).toBe(false);
	});

	test('settings snapshots are frozen', () => {
		const logger = new DriverLogger();
		expect(Object.isFrozen(logger.settings)).toBe(true);
	});

	test('rejects a threshold outside DEBUG..FATAL', () => {
		const outOfRange: number = 7;
		expect(() => new DriverLogger({ threshold: outOfRange as Severity })).toThrow(LogConfigError);
		expect(() => new DriverLogger({ threshold: outOfRange as Severity })).toThrow(
			'Invalid logger option "threshold": expected an integer 0-4, got 7',
		);
	});

	test('setLoggerFunc rejects an out-of-range threshold and keeps the old settings', () => {
		const logger = new DriverLogger({ threshold: Severity.WARN });
		const outOfRange: number = -1;

		expect(() => logger.setLoggerFunc('', false, outOfRange as Severity)).toThrow(LogConfigError);
		expect(logger.settings.threshold).toBe(Severity.WARN);
	});

	test('rejects a sink without write', () => {
		const logger = new DriverLogger();
		const sink = JSON.parse('{"output": 1}');
		expect(() => logger.setLogger(sink)).toThrow(LogConfigError);
	});
});

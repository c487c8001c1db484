import { createLogger, errorContext, LogEntry, LogLevel, parseLogLevel, setLogHandler, setLogLevel } from '../src/logger';

describe('logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
    setLogLevel(LogLevel.Info);
  });

  afterEach(() => {
    setLogHandler(() => undefined);
    setLogLevel(LogLevel.Info);
  });

  test('child loggers carry their parent context', () => {
    const log = createLogger({ component: 'engine' }).child({ runId: 'run_1' });

    log.info('Stage started', { stageId: 'build' });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: LogLevel.Info,
      message: 'Stage started',
      context: { component: 'engine', runId: 'run_1', stageId: 'build' },
    });
  });

  test('drops entries below the minimum level', () => {
    const log = createLogger();

    log.debug('hidden');
    setLogLevel(LogLevel.Warn);
    log.info('hidden too');
    log.error('shown');

    expect(entries.map((e) => e.message)).toEqual(['shown']);
  });

  test('parses level names', () => {
    expect(parseLogLevel(' WARN ')).toBe(LogLevel.Warn);
    expect(parseLogLevel('trace')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });

  test('flattens thrown values', () => {
    expect(errorContext(new TypeError('bad'))).toEqual({ error: 'bad', errorName: 'TypeError' });
    expect(errorContext(42)).toEqual({ error: '42' });
  });
});

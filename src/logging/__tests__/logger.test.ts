import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger, getLogger, setRootLogger, type LogEntry } from '../index.js';

describe('Logger', () => {
  let lines: string[];
  const sink = (line: string) => {
    lines.push(line);
  };

  function entries(): LogEntry[] {
    return lines.map(line => JSON.parse(line) as LogEntry);
  }

  beforeEach(() => {
    lines = [];
  });

  it('should write JSON entries with context and metadata', () => {
    const logger = new Logger({ component: 'test' }, { json: true, sink });

    logger.info('hello', { subject: 'Port Halvard' });

    const [entry] = entries();
    expect(entry).toMatchObject({
      level: 'info',
      message: 'hello',
      component: 'test',
      metadata: { subject: 'Port Halvard' },
    });
  });

  it('should drop entries below the minimum level', () => {
    const logger = new Logger({}, { json: true, sink, minLevel: 'warn' });

    logger.debug('quiet');
    logger.info('quiet');
    logger.warn('loud');

    expect(entries().map(e => e.message)).toEqual(['loud']);
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  it('should carry context and options into children', () => {
    const logger = new Logger({ component: 'http' }, { json: true, sink, minLevel: 'warn' });
    const child = logger.child({ requestId: 'req-1' });

    child.info('dropped');
    child.warn('kept');

    expect(entries()).toEqual([
      expect.objectContaining({ component: 'http', requestId: 'req-1', message: 'kept' }),
    ]);
  });

  it('should describe errors and non-errors', () => {
    const logger = new Logger({}, { json: true, sink });

    logger.error('failed', new TypeError('bad input'));
    logger.error('failed', 'plain string');

    const [first, second] = entries();
    expect(first?.error).toMatchObject({ name: 'TypeError', message: 'bad input' });
    expect(second?.error).toEqual({ name: 'NonError', message: 'plain string' });
  });

  it('should record durations', () => {
    const logger = new Logger({}, { json: true, sink });

    logger.time('done', Date.now() - 5);

    expect(entries()[0]?.duration).toBeGreaterThanOrEqual(5);
  });

  it('should write a readable line in pretty mode', () => {
    const logger = new Logger({ component: 'test' }, { sink });

    logger.info('hello');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[test] hello');
    expect(lines[0]).toContain('INFO');
  });

  it('should print metadata on its own line in pretty mode', () => {
    const logger = new Logger({}, { sink });

    logger.warn('slow', { ms: 12 });

    expect(lines[1]).toBe('   {"ms":12}');
  });
});

describe('getLogger', () => {
  afterEach(() => {
    setRootLogger(null);
  });

  it('should hand out children of the root logger', () => {
    const lines: string[] = [];
    setRootLogger(new Logger({}, { json: true, sink: line => lines.push(line) }));

    getLogger({ component: 'dispatcher' }).info('matched');

    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ component: 'dispatcher', message: 'matched' });
  });

  it('should build the root logger from the environment', () => {
    setRootLogger(null);
    vi.stubEnv('LOG_LEVEL', 'debug');

    expect(getLogger().isLevelEnabled('debug')).toBe(true);
  });

  it('should fall back to defaults when the environment is invalid', () => {
    setRootLogger(null);
    vi.stubEnv('LOG_LEVEL', 'verbose');

    const logger = getLogger({ component: 'cli' });

    expect(logger.isLevelEnabled('warn')).toBe(true);
    expect(logger.isLevelEnabled('info')).toBe(false);
  });

  it('should let modules load with an invalid environment', async () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    vi.resetModules();

    await expect(import('../../core/rules/dispatcher.js')).resolves.toHaveProperty('Dispatcher');
  });
});

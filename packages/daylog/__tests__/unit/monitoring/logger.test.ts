import { afterEach, describe, expect, test, vi } from 'vitest';
import { Logger, type LogLevel, type LoggerOptions } from '../../../src/monitoring/logger';

// ── Helpers ──────────────────────────────────────────────────────────────

function capture(opts: Omit<LoggerOptions, 'sink'> = {}) {
  const lines: Record<string, unknown>[] = [];
  const levels: LogLevel[] = [];
  const logger = new Logger({
    level: 'debug',
    ...opts,
    sink: (level, line) => {
      levels.push(level);
      lines.push(JSON.parse(line));
    },
  });
  return { logger, lines, levels };
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ── Tests ────────────────────────────────────────────────────────────────

describe('Logger', () => {
  test('writes one JSON line with service and bound context', () => {
    const { logger, lines } = capture({ context: { runId: 'run-1' } });

    logger.child({ component: 'batch' }).info('Batch finished', { total: 3 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 'info',
      msg: 'Batch finished',
      service: 'daylog',
      runId: 'run-1',
      component: 'batch',
      total: 3,
    });
  });

  test('forDay binds the date, child binds the lookup role', () => {
    const { logger, lines } = capture();

    logger.forDay('2024-03-05').child({ role: 'date field' }).warn('Required control missing');

    expect(lines[0]).toMatchObject({ date: '2024-03-05', role: 'date field' });
  });

  test('drops entries below the configured level', () => {
    const { logger, levels } = capture({ level: 'warn' });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');
    logger.error('kept');

    expect(levels).toEqual(['warn', 'error']);
  });

  test('masks values under secret-like keys at any depth', () => {
    const { logger, lines } = capture();

    logger.error('Login failed', {
      accountId: 's1234',
      credentials: { secret: 'test-secret' },
      password: 'x',
      cookies: ['JSESSIONID=abc'],
    });

    expect(lines[0]).toMatchObject({
      accountId: 's1234',
      credentials: { secret: '[REDACTED]' },
      password: '[REDACTED]',
      cookies: ['[REDACTED]'],
    });
  });

  test('withCredentials masks the secret wherever it appears', () => {
    const { logger, lines } = capture();
    const log = logger.withCredentials({ secret: 'test-secret' }).forDay('2024-03-05');

    log.error('Typing failed: test-secret rejected', {
      error: 'value test-secret not accepted',
      page: { text: ['hello test-secret'] },
    });

    expect(lines[0]).toMatchObject({
      msg: 'Typing failed: [REDACTED] rejected',
      date: '2024-03-05',
      error: 'value [REDACTED] not accepted',
      page: { text: ['hello [REDACTED]'] },
    });
  });

  test('an empty secret masks nothing', () => {
    const { logger, lines } = capture();

    logger.withCredentials({ secret: '' }).info('Opening login page');

    expect(lines[0].msg).toBe('Opening login page');
  });

  test('the default sink writes through the console method of the level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    new Logger({ level: 'info' }).warn('Could not return to a fresh entry form', { after: '2024-03-01' });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({
      level: 'warn',
      after: '2024-03-01',
    });
  });
});

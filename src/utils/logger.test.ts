import { afterEach, describe, it, expect, vi } from 'vitest';
import { formatLog, logger, LogLevel, setDebugLogging } from './logger';

describe('formatLog', () => {
  it('should format level, message and metadata on one line', () => {
    expect(
      formatLog({
        level: LogLevel.INFO,
        message: 'Jobs processed',
        timestamp: '2024-05-01T12:00:00.000Z',
        metadata: { processed: 2 },
      })
    ).toBe('[2024-05-01T12:00:00.000Z] INFO: Jobs processed {"processed":2}');
  });

  it('should omit missing metadata', () => {
    expect(
      formatLog({ level: LogLevel.WARN, message: 'Slow', timestamp: '2024-05-01T12:00:00.000Z' })
    ).toBe('[2024-05-01T12:00:00.000Z] WARN: Slow');
  });
});

describe('logger.debug', () => {
  afterEach(() => {
    setDebugLogging(false);
    vi.restoreAllMocks();
  });

  it('should stay silent unless debug logging is on', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    setDebugLogging(false);
    logger.debug('Invalid signature');
    expect(log).not.toHaveBeenCalled();

    setDebugLogging(true);
    logger.debug('Invalid signature');
    expect(log).toHaveBeenCalledTimes(1);
  });
});

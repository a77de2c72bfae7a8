import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, LOG_LEVELS, NoopLogger, createLogger } from '../logging.js';

describe('ConsoleLogger', () => {
  it('should drop messages below the configured level', () => {
    const sink = vi.fn();
    const logger = new ConsoleLogger({ level: 'warn', format: 'compact', sink });

    logger.info('ignored');
    logger.warn('Registry lookup failed', { image: 'nginx:1.25' });

    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink).toHaveBeenCalledWith('[WARN] Registry lookup failed {"image":"nginx:1.25"}');
  });

  it('should write JSON lines', () => {
    const sink = vi.fn();
    const logger = new ConsoleLogger({ format: 'json', includeTimestamps: false, sink });

    logger.error('Service create failed', { status: 409 });

    expect(sink).toHaveBeenCalledWith(
      '{"level":"error","message":"Service create failed","status":409}'
    );
  });

  it('should write context on its own lines in pretty format', () => {
    const sink = vi.fn();
    const logger = new ConsoleLogger({ level: 'debug', includeTimestamps: false, sink });

    logger.debug('Outgoing request', { method: 'POST' });
    logger.info('done');

    expect(sink).toHaveBeenNthCalledWith(1, '[DEBUG] Outgoing request \n  method: "POST"');
    expect(sink).toHaveBeenNthCalledWith(2, '[INFO] done');
  });
});

describe('createLogger', () => {
  it('should disable logging without a level', () => {
    expect(createLogger()).toBeInstanceOf(NoopLogger);
    expect(createLogger('info')).toBeInstanceOf(ConsoleLogger);
  });
});

describe('LOG_LEVELS', () => {
  it('should list levels from most to least verbose', () => {
    expect(LOG_LEVELS).toEqual(['trace', 'debug', 'info', 'warn', 'error']);
  });
});

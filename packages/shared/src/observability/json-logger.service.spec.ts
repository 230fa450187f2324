import { JsonLoggerService } from './json-logger.service';
import { RequestContext } from './request-context';

describe('JsonLoggerService', () => {
  let lines: string[];
  let logger: JsonLoggerService;

  beforeEach(() => {
    lines = [];
    logger = new JsonLoggerService('auction-service', (line) => lines.push(line));
  });

  function lastEntry(): Record<string, unknown> {
    return JSON.parse(lines[lines.length - 1]);
  }

  it('writes one JSON line per entry', () => {
    logger.log('Session opened', 'SessionService');
    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith('\n')).toBe(true);
    expect(lastEntry()).toMatchObject({
      level: 'info',
      service: 'auction-service',
      context: 'SessionService',
      event: 'Session opened',
    });
  });

  it('merges structured messages into the entry', () => {
    logger.warn(JSON.stringify({ event: 'db_retry', attempt: 2 }), 'DbRetry');
    expect(lastEntry()).toMatchObject({ level: 'warn', event: 'db_retry', attempt: 2 });
  });

  it('enriches entries from the request context', () => {
    RequestContext.run({ requestId: 'req-1' }, () => {
      RequestContext.set({ userId: 'u-1' });
      logger.error('boom', 'stack-trace', 'BidService');
    });
    expect(lastEntry()).toMatchObject({
      level: 'error',
      requestId: 'req-1',
      userId: 'u-1',
      trace: 'stack-trace',
    });
    expect(Object.keys(lastEntry())).not.toContain('sessionId');
  });
});

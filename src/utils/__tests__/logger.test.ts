import { logger } from '../logger';
import { resolveRequestId } from '../requestId';

describe('logger', () => {
  afterEach(() => {
    logger.setLevel('silent');
    jest.restoreAllMocks();
  });

  it('should redact secret-looking keys at any depth', () => {
    const line = logger.formatMessage('INFO', 'Catalog configured', {
      requestId: 'req-1',
      airtable: { apiKey: 'test-secret', baseId: 'base-1' },
      authorization: 'Bearer test-secret',
    });

    expect(line).toMatch(/^\[\S+\] \[INFO\] Catalog configured /);
    expect(line.endsWith(
      '{"requestId":"req-1","airtable":{"apiKey":"[REDACTED]","baseId":"base-1"},"authorization":"[REDACTED]"}'
    )).toBe(true);
  });

  it('should omit the context when none is given', () => {
    expect(logger.formatMessage('WARN', 'No context')).toMatch(/^\[\S+\] \[WARN\] No context$/);
  });

  it('should suppress messages below the configured level', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    logger.setLevel('warn');

    logger.info('hidden');
    logger.warn('shown', { requestId: 'req-2' });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain('[WARN] shown {"requestId":"req-2"}');
  });
});

describe('resolveRequestId', () => {
  it('should keep a well-formed incoming id', () => {
    expect(resolveRequestId('abc-123.x_y')).toBe('abc-123.x_y');
  });

  it('should mint a new id for missing or unsafe values', () => {
    expect(resolveRequestId(undefined)).toMatch(/^\d+-[a-z0-9]+$/);
    expect(resolveRequestId('bad id\n')).toMatch(/^\d+-[a-z0-9]+$/);
    expect(resolveRequestId('x'.repeat(65))).not.toBe('x'.repeat(65));
  });
});

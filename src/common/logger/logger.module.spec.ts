import { asyncLocalStorage } from './request-context';
import { requestContextFormat } from './logger.module';

describe('requestContextFormat', () => {
  const format = requestContextFormat();

  it('should add correlation ID and username inside a request', () => {
    asyncLocalStorage.run({ correlationId: 'corr-9', username: 'jdoe' }, () => {
      const info = format.transform({ level: 'info', message: 'Asset saved' });

      expect(info).toEqual({
        level: 'info',
        message: 'Asset saved',
        correlationId: 'corr-9',
        username: 'jdoe',
      });
    });
  });

  it('should leave entries untouched outside a request', () => {
    const info = format.transform({ level: 'warn', message: 'Tag fallback' });

    expect(info).toEqual({ level: 'warn', message: 'Tag fallback' });
  });
});

import { Logger } from '../src/common/interceptors/logging.interceptor';
import { RequestContext } from '../src/common/request-context/request-context';

describe('Logger', () => {
  const originalLevel = process.env.LOG_LEVEL;
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
    Logger.setLevel('');
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('drops messages below LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';

    Logger.log('invoice created', 'InvoicesService');
    Logger.warn('slow query', 'ReportsService');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('prefers a pinned level over the environment', () => {
    process.env.LOG_LEVEL = 'debug';
    Logger.setLevel('ERROR');

    Logger.warn('ignored');

    expect(Logger.level).toBe('error');
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('falls back to debug for an unknown level', () => {
    process.env.LOG_LEVEL = 'verbose';
    expect(Logger.level).toBe('debug');
  });

  it('tags messages with the current request id', () => {
    process.env.LOG_LEVEL = 'info';

    RequestContext.run({ requestId: 'req-42' }, () => {
      Logger.log('payment recorded', 'PaymentsService');
    });

    expect(logSpy.mock.calls[0][0]).toMatch(/^\[LOG\] \S+ \[PaymentsService:req-42\] payment recorded$/);
  });

  it('omits the request id outside a request', () => {
    process.env.LOG_LEVEL = 'info';

    Logger.log('sweep finished');

    expect(logSpy.mock.calls[0][0]).toMatch(/^\[LOG\] \S+ \[App\] sweep finished$/);
  });
});

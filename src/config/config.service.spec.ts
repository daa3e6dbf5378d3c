import { ConfigService } from './config.service';

describe('ConfigService', () => {
  const keys = ['DB_HOST', 'DB_PORT', 'PORT', 'CORS_ORIGIN'] as const;
  const saved: Record<string, string | undefined> = {};
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    keys.forEach((key) => {
      saved[key] = process.env[key];
      delete process.env[key];
    });
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    keys.forEach((key) => {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    });
    warnSpy.mockRestore();
  });

  it('reads values from the process environment', () => {
    process.env.DB_HOST = 'db.internal';

    expect(new ConfigService().get('DB_HOST')).toBe('db.internal');
  });

  it('throws for a missing required key', () => {
    expect(() => new ConfigService().get('DB_HOST')).toThrow(
      'Configuration error: Missing required environment variable DB_HOST',
    );
  });

  it('falls back for optional keys', () => {
    const config = new ConfigService();

    expect(config.getOrDefault('CORS_ORIGIN', 'http://localhost:8080')).toBe('http://localhost:8080');
    expect(config.getNumber('PORT', 5000)).toBe(5000);
  });

  it('parses numbers and ignores garbage', () => {
    process.env.DB_PORT = '6543';
    process.env.PORT = 'abc';
    const config = new ConfigService();

    expect(config.getNumber('DB_PORT', 5432)).toBe(6543);
    expect(config.getNumber('PORT', 5000)).toBe(5000);
  });

  it('is not production under test', () => {
    expect(new ConfigService().isProduction).toBe(false);
  });
});

import 'reflect-metadata';
import { validate } from './env-validation';

describe('env-validation', () => {
  it('should validate valid configuration', () => {
    const config = {
      NODE_ENV: 'development',
      PORT: 3000,
      TAG_PREFIX_CONFIG_PATH: '/etc/registry/tag-prefixes.json',
    };

    const result = validate(config);
    expect(result.NODE_ENV).toBe('development');
    expect(result.PORT).toBe(3000);
    expect(result.TAG_PREFIX_CONFIG_PATH).toBe('/etc/registry/tag-prefixes.json');
  });

  it('should use default values in non-production', () => {
    const result = validate({});
    expect(result.NODE_ENV).toBe('development');
    expect(result.PORT).toBe(3000);
    expect(result.ACTOR_HEADER).toBe('x-remote-user');
    expect(result.DB_PASSWORD).toBeUndefined();
  });

  it('should convert numeric strings from the environment', () => {
    const result = validate({ PORT: '8080', DB_PORT: '6543' });
    expect(result.PORT).toBe(8080);
    expect(result.DB_PORT).toBe(6543);
  });

  it('should throw error for invalid NODE_ENV', () => {
    expect(() => validate({ NODE_ENV: 'invalid' })).toThrow();
  });

  it('should reject an unknown database driver', () => {
    expect(() => validate({ DB_TYPE: 'mysql' })).toThrow();
    expect(validate({ DB_TYPE: 'better-sqlite3' }).DB_TYPE).toBe('better-sqlite3');
  });

  it('should throw error for invalid PORT type', () => {
    expect(() => validate({ PORT: 'not-a-number' })).toThrow();
  });

  it('should reject an actor header with invalid characters', () => {
    expect(() => validate({ ACTOR_HEADER: 'X Remote User' })).toThrow();
  });

  it('should require the database password in production', () => {
    expect(() => validate({ NODE_ENV: 'production' })).toThrow();
    expect(() =>
      validate({ NODE_ENV: 'production', DB_PASSWORD: 'test-secret' }),
    ).not.toThrow();
  });
});

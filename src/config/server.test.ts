import { describe, expect, it } from 'vitest';
import { resolveDatabaseConfig, resolveServerConfig } from './server';

describe('resolveServerConfig', () => {
  it('applies defaults', () => {
    expect(resolveServerConfig({ env: {} })).toEqual({ port: 3000, jsonBodyLimit: '1mb', nodeEnv: 'development' });
  });

  it('falls back on an invalid port', () => {
    expect(resolveServerConfig({ env: { PORT: 'eighty', NODE_ENV: 'production' } })).toMatchObject({
      port: 3000,
      nodeEnv: 'production'
    });
  });
});

describe('resolveDatabaseConfig', () => {
  it('requires DATABASE_URL', () => {
    expect(() => resolveDatabaseConfig({ env: { DATABASE_URL: ' ' } })).toThrow(
      'DATABASE_URL must be set before starting the API'
    );
  });

  it('reads the pool size', () => {
    expect(
      resolveDatabaseConfig({ env: { DATABASE_URL: 'postgres://localhost/ppe_test', DB_POOL_MAX: '4' } })
    ).toEqual({ connectionString: 'postgres://localhost/ppe_test', poolMax: 4 });
  });
});

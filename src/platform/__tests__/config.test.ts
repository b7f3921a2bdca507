import { describe, it, expect } from 'vitest';
import { loadConfig, requireDatabaseUrl } from '../config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.DB_POOL_MIN).toBe(2);
    expect(config.DB_POOL_MAX).toBe(10);
    expect(config.TOP_PRODUCTS_LIMIT).toBe(5);
    expect(config.DATABASE_URL).toBeUndefined();
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ PORT: '8080', TOP_PRODUCTS_LIMIT: '3' });
    expect(config.PORT).toBe(8080);
    expect(config.TOP_PRODUCTS_LIMIT).toBe(3);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ TOP_PRODUCTS_LIMIT: '0' })).toThrow(/TOP_PRODUCTS_LIMIT/);
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/PORT/);
  });

  it('requires a database url only when asked', () => {
    expect(() => requireDatabaseUrl(loadConfig({}))).toThrow('DATABASE_URL is not set');
    expect(requireDatabaseUrl(loadConfig({ DATABASE_URL: 'postgres://localhost/retail' }))).toBe(
      'postgres://localhost/retail'
    );
  });
});

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';

describe('loadConfig', () => {

  it('ska använda standardvärden', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 3000,
      nodeEnv: 'development',
      storage: { driver: 'file', dataDir: './data' },
      apiKeys: [],
      corsAllowedOrigins: ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:3000'],
      rateLimit: { apiMax: 100, optimizeMax: 10 },
    });
  });

  it('ska behandla tomma variabler som ej satta', () => {
    const config = loadConfig({ PORT: '', DATA_DIR: '', SUPABASE_URL: '', API_KEYS: '' });

    expect(config.port).toBe(3000);
    expect(config.storage).toEqual({ driver: 'file', dataDir: './data' });
    expect(config.apiKeys).toEqual([]);
  });

  it('ska dela upp kommaseparerade listor', () => {
    const config = loadConfig({
      API_KEYS: 'test-key-1, test-key-2,,',
      CORS_ALLOWED_ORIGINS: 'https://example.com',
    });

    expect(config.apiKeys).toEqual(['test-key-1', 'test-key-2']);
    expect(config.corsAllowedOrigins).toEqual(['https://example.com']);
  });

  it('ska läsa port och gränser som tal', () => {
    const config = loadConfig({ PORT: '8080', RATE_LIMIT_API_MAX: '50', RATE_LIMIT_OPTIMIZE_MAX: '5' });

    expect(config.port).toBe(8080);
    expect(config.rateLimit).toEqual({ apiMax: 50, optimizeMax: 5 });
  });

  it('ska läsa loggnivå', () => {
    expect(loadConfig({ LOG_LEVEL: 'warn' }).logLevel).toBe('warn');
    expect(loadConfig({ LOG_LEVEL: '' }).logLevel).toBeUndefined();
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow('Ogiltig konfiguration: LOG_LEVEL');
  });

  it('ska välja minneslagring', () => {
    expect(loadConfig({ STORAGE_DRIVER: 'memory' }).storage).toEqual({ driver: 'memory' });
  });

  it('ska kräva Supabase-uppgifter för supabase-drivrutinen', () => {
    expect(() => loadConfig({ STORAGE_DRIVER: 'supabase' })).toThrow('STORAGE_DRIVER=supabase kräver');

    const config = loadConfig({
      STORAGE_DRIVER: 'supabase',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_KEY: 'test-key',
    });
    expect(config.storage).toEqual({ driver: 'supabase', url: 'http://localhost:54321', key: 'test-key' });
  });

  it('ska avvisa ogiltiga värden', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('Ogiltig konfiguration: PORT');
    expect(() => loadConfig({ STORAGE_DRIVER: 'redis' })).toThrow('Ogiltig konfiguration: STORAGE_DRIVER');
  });

});

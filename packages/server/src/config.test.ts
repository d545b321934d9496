import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      databasePath: './data/showdesk.db',
      corsOrigin: '*',
      nodeEnv: 'development',
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      DATABASE_PATH: '/tmp/test.db',
      CORS_ORIGIN: 'https://example.com',
      NODE_ENV: 'production',
    });

    expect(config).toEqual({
      port: 8080,
      databasePath: '/tmp/test.db',
      corsOrigin: 'https://example.com',
      nodeEnv: 'production',
    });
  });

  it('should name the variables that fail to parse', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid configuration: PORT: /);
  });
});

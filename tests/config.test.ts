import { describe, it, expect, beforeEach, vi } from 'vitest';

// Mock environment before importing config
const mockEnv = {
  LIMITS_PATH: 'config/limits.json',
  WEIGHT_SCHEME: '1/Si',
  POLLUTED_THRESHOLD: '100',
  PORT: '8080',
  HOST: '0.0.0.0',
  CORS_ORIGINS: 'http://localhost:3000',
  LOG_LEVEL: 'info',
  RATE_LIMIT_MAX: '100',
  RATE_LIMIT_WINDOW: '1 minute',
  BODY_LIMIT_BYTES: '1048576',
};

describe('Configuration Validation', () => {
  beforeEach(() => {
    // Reset modules before each test
    vi.resetModules();
    Object.assign(process.env, mockEnv);
    delete process.env.ADMIN_TOKEN;
  });

  it('should read the limits path', async () => {
    const { config } = await import('../config.js');
    expect(config.limitsPath).toBe('config/limits.json');
  });

  it('should accept the equal weighting scheme', async () => {
    process.env.WEIGHT_SCHEME = 'equal';
    const { config } = await import('../config.js');
    expect(config.weightScheme).toBe('equal');
  });

  it('should reject unknown weighting schemes', async () => {
    process.env.WEIGHT_SCHEME = 'quadratic';

    await expect(async () => {
      await import('../config.js');
    }).rejects.toThrow('Invalid value for env var WEIGHT_SCHEME');
  });

  it('should default the weighting scheme to 1/Si', async () => {
    delete process.env.WEIGHT_SCHEME;
    const { config } = await import('../config.js');
    expect(config.weightScheme).toBe('1/Si');
  });

  it('should reject a non-positive polluted threshold', async () => {
    process.env.POLLUTED_THRESHOLD = '0';

    await expect(async () => {
      await import('../config.js');
    }).rejects.toThrow('Invalid value for env var POLLUTED_THRESHOLD');
  });

  it('should validate admin token length (minimum 8 characters)', async () => {
    process.env.ADMIN_TOKEN = 'short';

    await expect(async () => {
      await import('../config.js');
    }).rejects.toThrow('Invalid value for env var ADMIN_TOKEN');
  });

  it('should accept an 8 character admin token', async () => {
    process.env.ADMIN_TOKEN = '12345678';
    const { config } = await import('../config.js');
    expect(config.adminToken).toBe('12345678');
  });

  it('should leave admin editing disabled without a token', async () => {
    const { config } = await import('../config.js');
    expect(config.adminToken).toBeUndefined();
  });

  it('should parse CORS origins correctly', async () => {
    process.env.CORS_ORIGINS = 'http://localhost:3000,https://example.com';
    const { config } = await import('../config.js');
    expect(config.corsOrigins).toEqual(['http://localhost:3000', 'https://example.com']);
  });

  it('should use wildcard for missing CORS origins', async () => {
    delete process.env.CORS_ORIGINS;
    const { config } = await import('../config.js');
    expect(config.corsOrigins).toBe(true);
  });

  it('should parse numeric values correctly', async () => {
    process.env.PORT = '9999';
    process.env.POLLUTED_THRESHOLD = '150';
    process.env.RATE_LIMIT_MAX = '500';

    const { config } = await import('../config.js');
    expect(config.port).toBe(9999);
    expect(config.pollutedThreshold).toBe(150);
    expect(config.rateLimitMax).toBe(500);
    expect(config.bodyLimitBytes).toBe(1048576);
  });
});

import { ConfigError, loadServiceConfig } from '../../config/service-config';

describe('loadServiceConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadServiceConfig({})).toEqual({
      port: 8080,
      host: '0.0.0.0',
      serviceName: 'aiops-demo-service',
      logLevel: 'info',
      slow: { minMs: 2000, maxMs: 5000 },
      cpuSpikeMs: 3000,
      leak: { chunkBytes: 1048576, criticalChunks: 10 },
      randomSeed: undefined,
      outcomeTablePath: undefined,
      apiKey: undefined
    });
  });

  it('coerces numeric settings from strings', () => {
    const config = loadServiceConfig({
      PORT: '9090',
      SLOW_MIN_MS: '100',
      SLOW_MAX_MS: '200',
      CPU_SPIKE_MS: '50',
      LEAK_CHUNK_BYTES: '1024',
      LEAK_CRITICAL_CHUNKS: '3',
      RANDOM_SEED: '42'
    });

    expect(config.port).toBe(9090);
    expect(config.slow).toEqual({ minMs: 100, maxMs: 200 });
    expect(config.cpuSpikeMs).toBe(50);
    expect(config.leak).toEqual({ chunkBytes: 1024, criticalChunks: 3 });
    expect(config.randomSeed).toBe(42);
  });

  it('treats empty strings as unset', () => {
    const config = loadServiceConfig({ PORT: '', API_KEY: '', SERVICE_NAME: '' });

    expect(config.port).toBe(8080);
    expect(config.apiKey).toBeUndefined();
    expect(config.serviceName).toBe('aiops-demo-service');
  });

  it('trims optional strings', () => {
    expect(loadServiceConfig({ API_KEY: '  test-secret  ' }).apiKey).toBe('test-secret');
    expect(loadServiceConfig({ API_KEY: '   ' }).apiKey).toBeUndefined();
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadServiceConfig({ PORT: 'abc' })).toThrow(ConfigError);
  });

  it('rejects a port outside 1-65535', () => {
    expect(() => loadServiceConfig({ PORT: '70000' })).toThrow(/PORT/);
  });

  it('rejects a slow range whose maximum is below its minimum', () => {
    expect(() => loadServiceConfig({ SLOW_MIN_MS: '500', SLOW_MAX_MS: '100' }))
      .toThrow('Invalid configuration: SLOW_MAX_MS: SLOW_MAX_MS must be greater than or equal to SLOW_MIN_MS');
  });

  it('rejects an unknown log level', () => {
    expect(() => loadServiceConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });

  it('lists every invalid setting in one error', () => {
    try {
      loadServiceConfig({ PORT: '0', CPU_SPIKE_MS: '-1' });
      throw new Error('expected failure');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect((error as Error).message).toContain('PORT');
      expect((error as Error).message).toContain('CPU_SPIKE_MS');
    }
  });
});

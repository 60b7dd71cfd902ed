import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DEFAULT_BASE_URL,
  getCompatibleEndpoint,
  getNativeEndpoint,
  loadConfig,
  validateConfig,
} from '../index.js';

const ENV_KEYS = [
  'PORT',
  'HOST',
  'NODE_ENV',
  'AGENT_APP_ID',
  'AGENT_API_KEY',
  'AGENT_BASE_URL',
  'USE_NATIVE_API',
  'REQUEST_TIMEOUT',
  'STREAM_TIMEOUT',
];

function clearEnv(): void {
  for (const key of ENV_KEYS) {
    vi.stubEnv(key, '');
  }
}

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    clearEnv();
    const config = loadConfig();

    expect(config.server).toEqual({ port: 8080, host: '0.0.0.0', env: 'development' });
    expect(config.agent).toEqual({ appId: '', apiKey: '', baseURL: DEFAULT_BASE_URL, useNative: true });
    expect(config.transport).toEqual({ requestTimeoutMs: 180_000, streamTimeoutMs: 600_000 });
  });

  it('reads the environment', () => {
    clearEnv();
    vi.stubEnv('PORT', '9090');
    vi.stubEnv('AGENT_APP_ID', 'app-1');
    vi.stubEnv('AGENT_API_KEY', 'test-key');
    vi.stubEnv('AGENT_BASE_URL', 'https://agent.test/');
    vi.stubEnv('USE_NATIVE_API', 'false');
    vi.stubEnv('REQUEST_TIMEOUT', '30');
    vi.stubEnv('STREAM_TIMEOUT', '90');

    const config = loadConfig();

    expect(config.server.port).toBe(9090);
    expect(config.agent).toEqual({
      appId: 'app-1',
      apiKey: 'test-key',
      baseURL: 'https://agent.test',
      useNative: false,
    });
    expect(config.transport).toEqual({ requestTimeoutMs: 30_000, streamTimeoutMs: 90_000 });
  });

  it('falls back to the default on an invalid number', () => {
    clearEnv();
    vi.stubEnv('REQUEST_TIMEOUT', 'soon');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(loadConfig().transport.requestTimeoutMs).toBe(180_000);
    expect(warn).toHaveBeenCalledWith('[Config] Invalid number for REQUEST_TIMEOUT, using default: 180');
  });
});

describe('endpoints', () => {
  const agent = { appId: 'app-1', apiKey: 'test-key', baseURL: 'https://agent.test', useNative: true };

  it('builds the native completion endpoint', () => {
    expect(getNativeEndpoint(agent)).toBe('https://agent.test/api/v1/apps/app-1/completion');
  });

  it('builds the compatible-mode endpoint', () => {
    expect(getCompatibleEndpoint(agent)).toBe(
      'https://agent.test/api/v2/apps/agent/app-1/compatible-mode/v1/chat/completions',
    );
  });
});

describe('validateConfig', () => {
  it('reports missing credentials', () => {
    clearEnv();
    expect(validateConfig(loadConfig())).toEqual({
      valid: false,
      errors: ['Missing agent application ID (AGENT_APP_ID)', 'Missing agent API key (AGENT_API_KEY)'],
    });
  });

  it('reports non-positive timeouts and a bad port', () => {
    clearEnv();
    vi.stubEnv('AGENT_APP_ID', 'app-1');
    vi.stubEnv('AGENT_API_KEY', 'test-key');
    vi.stubEnv('PORT', '70000');
    vi.stubEnv('STREAM_TIMEOUT', '0');

    expect(validateConfig(loadConfig()).errors).toEqual(['Invalid PORT: 70000', 'STREAM_TIMEOUT must be positive']);
  });

  it('accepts a complete configuration', () => {
    clearEnv();
    vi.stubEnv('AGENT_APP_ID', 'app-1');
    vi.stubEnv('AGENT_API_KEY', 'test-key');

    expect(validateConfig(loadConfig())).toEqual({ valid: true, errors: [] });
  });
});

/**
 * Configuration Management Module
 *
 * Environment-driven configuration for the gateway: listener, backend
 * credentials and endpoints, and transport timeouts.
 */

import * as dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

/**
 * Backend agent application
 */
export interface AgentConfig {
  /** Agent application ID on the backend */
  appId: string;
  /** Bearer credential forwarded on every call */
  apiKey: string;
  /** API base URL */
  baseURL: string;
  /** Translate to the native agent protocol (false = compatible-mode passthrough) */
  useNative: boolean;
}

/**
 * Application Configuration
 */
export interface Config {
  server: {
    port: number;
    host: string;
    /** Node environment */
    env: string;
  };

  agent: AgentConfig;

  /** Outbound transport budgets */
  transport: {
    /** Timeout for buffered calls in milliseconds */
    requestTimeoutMs: number;
    /** Timeout for streamed calls in milliseconds, held for the life of the stream */
    streamTimeoutMs: number;
  };
}

export const DEFAULT_BASE_URL = 'https://dashscope.aliyuncs.com';

function getEnvVar(key: string, defaultValue: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    console.warn(`[Config] Invalid number for ${key}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return num;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  return {
    server: {
      port: getEnvNumber('PORT', 8080),
      host: getEnvVar('HOST', '0.0.0.0'),
      env: getEnvVar('NODE_ENV', 'development'),
    },

    agent: {
      appId: getEnvVar('AGENT_APP_ID', ''),
      apiKey: getEnvVar('AGENT_API_KEY', ''),
      baseURL: getEnvVar('AGENT_BASE_URL', DEFAULT_BASE_URL).replace(/\/+$/, ''),
      useNative: getEnvVar('USE_NATIVE_API', 'true') === 'true',
    },

    transport: {
      requestTimeoutMs: getEnvNumber('REQUEST_TIMEOUT', 180) * 1000,
      streamTimeoutMs: getEnvNumber('STREAM_TIMEOUT', 600) * 1000,
    },
  };
}

/**
 * Global configuration instance
 */
export const config: Config = loadConfig();

/**
 * Native agent completion endpoint
 */
export function getNativeEndpoint(agent: AgentConfig): string {
  return `${agent.baseURL}/api/v1/apps/${agent.appId}/completion`;
}

/**
 * Standard-protocol compatible endpoint, used when native translation is off
 */
export function getCompatibleEndpoint(agent: AgentConfig): string {
  return `${agent.baseURL}/api/v2/apps/agent/${agent.appId}/compatible-mode/v1/chat/completions`;
}

/**
 * Validate configuration
 */
export function validateConfig(target: Config = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!target.agent.appId) {
    errors.push('Missing agent application ID (AGENT_APP_ID)');
  }
  if (!target.agent.apiKey) {
    errors.push('Missing agent API key (AGENT_API_KEY)');
  }
  if (target.server.port <= 0 || target.server.port > 65535) {
    errors.push(`Invalid PORT: ${target.server.port}`);
  }
  if (target.transport.requestTimeoutMs <= 0) {
    errors.push('REQUEST_TIMEOUT must be positive');
  }
  if (target.transport.streamTimeoutMs <= 0) {
    errors.push('STREAM_TIMEOUT must be positive');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

function maskSecret(value: string): string {
  if (!value) return '(not set)';
  if (value.length <= 8) return '****';
  return `${value.slice(0, 4)}****${value.slice(-4)}`;
}

/**
 * Print configuration (for debugging)
 */
export function printConfig(target: Config = config): void {
  const endpoint = target.agent.useNative
    ? `${getNativeEndpoint(target.agent)} (native)`
    : `${getCompatibleEndpoint(target.agent)} (compatible mode)`;

  console.log('\n=== Agent Gateway Configuration ===\n');

  console.log('Server:');
  console.log(`  Host: ${target.server.host}`);
  console.log(`  Port: ${target.server.port}`);
  console.log(`  Environment: ${target.server.env}\n`);

  console.log('Agent:');
  console.log(`  App ID: ${target.agent.appId || '(not set)'}`);
  console.log(`  API Key: ${maskSecret(target.agent.apiKey)}`);
  console.log(`  Endpoint: ${endpoint}\n`);

  console.log('Transport:');
  console.log(`  Request Timeout: ${target.transport.requestTimeoutMs / 1000}s`);
  console.log(`  Stream Timeout: ${target.transport.streamTimeoutMs / 1000}s`);

  console.log('\n===================================\n');
}

export default config;

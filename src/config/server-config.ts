/**
 * Process-level settings read from the environment
 */

import { randomUUID } from 'crypto';
import { ConfigError } from '../utils/index.js';

export type ServerMode = 'stdio' | 'http' | 'both';

export interface ServerConfig {
  mode: ServerMode;
  port: number;
  host: string;
  sessionId: string;
  requestTimeoutMs: number;
  logLevel: string;
}

const MODES: readonly ServerMode[] = ['stdio', 'http', 'both'];

function isServerMode(value: string): value is ServerMode {
  return MODES.some((mode) => mode === value);
}

export function generateSessionId(): string {
  return `session-${randomUUID().replace(/-/g, '').slice(0, 8)}`;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const mode = (env.VIKUNJA_MCP_MODE || 'stdio').toLowerCase();
  const port = parseInt(env.VIKUNJA_MCP_PORT || '3000', 10);
  const host = env.VIKUNJA_MCP_HOST || '0.0.0.0';
  const requestTimeoutMs = parseInt(env.VIKUNJA_REQUEST_TIMEOUT_MS || '30000', 10);

  if (!isServerMode(mode)) {
    throw new ConfigError(`Invalid mode: ${mode}. Must be stdio, http, or both`);
  }

  if (mode !== 'stdio' && (isNaN(port) || port < 1 || port > 65535)) {
    throw new ConfigError(`Invalid port: ${env.VIKUNJA_MCP_PORT}. Must be between 1 and 65535`);
  }

  if (isNaN(requestTimeoutMs) || requestTimeoutMs <= 0) {
    throw new ConfigError(
      `Invalid request timeout: ${env.VIKUNJA_REQUEST_TIMEOUT_MS}. Must be a positive number of milliseconds`
    );
  }

  return {
    mode,
    port,
    host,
    sessionId: env.VIKUNJA_XQ_SESSION?.trim() || generateSessionId(),
    requestTimeoutMs,
    logLevel: (env.VIKUNJA_LOG_LEVEL || 'info').toLowerCase(),
  };
}

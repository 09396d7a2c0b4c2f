import { ConfigurationError } from './errors.js';
import { DEFAULT_BIND_ADDRESS, DEFAULT_UPSTREAM } from './dns-server.js';
import { DEFAULT_PORT, DEFAULT_UPSTREAM_TIMEOUT_MS, parsePort } from './upstream.js';

export interface ServerConfig {
  port: number;
  bindAddress: string;
  /** null serves local records only */
  upstream: string | null;
  failover: boolean;
  upstreamTimeoutMs: number;
  zonesFile: string | null;
  adminPort: number | null;
  adminApiKey: string | null;
  metricsPort: number | null;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const value = readString(env, name)?.toLowerCase();
  if (value === undefined) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got "${env[name]}"`);
}

function readPositiveInteger(env: Env, name: string, fallback: number): number {
  const value = readString(env, name);
  if (value === undefined) return fallback;
  const parsed = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function readPort(env: Env, name: string): number | undefined {
  const value = readString(env, name);
  return value === undefined ? undefined : parsePort(value, name);
}

/**
 * Reads the server configuration from environment variables. An empty
 * DNSERVER_UPSTREAM disables forwarding.
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const upstream = env.DNSERVER_UPSTREAM === undefined ? DEFAULT_UPSTREAM : readString(env, 'DNSERVER_UPSTREAM');

  return {
    port: readPort(env, 'DNSERVER_PORT') ?? DEFAULT_PORT,
    bindAddress: readString(env, 'DNSERVER_BIND_ADDRESS') ?? DEFAULT_BIND_ADDRESS,
    upstream: upstream ?? null,
    failover: readBoolean(env, 'DNSERVER_FAILOVER', false),
    upstreamTimeoutMs: readPositiveInteger(env, 'DNSERVER_UPSTREAM_TIMEOUT_MS', DEFAULT_UPSTREAM_TIMEOUT_MS),
    zonesFile: readString(env, 'DNSERVER_ZONES_FILE') ?? null,
    adminPort: readPort(env, 'ADMIN_PORT') ?? null,
    adminApiKey: readString(env, 'ADMIN_API_KEY') ?? null,
    metricsPort: readPort(env, 'METRICS_PORT') ?? null,
  };
}

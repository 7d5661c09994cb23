import { registerAs } from '@nestjs/config';

export const DEFAULT_UPSTREAM_BASE_URL = 'https://hourglass-qa.shieldfoundry.com';
export const DEFAULT_UPSTREAM_TIMEOUT_MS = 30000;
export const DEFAULT_CORS_ORIGIN = 'http://localhost:5173';
export const DEFAULT_PORT = 5000;

export interface GatewayConfig {
  /** Empty when no key is configured; upstream calls will then be rejected upstream. */
  apiKey: string;
  upstreamBaseUrl: string;
  upstreamTimeoutMs: number;
  corsOrigins: string[];
  corsAllowedHeaders: string;
  port: number;
}

type Env = Record<string, string | undefined>;

export function loadGatewayConfig(env: Env): GatewayConfig {
  return {
    apiKey: (env.UPSTREAM_API_KEY ?? env.API_KEY ?? '').trim(),
    upstreamBaseUrl: parseBaseUrl(env.UPSTREAM_BASE_URL),
    upstreamTimeoutMs: parsePositiveInt(
      'UPSTREAM_TIMEOUT_MS',
      env.UPSTREAM_TIMEOUT_MS,
      DEFAULT_UPSTREAM_TIMEOUT_MS,
    ),
    corsOrigins: parseList(env.CORS_ORIGINS, [DEFAULT_CORS_ORIGIN]),
    corsAllowedHeaders: env.CORS_ALLOWED_HEADERS?.trim() || '*',
    port: parsePositiveInt('PORT', env.PORT, DEFAULT_PORT),
  };
}

/** Shows the first six and last four characters only. */
export function maskApiKey(apiKey: string): string {
  if (apiKey.length <= 10) {
    return '*'.repeat(apiKey.length);
  }
  return `${apiKey.slice(0, 6)}...${apiKey.slice(-4)}`;
}

function parseBaseUrl(raw: string | undefined): string {
  const value = raw?.trim() || DEFAULT_UPSTREAM_BASE_URL;
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`UPSTREAM_BASE_URL is not a valid URL: ${value}`);
  }
  if (url.protocol !== 'https:') {
    throw new Error(`UPSTREAM_BASE_URL must use https: ${value}`);
  }
  return url.origin;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseList(raw: string | undefined, fallback: string[]): string[] {
  const entries = (raw ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return entries.length ? entries : fallback;
}

export const gatewayConfig = registerAs('gateway', (): GatewayConfig => loadGatewayConfig(process.env));

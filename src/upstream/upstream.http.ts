import axios, { AxiosInstance } from 'axios';
import { Agent } from 'https';
import { GatewayConfig } from '../config/gateway.config';

export const UPSTREAM_HTTP = Symbol('UPSTREAM_HTTP');
export const UPSTREAM_AGENT = Symbol('UPSTREAM_AGENT');

export function createUpstreamAgent(): Agent {
  return new Agent({ keepAlive: true });
}

/**
 * Status handling and body parsing are left to UpstreamClient: every status
 * resolves and the body always arrives as the raw string.
 */
export function createUpstreamHttp(config: GatewayConfig, agent: Agent): AxiosInstance {
  return axios.create({
    baseURL: config.upstreamBaseUrl,
    timeout: config.upstreamTimeoutMs,
    httpsAgent: agent,
    maxRedirects: 5,
    headers: {
      'Content-Type': 'application/json',
      'X-Api-Key': config.apiKey,
    },
    responseType: 'text',
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true,
  });
}

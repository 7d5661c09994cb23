import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance, AxiosResponse, Method, isAxiosError } from 'axios';
import { ErrorDetail, InternalError, UnavailableError, UpstreamError, describeError } from '../shared/gateway-errors';
import { UPSTREAM_HTTP } from './upstream.http';

export type QueryParams = Record<string, string | number>;

export interface UpstreamResponse {
  status: number;
  data: unknown;
}

@Injectable()
export class UpstreamClient {
  private readonly logger = new Logger(UpstreamClient.name);

  constructor(@Inject(UPSTREAM_HTTP) private readonly http: AxiosInstance) {}

  get baseUrl(): string {
    return this.http.defaults.baseURL ?? '';
  }

  get(path: string, params?: QueryParams): Promise<UpstreamResponse> {
    return this.send('GET', path, { params });
  }

  post(path: string, body: unknown): Promise<UpstreamResponse> {
    return this.send('POST', path, { data: body });
  }

  put(path: string, body: unknown): Promise<UpstreamResponse> {
    return this.send('PUT', path, { data: body });
  }

  private async send(
    method: Method,
    path: string,
    options: { params?: QueryParams; data?: unknown },
  ): Promise<UpstreamResponse> {
    this.logger.debug(`${method} ${this.baseUrl}${path} params=${JSON.stringify(options.params ?? {})}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({ method, url: path, ...options });
    } catch (error) {
      throw this.translateFailure(method, path, error);
    }

    const data = parseBody(response.data);
    if (response.status < 200 || response.status >= 300) {
      this.logger.warn(`${method} ${path} -> ${response.status}: ${JSON.stringify(data)}`);
      throw new UpstreamError(response.status, toDetail(data));
    }
    this.logger.debug(`${method} ${path} -> ${response.status}`);
    return { status: response.status, data };
  }

  private translateFailure(method: Method, path: string, error: unknown): Error {
    if (isAxiosError(error) && !error.response) {
      this.logger.error(`${method} ${path} failed: ${error.code ?? 'ERR'} ${error.message}`);
      return new UnavailableError(error.message);
    }
    this.logger.error(`${method} ${path} failed unexpectedly: ${describeError(error)}`);
    return new InternalError(describeError(error));
  }
}

/** JSON when it parses, the raw text otherwise; an empty body becomes null. */
export function parseBody(raw: unknown): unknown {
  if (typeof raw !== 'string') {
    return raw ?? null;
  }
  if (raw.trim() === '') {
    return null;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function toDetail(data: unknown): ErrorDetail {
  if (typeof data === 'string') {
    return data;
  }
  if (typeof data === 'object' && data !== null) {
    return data;
  }
  return data === null ? '' : String(data);
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { gatewayConfig } from '../config/gateway.config';
import { describeError } from '../shared/gateway-errors';
import { UpstreamClient } from '../upstream/upstream.client';

export interface ConnectionCheckResult {
  status: 'success' | 'error';
  message: string;
  url?: string;
}

export const CORS_TEST_MESSAGE = 'CORS is working properly!';

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    private readonly upstream: UpstreamClient,
    @Inject(gatewayConfig.KEY) private readonly config: ConfigType<typeof gatewayConfig>,
  ) {}

  /** Never throws: failures are reported in the result body. */
  async checkConnection(): Promise<ConnectionCheckResult> {
    if (!this.config.apiKey) {
      return { status: 'error', message: 'API key not configured' };
    }
    try {
      await this.upstream.get('/api/resources');
      return {
        status: 'success',
        message: 'Connection to upstream API successful',
        url: `${this.upstream.baseUrl}/api/resources`,
      };
    } catch (error) {
      this.logger.warn(`Connection check failed: ${describeError(error)}`);
      return { status: 'error', message: `Connection failed: ${describeError(error)}` };
    }
  }
}

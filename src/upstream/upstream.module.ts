import { Inject, Logger, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Agent } from 'https';
import { gatewayConfig } from '../config/gateway.config';
import { UpstreamClient } from './upstream.client';
import { UPSTREAM_AGENT, UPSTREAM_HTTP, createUpstreamAgent, createUpstreamHttp } from './upstream.http';

@Module({
  providers: [
    { provide: UPSTREAM_AGENT, useFactory: createUpstreamAgent },
    {
      provide: UPSTREAM_HTTP,
      useFactory: (config: ConfigType<typeof gatewayConfig>, agent: Agent) =>
        createUpstreamHttp(config, agent),
      inject: [gatewayConfig.KEY, UPSTREAM_AGENT],
    },
    UpstreamClient,
  ],
  exports: [UpstreamClient],
})
export class UpstreamModule implements OnApplicationShutdown {
  private readonly logger = new Logger(UpstreamModule.name);

  constructor(@Inject(UPSTREAM_AGENT) private readonly agent: Agent) {}

  onApplicationShutdown(signal?: string): void {
    this.agent.destroy();
    this.logger.log(`Upstream connection pool closed${signal ? ` (${signal})` : ''}`);
  }
}

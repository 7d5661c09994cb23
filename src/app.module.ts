import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { gatewayConfig } from './config/gateway.config';
import { HealthModule } from './health/health.module';
import { ResourcesModule } from './resources/resources.module';
import { SchedulesModule } from './schedules/schedules.module';
import { CorsHeadersMiddleware } from './shared/cors-headers.middleware';
import { GatewayExceptionFilter } from './shared/gateway-exception.filter';
import { RequestLoggerMiddleware } from './shared/request-logger.middleware';
import { createValidationPipe } from './shared/validation.pipe';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, cache: true, load: [gatewayConfig] }),
    ResourcesModule,
    SchedulesModule,
    HealthModule,
  ],
  providers: [
    { provide: APP_FILTER, useClass: GatewayExceptionFilter },
    { provide: APP_PIPE, useFactory: createValidationPipe },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestLoggerMiddleware, CorsHeadersMiddleware).forRoutes('*');
  }
}

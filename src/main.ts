import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { setupApp } from './app.setup';
import { gatewayConfig, maskApiKey } from './config/gateway.config';

async function bootstrap() {
  const app = setupApp(await NestFactory.create(AppModule));
  app.enableShutdownHooks();

  const logger = new Logger('Bootstrap');
  const config = app.get<ConfigType<typeof gatewayConfig>>(gatewayConfig.KEY);
  if (!config.apiKey) {
    logger.warn('UPSTREAM_API_KEY is not set. Upstream calls will fail authorization!');
  } else {
    logger.log(`API key loaded: ${maskApiKey(config.apiKey)}`);
  }

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder().setTitle('Scheduling Gateway').setVersion('1.0').build(),
  );
  SwaggerModule.setup('docs', app, document);

  await app.listen(config.port);
  logger.log(`Proxying ${config.upstreamBaseUrl} on port ${config.port}`);
}

bootstrap().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Bootstrap failed', err);
  process.exit(1);
});

import { Inject, Injectable, NestMiddleware } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NextFunction, Request, Response } from 'express';
import { GatewayConfig, gatewayConfig } from '../config/gateway.config';

export const CORS_ALLOWED_METHODS = 'GET, POST, PUT, DELETE, OPTIONS';

export function applyCorsHeaders(req: Request, res: Response, config: GatewayConfig): void {
  const origin = req.headers.origin;
  const allowedOrigin = origin && config.corsOrigins.includes(origin) ? origin : config.corsOrigins[0];
  res.setHeader('Access-Control-Allow-Origin', allowedOrigin);
  res.setHeader('Access-Control-Allow-Credentials', 'true');
  res.setHeader('Access-Control-Allow-Methods', CORS_ALLOWED_METHODS);
  res.setHeader('Access-Control-Allow-Headers', config.corsAllowedHeaders);
  res.setHeader('Vary', 'Origin');
}

/**
 * Sets the cross-origin headers on every response before routing, so error
 * responses (including 404s and filter output) stay readable by the browser.
 */
@Injectable()
export class CorsHeadersMiddleware implements NestMiddleware {
  constructor(
    @Inject(gatewayConfig.KEY) private readonly config: ConfigType<typeof gatewayConfig>,
  ) {}

  use(req: Request, res: Response, next: NextFunction): void {
    applyCorsHeaders(req, res, this.config);

    // Only real preflights stop here; a plain OPTIONS still reaches its route.
    if (req.method === 'OPTIONS' && req.headers['access-control-request-method']) {
      res.status(200).send('OK');
      return;
    }
    next();
  }
}

import { ArgumentsHost, Catch, ExceptionFilter, HttpException, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Request, Response } from 'express';
import { gatewayConfig } from '../config/gateway.config';
import { applyCorsHeaders } from './cors-headers.middleware';
import { ErrorDetail, GatewayError, InternalError, describeError } from './gateway-errors';

export interface ErrorResponse {
  status: number;
  body: { detail: ErrorDetail };
}

export function toErrorResponse(exception: unknown): ErrorResponse {
  if (exception instanceof GatewayError) {
    return { status: exception.status, body: { detail: exception.detail } };
  }
  if (exception instanceof HttpException) {
    return { status: exception.getStatus(), body: { detail: exception.message } };
  }
  const internal = new InternalError(describeError(exception));
  return { status: internal.status, body: { detail: internal.detail } };
}

@Catch()
export class GatewayExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GatewayExceptionFilter.name);

  constructor(
    @Inject(gatewayConfig.KEY) private readonly config: ConfigType<typeof gatewayConfig>,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();
    const { status, body } = toErrorResponse(exception);

    const summary = `${req.method} ${req.originalUrl} -> ${status}: ${describeError(exception)}`;
    if (status >= 500) {
      this.logger.error(summary, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(summary);
    }

    // body parser failures happen before the CORS middleware has run
    if (!res.hasHeader('Access-Control-Allow-Origin')) {
      applyCorsHeaders(req, res, this.config);
    }
    res.status(status).json(body);
  }
}

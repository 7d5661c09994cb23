export type GatewayErrorKind = 'validation' | 'upstream' | 'unavailable' | 'internal';

/** String for locally raised errors, whatever the upstream sent for UpstreamError. */
export type ErrorDetail = string | object;

export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;

  protected constructor(
    readonly status: number,
    readonly detail: ErrorDetail,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends GatewayError {
  readonly kind = 'validation';

  constructor(message: string) {
    super(400, message, message);
  }
}

export class UpstreamError extends GatewayError {
  readonly kind = 'upstream';

  constructor(status: number, detail: ErrorDetail) {
    super(status, detail, `Upstream responded with status ${status}`);
  }
}

export class UnavailableError extends GatewayError {
  readonly kind = 'unavailable';

  constructor(reason: string) {
    const detail = `Service unavailable: ${reason}`;
    super(503, detail, detail);
  }
}

export class InternalError extends GatewayError {
  readonly kind = 'internal';

  constructor(reason: string) {
    const detail = `Internal server error: ${reason}`;
    super(500, detail, detail);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

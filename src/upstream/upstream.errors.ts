import { AppError } from '../utils/app-error';

export class UpstreamError extends AppError {
  constructor(
    message: string,
    readonly status: number | null = null,
    readonly detail: unknown = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class UpstreamTimeoutError extends UpstreamError {
  constructor(timeoutMs: number) {
    super(`Upstream did not answer within ${timeoutMs}ms`);
  }
}

export class UpstreamProtocolError extends UpstreamError {
  constructor(status: number, detail: unknown) {
    super('Upstream response has an unexpected shape', status, detail);
  }
}

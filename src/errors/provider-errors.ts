import { EmergencyDeskError, UnexpectedError, ValidationError, handleUnknownError } from './index';

/**
 * The completion endpoint answered with a non-2xx status.
 * `body` is the response body exactly as received.
 */
export class UpstreamError extends EmergencyDeskError {
  readonly kind = 'upstream' as const;

  constructor(public readonly status: number, public readonly body: string) {
    super(`Completion endpoint returned ${status}`, 'UPSTREAM_ERROR');
    this.name = 'UpstreamError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamError);
    }
  }
}

/**
 * The request never produced a response: DNS, refused connection, TLS or timeout.
 */
export class TransportError extends EmergencyDeskError {
  readonly kind = 'transport' as const;

  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'TRANSPORT_ERROR');
    this.name = 'TransportError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransportError);
    }
  }
}

export class MalformedResponseError extends UnexpectedError {
  constructor(message: string, public readonly response: unknown, cause?: unknown) {
    super(`Malformed completion response: ${message}`, cause);
    this.name = 'MalformedResponseError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MalformedResponseError);
    }
  }
}

export type HandlerError = ValidationError | UpstreamError | TransportError | UnexpectedError;

export function isHandlerError(e: unknown): e is HandlerError {
  return (
    e instanceof ValidationError ||
    e instanceof UpstreamError ||
    e instanceof TransportError ||
    e instanceof UnexpectedError
  );
}

/**
 * Narrows anything caught at a handler boundary to one of the four reportable kinds.
 */
export function toHandlerError(e: unknown, context: string): HandlerError {
  if (isHandlerError(e)) {
    return e;
  }
  const err = handleUnknownError(e, context);
  return new UnexpectedError(err.message, e);
}

/**
 * Error taxonomy shared by the HTTP and queue paths.
 *
 * Every error carries a stable `code` for logs and metrics and the HTTP status
 * a synchronous route answers with. Errors raised on the queue path are never
 * shown to the webhook sender; they only decide whether a message is retried.
 */

export type ValidationReason =
  | 'MissingBody'
  | 'MissingTriggers'
  | 'InvalidTrigger'
  | 'InvalidTimestamp'
  | 'InvalidPayload';

export abstract class ServiceError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends ServiceError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(readonly reason: ValidationReason, message: string) {
    super(message);
  }
}

export class RouteNotFoundError extends ServiceError {
  readonly code = 'ROUTE_NOT_FOUND';
  readonly statusCode = 404;
}

export class MethodNotAllowedError extends ServiceError {
  readonly code = 'METHOD_NOT_ALLOWED';
  readonly statusCode = 405;
}

export class ConfigurationError extends ServiceError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly statusCode = 500;
}

export class NotFoundError extends ServiceError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;
}

// The event was recorded but its video never arrived
export class VideoNotAvailableError extends ServiceError {
  readonly code = 'VIDEO_NOT_AVAILABLE';
  readonly statusCode = 404;
}

export class StorageError extends ServiceError {
  readonly code = 'STORAGE_ERROR';
  readonly statusCode = 500;
}

export class QueueError extends ServiceError {
  readonly code = 'QUEUE_ERROR';
  readonly statusCode = 500;
}

export class CredentialsError extends ServiceError {
  readonly code = 'CREDENTIALS_ERROR';
  readonly statusCode = 500;
}

/**
 * Video acquisition failures. Both are retried through queue redelivery.
 */
export abstract class AcquisitionError extends ServiceError {
  readonly statusCode = 502;
}

export class AcquisitionTimeoutError extends AcquisitionError {
  readonly code = 'ACQUISITION_TIMEOUT';
}

export class AcquisitionAuthError extends AcquisitionError {
  readonly code = 'ACQUISITION_AUTH_ERROR';
}

export class AcquisitionFailedError extends AcquisitionError {
  readonly code = 'ACQUISITION_FAILED';
}

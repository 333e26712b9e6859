// source/handler/errors.ts
// Typed failures surfaced to whoever hosts the handler.

export class HandlerError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when the handler is wired incorrectly, e.g. the dispatcher never
 * attached a path-within-mapping to the request. Not meant to be recovered
 * per request.
 */
export class ConfigurationError extends HandlerError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR');
  }
}

export class MethodNotSupportedError extends HandlerError {
  readonly method: string;
  readonly supportedMethods: readonly string[];

  constructor(method: string, supportedMethods: readonly string[]) {
    super(
      `Request method '${method}' not supported`,
      405,
      'METHOD_NOT_SUPPORTED',
    );
    this.method = method;
    this.supportedMethods = supportedMethods;
  }
}

export class ResourceNotFoundError extends HandlerError {
  readonly resource: string;

  constructor(resource: string, options?: { cause?: unknown }) {
    super(`${resource} could not be opened`, 404, 'RESOURCE_NOT_FOUND');
    this.resource = resource;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

const isErrnoException = (
  value: unknown,
): value is NodeJS.ErrnoException =>
  value instanceof Error && 'code' in value;

export const isMissingEntry = (value: unknown): boolean =>
  isErrnoException(value) &&
  (value.code === 'ENOENT' || value.code === 'ENOTDIR');

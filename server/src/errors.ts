export type ServiceErrorCode = 'CONFIG_INVALID' | 'FORMAT_INVALID' | 'NOT_FOUND' | 'UPSTREAM_FAILED' | 'INTERNAL';

export abstract class ServiceError extends Error {
  abstract readonly code: ServiceErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or unreadable configuration/data for an enabled service. Fatal at startup. */
export class ConfigError extends ServiceError {
  readonly code = 'CONFIG_INVALID';
}

/** The question name does not match the service grammar. */
export class FormatError extends ServiceError {
  readonly code = 'FORMAT_INVALID';
}

/** Place name not present in the geo index. */
export class ResolutionError extends ServiceError {
  readonly code = 'NOT_FOUND';
}

/** External data source unreachable, errored or timed out. Never cached. */
export class UpstreamError extends ServiceError {
  readonly code = 'UPSTREAM_FAILED';
}

export class InternalError extends ServiceError {
  readonly code = 'INTERNAL';
}

export function toServiceError(err: unknown): ServiceError {
  if (err instanceof ServiceError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new InternalError(message || 'INTERNAL', { cause: err });
}

/** Request-time errors the client caused (as opposed to server-side failures). */
export function isNegativeError(err: ServiceError): boolean {
  return err instanceof FormatError || err instanceof ResolutionError;
}

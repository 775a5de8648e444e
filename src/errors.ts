export type DdnsErrorKind =
  | 'configuration'
  | 'network'
  | 'decode'
  | 'not-found'
  | 'api';

/** Base class for every failure the updater reports */
export abstract class DdnsError extends Error {
  abstract readonly kind: DdnsErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or unusable settings; raised before any request is made */
export class ConfigurationError extends DdnsError {
  readonly kind = 'configuration';
}

/** Transport failure, timeout, or an unreadable response body */
export class NetworkError extends DdnsError {
  readonly kind = 'network';
}

/** Response body is not JSON, or not in the expected shape */
export class DecodeError extends DdnsError {
  readonly kind = 'decode';
}

/** The provider returned no record for the requested ID */
export class NotFoundError extends DdnsError {
  readonly kind = 'not-found';
}

export interface ApiErrorOptions extends ErrorOptions {
  /** HTTP status code, when the failure came from one */
  status?: number;
  /** Message reported by the provider */
  providerMessage?: string;
}

/** The provider answered, but reported a failure */
export class ApiError extends DdnsError {
  readonly kind = 'api';
  readonly status?: number;
  readonly providerMessage?: string;

  constructor(message: string, options: ApiErrorOptions = {}) {
    const { status, providerMessage, ...rest } = options;
    super(message, rest);
    this.status = status;
    this.providerMessage = providerMessage;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * shared/errors.ts — Error kinds surfaced by the analytics pipeline
 *
 * Each error carries the HTTP status and machine code the API envelope reports.
 * Anything that is not an AnalysisError is treated as an internal failure.
 */

export class AnalysisError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

/** Malformed caller input: bad bounds, non-array deals, non-numeric amounts. */
export class InvalidInputError extends AnalysisError {
  constructor(message: string) {
    super(message, 400, 'INVALID_INPUT');
  }
}

/** Not enough qualifying deals to compute a sample-based figure. */
export class InsufficientDataError extends AnalysisError {
  constructor(message: string) {
    super(message, 422, 'INSUFFICIENT_DATA');
  }
}

export class AddressNotFoundError extends AnalysisError {
  constructor(address: string) {
    super(`No results found for address: ${address}`, 404, 'ADDRESS_NOT_FOUND');
  }
}

/** Registry request failed after retries, or answered with an unexpected shape. */
export class RegistryError extends AnalysisError {
  readonly endpoint: string;

  constructor(endpoint: string, message: string) {
    super(`Registry ${endpoint} failed: ${message}`, 502, 'UPSTREAM_ERROR');
    this.endpoint = endpoint;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

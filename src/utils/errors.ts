/**
 * Error categories of a scraping run.
 *
 * TransportError and PersistenceError are thrown; ExtractionError and
 * DataQualityError are usually only logged because they never abort a run.
 */

export class TransportError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, status?: number) {
    super(message);
    this.name = 'TransportError';
    this.url = url;
    this.status = status;
  }
}

export class ExtractionError extends Error {
  readonly listingId: string | null;

  constructor(message: string, listingId: string | null = null) {
    super(message);
    this.name = 'ExtractionError';
    this.listingId = listingId;
  }
}

export class PersistenceError extends Error {
  readonly operation: string;
  readonly code?: string;

  constructor(operation: string, message: string, code?: string) {
    super(`${operation} failed: ${message}`);
    this.name = 'PersistenceError';
    this.operation = operation;
    this.code = code;
  }
}

export class DataQualityError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'DataQualityError';
    this.field = field;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

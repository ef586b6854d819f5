export class EnumerationError extends Error {
  readonly entryPoint: string;

  constructor(entryPoint: string, message: string, options?: ErrorOptions) {
    super(`Entry point ${entryPoint} is unreachable: ${message}`, options);
    this.name = 'EnumerationError';
    this.entryPoint = entryPoint;
  }
}

export type FetchErrorKind = 'transient' | 'permanent';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status?: number;

  constructor(kind: FetchErrorKind, url: string, message: string, status?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FetchError';
    this.kind = kind;
    this.url = url;
    this.status = status;
  }
}

export class ExtractionError extends Error {
  readonly kind = 'missing_required_field' as const;
  readonly field: string;

  constructor(field: string) {
    super(`Required marker "${field}" not found; not a book page`);
    this.name = 'ExtractionError';
    this.field = field;
  }
}

export type ValidationErrorKind = 'missing_field' | 'malformed_field';

export class ValidationError extends Error {
  readonly kind: ValidationErrorKind;
  readonly field: string;

  constructor(kind: ValidationErrorKind, field: string, detail?: string) {
    const base = kind === 'missing_field' ? `Missing field "${field}"` : `Malformed field "${field}"`;
    super(detail ? `${base}: ${detail}` : base);
    this.name = 'ValidationError';
    this.kind = kind;
    this.field = field;
  }
}

/**
 * transient: the batch may succeed if delivered again.
 * permanent: the record (or batch) will never be accepted as is.
 * fatal: the store itself is unusable; the run stops.
 */
export type StoreErrorKind = 'transient' | 'permanent' | 'fatal';

export class StoreError extends Error {
  readonly kind: StoreErrorKind;
  readonly code?: string;

  constructor(kind: StoreErrorKind, message: string, code?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StoreError';
    this.kind = kind;
    this.code = code;
  }
}

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid run configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Error classes shared by the lookup pipeline and the CLI.
 *
 * `fatal` errors abort a run before any lookups happen; everything else is
 * recovered from where it is raised and only ever logged.
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly fatal: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    fatal: boolean,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.fatal = fatal;
    this.context = context;
  }
}

export class ExtractionError extends AppError {
  constructor(path: string, cause: unknown) {
    super(
      `Cannot read input file ${path}: ${errorMessage(cause)}`,
      "EXTRACTION_ERROR",
      true,
      { path }
    );
  }
}

export class InvalidHashType extends AppError {
  constructor(value: string) {
    super(
      `Unsupported hash type "${value}" ` +
        "(expected one of nt, lm, md5, sha1, sha256)",
      "INVALID_HASH_TYPE",
      true,
      { value }
    );
  }
}

export class UsageError extends AppError {
  constructor(message: string) {
    super(message, "USAGE_ERROR", true);
  }
}

export class TransportError extends AppError {
  public readonly status: number | null;
  public readonly retryable: boolean;

  constructor(message: string, status: number | null, retryable: boolean) {
    super(message, "TRANSPORT_ERROR", false, { status });
    this.status = status;
    this.retryable = retryable;
  }
}

export class IncompleteResponseError extends AppError {
  public readonly missing: string[];

  constructor(missing: string[]) {
    super(
      `Response omitted ${missing.length} requested hash(es)`,
      "INCOMPLETE_RESPONSE",
      false,
      { missing: missing.length }
    );
    this.missing = missing;
  }
}

export class OutputWriteError extends AppError {
  constructor(path: string, cause: unknown) {
    super(
      `Cannot write output file ${path}: ${errorMessage(cause)}`,
      "OUTPUT_WRITE_ERROR",
      false,
      { path }
    );
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

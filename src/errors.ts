export class NovelCliError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "NovelCliError";
    this.exitCode = exitCode;
  }
}

export const EXIT_USAGE = 2;
export const EXIT_AUTH = 3;
export const EXIT_ORACLE_EXHAUSTED = 4;

/**
 * Failure raised by an oracle adapter after transport errors have been classified.
 * Callers above the adapters only ever see this hierarchy, never raw HTTP/client errors.
 */
export class OracleError extends NovelCliError {
  public readonly retryable: boolean;
  public readonly status: number | null;

  constructor(message: string, opts: { retryable?: boolean; status?: number | null; exitCode?: number } = {}) {
    super(message, opts.exitCode ?? 1);
    this.name = "OracleError";
    this.retryable = opts.retryable ?? false;
    this.status = opts.status ?? null;
  }
}

export class AuthError extends OracleError {
  constructor(message: string, status: number | null = null) {
    super(message, { retryable: false, status, exitCode: EXIT_AUTH });
    this.name = "AuthError";
  }
}

export class RateLimitedError extends OracleError {
  constructor(message: string, status: number | null = 429) {
    super(message, { retryable: true, status });
    this.name = "RateLimitedError";
  }
}

export class TransientHttpError extends OracleError {
  constructor(message: string, status: number | null = null) {
    super(message, { retryable: true, status });
    this.name = "TransientHttpError";
  }
}

export class OracleExhaustedError extends OracleError {
  public readonly attempts: number;
  public readonly lastError: OracleError;

  constructor(attempts: number, lastError: OracleError) {
    super(`Oracle failed after ${attempts} attempt(s): ${lastError.message}`, {
      retryable: false,
      status: lastError.status,
      exitCode: EXIT_ORACLE_EXHAUSTED
    });
    this.name = "OracleExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Warehouse error types.
 *
 * Row-level data-quality problems never surface here; the Silver rules absorb
 * them. These classes cover the batch and step failures that propagate to the
 * caller.
 */

export type Severity = "warning" | "error" | "fatal";

export interface ErrorDiagnostic {
  code: string;
  severity: Severity;
  step?: string;
  message: string;
}

export class WarehouseError extends Error {
  readonly code: string;
  readonly severity: Severity;
  readonly step?: string;

  constructor(code: string, severity: Severity, message: string, options?: { step?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.severity = severity;
    this.step = options?.step;
  }

  toDiagnostic(): ErrorDiagnostic {
    return {
      code: this.code,
      severity: this.severity,
      ...(this.step ? { step: this.step } : {}),
      message: this.message,
    };
  }
}

export class SourceUnavailableError extends WarehouseError {
  constructor(table: string, cause?: unknown) {
    super("SOURCE_UNAVAILABLE", "fatal", `Source table ${table} is missing or unreadable`, { step: table, cause });
  }
}

/** A Silver step failed; wraps whatever the engine or the rule threw. */
export class StepFailedError extends WarehouseError {
  readonly engineErrorType?: string;

  constructor(step: string, cause: unknown) {
    super("STEP_FAILED", "error", `Step ${step} failed: ${errorMessage(cause)}`, { step, cause });
    this.engineErrorType = engineErrorType(cause);
  }
}

export class BatchCancelledError extends WarehouseError {
  constructor(step: string) {
    super("BATCH_CANCELLED", "warning", `Batch cancelled before ${step}`, { step });
  }
}

export class ConfigError extends WarehouseError {
  constructor(message: string) {
    super("CONFIG_INVALID", "error", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * DuckDB prefixes its messages with the error class, e.g.
 * "Constraint Error: NOT NULL constraint failed: ...".
 */
export function engineErrorType(err: unknown): string | undefined {
  const match = errorMessage(err).match(/^([A-Z][A-Za-z ]*?) Error:/);
  return match ? match[1] : undefined;
}

export function describeError(err: unknown): ErrorDiagnostic {
  if (err instanceof WarehouseError) return err.toDiagnostic();
  return { code: "UNEXPECTED", severity: "error", message: errorMessage(err) };
}

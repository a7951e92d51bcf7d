/**
 * Error types shared by the sync loop and the persistence layer.
 *
 * Upstream and artifact errors fail the current cycle; record-level errors
 * are caught by the loaders, reported, and the batch carries on.
 */

// ============================================================================
// Cycle-level errors
// ============================================================================

export class UpstreamError extends Error {
  code = "UPSTREAM_ERROR" as const;

  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "UpstreamError";
  }
}

export class ArtifactError extends Error {
  code = "ARTIFACT_ERROR" as const;

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ArtifactError";
  }
}

export type StageName = "export" | "load";

export class StageError extends Error {
  code = "STAGE_ERROR" as const;

  constructor(
    readonly stage: StageName,
    cause: unknown
  ) {
    super(
      `${stage} stage failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "StageError";
  }
}

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;

  constructor(
    message: string,
    readonly details: string[] = []
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Record-level errors
// ============================================================================

export class RecordValidationError extends Error {
  code = "RECORD_INVALID" as const;

  constructor(message: string) {
    super(message);
    this.name = "RecordValidationError";
  }
}

export class UnresolvedReferenceError extends Error {
  code = "UNRESOLVED_REFERENCE" as const;

  constructor(
    readonly entity: string,
    readonly key: string
  ) {
    super(`No ${entity} found for key '${key}'`);
    this.name = "UnresolvedReferenceError";
  }
}

/**
 * True for unique / foreign-key / not-null violations raised by either
 * PostgreSQL (SQLSTATE class 23) or SQLite (SQLITE_CONSTRAINT*).
 */
export function isConstraintViolation(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  const { code } = error;
  if (typeof code !== "string") {
    return false;
  }
  return /^23\d{3}$/.test(code) || code.startsWith("SQLITE_CONSTRAINT");
}

/**
 * Errors a loader isolates to the single record being processed.
 */
export function isRecordLevelError(error: unknown): boolean {
  return (
    error instanceof RecordValidationError ||
    error instanceof UnresolvedReferenceError ||
    isConstraintViolation(error)
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

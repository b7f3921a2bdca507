// ──────────────────────────────────────────
// Shared error types
// ──────────────────────────────────────────

export interface FieldIssue {
  field: string;
  message: string;
}

/** A single input row failed validation. Never escapes the loader. */
export class ValidationError extends Error {
  constructor(message: string, public readonly issues: FieldIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** The load source could not be read at all. Fatal for the batch. */
export class SourceUnreadableError extends Error {
  constructor(public readonly source: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Cannot read load source ${source}${detail}`, { cause });
    this.name = 'SourceUnreadableError';
  }
}

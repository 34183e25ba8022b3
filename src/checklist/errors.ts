/**
 * Checklist Errors
 */

/** The checklist file could not be written */
export class ChecklistIOError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ChecklistIOError';
    this.path = path;
  }
}

/** A mutating call reached a store that has already been closed */
export class ChecklistClosedError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: checklist store is closed`);
    this.name = 'ChecklistClosedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

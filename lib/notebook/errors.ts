export type NotebookImportErrorCode = 'invalid-json' | 'invalid-notebook-format'

/**
 * Fatal document error: the import produced no records at all.
 */
export class NotebookImportError extends Error {
  constructor(
    public readonly code: NotebookImportErrorCode,
    message: string
  ) {
    super(message)
    this.name = 'NotebookImportError'
  }
}

/**
 * Per-cell, non-fatal import failure. Collected on the import result, never thrown.
 */
export interface CellImportError {
  cellIndex: number
  /** `window_id` found in the cell metadata, when it was readable */
  originalWindowId: number | null
  message: string
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export type WorkspaceErrorCode =
  | 'invalid-name'
  | 'duplicate-name'
  | 'not-found'
  | 'file-not-found'
  | 'directory-creation-failed'
  | 'save-failed'
  | 'load-failed'

export class WorkspaceError extends Error {
  constructor(
    public readonly code: WorkspaceErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'WorkspaceError'
  }
}

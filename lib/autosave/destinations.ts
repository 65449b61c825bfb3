/**
 * Save Destinations
 *
 * Each destination exports the registry and writes it somewhere. Destinations throw on
 * failure; the pipeline turns the throw into a failed SaveResult.
 */

import path from 'path'
import { format } from 'date-fns'
import type { SaveDestinationKind } from '../config/autosave-config'
import type { NotebookServerAdapter } from '../adapters/notebook-server-adapter'
import { exportDocument, exportToJSON } from '../notebook/notebook-codec'
import { writeFileAtomic } from '../utils/atomic-write'
import type { WindowRegistry } from '../windows/window-registry'
import type { AutoSaveEventType } from './events'

export interface SaveContext {
  trigger: AutoSaveEventType
  timestamp: Date
}

export interface SaveOutcome {
  location?: string
}

export interface SaveDestination {
  readonly kind: SaveDestinationKind
  save(registry: WindowRegistry, context: SaveContext): Promise<SaveOutcome>
}

export function autosaveFileName(date: Date): string {
  return `autosave_${format(date, 'yyyy-MM-dd_HH-mm-ss')}.ipynb`
}

// =============================================================================
// Local File
// =============================================================================

export interface LocalFileDestinationOptions {
  directory: string
  /** Write `autosave_<timestamp>.ipynb` files instead of overwriting `fileName` */
  timestamped: boolean
  fileName: string
}

export class LocalFileDestination implements SaveDestination {
  readonly kind = 'local-file'

  constructor(private readonly options: LocalFileDestinationOptions) {}

  async save(registry: WindowRegistry, context: SaveContext): Promise<SaveOutcome> {
    const fileName = this.options.timestamped
      ? autosaveFileName(context.timestamp)
      : this.options.fileName
    const filePath = path.join(this.options.directory, fileName)
    await writeFileAtomic(filePath, exportToJSON(registry, { now: context.timestamp }))
    return { location: filePath }
  }
}

// =============================================================================
// Workspace
// =============================================================================

export interface WorkspaceSaver {
  saveWorkspace(id: string, registry: WindowRegistry): Promise<{ filePath: string }>
}

/**
 * Local-file destination that writes the active workspace's own document and keeps
 * the metadata index current.
 */
export class WorkspaceDestination implements SaveDestination {
  readonly kind = 'local-file'

  constructor(
    private readonly store: WorkspaceSaver,
    private readonly getActiveWorkspaceId: () => string | null
  ) {}

  async save(registry: WindowRegistry): Promise<SaveOutcome> {
    const workspaceId = this.getActiveWorkspaceId()
    if (!workspaceId) {
      throw new Error('No active workspace to save')
    }
    const record = await this.store.saveWorkspace(workspaceId, registry)
    return { location: record.filePath }
  }
}

// =============================================================================
// Remote Server
// =============================================================================

export interface RemoteServerDestinationOptions {
  remoteDirectory: string
}

export class RemoteServerDestination implements SaveDestination {
  readonly kind = 'remote-server'

  constructor(
    private readonly adapter: NotebookServerAdapter,
    private readonly options: RemoteServerDestinationOptions
  ) {}

  async save(registry: WindowRegistry, context: SaveContext): Promise<SaveOutcome> {
    const fileName = autosaveFileName(context.timestamp)
    const remotePath = this.options.remoteDirectory
      ? `${this.options.remoteDirectory.replace(/\/+$/, '')}/${fileName}`
      : fileName
    await this.adapter.saveNotebook(remotePath, exportDocument(registry, { now: context.timestamp }))
    return { location: this.adapter.contentsUrl(remotePath) }
  }
}

/**
 * AutoSave Runtime
 *
 * Wires a registry to the pipeline, its destinations and the debouncers that feed it.
 *
 * Key concepts:
 * - Raw window signals (move, focus, close, edit) enter through the runtime
 * - Movement and focus loss are debounced per window before reaching the pipeline
 * - With a workspace store and an active workspace, the local-file destination writes
 *   that workspace's document; otherwise it writes plain autosave files
 */

import { NotebookServerAdapter } from '../adapters/notebook-server-adapter'
import { getAutoSaveConfig, type AutoSaveConfig, type AutoSaveConfigOverrides } from '../config/autosave-config'
import { setDebugLoggingOverride } from '../utils/debug-logger'
import type { WindowPosition } from '../windows/types'
import type { WindowRegistry } from '../windows/window-registry'
import type { WorkspaceMetadataStore } from '../workspaces/workspace-metadata-store'
import { AutoSavePipeline } from './autosave-pipeline'
import {
  LocalFileDestination,
  RemoteServerDestination,
  WorkspaceDestination,
  type SaveDestination,
} from './destinations'
import type { SaveResult } from './events'
import { FocusTracker } from './focus-tracker'
import { MovementDebouncer } from './movement-debouncer'
import { DEFAULT_WORKSPACE_KEY, WorkspaceAutoSaver } from './workspace-autosaver'

export interface AutoSaveRuntimeOptions {
  registry: WindowRegistry
  config?: AutoSaveConfig
  overrides?: AutoSaveConfigOverrides
  store?: WorkspaceMetadataStore
  fetchImpl?: typeof fetch
  now?: () => Date
}

export class AutoSaveRuntime {
  readonly config: AutoSaveConfig
  readonly pipeline: AutoSavePipeline
  readonly movement: MovementDebouncer
  readonly focus: FocusTracker
  readonly workspaceSaver: WorkspaceAutoSaver

  private readonly registry: WindowRegistry
  private activeWorkspaceId: string | null = null

  constructor(options: AutoSaveRuntimeOptions) {
    this.registry = options.registry
    this.config = options.config ?? getAutoSaveConfig(options.overrides)
    if (this.config.debug !== undefined) {
      setDebugLoggingOverride(this.config.debug)
    }

    this.pipeline = new AutoSavePipeline({
      registry: this.registry,
      destinations: this.createDestinations(options),
      settings: this.config,
      now: options.now,
    })

    const sink = this.pipeline.handleEvent.bind(this.pipeline)
    this.movement = new MovementDebouncer(sink, this.config.movementDebounceMs)
    this.focus = new FocusTracker(sink, this.config.focusDebounceMs)
    this.workspaceSaver = new WorkspaceAutoSaver(this.registry, this.pipeline, {
      debounceMs: this.config.workspaceDebounceMs,
    })
  }

  private createDestinations(options: AutoSaveRuntimeOptions): SaveDestination[] {
    const { local, server } = this.config
    const destinations: SaveDestination[] = []

    if (options.store) {
      destinations.push(new WorkspaceDestination(options.store, () => this.activeWorkspaceId))
    } else {
      destinations.push(new LocalFileDestination(local))
    }

    const adapter = new NotebookServerAdapter({
      baseUrl: server.url,
      token: server.token,
      timeoutMs: server.timeoutMs,
      fetchImpl: options.fetchImpl,
    })
    destinations.push(new RemoteServerDestination(adapter, { remoteDirectory: server.remoteDirectory }))
    return destinations
  }

  start(): void {
    this.pipeline.start()
    this.workspaceSaver.start()
  }

  /** Flush pending debounced work, then wait for the queue to drain */
  async stop(): Promise<void> {
    this.movement.flushAll()
    await this.workspaceSaver.flush()
    this.workspaceSaver.stop()
    this.movement.dispose()
    this.focus.dispose()
    await this.pipeline.stop()
  }

  // === Window Signals ===

  windowMoved(windowId: number, position: WindowPosition): void {
    this.movement.recordMovement(windowId, position)
  }

  windowFocused(windowId: number): void {
    this.focus.focusGained(windowId)
  }

  windowBlurred(windowId: number): void {
    this.focus.focusLost(windowId)
  }

  contentChanged(windowId: number, content: string): void {
    this.pipeline.handleEvent({ type: 'content-changed', windowId, content })
  }

  windowClosed(windowId: number): void {
    this.movement.cancel(windowId)
    this.registry.markClosed(windowId)
    this.pipeline.handleEvent({ type: 'window-closed', windowId })
  }

  saveNow(): Promise<SaveResult[]> {
    return this.pipeline.triggerManualSave()
  }

  // === Workspace ===

  /** Route later local saves to a workspace's document (null for none) */
  async setActiveWorkspace(workspaceId: string | null): Promise<void> {
    await this.workspaceSaver.switchWorkspace(workspaceId ?? DEFAULT_WORKSPACE_KEY)
    this.activeWorkspaceId = workspaceId
  }

  getActiveWorkspaceId(): string | null {
    return this.activeWorkspaceId
  }
}

export function createAutoSaveRuntime(options: AutoSaveRuntimeOptions): AutoSaveRuntime {
  return new AutoSaveRuntime(options)
}

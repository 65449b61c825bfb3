/**
 * Workspace AutoSaver
 *
 * Turns arbitrary registry mutations into one debounced save per quiet period.
 * Saves go through the pipeline as `manual-save` (reason `debounced`) so they are
 * ordered with every other write by the single drain loop. Changes the pipeline applies
 * for its own content and movement events are already saved and do not re-arm the timer.
 */

import { debugLog } from '../utils/debug-logger'
import type { RegistryChange, WindowRegistry } from '../windows/window-registry'
import type { AutoSavePipeline } from './autosave-pipeline'
import { createPersistScheduler, DEFAULT_DEBOUNCE_MS, type PersistScheduler } from './persist-scheduler'

export const DEFAULT_WORKSPACE_KEY = 'default'

/** Registry changes that alter persisted state */
const PERSISTED_CHANGES = new Set<RegistryChange['kind']>([
  'created',
  'inserted',
  'updated',
  'removed',
  'cleared',
])

export interface WorkspaceAutoSaverOptions {
  debounceMs?: number
  workspaceKey?: string
}

export class WorkspaceAutoSaver {
  private readonly schedulers = new Map<string, PersistScheduler>()
  private readonly debounceMs: number
  private activeKey: string
  private unsubscribe: (() => void) | null = null
  private saveCount = 0

  constructor(
    private readonly registry: WindowRegistry,
    private readonly pipeline: AutoSavePipeline,
    options: WorkspaceAutoSaverOptions = {}
  ) {
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS
    this.activeKey = options.workspaceKey ?? DEFAULT_WORKSPACE_KEY
  }

  /** Begin listening to registry mutations */
  start(): void {
    if (this.unsubscribe) return
    this.unsubscribe = this.registry.subscribe((change) => {
      // The pipeline saves right after applying its own event's change
      if (this.pipeline.isApplyingEvent) return
      if (PERSISTED_CHANGES.has(change.kind)) {
        this.scheduleAutoSave()
      }
    })
  }

  stop(): void {
    this.unsubscribe?.()
    this.unsubscribe = null
    this.schedulers.forEach((scheduler) => scheduler.cancelDebounced())
  }

  /** Re-arm the active workspace's debounce timer */
  scheduleAutoSave(): void {
    this.schedulerFor(this.activeKey).scheduleDebounced()
  }

  /** Save the active workspace now if a debounced save is pending */
  async flush(): Promise<void> {
    const scheduler = this.schedulers.get(this.activeKey)
    if (scheduler?.isPending()) {
      await scheduler.flushNow()
    }
  }

  /** Flush the current workspace, then route later saves to `workspaceKey` */
  async switchWorkspace(workspaceKey: string): Promise<void> {
    await this.flush()
    this.activeKey = workspaceKey
  }

  getActiveWorkspaceKey(): string {
    return this.activeKey
  }

  isPending(): boolean {
    return this.schedulers.get(this.activeKey)?.isPending() ?? false
  }

  /** Number of debounced saves that have run */
  getSaveCount(): number {
    return this.saveCount
  }

  private schedulerFor(workspaceKey: string): PersistScheduler {
    let scheduler = this.schedulers.get(workspaceKey)
    if (!scheduler) {
      scheduler = createPersistScheduler(
        { persist: () => this.persist(workspaceKey) },
        this.debounceMs
      )
      this.schedulers.set(workspaceKey, scheduler)
    }
    return scheduler
  }

  private async persist(workspaceKey: string): Promise<void> {
    this.saveCount++
    void debugLog({
      component: 'WorkspaceAutoSaver',
      action: 'debounced_save',
      metadata: { workspaceKey },
    })
    await this.pipeline.submit({ type: 'manual-save', reason: 'debounced' })
  }
}

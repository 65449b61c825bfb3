/**
 * Window Registry
 *
 * In-memory map of window id -> window record, plus the set of windows that are
 * actually open on screen.
 *
 * Key concepts:
 * - Ids are positive integers, allocated as max(existing, highest ever allocated) + 1
 * - A record can live in the registry without being open (closed but not yet purged)
 * - Mutators never throw: an unknown id is a logged no-op and the mutator returns false
 * - Every applied mutation stamps `lastModified` and notifies subscribers
 */

import { debugLog } from '../utils/debug-logger'
import {
  createDefaultPosition,
  createDefaultState,
  DEFAULT_EXPORT_TEMPLATE,
  type ChartData,
  type DataFrameData,
  type ExportTemplate,
  type Model3DData,
  type PayloadKind,
  type PointCloudData,
  type VolumeData,
  type WindowPayload,
  type WindowPosition,
  type WindowRecord,
  type WindowState,
  type WindowType,
} from './types'

// =============================================================================
// Change Notifications
// =============================================================================

export type RegistryChangeKind =
  | 'created'
  | 'inserted'
  | 'updated'
  | 'removed'
  | 'opened'
  | 'closed'
  | 'cleared'

export interface RegistryChange {
  kind: RegistryChangeKind
  windowId: number | null
}

export type RegistryListener = (change: RegistryChange) => void

/**
 * Collaborators the registry calls out to. All optional.
 */
export interface WindowRegistryCollaborators {
  /** Release rendering resources tied to a window (called on close/removal) */
  cleanupWindow?: (windowId: number) => void | Promise<void>
  /** Release every rendering resource (called on clearAll) */
  cleanupAll?: () => void | Promise<void>
  /** Clock, injectable for tests */
  now?: () => Date
}

export type WindowStatePatch = Partial<
  Pick<WindowState, 'isMinimized' | 'isMaximized' | 'opacity'>
>

// =============================================================================
// Template Auto-Selection
// =============================================================================

/**
 * Template chosen when a window of the given type receives a payload of the given
 * kind while its template is still the default.
 */
const AUTO_TEMPLATE_RULES: Array<{
  windowTypes: WindowType[]
  payloadKind: PayloadKind
  template: ExportTemplate
}> = [
  { windowTypes: ['tabular'], payloadKind: 'tabular', template: 'pandas' },
  { windowTypes: ['chart'], payloadKind: 'chart', template: 'matplotlib' },
  { windowTypes: ['spatial', 'pointcloud'], payloadKind: 'pointcloud', template: 'custom' },
  { windowTypes: ['model3d'], payloadKind: 'model3d', template: 'custom' },
]

export function autoTemplateFor(
  windowType: WindowType,
  payloadKind: PayloadKind
): ExportTemplate | null {
  const rule = AUTO_TEMPLATE_RULES.find(
    (candidate) =>
      candidate.payloadKind === payloadKind && candidate.windowTypes.includes(windowType)
  )
  return rule?.template ?? null
}

// =============================================================================
// Registry
// =============================================================================

export class WindowRegistry {
  private readonly windows = new Map<number, WindowRecord>()
  private readonly openWindowIds = new Set<number>()
  private readonly listeners = new Set<RegistryListener>()
  private highestAllocatedId = 0
  private readonly now: () => Date

  constructor(private readonly collaborators: WindowRegistryCollaborators = {}) {
    this.now = collaborators.now ?? (() => new Date())
  }

  // === Ids ===

  getNextID(): number {
    let max = this.highestAllocatedId
    for (const id of this.windows.keys()) {
      if (id > max) max = id
    }
    return max + 1
  }

  get size(): number {
    return this.windows.size
  }

  // === Creation ===

  create(type: WindowType, id?: number, position?: WindowPosition): WindowRecord {
    const windowId = id !== undefined && Number.isInteger(id) && id > 0 ? id : this.getNextID()

    if (this.windows.has(windowId)) {
      console.warn(`[WindowRegistry] Replacing existing window #${windowId}`)
    }

    const now = this.now()
    const record: WindowRecord = {
      id: windowId,
      windowType: type,
      position: position ? { ...position } : createDefaultPosition(),
      state: createDefaultState(now),
      createdAt: now,
    }

    this.windows.set(windowId, record)
    this.trackAllocated(windowId)

    void debugLog({
      component: 'WindowRegistry',
      action: 'window_created',
      window_id: windowId,
      metadata: { type },
    })

    this.notify({ kind: 'created', windowId })
    return record
  }

  /**
   * Insert a fully built record (used by notebook import).
   * Never overwrites: returns false when the id is already taken.
   */
  insert(record: WindowRecord): boolean {
    if (this.windows.has(record.id)) {
      void debugLog({
        component: 'WindowRegistry',
        action: 'insert_rejected_duplicate',
        window_id: record.id,
      })
      return false
    }
    this.windows.set(record.id, record)
    this.trackAllocated(record.id)
    this.notify({ kind: 'inserted', windowId: record.id })
    return true
  }

  // === Reads ===

  /**
   * Returns the record only while it is open.
   * Unknown ids and known-but-not-open ids both return undefined, with distinct diagnostics.
   */
  get(id: number): WindowRecord | undefined {
    const record = this.windows.get(id)
    if (!record) {
      void debugLog({ component: 'WindowRegistry', action: 'get_unknown_id', window_id: id })
      return undefined
    }
    if (!this.openWindowIds.has(id)) {
      void debugLog({ component: 'WindowRegistry', action: 'get_not_open', window_id: id })
      return undefined
    }
    return record
  }

  /** Returns the record whether or not it is open. */
  peek(id: number): WindowRecord | undefined {
    return this.windows.get(id)
  }

  has(id: number): boolean {
    return this.windows.has(id)
  }

  isOpen(id: number): boolean {
    return this.openWindowIds.has(id)
  }

  listAll(onlyOpen = false): WindowRecord[] {
    const all = Array.from(this.windows.values()).sort((a, b) => a.id - b.id)
    return onlyOpen ? all.filter((record) => this.openWindowIds.has(record.id)) : all
  }

  // === Narrow Mutators ===

  updatePosition(id: number, position: WindowPosition): boolean {
    return this.mutate(id, 'position', (record) => {
      record.position = { ...position }
    })
  }

  updateContent(id: number, content: string): boolean {
    return this.mutate(id, 'content', (record) => {
      record.state.content = content
    })
  }

  updateTemplate(id: number, template: ExportTemplate): boolean {
    return this.mutate(id, 'template', (record) => {
      record.state.exportTemplate = template
    })
  }

  updateImports(id: number, imports: string[]): boolean {
    return this.mutate(id, 'imports', (record) => {
      record.state.customImports = [...imports]
    })
  }

  updateState(id: number, patch: WindowStatePatch): boolean {
    return this.mutate(id, 'state', (record) => {
      Object.assign(record.state, patch)
    })
  }

  /** Replace all tags; duplicates are dropped, first occurrence wins */
  updateTags(id: number, tags: string[]): boolean {
    return this.mutate(id, 'tags', (record) => {
      record.state.tags = Array.from(new Set(tags))
    })
  }

  addTag(id: number, tag: string): boolean {
    const record = this.windows.get(id)
    if (record && record.state.tags.includes(tag)) {
      return false
    }
    return this.mutate(id, 'tag_added', (target) => {
      target.state.tags.push(tag)
    })
  }

  removeTag(id: number, tag: string): boolean {
    return this.mutate(id, 'tag_removed', (record) => {
      record.state.tags = record.state.tags.filter((existing) => existing !== tag)
    })
  }

  // === Payload Mutators ===

  updateTabularData(id: number, data: DataFrameData): boolean {
    return this.setPayload(id, { kind: 'tabular', data })
  }

  updateChartData(id: number, data: ChartData): boolean {
    return this.setPayload(id, { kind: 'chart', data })
  }

  updatePointCloud(id: number, data: PointCloudData): boolean {
    return this.setPayload(id, { kind: 'pointcloud', data })
  }

  updateVolumeData(id: number, data: VolumeData): boolean {
    return this.setPayload(id, { kind: 'volume', data })
  }

  updateModel3D(id: number, data: Model3DData): boolean {
    return this.setPayload(id, { kind: 'model3d', data })
  }

  // === Open / Closed Tracking ===

  markOpened(id: number): void {
    if (this.openWindowIds.has(id)) return
    this.openWindowIds.add(id)
    this.notify({ kind: 'opened', windowId: id })
  }

  markClosed(id: number): void {
    if (!this.openWindowIds.delete(id)) return
    this.runCleanup(id)
    this.notify({ kind: 'closed', windowId: id })
  }

  removeWindow(id: number): void {
    const had = this.windows.delete(id)
    const wasOpen = this.openWindowIds.delete(id)
    if (!had && !wasOpen) return

    this.runCleanup(id)

    void debugLog({ component: 'WindowRegistry', action: 'window_removed', window_id: id })

    this.notify({ kind: 'removed', windowId: id })
  }

  /** Remove exactly the records that are not open. Returns the removed ids. */
  cleanup(): number[] {
    const removed: number[] = []
    for (const id of Array.from(this.windows.keys())) {
      if (!this.openWindowIds.has(id)) {
        this.windows.delete(id)
        this.runCleanup(id)
        removed.push(id)
      }
    }
    for (const id of removed) {
      this.notify({ kind: 'removed', windowId: id })
    }
    return removed
  }

  clearAll(): void {
    const count = this.windows.size
    this.windows.clear()
    this.openWindowIds.clear()

    const cleanupAll = this.collaborators.cleanupAll
    if (cleanupAll) {
      Promise.resolve()
        .then(() => cleanupAll())
        .catch((error: unknown) => {
          console.error('[WindowRegistry] Bulk entity cleanup failed:', error)
        })
    }

    void debugLog({ component: 'WindowRegistry', action: 'cleared', metadata: { count } })

    this.notify({ kind: 'cleared', windowId: null })
  }

  // === Subscriptions ===

  subscribe(listener: RegistryListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // === Internals ===

  private setPayload(id: number, payload: WindowPayload): boolean {
    return this.mutate(id, `payload_${payload.kind}`, (record) => {
      record.state.payload = payload
      // Literal rule: fires whenever the template currently equals the default
      if (record.state.exportTemplate === DEFAULT_EXPORT_TEMPLATE) {
        const template = autoTemplateFor(record.windowType, payload.kind)
        if (template) {
          record.state.exportTemplate = template
        }
      }
    })
  }

  private mutate(id: number, action: string, apply: (record: WindowRecord) => void): boolean {
    const record = this.windows.get(id)
    if (!record) {
      void debugLog({
        component: 'WindowRegistry',
        action: 'mutation_ignored_unknown_id',
        window_id: id,
        metadata: { mutation: action },
      })
      return false
    }

    apply(record)
    record.state.lastModified = this.now()
    this.notify({ kind: 'updated', windowId: id })
    return true
  }

  private trackAllocated(id: number): void {
    if (id > this.highestAllocatedId) {
      this.highestAllocatedId = id
    }
  }

  private runCleanup(id: number): void {
    const cleanupWindow = this.collaborators.cleanupWindow
    if (!cleanupWindow) return
    Promise.resolve()
      .then(() => cleanupWindow(id))
      .catch((error: unknown) => {
        console.error(`[WindowRegistry] Entity cleanup failed for window #${id}:`, error)
      })
  }

  private notify(change: RegistryChange): void {
    this.listeners.forEach((listener) => {
      try {
        listener(change)
      } catch (error) {
        console.error(`[WindowRegistry] Listener failed for ${change.kind} change:`, error)
      }
    })
  }
}

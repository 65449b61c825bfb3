/**
 * AutoSave Pipeline
 *
 * FIFO queue of auto-save events drained by a single loop.
 *
 * Key concepts:
 * - handleEvent() enqueues and returns at once; draining is asynchronous
 * - Exactly one drain loop runs at a time, so writes land in arrival order
 * - Each accepted event fans out to every configured destination independently
 * - Destination failures become SaveResult records; nothing is thrown to the caller
 */

import { EventEmitter } from 'events'
import type { AutoSaveConfig, SaveDestinationKind } from '../config/autosave-config'
import { debugLog } from '../utils/debug-logger'
import type { WindowRegistry } from '../windows/window-registry'
import type { SaveDestination } from './destinations'
import { eventWindowId, type AutoSaveEvent, type SaveResult } from './events'

export type AutoSaveSettings = Pick<
  AutoSaveConfig,
  | 'enabled'
  | 'intervalMs'
  | 'saveOnFocusLoss'
  | 'saveOnMovement'
  | 'destinations'
  | 'resultHistoryLimit'
>

export interface AutoSavePipelineOptions {
  registry: WindowRegistry
  destinations: SaveDestination[]
  settings: AutoSaveSettings
  now?: () => Date
}

export interface SaveCompletedEvent {
  event: AutoSaveEvent
  results: SaveResult[]
}

interface QueuedEvent {
  event: AutoSaveEvent
  settle?: (results: SaveResult[]) => void
}

export class AutoSavePipeline extends EventEmitter {
  private readonly registry: WindowRegistry
  private readonly destinations = new Map<SaveDestinationKind, SaveDestination>()
  private readonly now: () => Date
  private settings: AutoSaveSettings

  private queue: QueuedEvent[] = []
  private drainPromise: Promise<void> | null = null
  private results: SaveResult[] = []
  private lastSaveTime: Date | null = null
  private intervalHandle: ReturnType<typeof setInterval> | null = null
  private running = false
  private applyingEvent = false

  constructor(options: AutoSavePipelineOptions) {
    super()
    this.registry = options.registry
    this.settings = { ...options.settings, destinations: [...options.settings.destinations] }
    this.now = options.now ?? (() => new Date())
    options.destinations.forEach((destination) => this.setDestination(destination))
  }

  /** Install (or replace) the destination used for its kind */
  setDestination(destination: SaveDestination): void {
    this.destinations.set(destination.kind, destination)
  }

  // === Event Intake ===

  handleEvent(event: AutoSaveEvent): void {
    void this.submit(event)
  }

  /** Queue a user-requested save and resolve with its results once it has run */
  triggerManualSave(): Promise<SaveResult[]> {
    return this.submit({ type: 'manual-save', reason: 'user' })
  }

  /** Queue an event; resolves with its results (empty when filtered) once it has run */
  submit(event: AutoSaveEvent): Promise<SaveResult[]> {
    return new Promise((resolve) => {
      this.queue.push({ event, settle: resolve })
      this.emit('event-queued', event)
      this.ensureDraining()
    })
  }

  private ensureDraining(): void {
    if (this.drainPromise) return

    this.drainPromise = this.drainQueue().finally(() => {
      this.drainPromise = null
      // An event pushed between the loop's last check and this callback
      if (this.queue.length > 0) {
        this.ensureDraining()
      }
    })
  }

  private async drainQueue(): Promise<void> {
    // Let the enqueuing caller return before the first event is processed
    await Promise.resolve()

    let next = this.queue.shift()
    while (next) {
      let results: SaveResult[] = []
      try {
        results = await this.processEvent(next.event)
      } catch (error) {
        console.error(`[AutoSavePipeline] Failed to process ${next.event.type}:`, error)
      }
      next.settle?.(results)
      next = this.queue.shift()
    }
  }

  /** Resolves once the queue is empty and no drain is running */
  async whenIdle(): Promise<void> {
    while (this.drainPromise) {
      await this.drainPromise
    }
  }

  get isAutoSaving(): boolean {
    return this.drainPromise !== null
  }

  // === Processing ===

  shouldProcess(event: AutoSaveEvent): boolean {
    if (!this.settings.enabled && !(event.type === 'manual-save' && event.reason !== 'debounced')) {
      return false
    }

    switch (event.type) {
      case 'focus-gained':
        return false
      case 'focus-lost':
        return this.settings.saveOnFocusLoss
      case 'movement-stopped':
        return this.settings.saveOnMovement
      case 'content-changed':
      case 'window-closed':
      case 'manual-save':
      case 'interval-save':
        return true
    }
  }

  private async processEvent(event: AutoSaveEvent): Promise<SaveResult[]> {
    if (!this.shouldProcess(event)) {
      void debugLog({
        component: 'AutoSavePipeline',
        action: 'event_filtered',
        window_id: eventWindowId(event),
        metadata: { type: event.type },
      })
      this.emit('event-filtered', event)
      return []
    }

    this.applyToRegistry(event)

    const timestamp = this.now()
    const results = await Promise.all(
      this.settings.destinations.map((kind) => this.saveTo(kind, event, timestamp))
    )

    this.recordResults(results)

    void debugLog({
      component: 'AutoSavePipeline',
      action: 'event_processed',
      window_id: eventWindowId(event),
      metadata: {
        type: event.type,
        succeeded: results.filter((result) => result.success).length,
        failed: results.filter((result) => !result.success).length,
      },
    })

    const completed: SaveCompletedEvent = { event, results }
    try {
      this.emit('save-completed', completed)
    } catch (error) {
      console.error('[AutoSavePipeline] save-completed listener failed:', error)
    }
    return results
  }

  /** True while the pipeline writes an event's own change into the registry */
  get isApplyingEvent(): boolean {
    return this.applyingEvent
  }

  private applyToRegistry(event: AutoSaveEvent): void {
    this.applyingEvent = true
    try {
      if (event.type === 'content-changed') {
        this.registry.updateContent(event.windowId, event.content)
      } else if (event.type === 'movement-stopped') {
        this.registry.updatePosition(event.windowId, event.position)
      }
    } finally {
      this.applyingEvent = false
    }
  }

  private async saveTo(
    kind: SaveDestinationKind,
    event: AutoSaveEvent,
    timestamp: Date
  ): Promise<SaveResult> {
    const destination = this.destinations.get(kind)
    if (!destination) {
      return {
        destination: kind,
        success: false,
        timestamp,
        error: `No ${kind} destination configured`,
        trigger: event.type,
      }
    }

    try {
      const outcome = await destination.save(this.registry, { trigger: event.type, timestamp })
      return {
        destination: kind,
        success: true,
        timestamp,
        location: outcome.location,
        trigger: event.type,
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.error(`[AutoSavePipeline] ${kind} save failed:`, message)
      return { destination: kind, success: false, timestamp, error: message, trigger: event.type }
    }
  }

  private recordResults(results: SaveResult[]): void {
    this.results.push(...results)
    const overflow = this.results.length - this.settings.resultHistoryLimit
    if (overflow > 0) {
      this.results.splice(0, overflow)
    }

    for (const result of results) {
      if (result.success && (!this.lastSaveTime || result.timestamp >= this.lastSaveTime)) {
        this.lastSaveTime = result.timestamp
      }
    }
  }

  // === Observability ===

  /** Most recent results, oldest first */
  getResults(): SaveResult[] {
    return [...this.results]
  }

  getLastSaveTime(): Date | null {
    return this.lastSaveTime
  }

  getSettings(): AutoSaveSettings {
    return { ...this.settings, destinations: [...this.settings.destinations] }
  }

  // === Lifecycle ===

  updateSettings(patch: Partial<AutoSaveSettings>): void {
    const intervalChanged =
      patch.intervalMs !== undefined && patch.intervalMs !== this.settings.intervalMs
    const enabledChanged = patch.enabled !== undefined && patch.enabled !== this.settings.enabled

    this.settings = {
      ...this.settings,
      ...patch,
      destinations: [...(patch.destinations ?? this.settings.destinations)],
    }

    if (this.running && (intervalChanged || enabledChanged)) {
      this.stopInterval()
      this.startInterval()
    }

    void debugLog({
      component: 'AutoSavePipeline',
      action: 'settings_updated',
      metadata: { ...patch },
    })
  }

  /** Start the periodic interval-save timer */
  start(): void {
    if (this.running) return
    this.running = true
    this.startInterval()
  }

  /** Stop the timer and wait for queued events to finish */
  async stop(): Promise<void> {
    this.running = false
    this.stopInterval()
    await this.whenIdle()
  }

  private startInterval(): void {
    if (!this.settings.enabled || this.settings.intervalMs <= 0) return
    this.intervalHandle = setInterval(() => {
      this.handleEvent({ type: 'interval-save' })
    }, this.settings.intervalMs)
    this.intervalHandle.unref()
  }

  private stopInterval(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle)
      this.intervalHandle = null
    }
  }
}

import type { WindowPosition } from '../windows/types'
import type { AutoSaveEvent } from './events'
import { KeyedDebouncer } from './keyed-debouncer'

export type AutoSaveEventSink = (event: AutoSaveEvent) => void

/**
 * Collapses bursts of movement samples per window into one trailing
 * `movement-stopped` event carrying the last position.
 */
export class MovementDebouncer {
  private readonly debouncer: KeyedDebouncer<number, WindowPosition>

  constructor(emit: AutoSaveEventSink, debounceMs = 1000) {
    this.debouncer = new KeyedDebouncer(debounceMs, (windowId, position) => {
      emit({ type: 'movement-stopped', windowId, position })
    })
  }

  recordMovement(windowId: number, position: WindowPosition): void {
    this.debouncer.schedule(windowId, { ...position })
  }

  /** Drop a window's pending movement, e.g. when it closes */
  cancel(windowId: number): void {
    this.debouncer.cancel(windowId)
  }

  flushAll(): void {
    this.debouncer.flushAll()
  }

  dispose(): void {
    this.debouncer.cancelAll()
  }

  isPending(windowId: number): boolean {
    return this.debouncer.isPending(windowId)
  }
}

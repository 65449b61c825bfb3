import { KeyedDebouncer } from './keyed-debouncer'
import type { AutoSaveEventSink } from './movement-debouncer'

/**
 * Tracks which window has focus. Focus gain is forwarded at once; focus loss is
 * debounced per window so a quick blur/refocus does not trigger a save.
 */
export class FocusTracker {
  private focusedWindowId: number | null = null
  private readonly pendingLoss: KeyedDebouncer<number, null>

  constructor(
    private readonly emit: AutoSaveEventSink,
    debounceMs = 500
  ) {
    this.pendingLoss = new KeyedDebouncer(debounceMs, (windowId) => {
      this.emit({ type: 'focus-lost', windowId })
    })
  }

  focusGained(windowId: number): void {
    this.pendingLoss.cancel(windowId)
    this.focusedWindowId = windowId
    this.emit({ type: 'focus-gained', windowId })
  }

  focusLost(windowId: number): void {
    if (this.focusedWindowId === windowId) {
      this.focusedWindowId = null
    }
    this.pendingLoss.schedule(windowId, null)
  }

  getFocusedWindowId(): number | null {
    return this.focusedWindowId
  }

  dispose(): void {
    this.pendingLoss.cancelAll()
  }
}

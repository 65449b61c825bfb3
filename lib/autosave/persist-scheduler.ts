/**
 * Persist Scheduler
 *
 * Event-driven persistence scheduling for one workspace.
 *
 * Key concepts:
 * - Debounced persist: every change re-arms a fixed delay measured from the latest change
 * - A burst faster than the delay produces no persist until it pauses
 * - flushNow() cancels the pending timer and persists immediately
 */

// =============================================================================
// Configuration
// =============================================================================

/** Default debounce delay in milliseconds */
export const DEFAULT_DEBOUNCE_MS = 1000

// =============================================================================
// Debounce Implementation
// =============================================================================

function debounce(
  fn: () => void,
  delayMs: number
): { (): void; cancel: () => void; pending: () => boolean } {
  let timeoutId: ReturnType<typeof setTimeout> | null = null

  const debounced = () => {
    if (timeoutId !== null) {
      clearTimeout(timeoutId)
    }
    timeoutId = setTimeout(() => {
      timeoutId = null
      fn()
    }, delayMs)
  }

  debounced.cancel = () => {
    if (timeoutId !== null) {
      clearTimeout(timeoutId)
      timeoutId = null
    }
  }

  debounced.pending = () => timeoutId !== null

  return debounced
}

// =============================================================================
// Persist Scheduler Factory
// =============================================================================

export interface PersistScheduler {
  scheduleDebounced(): void
  cancelDebounced(): void
  flushNow(): Promise<void>
  isPending(): boolean
}

/**
 * Target interface required by the persist scheduler.
 */
export interface PersistTarget {
  persist(): Promise<void>
}

/**
 * Create a persist scheduler.
 *
 * @param debounceMs Debounce delay (default: 1000ms)
 */
export function createPersistScheduler(
  target: PersistTarget,
  debounceMs: number = DEFAULT_DEBOUNCE_MS
): PersistScheduler {
  const debouncedPersist = debounce(() => {
    target.persist().catch((error: unknown) => {
      console.error('[PersistScheduler] Debounced persist failed:', error)
    })
  }, debounceMs)

  return {
    scheduleDebounced(): void {
      debouncedPersist()
    },

    cancelDebounced(): void {
      debouncedPersist.cancel()
    },

    async flushNow(): Promise<void> {
      // Cancel pending debounce to avoid double-persist
      debouncedPersist.cancel()
      await target.persist()
    },

    isPending(): boolean {
      return debouncedPersist.pending()
    },
  }
}

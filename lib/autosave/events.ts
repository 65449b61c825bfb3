import type { WindowPosition } from '../windows/types'
import type { SaveDestinationKind } from '../config/autosave-config'

export type AutoSaveEvent =
  | { type: 'focus-gained'; windowId: number }
  | { type: 'focus-lost'; windowId: number }
  | { type: 'movement-stopped'; windowId: number; position: WindowPosition }
  | { type: 'content-changed'; windowId: number; content: string }
  | { type: 'window-closed'; windowId: number }
  | { type: 'manual-save'; reason?: 'user' | 'debounced' }
  | { type: 'interval-save' }

export type AutoSaveEventType = AutoSaveEvent['type']

export interface SaveResult {
  destination: SaveDestinationKind
  success: boolean
  timestamp: Date
  /** File path or URL written, when the destination reports one */
  location?: string
  error?: string
  /** Event that triggered the save */
  trigger: AutoSaveEventType
}

export function eventWindowId(event: AutoSaveEvent): number | null {
  return 'windowId' in event ? event.windowId : null
}

export * from './windows/types'
export * from './windows/window-registry'

export * from './notebook/types'
export * from './notebook/errors'
export * from './notebook/content-generators'
export * from './notebook/payload-extractors'
export * from './notebook/notebook-codec'

export * from './config/autosave-config'
export * from './adapters/notebook-server-adapter'
export * from './autosave/events'
export * from './autosave/destinations'
export * from './autosave/autosave-pipeline'
export * from './autosave/keyed-debouncer'
export * from './autosave/movement-debouncer'
export * from './autosave/focus-tracker'
export * from './autosave/persist-scheduler'
export * from './autosave/workspace-autosaver'
export * from './autosave/runtime'

export * from './workspaces/types'
export * from './workspaces/errors'
export * from './workspaces/workspace-metadata-store'

export { debugLog, setDebugLogSink, setDebugLoggingOverride, isDebugEnabled } from './utils/debug-logger'
export type { DebugLogData, DebugLogEntry, DebugLogSink } from './utils/debug-logger'
export { writeFileAtomic } from './utils/atomic-write'

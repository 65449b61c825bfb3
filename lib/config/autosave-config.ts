import path from 'path'
import { z } from 'zod'

export const SAVE_DESTINATION_KINDS = ['local-file', 'remote-server'] as const
export type SaveDestinationKind = (typeof SAVE_DESTINATION_KINDS)[number]

export interface NotebookServerConfig {
  url: string                   // Base URL of the notebook server
  token?: string                // Sent as `Authorization: token <token>`
  timeoutMs: number             // Abort a remote save after this long
  remoteDirectory: string       // Server-side folder for autosaved notebooks
}

export interface LocalSaveConfig {
  directory: string             // Where autosaved notebooks are written
  timestamped: boolean          // One file per save instead of a fixed file
  fileName: string              // Fixed file name when not timestamped
}

export interface AutoSaveConfig {
  // Triggers
  enabled: boolean
  intervalMs: number            // Periodic save; 0 disables the timer
  saveOnFocusLoss: boolean
  saveOnMovement: boolean

  // Debounce windows
  movementDebounceMs: number    // Per-window quiet period before movement-stopped
  focusDebounceMs: number       // Per-window quiet period before focus-lost
  workspaceDebounceMs: number   // Quiet period after a registry mutation

  // Output
  destinations: SaveDestinationKind[]
  resultHistoryLimit: number
  local: LocalSaveConfig
  server: NotebookServerConfig

  // Development
  debug?: boolean
}

export type AutoSaveConfigOverrides = Partial<Omit<AutoSaveConfig, 'local' | 'server'>> & {
  local?: Partial<LocalSaveConfig>
  server?: Partial<NotebookServerConfig>
}

const DEFAULT_SERVER: NotebookServerConfig = {
  url: 'http://localhost:8888',
  timeoutMs: 10000,
  remoteDirectory: 'autosave',
}

const DEFAULT_LOCAL: LocalSaveConfig = {
  directory: 'autosave',
  timestamped: true,
  fileName: 'autosave_workspace.ipynb',
}

export type AutoSavePreset = 'development' | 'production' | 'test'

// Default configurations for different environments
export const AUTOSAVE_CONFIGS: Record<AutoSavePreset, AutoSaveConfig> = {
  development: {
    enabled: true,
    intervalMs: 30000,
    saveOnFocusLoss: true,
    saveOnMovement: true,
    movementDebounceMs: 1000,
    focusDebounceMs: 500,
    workspaceDebounceMs: 1000,
    destinations: ['local-file'],
    resultHistoryLimit: 10,
    local: DEFAULT_LOCAL,
    server: DEFAULT_SERVER,
    debug: true,
  },

  production: {
    enabled: true,
    intervalMs: 30000,
    saveOnFocusLoss: true,
    saveOnMovement: true,
    movementDebounceMs: 1000,
    focusDebounceMs: 500,
    workspaceDebounceMs: 1000,
    destinations: ['local-file'],
    resultHistoryLimit: 10,
    local: DEFAULT_LOCAL,
    server: DEFAULT_SERVER,
    debug: false,
  },

  // Test configuration - no periodic timer, fixed file
  test: {
    enabled: true,
    intervalMs: 0,
    saveOnFocusLoss: true,
    saveOnMovement: true,
    movementDebounceMs: 1000,
    focusDebounceMs: 500,
    workspaceDebounceMs: 1000,
    destinations: ['local-file'],
    resultHistoryLimit: 10,
    local: { ...DEFAULT_LOCAL, timestamped: false },
    server: { ...DEFAULT_SERVER, timeoutMs: 1000 },
    debug: false,
  },
}

// =============================================================================
// Validation
// =============================================================================

export const AutoSaveConfigSchema = z.object({
  enabled: z.boolean(),
  intervalMs: z.number().int().nonnegative(),
  saveOnFocusLoss: z.boolean(),
  saveOnMovement: z.boolean(),
  movementDebounceMs: z.number().int().nonnegative(),
  focusDebounceMs: z.number().int().nonnegative(),
  workspaceDebounceMs: z.number().int().nonnegative(),
  destinations: z.array(z.enum(SAVE_DESTINATION_KINDS)).min(1, 'At least one destination is required'),
  resultHistoryLimit: z.number().int().positive(),
  local: z.object({
    directory: z.string().min(1),
    timestamped: z.boolean(),
    fileName: z.string().min(1),
  }),
  server: z.object({
    url: z.string().url(),
    token: z.string().optional(),
    timeoutMs: z.number().int().positive(),
    remoteDirectory: z.string(),
  }),
  debug: z.boolean().optional(),
})

const envBoolean = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'on', 'off', 'yes', 'no']))
  .transform((value) => ['true', '1', 'on', 'yes'].includes(value))

const envMilliseconds = z.coerce.number().int().nonnegative()

const envDestinations = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  )
  .pipe(z.array(z.enum(SAVE_DESTINATION_KINDS)).min(1))

function readEnv<T>(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | undefined {
  const raw = env[name]
  if (raw === undefined || raw === '') return undefined
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? 'invalid value'
    console.warn(`[AutoSaveConfig] Ignoring invalid ${name}="${raw}": ${reason}`)
    return undefined
  }
  return parsed.data
}

function definedOnly<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {}
  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key]
    }
  }
  return result
}

/**
 * Overrides read from NOTEBOOK_* environment variables. Invalid values are ignored.
 */
export function readAutoSaveEnv(env: NodeJS.ProcessEnv = process.env): AutoSaveConfigOverrides {
  return {
    ...definedOnly({
      enabled: readEnv(env, 'NOTEBOOK_AUTOSAVE_ENABLED', envBoolean),
      intervalMs: readEnv(env, 'NOTEBOOK_AUTOSAVE_INTERVAL_MS', envMilliseconds),
      saveOnFocusLoss: readEnv(env, 'NOTEBOOK_AUTOSAVE_ON_FOCUS_LOSS', envBoolean),
      saveOnMovement: readEnv(env, 'NOTEBOOK_AUTOSAVE_ON_MOVEMENT', envBoolean),
      destinations: readEnv(env, 'NOTEBOOK_AUTOSAVE_DESTINATIONS', envDestinations),
    }),
    local: definedOnly({
      directory: readEnv(env, 'NOTEBOOK_AUTOSAVE_DIR', z.string()),
    }),
    server: definedOnly({
      url: readEnv(env, 'NOTEBOOK_SERVER_URL', z.string().url()),
      token: readEnv(env, 'NOTEBOOK_SERVER_TOKEN', z.string()),
      timeoutMs: readEnv(env, 'NOTEBOOK_SERVER_TIMEOUT_MS', z.coerce.number().int().positive()),
    }),
  }
}

function presetFromNodeEnv(nodeEnv: string | undefined): AutoSavePreset {
  if (nodeEnv === 'production') return 'production'
  if (nodeEnv === 'test') return 'test'
  return 'development'
}

export interface GetAutoSaveConfigOptions {
  preset?: AutoSavePreset
  env?: NodeJS.ProcessEnv
}

/**
 * Resolve the effective config: preset <- environment <- overrides.
 * Throws a ZodError when the merged result is invalid.
 */
export function getAutoSaveConfig(
  overrides: AutoSaveConfigOverrides = {},
  options: GetAutoSaveConfigOptions = {}
): AutoSaveConfig {
  const env = options.env ?? process.env
  const base: AutoSaveConfig = AUTOSAVE_CONFIGS[options.preset ?? presetFromNodeEnv(env.NODE_ENV)]
  const fromEnv = readAutoSaveEnv(env)

  const { local: envLocal, server: envServer, ...envTop } = fromEnv
  const { local: localOverrides, server: serverOverrides, ...topOverrides } = overrides

  const merged: AutoSaveConfig = {
    ...base,
    ...definedOnly(envTop),
    ...definedOnly(topOverrides),
    local: { ...base.local, ...envLocal, ...definedOnly(localOverrides ?? {}) },
    server: { ...base.server, ...envServer, ...definedOnly(serverOverrides ?? {}) },
  }
  merged.destinations = [...merged.destinations]

  const config = AutoSaveConfigSchema.parse(merged)
  return { ...config, local: { ...config.local, directory: path.resolve(config.local.directory) } }
}

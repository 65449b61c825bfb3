/**
 * Debug Logger - structured, rate-limited diagnostics for the workspace services
 */

const DEBUG_LOGGING_ENABLED = ['true', '1', 'on', 'yes'].includes(
  (process.env.NOTEBOOK_DEBUG_LOGGING ?? '').toLowerCase()
);
const RATE_LIMIT_INTERVAL_MS = 1000;
const RATE_LIMIT_MAX =
  Number(process.env.NOTEBOOK_DEBUG_LOG_MAX ?? '') > 0
    ? Number(process.env.NOTEBOOK_DEBUG_LOG_MAX)
    : 40; // ~40 logs/sec default before suppressing

type OverrideValue = string | boolean | null | undefined;

const parseOverride = (value: OverrideValue): boolean | null => {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'on', 'yes', 'enable', 'enabled'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'off', 'no', 'disable', 'disabled'].includes(normalized)) {
    return false;
  }
  return null;
};

let runtimeOverride: boolean | null = null;

/**
 * Force debug logging on or off at runtime, regardless of NOTEBOOK_DEBUG_LOGGING.
 * Pass null to return to the environment default.
 */
export function setDebugLoggingOverride(value: OverrideValue): void {
  runtimeOverride = parseOverride(value);
}

export const isDebugEnabled = (): boolean => {
  if (runtimeOverride !== null) {
    return runtimeOverride;
  }
  return DEBUG_LOGGING_ENABLED;
};

let rateWindowStart = 0;
let rateWindowCount = 0;
let rateLimitWarned = false;

const shouldEmitDebugLog = () => {
  if (!isDebugEnabled()) {
    return false;
  }

  if (RATE_LIMIT_MAX <= 0) {
    return true;
  }

  const now = Date.now();
  if (now - rateWindowStart > RATE_LIMIT_INTERVAL_MS) {
    rateWindowStart = now;
    rateWindowCount = 0;
    rateLimitWarned = false;
  }

  if (rateWindowCount >= RATE_LIMIT_MAX) {
    if (!rateLimitWarned) {
      console.warn(
        `[DebugLogger] Suppressing debug logs after ${RATE_LIMIT_MAX} events/sec. ` +
          'Raise NOTEBOOK_DEBUG_LOG_MAX to re-enable.',
      );
      rateLimitWarned = true;
    }
    return false;
  }

  rateWindowCount += 1;
  return true;
};

let sessionId: string | null = null;

function getSessionId(): string {
  if (!sessionId) {
    sessionId = `session-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }
  return sessionId;
}

export interface DebugLogData {
  component: string;
  action: string;
  content_preview?: string;
  metadata?: Record<string, unknown>;
  window_id?: number | null;
}

export interface DebugLogEntry extends DebugLogData {
  session_id: string;
  timestamp: string;
}

export type DebugLogSink = (entry: DebugLogEntry) => void | Promise<void>;

const consoleSink: DebugLogSink = (entry) => {
  console.log(`[DEBUG ${entry.component}] ${entry.action}`, {
    ...(entry.content_preview ? { preview: entry.content_preview } : {}),
    ...(entry.window_id != null ? { windowId: entry.window_id } : {}),
    ...entry.metadata,
  });
};

let activeSink: DebugLogSink = consoleSink;

/**
 * Replace where debug entries are written. Returns a function restoring the previous sink.
 */
export function setDebugLogSink(sink: DebugLogSink): () => void {
  const previous = activeSink;
  activeSink = sink;
  return () => {
    activeSink = previous;
  };
}

/**
 * Log debug information.
 */
export async function debugLog(logData: DebugLogData): Promise<void> {
  // Early return if debug logging is disabled or rate-limited
  if (!shouldEmitDebugLog()) {
    return;
  }

  try {
    await activeSink({
      ...logData,
      session_id: getSessionId(),
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    // Fallback to console if the sink fails
    console.log('[DEBUG]', logData.component, logData.action, error);
  }
}

/**
 * Notebook Codec
 *
 * Serializes a window registry into a notebook document and restores windows from one.
 *
 * Key concepts:
 * - Export writes one cell per window, ascending id, plus an aggregate block
 * - Import allocates fresh ids and never reuses the ids embedded in the document
 * - Only unparseable text or a missing `cells` array is fatal; everything else is per cell
 * - Payload recovery is delegated to the extractor registry and is best-effort
 */

import { debugLog } from '../utils/debug-logger'
import {
  createDefaultState,
  EXPORT_TEMPLATE_LABELS,
  parseExportTemplate,
  parseWindowType,
  WINDOW_TYPE_LABELS,
  type WindowPosition,
  type WindowRecord,
} from '../windows/types'
import type { WindowRegistry } from '../windows/window-registry'
import { generateCellContent } from './content-generators'
import { describeError, NotebookImportError, type CellImportError } from './errors'
import {
  CellPositionSchema,
  CellStateSchema,
  CellTagsSchema,
  CellTimestampsSchema,
  CellWindowIdSchema,
  isPlainObject,
  SpatialExportInfoSchema,
  WorkspaceMetadataBlockSchema,
} from './notebook-schema'
import { createDefaultExtractorRegistry, type PayloadExtractorRegistry } from './payload-extractors'
import {
  CREATED_BY,
  EXPORT_BLOCK_KEY,
  LEGACY_EXPORT_BLOCK_KEY,
  NBFORMAT,
  NBFORMAT_MINOR,
  PLATFORM_VERSION,
  type ImportResult,
  type NotebookAnalysis,
  type NotebookCell,
  type NotebookDocument,
  type NotebookSource,
  type SpatialExportInfo,
  type WindowCellMetadata,
  type WorkspaceMetadataBlock,
} from './types'

export interface ExportOptions {
  workspace?: WorkspaceMetadataBlock
  now?: Date
}

export interface DecodeOptions {
  extractors?: PayloadExtractorRegistry
  now?: Date
}

const defaultExtractors = createDefaultExtractorRegistry()

// =============================================================================
// Source Lines
// =============================================================================

/** Split text into notebook source lines: every line but the last keeps its `\n` */
export function toSourceLines(text: string): string[] {
  if (text.length === 0) return []
  const lines = text.split('\n')
  return lines.map((line, index) => (index < lines.length - 1 ? `${line}\n` : line))
}

/**
 * Join notebook source back into text. Lines written by notebook tools carry their own
 * newlines; hand-written sources that do not are joined with `\n`.
 */
export function joinSourceLines(source: unknown): string {
  if (typeof source === 'string') return source
  if (!Array.isArray(source)) return ''
  const lines = source.filter((line): line is string => typeof line === 'string')
  const selfTerminated = lines.slice(0, -1).every((line) => line.endsWith('\n'))
  return lines.join(selfTerminated ? '' : '\n')
}

// =============================================================================
// Export
// =============================================================================

function uniqueInOrder(values: string[]): string[] {
  return Array.from(new Set(values))
}

function buildCellMetadata(record: WindowRecord): WindowCellMetadata {
  const { position, state } = record
  return {
    window_id: record.id,
    window_type: WINDOW_TYPE_LABELS[record.windowType],
    export_template: EXPORT_TEMPLATE_LABELS[state.exportTemplate],
    tags: [...state.tags],
    position: {
      x: position.x,
      y: position.y,
      z: position.z,
      width: position.width,
      height: position.height,
      ...(position.depth !== undefined ? { depth: position.depth } : {}),
    },
    state: {
      minimized: state.isMinimized,
      maximized: state.isMaximized,
      opacity: state.opacity,
    },
    timestamps: {
      created: record.createdAt.toISOString(),
      modified: state.lastModified.toISOString(),
    },
  }
}

export function buildCell(record: WindowRecord): NotebookCell {
  const source = toSourceLines(generateCellContent(record))
  const metadata = buildCellMetadata(record)

  if (record.state.exportTemplate === 'markdown') {
    return { cell_type: 'markdown', metadata, source }
  }
  return { cell_type: 'code', metadata, source, execution_count: null, outputs: [] }
}

export function exportDocument(
  registry: WindowRegistry,
  options: ExportOptions = {}
): NotebookDocument {
  const records = registry.listAll(false)
  const now = options.now ?? new Date()

  const exportInfo: SpatialExportInfo = {
    export_date: now.toISOString(),
    total_windows: records.length,
    window_types: uniqueInOrder(records.map((record) => WINDOW_TYPE_LABELS[record.windowType])),
    export_templates: uniqueInOrder(
      records.map((record) => EXPORT_TEMPLATE_LABELS[record.state.exportTemplate])
    ),
    all_tags: uniqueInOrder(records.flatMap((record) => record.state.tags)),
    created_by: CREATED_BY,
    platform_version: PLATFORM_VERSION,
  }

  const document: NotebookDocument = {
    cells: records.map(buildCell),
    metadata: {
      kernelspec: { display_name: 'Python 3', language: 'python', name: 'python3' },
      language_info: { name: 'python', version: '3.9.0' },
      [EXPORT_BLOCK_KEY]: exportInfo,
    },
    nbformat: NBFORMAT,
    nbformat_minor: NBFORMAT_MINOR,
  }

  if (options.workspace) {
    document.metadata.workspace_metadata = { ...options.workspace }
  }

  void debugLog({
    component: 'NotebookCodec',
    action: 'exported',
    metadata: { totalWindows: records.length, workspace: options.workspace?.name ?? null },
  })

  return document
}

/** Document text, formatted the way notebook tools write it */
export function exportToJSON(registry: WindowRegistry, options: ExportOptions = {}): string {
  return `${JSON.stringify(exportDocument(registry, options), null, 1)}\n`
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a notebook source into its top-level object.
 * Throws NotebookImportError for text that is not JSON or lacks a `cells` array.
 */
export function parseNotebookSource(
  source: NotebookSource
): Record<string, unknown> & { cells: unknown[] } {
  let parsed: unknown = source
  if (typeof source === 'string' || source instanceof Uint8Array) {
    const text = typeof source === 'string' ? source : Buffer.from(source).toString('utf8')
    try {
      parsed = JSON.parse(text)
    } catch (error) {
      throw new NotebookImportError('invalid-json', `Notebook is not valid JSON: ${describeError(error)}`)
    }
  }

  if (!isPlainObject(parsed)) {
    throw new NotebookImportError('invalid-notebook-format', 'Notebook must be a JSON object')
  }

  const cells = parsed.cells
  if (!Array.isArray(cells)) {
    throw new NotebookImportError('invalid-notebook-format', 'Notebook has no "cells" array')
  }

  return { ...parsed, cells }
}

function readExportInfo(document: Record<string, unknown>): SpatialExportInfo | null {
  const metadata = document.metadata
  if (!isPlainObject(metadata)) return null
  const block = metadata[EXPORT_BLOCK_KEY] ?? metadata[LEGACY_EXPORT_BLOCK_KEY]
  if (!isPlainObject(block)) return null
  const parsed = SpatialExportInfoSchema.safeParse(block)
  return parsed.success ? parsed.data : null
}

function readWorkspaceBlock(document: Record<string, unknown>): WorkspaceMetadataBlock | null {
  const metadata = document.metadata
  if (!isPlainObject(metadata)) return null
  const parsed = WorkspaceMetadataBlockSchema.safeParse(metadata.workspace_metadata)
  return parsed.success ? parsed.data : null
}

function parseDate(value: string | undefined, fallback: Date): Date {
  if (!value) return fallback
  const date = new Date(value)
  return Number.isNaN(date.getTime()) ? fallback : date
}

// =============================================================================
// Import
// =============================================================================

type CellOutcome =
  | { status: 'skipped'; reason: string }
  | { status: 'restored'; record: WindowRecord; originalWindowId: number | null }

/**
 * Decode one cell. Returns `skipped` for cells with no window affinity and throws for
 * cells that claim a window but cannot be read.
 */
function decodeCell(
  cell: unknown,
  id: number,
  extractors: PayloadExtractorRegistry,
  now: Date
): CellOutcome {
  if (!isPlainObject(cell) || !isPlainObject(cell.metadata)) {
    return { status: 'skipped', reason: 'no metadata' }
  }

  const metadata = cell.metadata
  const rawType = metadata.window_type
  if (rawType === undefined) {
    return { status: 'skipped', reason: 'no window_type' }
  }
  if (typeof rawType !== 'string') {
    throw new Error(`window_type must be a string, got ${rawType === null ? 'null' : typeof rawType}`)
  }

  const windowType = parseWindowType(rawType)
  if (!windowType) {
    return { status: 'skipped', reason: `unknown window_type "${rawType}"` }
  }

  const rawPosition = CellPositionSchema.parse(metadata.position)
  const position: WindowPosition = {
    x: rawPosition.x,
    y: rawPosition.y,
    z: rawPosition.z,
    width: rawPosition.width,
    height: rawPosition.height,
  }
  if (rawPosition.depth !== undefined) {
    position.depth = rawPosition.depth
  }

  const flags = CellStateSchema.parse(metadata.state)
  const timestamps = CellTimestampsSchema.parse(metadata.timestamps)
  const template =
    typeof metadata.export_template === 'string'
      ? parseExportTemplate(metadata.export_template)
      : undefined

  const content = joinSourceLines(cell.source)
  const state = createDefaultState(parseDate(timestamps.modified, now))
  state.isMinimized = flags.minimized
  state.isMaximized = flags.maximized
  state.opacity = flags.opacity
  state.content = content
  state.tags = uniqueInOrder(CellTagsSchema.parse(metadata.tags))
  if (template) {
    state.exportTemplate = template
  }
  state.payload = extractors.extract(windowType, content).payload

  const record: WindowRecord = {
    id,
    windowType,
    position,
    state,
    createdAt: parseDate(timestamps.created, now),
  }

  return {
    status: 'restored',
    record,
    originalWindowId: CellWindowIdSchema.parse(metadata.window_id) ?? null,
  }
}

function readOriginalWindowId(cell: unknown): number | null {
  if (!isPlainObject(cell) || !isPlainObject(cell.metadata)) return null
  return CellWindowIdSchema.parse(cell.metadata.window_id) ?? null
}

/**
 * Decode a document into window records numbered from `startId`, without touching a registry.
 * Throws NotebookImportError only for fatal document errors.
 */
export function decodeNotebook(
  source: NotebookSource,
  startId: number,
  options: DecodeOptions = {}
): ImportResult {
  const document = parseNotebookSource(source)
  const extractors = options.extractors ?? defaultExtractors
  const now = options.now ?? new Date()

  const restoredWindows: WindowRecord[] = []
  const errors: CellImportError[] = []
  const idMapping = new Map<number, number>()
  let nextId = startId

  document.cells.forEach((cell, cellIndex) => {
    try {
      const outcome = decodeCell(cell, nextId, extractors, now)
      if (outcome.status === 'skipped') {
        void debugLog({
          component: 'NotebookCodec',
          action: 'cell_skipped',
          metadata: { cellIndex, reason: outcome.reason },
        })
        return
      }
      if (outcome.originalWindowId !== null) {
        idMapping.set(outcome.originalWindowId, nextId)
      }
      restoredWindows.push(outcome.record)
      nextId++
    } catch (error) {
      errors.push({
        cellIndex,
        originalWindowId: readOriginalWindowId(cell),
        message: describeError(error),
      })
    }
  })

  return {
    restoredWindows,
    errors,
    idMapping,
    originalMetadata: readExportInfo(document),
    workspaceMetadata: readWorkspaceBlock(document),
  }
}

/**
 * Import a document into the registry. Restored windows are inserted but not opened;
 * callers open each one and call `markOpened`.
 */
export function importNotebook(
  source: NotebookSource,
  registry: WindowRegistry,
  options: DecodeOptions = {}
): ImportResult {
  const result = decodeNotebook(source, registry.getNextID(), options)

  for (const record of result.restoredWindows) {
    if (!registry.insert(record)) {
      result.errors.push({
        cellIndex: -1,
        originalWindowId: null,
        message: `Window id ${record.id} is already taken`,
      })
    }
  }

  void debugLog({
    component: 'NotebookCodec',
    action: 'imported',
    metadata: {
      restored: result.restoredWindows.length,
      errors: result.errors.length,
    },
  })

  return result
}

// =============================================================================
// Analysis
// =============================================================================

export function analyzeNotebook(source: NotebookSource): NotebookAnalysis {
  const document = parseNotebookSource(source)

  let windowCells = 0
  const windowTypes = new Set<string>()
  const exportTemplates = new Set<string>()

  for (const cell of document.cells) {
    if (!isPlainObject(cell) || !isPlainObject(cell.metadata)) continue
    const { window_type: windowType, export_template: template } = cell.metadata
    // Same acceptance as import: unknown types are not windows
    const type = typeof windowType === 'string' ? parseWindowType(windowType) : undefined
    if (!type) continue

    windowCells++
    windowTypes.add(WINDOW_TYPE_LABELS[type])
    if (typeof template === 'string') {
      exportTemplates.add(template)
    }
  }

  return {
    totalCells: document.cells.length,
    windowCells,
    windowTypes: Array.from(windowTypes),
    exportTemplates: Array.from(exportTemplates),
    metadata: readExportInfo(document),
    workspaceMetadata: readWorkspaceBlock(document),
  }
}

/**
 * True when the source parses as a notebook and either carries the aggregate block
 * or at least one window cell.
 */
export function validateNotebook(source: NotebookSource): boolean {
  let analysis: NotebookAnalysis
  try {
    analysis = analyzeNotebook(source)
  } catch (error) {
    if (error instanceof NotebookImportError) {
      return false
    }
    throw error
  }
  return analysis.metadata !== null || analysis.windowCells > 0
}

/**
 * Workspace Metadata Store
 *
 * Index of workspace documents: one JSON index file plus a directory of notebooks.
 *
 * Key concepts:
 * - The index is a cache; counts and types can always be re-derived from the documents
 * - Index writes go through a temp file and a rename
 * - Mutating operations run one at a time, so name checks and index writes cannot interleave
 * - Restored windows are opened in ascending id order, one at a time, with a pacing delay
 */

import path from 'path'
import * as fs from 'fs-extra'
import { format } from 'date-fns'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import { analyzeNotebook, exportToJSON, importNotebook, parseNotebookSource } from '../notebook/notebook-codec'
import { describeError } from '../notebook/errors'
import { isPlainObject } from '../notebook/notebook-schema'
import type { NotebookAnalysis, WorkspaceMetadataBlock } from '../notebook/types'
import { writeFileAtomic } from '../utils/atomic-write'
import { debugLog } from '../utils/debug-logger'
import { WINDOW_TYPE_LABELS } from '../windows/types'
import type { WindowRegistry } from '../windows/window-registry'
import { WorkspaceError } from './errors'
import {
  parseWorkspaceCategory,
  WORKSPACE_CATEGORY_LABELS,
  WORKSPACE_VERSION,
  type CreateWorkspaceInput,
  type FailedWindowOpen,
  type LoadWorkspaceOptions,
  type LoadWorkspaceResult,
  type WorkspaceCategory,
  type WorkspaceMetadataRecord,
} from './types'

// =============================================================================
// Configuration
// =============================================================================

export const INDEX_FILE_NAME = 'workspace_metadata.json'
export const WORKSPACES_DIRECTORY_NAME = 'Workspaces'
export const NOTEBOOK_EXTENSION = '.ipynb'

/** Delay between successive window opens during loadWorkspace */
const DEFAULT_PACING_MS = 200

export interface WorkspaceMetadataStoreOptions {
  rootDirectory: string
  pacingMs?: number
  now?: () => Date
  sleep?: (ms: number) => Promise<void>
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/** `my_workspace_20240102_030405.ipynb` */
export function workspaceFileName(name: string, date: Date): string {
  const sanitized = name.toLowerCase().replace(/[^a-z0-9]/g, '_')
  return `${sanitized}_${format(date, 'yyyyMMdd_HHmmss')}${NOTEBOOK_EXTENSION}`
}

// =============================================================================
// Index Serialization
// =============================================================================

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((values) => values.filter((value): value is string => typeof value === 'string'))

const IndexEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().catch(''),
  category: z.string().catch('Custom'),
  isTemplate: z.boolean().catch(false),
  createdDate: z.string().catch(''),
  modifiedDate: z.string().catch(''),
  totalWindows: z.number().int().nonnegative().catch(0),
  windowTypes: stringList,
  tags: stringList,
  filePath: z.string().min(1),
  version: z.string().catch(WORKSPACE_VERSION),
})

type IndexEntry = z.infer<typeof IndexEntrySchema>

function toIndexEntry(record: WorkspaceMetadataRecord): IndexEntry {
  return {
    id: record.id,
    name: record.name,
    description: record.description,
    category: WORKSPACE_CATEGORY_LABELS[record.category],
    isTemplate: record.isTemplate,
    createdDate: record.createdDate.toISOString(),
    modifiedDate: record.modifiedDate.toISOString(),
    totalWindows: record.totalWindows,
    windowTypes: [...record.windowTypes],
    tags: [...record.tags],
    filePath: record.filePath,
    version: record.version,
  }
}

function parseDate(value: string, fallback: Date): Date {
  const date = new Date(value)
  return value && !Number.isNaN(date.getTime()) ? date : fallback
}

function fromIndexEntry(entry: IndexEntry, fallbackDate: Date): WorkspaceMetadataRecord {
  return {
    id: entry.id,
    name: entry.name,
    description: entry.description,
    category: parseWorkspaceCategory(entry.category),
    isTemplate: entry.isTemplate,
    createdDate: parseDate(entry.createdDate, fallbackDate),
    modifiedDate: parseDate(entry.modifiedDate, fallbackDate),
    totalWindows: entry.totalWindows,
    windowTypes: entry.windowTypes,
    tags: entry.tags,
    filePath: entry.filePath,
    version: entry.version,
  }
}

function toWorkspaceBlock(record: WorkspaceMetadataRecord): WorkspaceMetadataBlock {
  return {
    id: record.id,
    name: record.name,
    description: record.description,
    category: WORKSPACE_CATEGORY_LABELS[record.category],
    is_template: record.isTemplate,
    created_date: record.createdDate.toISOString(),
    modified_date: record.modifiedDate.toISOString(),
    tags: [...record.tags],
    version: record.version,
  }
}

function cloneRecord(record: WorkspaceMetadataRecord): WorkspaceMetadataRecord {
  return {
    ...record,
    createdDate: new Date(record.createdDate),
    modifiedDate: new Date(record.modifiedDate),
    windowTypes: [...record.windowTypes],
    tags: [...record.tags],
  }
}

function registryWindowTypes(registry: WindowRegistry): string[] {
  return Array.from(new Set(registry.listAll().map((record) => WINDOW_TYPE_LABELS[record.windowType])))
}

// =============================================================================
// Store
// =============================================================================

export class WorkspaceMetadataStore {
  readonly rootDirectory: string
  readonly indexPath: string
  readonly workspacesDirectory: string

  private readonly records = new Map<string, WorkspaceMetadataRecord>()
  private readonly pacingMs: number
  private readonly now: () => Date
  private readonly sleep: (ms: number) => Promise<void>
  private loaded = false
  private tail: Promise<unknown> = Promise.resolve()

  constructor(options: WorkspaceMetadataStoreOptions) {
    this.rootDirectory = path.resolve(options.rootDirectory)
    this.indexPath = path.join(this.rootDirectory, INDEX_FILE_NAME)
    this.workspacesDirectory = path.join(this.rootDirectory, WORKSPACES_DIRECTORY_NAME)
    this.pacingMs = options.pacingMs ?? DEFAULT_PACING_MS
    this.now = options.now ?? (() => new Date())
    this.sleep = options.sleep ?? defaultSleep
  }

  // === Loading ===

  /**
   * Read the index, relinking or dropping records whose file moved, then pick up any
   * documents in the workspaces directory that the index does not know.
   * Falls back to a full directory scan when the index is missing or unreadable.
   */
  load(): Promise<WorkspaceMetadataRecord[]> {
    return this.exclusive(() => this.loadUnlocked())
  }

  private async loadUnlocked(): Promise<WorkspaceMetadataRecord[]> {
    await this.ensureWorkspacesDirectory()
    this.records.clear()

    const entries = await this.readIndex()
    let changed = entries === null

    for (const entry of entries ?? []) {
      const record = fromIndexEntry(entry, this.now())
      const filePath = await this.resolveBackingFile(record.filePath)
      if (!filePath) {
        console.warn(`[WorkspaceMetadataStore] Dropping "${record.name}": ${record.filePath} not found`)
        changed = true
        continue
      }
      if (filePath !== record.filePath) {
        record.filePath = filePath
        changed = true
      }
      this.records.set(record.id, record)
    }

    changed = (await this.scanDirectory()) > 0 || changed
    this.loaded = true

    if (changed) {
      await this.saveUnlocked()
    }

    void debugLog({
      component: 'WorkspaceMetadataStore',
      action: 'loaded',
      metadata: { workspaces: this.records.size, fromIndex: entries !== null },
    })

    return this.list()
  }

  /** Parsed index entries, or null when the index is absent or unreadable */
  private async readIndex(): Promise<IndexEntry[] | null> {
    let raw: string
    try {
      raw = await fs.readFile(this.indexPath, 'utf8')
    } catch (error) {
      void debugLog({
        component: 'WorkspaceMetadataStore',
        action: 'index_unavailable',
        metadata: { error: describeError(error) },
      })
      return null
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      console.warn('[WorkspaceMetadataStore] Index file is not valid JSON, rescanning:', describeError(error))
      return null
    }
    if (!Array.isArray(parsed)) {
      console.warn('[WorkspaceMetadataStore] Index file is not an array, rescanning')
      return null
    }

    const entries: IndexEntry[] = []
    parsed.forEach((candidate, index) => {
      const result = IndexEntrySchema.safeParse(candidate)
      if (result.success) {
        entries.push(result.data)
      } else {
        console.warn(`[WorkspaceMetadataStore] Skipping malformed index entry #${index}`)
      }
    })
    return entries
  }

  private async resolveBackingFile(filePath: string): Promise<string | null> {
    if (await fs.pathExists(filePath)) return filePath
    const relinked = path.join(this.workspacesDirectory, path.basename(filePath))
    if (await fs.pathExists(relinked)) return relinked
    return null
  }

  /** Add a record for every untracked document. Returns how many were added. */
  private async scanDirectory(): Promise<number> {
    const tracked = new Set(Array.from(this.records.values(), (record) => path.resolve(record.filePath)))
    const files = (await fs.readdir(this.workspacesDirectory))
      .filter((file) => file.endsWith(NOTEBOOK_EXTENSION))
      .sort()

    let added = 0
    for (const file of files) {
      const filePath = path.join(this.workspacesDirectory, file)
      if (tracked.has(path.resolve(filePath))) continue

      const record = await this.recordFromFile(filePath)
      if (record) {
        this.records.set(record.id, record)
        added++
      }
    }
    return added
  }

  private async recordFromFile(filePath: string): Promise<WorkspaceMetadataRecord | null> {
    let analysis: NotebookAnalysis
    let stats: fs.Stats
    try {
      stats = await fs.stat(filePath)
      analysis = analyzeNotebook(await fs.readFile(filePath, 'utf8'))
    } catch (error) {
      console.warn(`[WorkspaceMetadataStore] Skipping unreadable document ${filePath}:`, describeError(error))
      return null
    }

    const fileDate = stats.mtime
    const block = analysis.workspaceMetadata
    const baseName = path.basename(filePath, NOTEBOOK_EXTENSION)

    // Native documents keep their identity unless it collides with an indexed one
    const id = block && !this.records.has(block.id) ? block.id : uuidv4()
    const name = this.uniqueName(block?.name ?? baseName)

    return {
      id,
      name,
      description: block ? block.description : 'Imported workspace',
      category: block ? parseWorkspaceCategory(block.category) : 'custom',
      isTemplate: block?.is_template ?? false,
      createdDate: block ? parseDate(block.created_date, fileDate) : fileDate,
      modifiedDate: block ? parseDate(block.modified_date, fileDate) : fileDate,
      totalWindows: analysis.windowCells,
      windowTypes: analysis.windowTypes,
      tags: block ? [...block.tags] : [],
      filePath,
      version: block?.version ?? WORKSPACE_VERSION,
    }
  }

  private uniqueName(name: string): string {
    if (!this.findRecordByName(name)) return name
    let suffix = 2
    while (this.findRecordByName(`${name} ${suffix}`)) suffix++
    return `${name} ${suffix}`
  }

  // === Index Persistence ===

  /** Atomically overwrite the index file */
  save(): Promise<void> {
    return this.exclusive(() => this.saveUnlocked())
  }

  private async saveUnlocked(): Promise<void> {
    const entries = Array.from(this.records.values(), toIndexEntry)
    try {
      await writeFileAtomic(this.indexPath, `${JSON.stringify(entries, null, 2)}\n`)
    } catch (error) {
      console.error('[WorkspaceMetadataStore] Failed to write index:', error)
      throw new WorkspaceError('save-failed', `Failed to write workspace index: ${describeError(error)}`, error)
    }
  }

  // === Workspace Operations ===

  create(input: CreateWorkspaceInput, registry: WindowRegistry): Promise<WorkspaceMetadataRecord> {
    return this.exclusive(async () => {
      await this.ensureLoaded()

      const name = input.name.trim()
      if (name.length === 0) {
        throw new WorkspaceError('invalid-name', 'Workspace name must not be empty')
      }
      if (this.findRecordByName(name)) {
        throw new WorkspaceError('duplicate-name', `A workspace named "${name}" already exists`)
      }

      const now = this.now()
      const record: WorkspaceMetadataRecord = {
        id: uuidv4(),
        name,
        description: input.description ?? '',
        category: input.category ?? 'custom',
        isTemplate: input.isTemplate ?? false,
        createdDate: now,
        modifiedDate: now,
        totalWindows: 0,
        windowTypes: [],
        tags: Array.from(new Set(input.tags ?? [])),
        filePath: path.join(this.workspacesDirectory, workspaceFileName(name, now)),
        version: WORKSPACE_VERSION,
      }

      await this.writeDocument(record, registry)
      this.records.set(record.id, record)
      try {
        await this.saveUnlocked()
      } catch (error) {
        // Not indexed, so not created
        this.records.delete(record.id)
        await fs.remove(record.filePath)
        throw error
      }

      void debugLog({
        component: 'WorkspaceMetadataStore',
        action: 'created',
        metadata: { id: record.id, name, totalWindows: record.totalWindows },
      })

      return cloneRecord(record)
    })
  }

  /** Re-export the registry into an existing workspace's document */
  saveWorkspace(id: string, registry: WindowRegistry): Promise<WorkspaceMetadataRecord> {
    return this.exclusive(async () => {
      await this.ensureLoaded()
      const record = this.requireRecord(id)
      record.modifiedDate = this.now()
      await this.writeDocument(record, registry)
      await this.saveUnlocked()
      return cloneRecord(record)
    })
  }

  /**
   * Import a workspace's document into the registry and open each restored window.
   * A fatal document error propagates as NotebookImportError.
   */
  loadWorkspace(
    id: string,
    registry: WindowRegistry,
    options: LoadWorkspaceOptions = {}
  ): Promise<LoadWorkspaceResult> {
    return this.exclusive(async () => {
      await this.ensureLoaded()
      const record = this.requireRecord(id)

      if (!(await fs.pathExists(record.filePath))) {
        throw new WorkspaceError('file-not-found', `Workspace file not found: ${record.filePath}`)
      }

      let text: string
      try {
        text = await fs.readFile(record.filePath, 'utf8')
      } catch (error) {
        throw new WorkspaceError('load-failed', `Failed to read ${record.filePath}: ${describeError(error)}`, error)
      }

      // Parse before clearing so a broken document leaves the registry untouched
      const document = parseNotebookSource(text)
      if (options.clearExisting ?? true) {
        registry.clearAll()
      }
      const importResult = importNotebook(document, registry)

      const openedWindows: number[] = []
      const failedWindows: FailedWindowOpen[] = []
      const ordered = [...importResult.restoredWindows].sort((a, b) => a.id - b.id)

      for (const [index, window] of ordered.entries()) {
        if (index > 0 && this.pacingMs > 0) {
          await this.sleep(this.pacingMs)
        }
        try {
          await options.openWindow?.(window.id)
          registry.markOpened(window.id)
          openedWindows.push(window.id)
        } catch (error) {
          console.warn(`[WorkspaceMetadataStore] Failed to open window #${window.id}:`, describeError(error))
          failedWindows.push({ windowId: window.id, error: describeError(error) })
        }
      }

      void debugLog({
        component: 'WorkspaceMetadataStore',
        action: 'workspace_loaded',
        metadata: {
          id,
          restored: importResult.restoredWindows.length,
          opened: openedWindows.length,
          failed: failedWindows.length,
          cellErrors: importResult.errors.length,
        },
      })

      return { workspace: cloneRecord(record), importResult, openedWindows, failedWindows }
    })
  }

  deleteWorkspace(id: string): Promise<void> {
    return this.exclusive(async () => {
      await this.ensureLoaded()
      const record = this.requireRecord(id)
      await fs.remove(record.filePath)
      this.records.delete(id)
      await this.saveUnlocked()

      void debugLog({
        component: 'WorkspaceMetadataStore',
        action: 'deleted',
        metadata: { id, name: record.name },
      })
    })
  }

  /** Copy a workspace as "<name> Copy": a custom, non-template workspace */
  duplicateWorkspace(id: string): Promise<WorkspaceMetadataRecord> {
    return this.exclusive(async () => {
      await this.ensureLoaded()
      const source = this.requireRecord(id)
      if (!(await fs.pathExists(source.filePath))) {
        throw new WorkspaceError('file-not-found', `Workspace file not found: ${source.filePath}`)
      }

      const now = this.now()
      const name = this.uniqueName(`${source.name} Copy`)
      const record: WorkspaceMetadataRecord = {
        ...cloneRecord(source),
        id: uuidv4(),
        name,
        category: 'custom',
        isTemplate: false,
        createdDate: now,
        modifiedDate: now,
        filePath: path.join(this.workspacesDirectory, workspaceFileName(name, now)),
      }

      const document = parseNotebookSource(await fs.readFile(source.filePath, 'utf8'))
      const metadata = isPlainObject(document.metadata) ? document.metadata : {}
      const copy = { ...document, metadata: { ...metadata, workspace_metadata: toWorkspaceBlock(record) } }

      await this.writeText(record.filePath, `${JSON.stringify(copy, null, 1)}\n`)
      this.records.set(record.id, record)
      await this.saveUnlocked()
      return cloneRecord(record)
    })
  }

  /**
   * Re-derive window counts and types from every backing document.
   * User-editable fields are left alone. Returns how many records changed.
   */
  refresh(): Promise<number> {
    return this.exclusive(async () => {
      await this.ensureLoaded()
      let updated = 0

      for (const record of this.records.values()) {
        let analysis: NotebookAnalysis
        try {
          analysis = analyzeNotebook(await fs.readFile(record.filePath, 'utf8'))
        } catch (error) {
          console.warn(`[WorkspaceMetadataStore] Cannot refresh "${record.name}":`, describeError(error))
          continue
        }

        const typesChanged =
          analysis.windowTypes.length !== record.windowTypes.length ||
          analysis.windowTypes.some((type, index) => type !== record.windowTypes[index])
        if (analysis.windowCells !== record.totalWindows || typesChanged) {
          record.totalWindows = analysis.windowCells
          record.windowTypes = analysis.windowTypes
          updated++
        }
      }

      if (updated > 0) {
        await this.saveUnlocked()
      }
      return updated
    })
  }

  // === Queries ===

  /** All workspaces, most recently modified first */
  list(): WorkspaceMetadataRecord[] {
    return Array.from(this.records.values(), cloneRecord).sort(
      (a, b) => b.modifiedDate.getTime() - a.modifiedDate.getTime()
    )
  }

  listCustom(): WorkspaceMetadataRecord[] {
    return this.list().filter((record) => !record.isTemplate)
  }

  /** Templates, by name */
  listTemplates(): WorkspaceMetadataRecord[] {
    return this.list()
      .filter((record) => record.isTemplate)
      .sort((a, b) => a.name.localeCompare(b.name))
  }

  listByCategory(category: WorkspaceCategory): WorkspaceMetadataRecord[] {
    return this.list().filter((record) => record.category === category)
  }

  /** Case-insensitive match on name, description or any tag */
  search(query: string): WorkspaceMetadataRecord[] {
    const needle = query.trim().toLowerCase()
    if (!needle) return this.list()
    return this.list().filter(
      (record) =>
        record.name.toLowerCase().includes(needle) ||
        record.description.toLowerCase().includes(needle) ||
        record.tags.some((tag) => tag.toLowerCase().includes(needle))
    )
  }

  get(id: string): WorkspaceMetadataRecord | undefined {
    const record = this.records.get(id)
    return record ? cloneRecord(record) : undefined
  }

  findByName(name: string): WorkspaceMetadataRecord | undefined {
    const record = this.findRecordByName(name)
    return record ? cloneRecord(record) : undefined
  }

  get size(): number {
    return this.records.size
  }

  // === Internals ===

  private findRecordByName(name: string): WorkspaceMetadataRecord | undefined {
    for (const record of this.records.values()) {
      if (record.name === name) return record
    }
    return undefined
  }

  private requireRecord(id: string): WorkspaceMetadataRecord {
    const record = this.records.get(id)
    if (!record) {
      throw new WorkspaceError('not-found', `Workspace not found: ${id}`)
    }
    return record
  }

  private async ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      await this.loadUnlocked()
    }
  }

  private async ensureWorkspacesDirectory(): Promise<void> {
    try {
      await fs.ensureDir(this.workspacesDirectory)
    } catch (error) {
      throw new WorkspaceError(
        'directory-creation-failed',
        `Cannot create ${this.workspacesDirectory}: ${describeError(error)}`,
        error
      )
    }
  }

  private async writeDocument(record: WorkspaceMetadataRecord, registry: WindowRegistry): Promise<void> {
    const text = exportToJSON(registry, { workspace: toWorkspaceBlock(record), now: record.modifiedDate })
    await this.writeText(record.filePath, text)
    record.totalWindows = registry.size
    record.windowTypes = registryWindowTypes(registry)
  }

  private async writeText(filePath: string, text: string): Promise<void> {
    await this.ensureWorkspacesDirectory()
    try {
      await writeFileAtomic(filePath, text)
    } catch (error) {
      throw new WorkspaceError('save-failed', `Failed to write ${filePath}: ${describeError(error)}`, error)
    }
  }

  /** Run `task` after every previously queued task has settled */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task)
    // Failures reach the caller through `run`; the chain itself keeps going
    this.tail = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }
}

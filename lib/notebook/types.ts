/**
 * Notebook Document Types
 *
 * Shape of the notebook interchange documents written and read by the codec.
 * Field names are snake_case because they are wire format.
 */

import type { WindowRecord } from '../windows/types'
import type { CellImportError } from './errors'

export const NBFORMAT = 4
export const NBFORMAT_MINOR = 5

/** Document-level aggregate block key */
export const EXPORT_BLOCK_KEY = 'spatial_export'
/** Older documents carry the aggregate block under this key */
export const LEGACY_EXPORT_BLOCK_KEY = 'visionos_export'

export const CREATED_BY = 'spatial-notebook-workspace'
export const PLATFORM_VERSION = '1.0'

export type CellType = 'code' | 'markdown'

export interface CellPositionMetadata {
  x: number
  y: number
  z: number
  width: number
  height: number
  /** Volumetric windows only */
  depth?: number
}

export interface CellStateMetadata {
  minimized: boolean
  maximized: boolean
  opacity: number
}

export interface CellTimestamps {
  created: string
  modified: string
}

export interface WindowCellMetadata {
  window_id: number
  window_type: string
  export_template: string
  tags: string[]
  position: CellPositionMetadata
  state: CellStateMetadata
  timestamps: CellTimestamps
}

export interface NotebookCell {
  cell_type: CellType
  metadata: WindowCellMetadata
  source: string[]
  execution_count?: null
  outputs?: unknown[]
}

export interface SpatialExportInfo {
  export_date: string
  total_windows: number
  window_types: string[]
  export_templates: string[]
  all_tags: string[]
  created_by?: string
  platform_version?: string
}

export interface WorkspaceMetadataBlock {
  id: string
  name: string
  description: string
  category: string
  is_template: boolean
  created_date: string
  modified_date: string
  tags: string[]
  version: string
}

export interface NotebookDocumentMetadata {
  kernelspec: { display_name: string; language: string; name: string }
  language_info: { name: string; version: string }
  [EXPORT_BLOCK_KEY]: SpatialExportInfo
  workspace_metadata?: WorkspaceMetadataBlock
}

export interface NotebookDocument {
  cells: NotebookCell[]
  metadata: NotebookDocumentMetadata
  nbformat: number
  nbformat_minor: number
}

/** Anything `decodeNotebook` accepts */
export type NotebookSource = string | Buffer | Uint8Array | Record<string, unknown>

export interface ImportResult {
  restoredWindows: WindowRecord[]
  errors: CellImportError[]
  /** Old embedded `window_id` -> newly allocated id */
  idMapping: Map<number, number>
  /** Informational only; may disagree with the restored records */
  originalMetadata: SpatialExportInfo | null
  workspaceMetadata: WorkspaceMetadataBlock | null
}

export interface NotebookAnalysis {
  totalCells: number
  windowCells: number
  windowTypes: string[]
  exportTemplates: string[]
  metadata: SpatialExportInfo | null
  workspaceMetadata: WorkspaceMetadataBlock | null
}

/**
 * Workspace Metadata Types
 */

import type { ImportResult } from '../notebook/types'

export const WORKSPACE_CATEGORIES = [
  'custom',
  'template',
  'demo',
  'data-visualization',
  'analysis',
  'modeling',
  'dashboard',
  'research',
] as const

export type WorkspaceCategory = (typeof WORKSPACE_CATEGORIES)[number]

/** Labels written to the index and to `workspace_metadata.category` */
export const WORKSPACE_CATEGORY_LABELS: Record<WorkspaceCategory, string> = {
  custom: 'Custom',
  template: 'Template',
  demo: 'Demo',
  'data-visualization': 'Data Visualization',
  analysis: 'Analysis',
  modeling: '3D Modeling',
  dashboard: 'Dashboard',
  research: 'Research',
}

/** Resolve a label or key; anything else is `custom` */
export function parseWorkspaceCategory(value: string): WorkspaceCategory {
  for (const category of WORKSPACE_CATEGORIES) {
    if (category === value || WORKSPACE_CATEGORY_LABELS[category] === value) {
      return category
    }
  }
  return 'custom'
}

export const WORKSPACE_VERSION = '1.0'

export interface WorkspaceMetadataRecord {
  id: string
  name: string
  description: string
  category: WorkspaceCategory
  isTemplate: boolean
  createdDate: Date
  modifiedDate: Date
  /** Derived from the backing document; refreshed on demand */
  totalWindows: number
  /** Derived: window type labels present in the document */
  windowTypes: string[]
  tags: string[]
  filePath: string
  version: string
}

export interface CreateWorkspaceInput {
  name: string
  description?: string
  category?: WorkspaceCategory
  isTemplate?: boolean
  tags?: string[]
}

export interface LoadWorkspaceOptions {
  /** Empty the registry before importing (default true) */
  clearExisting?: boolean
  /** Opens a restored window visually; a rejection marks only that window as failed */
  openWindow?: (windowId: number) => void | Promise<void>
}

export interface FailedWindowOpen {
  windowId: number
  error: string
}

export interface LoadWorkspaceResult {
  workspace: WorkspaceMetadataRecord
  importResult: ImportResult
  /** Ids marked opened, in the order they were opened */
  openedWindows: number[]
  failedWindows: FailedWindowOpen[]
}

/**
 * Zod schemas for the metadata blocks read back from notebook documents.
 *
 * Cell metadata sub-objects are lenient: every field falls back to its default on its own,
 * so one malformed field never costs the rest of the cell.
 */

import { z } from 'zod'

const finiteNumber = (fallback: number) => z.number().finite().catch(fallback)

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((values) => values.filter((value): value is string => typeof value === 'string'))

const optionalString = z.string().optional().catch(undefined)

// =============================================================================
// Cell Metadata
// =============================================================================

export const CellPositionSchema = z
  .object({
    x: finiteNumber(0),
    y: finiteNumber(0),
    z: finiteNumber(0),
    width: finiteNumber(400),
    height: finiteNumber(300),
    depth: z.number().finite().optional().catch(undefined),
  })
  .catch({ x: 0, y: 0, z: 0, width: 400, height: 300, depth: undefined })

export const CellStateSchema = z
  .object({
    minimized: z.boolean().catch(false),
    maximized: z.boolean().catch(false),
    opacity: finiteNumber(1),
  })
  .catch({ minimized: false, maximized: false, opacity: 1 })

export const CellTimestampsSchema = z
  .object({
    created: optionalString,
    modified: optionalString,
  })
  .catch({ created: undefined, modified: undefined })

export const CellTagsSchema = stringList

export const CellWindowIdSchema = z.number().int().optional().catch(undefined)

// =============================================================================
// Document Metadata Blocks
// =============================================================================

export const SpatialExportInfoSchema = z.object({
  export_date: z.string().catch(''),
  total_windows: z.number().int().nonnegative().catch(0),
  window_types: stringList,
  export_templates: stringList,
  all_tags: stringList,
  created_by: optionalString,
  platform_version: optionalString,
})

/** id and name are required; a block without them is not a native workspace block */
export const WorkspaceMetadataBlockSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().catch(''),
  category: z.string().catch('Custom'),
  is_template: z.boolean().catch(false),
  created_date: z.string().catch(''),
  modified_date: z.string().catch(''),
  tags: stringList,
  version: z.string().catch('1.0'),
})

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

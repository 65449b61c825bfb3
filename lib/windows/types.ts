/**
 * Window Types
 *
 * Data model for windows persisted into workspace notebooks.
 *
 * Key concepts:
 * - A window record has an integer id, a fixed window type, a position and a mutable state bag
 * - State carries at most one typed payload (modelled as a discriminated union)
 * - Wire labels are what the notebook stores; keys are what the code uses
 */

// =============================================================================
// Window Types
// =============================================================================

export const WINDOW_TYPES = [
  'chart',
  'spatial',
  'tabular',
  'volume',
  'pointcloud',
  'model3d',
] as const

export type WindowType = (typeof WINDOW_TYPES)[number]

/** Labels written to `window_type` in notebook cell metadata */
export const WINDOW_TYPE_LABELS: Record<WindowType, string> = {
  chart: 'Charts',
  spatial: 'Spatial Editor',
  tabular: 'DataFrame Viewer',
  volume: 'Model Metric Viewer',
  pointcloud: 'Point Cloud Viewer',
  model3d: '3D Model Viewer',
}

/**
 * Resolve a wire label (or a key) to a window type.
 * Returns undefined for anything outside the closed set.
 */
export function parseWindowType(value: string): WindowType | undefined {
  for (const type of WINDOW_TYPES) {
    if (WINDOW_TYPE_LABELS[type] === value || type === value) {
      return type
    }
  }
  return undefined
}

// =============================================================================
// Export Templates
// =============================================================================

export const EXPORT_TEMPLATES = [
  'plain',
  'matplotlib',
  'pandas',
  'numpy',
  'plotly',
  'seaborn',
  'custom',
  'markdown',
] as const

export type ExportTemplate = (typeof EXPORT_TEMPLATES)[number]

export const DEFAULT_EXPORT_TEMPLATE: ExportTemplate = 'plain'

export const EXPORT_TEMPLATE_LABELS: Record<ExportTemplate, string> = {
  plain: 'Plain Text',
  matplotlib: 'Matplotlib Chart',
  pandas: 'Pandas DataFrame',
  numpy: 'NumPy Array',
  plotly: 'Plotly Interactive',
  seaborn: 'Seaborn Statistical',
  custom: 'Custom Code',
  markdown: 'Markdown Only',
}

export function parseExportTemplate(value: string): ExportTemplate | undefined {
  for (const template of EXPORT_TEMPLATES) {
    if (EXPORT_TEMPLATE_LABELS[template] === value || template === value) {
      return template
    }
  }
  return undefined
}

// =============================================================================
// Position
// =============================================================================

export interface WindowPosition {
  x: number
  y: number
  z: number
  width: number
  height: number
  depth?: number
}

export function createDefaultPosition(): WindowPosition {
  return { x: 0, y: 0, z: 0, width: 400, height: 300 }
}

// =============================================================================
// Payloads
// =============================================================================

export interface DataFrameData {
  columns: string[]
  /** Row-major cell values */
  rows: string[][]
  /** Column name to data type (int, float, datetime, bool, string, ...) */
  dtypes: Record<string, string>
}

export interface ChartData {
  title: string
  chartType: string
  xLabel: string
  yLabel: string
  xData: number[]
  yData: number[]
  color?: string
  style?: string
}

export interface PointData {
  x: number
  y: number
  z: number
  intensity?: number
  color?: string
}

export interface PointCloudData {
  title: string
  xAxisLabel: string
  yAxisLabel: string
  zAxisLabel: string
  demoType: string
  parameters: Record<string, number>
  points: PointData[]
}

export interface VolumeData {
  title: string
  category: string
  metrics: Record<string, number>
  unit?: string
}

export type Vector3 = { x: number; y: number; z: number }

export interface Material3D {
  name: string
  color: string
  metallic?: number
  roughness?: number
  transparency?: number
}

export interface Model3DData {
  title: string
  modelType: string
  scale: number
  vertices: Vector3[]
  /** Each face lists indices into `vertices` */
  faces: number[][]
  materials: Material3D[]
  position: Vector3
  rotation: Vector3
}

export type WindowPayload =
  | { kind: 'tabular'; data: DataFrameData }
  | { kind: 'chart'; data: ChartData }
  | { kind: 'pointcloud'; data: PointCloudData }
  | { kind: 'volume'; data: VolumeData }
  | { kind: 'model3d'; data: Model3DData }

export type PayloadKind = WindowPayload['kind']

// =============================================================================
// State and Record
// =============================================================================

export interface WindowState {
  isMinimized: boolean
  isMaximized: boolean
  opacity: number
  content: string
  exportTemplate: ExportTemplate
  customImports: string[]
  /** Set semantics, insertion order kept for display */
  tags: string[]
  lastModified: Date
  payload: WindowPayload | null
}

export function createDefaultState(now: Date = new Date()): WindowState {
  return {
    isMinimized: false,
    isMaximized: false,
    opacity: 1,
    content: '',
    exportTemplate: DEFAULT_EXPORT_TEMPLATE,
    customImports: [],
    tags: [],
    lastModified: now,
    payload: null,
  }
}

export interface WindowRecord {
  readonly id: number
  windowType: WindowType
  position: WindowPosition
  state: WindowState
  readonly createdAt: Date
}

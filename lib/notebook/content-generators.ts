/**
 * Content Generators
 *
 * Turn a window's payload into the code written to its notebook cell.
 * Every generator is pure and total: the same payload always yields the same text,
 * and an empty payload yields a labeled placeholder instead of throwing.
 *
 * The markers written here (`x_data = [...]`, `metrics = {...}`, `vertices = np.array([...])`,
 * `# Chart Type:` ...) are what the payload extractors look for on import.
 */

import {
  WINDOW_TYPE_LABELS,
  type ChartData,
  type DataFrameData,
  type Model3DData,
  type PayloadKind,
  type PointCloudData,
  type VolumeData,
  type WindowPayload,
  type WindowRecord,
  type WindowType,
} from '../windows/types'

// =============================================================================
// Python Literal Helpers
// =============================================================================

/** Single-quoted python string literal, kept on one line */
export function pyString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\r?\n/g, ' ')
  return `'${escaped}'`
}

function pyNumber(value: number): string {
  return Number.isFinite(value) ? String(value) : 'float("nan")'
}

function pyNumberList(values: number[]): string {
  return `[${values.map(pyNumber).join(', ')}]`
}

function oneLine(value: string): string {
  return value.replace(/\r?\n/g, ' ')
}

const NUMERIC_CELL = /^-?\d+(\.\d+)?$/
const NUMERIC_DTYPES = new Set(['int', 'int64', 'float', 'float64', 'number'])

function pyCell(value: string, dtype: string | undefined): string {
  if (dtype && NUMERIC_DTYPES.has(dtype) && NUMERIC_CELL.test(value)) {
    return value
  }
  return pyString(value)
}

function placeholder(kind: string, label: string): string {
  return `# Empty ${kind}\nprint('No ${label} data available')`
}

// =============================================================================
// Payload Generators
// =============================================================================

export function generateTabularCode(data: DataFrameData | null): string {
  if (!data || data.columns.length === 0) {
    return placeholder('DataFrame', 'DataFrame')
  }

  const columnLines = data.columns.map((column, index) => {
    const dtype = data.dtypes[column]
    const values = data.rows.map((row) => pyCell(row[index] ?? '', dtype))
    return `    ${pyString(column)}: [${values.join(', ')}],`
  })

  const dtypeEntries = data.columns.map(
    (column) => `${pyString(column)}: ${pyString(data.dtypes[column] ?? 'string')}`
  )

  return [
    `# DataFrame (${data.rows.length} rows x ${data.columns.length} columns)`,
    'import pandas as pd',
    'import numpy as np',
    '',
    'data = {',
    ...columnLines,
    '}',
    '',
    `dtypes = {${dtypeEntries.join(', ')}}`,
    '',
    'df = pd.DataFrame(data)',
    'print(df.info())',
    'df.head()',
  ].join('\n')
}

const CHART_CALLS: Record<string, string> = {
  line: 'plt.plot',
  scatter: 'plt.scatter',
  bar: 'plt.bar',
  area: 'plt.fill_between',
}

export function generateChartCode(data: ChartData | null): string {
  if (!data || (data.xData.length === 0 && data.yData.length === 0)) {
    return placeholder('chart', 'chart')
  }

  const call = CHART_CALLS[data.chartType] ?? 'plt.plot'
  const extras: string[] = []
  if (data.color) extras.push(`color=${pyString(data.color)}`)
  if (data.style) extras.push(`linestyle=${pyString(data.style)}`)
  const args = ['x_data', 'y_data', ...extras].join(', ')

  return [
    `# ${oneLine(data.title)}`,
    `# Chart Type: ${data.chartType}`,
    'import matplotlib.pyplot as plt',
    'import numpy as np',
    '',
    `x_data = ${pyNumberList(data.xData)}`,
    `y_data = ${pyNumberList(data.yData)}`,
    '',
    'plt.figure(figsize=(10, 6))',
    `${call}(${args})`,
    `plt.title(${pyString(data.title)})`,
    `plt.xlabel(${pyString(data.xLabel)})`,
    `plt.ylabel(${pyString(data.yLabel)})`,
    'plt.grid(True, alpha=0.3)',
    'plt.show()',
  ].join('\n')
}

export function generatePointCloudCode(data: PointCloudData | null): string {
  if (!data || data.points.length === 0) {
    return placeholder('point cloud', 'point cloud')
  }

  const hasIntensity = data.points.some((point) => point.intensity !== undefined)
  const parameterEntries = Object.keys(data.parameters)
    .sort()
    .map((key) => `${pyString(key)}: ${pyNumber(data.parameters[key] ?? 0)}`)

  const lines = [
    `# ${oneLine(data.title)}`,
    `# Demo Type: ${oneLine(data.demoType)}`,
    'import numpy as np',
    'import matplotlib.pyplot as plt',
    '',
    `# Point cloud data (${data.points.length} points)`,
    `x_points = np.array(${pyNumberList(data.points.map((point) => point.x))})`,
    `y_points = np.array(${pyNumberList(data.points.map((point) => point.y))})`,
    `z_points = np.array(${pyNumberList(data.points.map((point) => point.z))})`,
  ]

  if (hasIntensity) {
    lines.push(
      `intensities = np.array(${pyNumberList(data.points.map((point) => point.intensity ?? 0))})`
    )
  }

  lines.push(
    `parameters = {${parameterEntries.join(', ')}}`,
    '',
    'fig = plt.figure(figsize=(12, 10))',
    "ax = fig.add_subplot(111, projection='3d')",
    hasIntensity
      ? "ax.scatter(x_points, y_points, z_points, c=intensities, cmap='viridis', alpha=0.7)"
      : 'ax.scatter(x_points, y_points, z_points, alpha=0.7)',
    `ax.set_xlabel(${pyString(data.xAxisLabel)})`,
    `ax.set_ylabel(${pyString(data.yAxisLabel)})`,
    `ax.set_zlabel(${pyString(data.zAxisLabel)})`,
    `ax.set_title(${pyString(data.title)})`,
    'plt.show()'
  )

  return lines.join('\n')
}

export function generateVolumeCode(data: VolumeData | null): string {
  if (!data || Object.keys(data.metrics).length === 0) {
    return placeholder('volume data', 'volume')
  }

  const header = [`# ${oneLine(data.title)}`, `# Category: ${oneLine(data.category)}`]
  if (data.unit) header.push(`# Unit: ${oneLine(data.unit)}`)

  const metricLines = Object.entries(data.metrics).map(
    ([name, value]) => `    ${pyString(name)}: ${pyNumber(value)},`
  )

  return [
    ...header,
    'import matplotlib.pyplot as plt',
    'import pandas as pd',
    '',
    'metrics = {',
    ...metricLines,
    '}',
    '',
    "df = pd.DataFrame(list(metrics.items()), columns=['Metric', 'Value'])",
    'print(df)',
    '',
    'plt.figure(figsize=(10, 6))',
    "plt.bar(df['Metric'], df['Value'])",
    `plt.title(${pyString(data.title)})`,
    'plt.show()',
  ].join('\n')
}

export function generateModel3DCode(data: Model3DData | null): string {
  if (!data || data.vertices.length === 0) {
    return placeholder('3D model', '3D model')
  }

  const vertexLines = data.vertices.map(
    (vertex) => `    ${pyNumberList([vertex.x, vertex.y, vertex.z])},`
  )
  const faceLines = data.faces.map((face) => `    ${pyNumberList(face)},`)
  const materialLines = data.materials.map(
    (material) => `# Material: ${oneLine(material.name)} (${oneLine(material.color)})`
  )

  return [
    `# ${oneLine(data.title)}`,
    `# Model Type: ${oneLine(data.modelType)}`,
    `# Scale: ${pyNumber(data.scale)}`,
    ...materialLines,
    'import numpy as np',
    'import matplotlib.pyplot as plt',
    'from mpl_toolkits.mplot3d.art3d import Poly3DCollection',
    '',
    'vertices = np.array([',
    ...vertexLines,
    '])',
    '',
    'faces = [',
    ...faceLines,
    ']',
    '',
    `position = ${pyNumberList([data.position.x, data.position.y, data.position.z])}`,
    `rotation = ${pyNumberList([data.rotation.x, data.rotation.y, data.rotation.z])}`,
    '',
    'fig = plt.figure(figsize=(10, 8))',
    "ax = fig.add_subplot(111, projection='3d')",
    'ax.add_collection3d(Poly3DCollection([[vertices[i] for i in face] for face in faces], alpha=0.7))',
    `ax.set_title(${pyString(data.title)})`,
    'plt.show()',
  ].join('\n')
}

/** Generate code for any payload */
export function generatePayloadCode(payload: WindowPayload): string {
  switch (payload.kind) {
    case 'tabular':
      return generateTabularCode(payload.data)
    case 'chart':
      return generateChartCode(payload.data)
    case 'pointcloud':
      return generatePointCloudCode(payload.data)
    case 'volume':
      return generateVolumeCode(payload.data)
    case 'model3d':
      return generateModel3DCode(payload.data)
  }
}

// =============================================================================
// Window Cell Content
// =============================================================================

/** Payload kind each window type renders; other kinds are ignored on export */
export const PAYLOAD_KIND_FOR_WINDOW: Record<WindowType, PayloadKind> = {
  chart: 'chart',
  spatial: 'pointcloud',
  tabular: 'tabular',
  volume: 'volume',
  pointcloud: 'pointcloud',
  model3d: 'model3d',
}

const HEADER_IMPORTS: Record<WindowType, string[]> = {
  chart: ['import matplotlib.pyplot as plt', 'import numpy as np'],
  spatial: [],
  tabular: ['import pandas as pd', 'import numpy as np'],
  volume: ['import matplotlib.pyplot as plt', 'import numpy as np', 'import pandas as pd'],
  pointcloud: ['import numpy as np', 'import matplotlib.pyplot as plt'],
  model3d: [
    'import numpy as np',
    'import matplotlib.pyplot as plt',
    'from mpl_toolkits.mplot3d.art3d import Poly3DCollection',
  ],
}

function generateWindowHeader(record: WindowRecord): string {
  const { id, windowType, position, state } = record
  const lines = [
    `# ${WINDOW_TYPE_LABELS[windowType]} Window #${id}`,
    `# Position: (${position.x}, ${position.y}, ${position.z})`,
    `# Size: ${position.width} x ${position.height}`,
  ]

  const imports = [...HEADER_IMPORTS[windowType], ...state.customImports]
  if (imports.length > 0) {
    lines.push('', ...imports)
  }

  lines.push('')
  return lines.join('\n')
}

/**
 * Cell text for a window: generated payload code when the window carries an applicable
 * payload, otherwise a per-type header followed by the window's free-text content.
 */
export function generateCellContent(record: WindowRecord): string {
  const payload = record.state.payload
  if (payload && payload.kind === PAYLOAD_KIND_FOR_WINDOW[record.windowType]) {
    return generatePayloadCode(payload)
  }

  const header = generateWindowHeader(record)
  if (record.state.content.length === 0) {
    return record.windowType === 'spatial' ? `${header}\n*No content available*` : header
  }
  return `${header}\n${record.state.content}`
}

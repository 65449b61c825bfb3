/**
 * Payload Extractors
 *
 * Best-effort recovery of typed payloads from the free text of a notebook cell.
 * Nothing here parses Python: each matcher looks for a textual marker and rebuilds
 * whatever values it can find around it.
 *
 * Key concepts:
 * - Matchers are registered per window type, in priority order
 * - The first matcher whose pattern occurs in the text decides the outcome
 * - No match (or a matcher returning null) means no payload, never an error
 */

import type {
  ChartData,
  DataFrameData,
  Material3D,
  Model3DData,
  PointCloudData,
  PointData,
  Vector3,
  VolumeData,
  WindowPayload,
  WindowType,
} from '../windows/types'

export interface PayloadMatcher {
  name: string
  pattern: RegExp
  extract: (content: string, match: RegExpExecArray) => WindowPayload | null
}

export interface ExtractionOutcome {
  payload: WindowPayload | null
  /** Name of the matcher that fired, null when none matched */
  matcher: string | null
}

// =============================================================================
// Text Helpers
// =============================================================================

const NUMBER = '-?\\d+(?:\\.\\d+)?(?:[eE][-+]?\\d+)?'
const QUOTED = `'((?:[^'\\\\]|\\\\.)*)'|"((?:[^"\\\\]|\\\\.)*)"`

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function unescapePy(value: string): string {
  return value.replace(/\\(.)/g, '$1')
}

function quotedValue(match: RegExpExecArray, firstGroup: number): string {
  return unescapePy(match[firstGroup] ?? match[firstGroup + 1] ?? '')
}

/** First `# ...` comment line, trimmed */
export function findTitle(content: string): string | null {
  const match = /^[ \t]*# (.+)$/m.exec(content)
  return match ? match[1].trim() : null
}

function commentValue(content: string, label: string): string | null {
  const match = new RegExp(`^[ \\t]*# ${escapeRegExp(label)}:[ \\t]*(.*)$`, 'm').exec(content)
  return match ? match[1].trim() : null
}

function callArgument(content: string, fn: string): string | null {
  const match = new RegExp(`${escapeRegExp(fn)}\\(\\s*(?:${QUOTED})`).exec(content)
  return match ? quotedValue(match, 1) : null
}

function keywordArgument(content: string, keyword: string): string | null {
  const match = new RegExp(`\\b${keyword}\\s*=\\s*(?:${QUOTED})`).exec(content)
  return match ? quotedValue(match, 1) : null
}

function numberList(text: string): number[] {
  return Array.from(text.matchAll(new RegExp(NUMBER, 'g')), (match) => Number(match[0]))
}

function assignedNumberList(content: string, variable: string): number[] | null {
  const match = new RegExp(
    `(?:^|[^\\w.])${escapeRegExp(variable)}\\s*=\\s*(?:np\\.array\\()?\\[([^\\]]*)\\]`,
    'm'
  ).exec(content)
  return match ? numberList(match[1]) : null
}

interface BalancedSlice {
  inner: string
  /** Index just past the closing bracket */
  end: number
}

/** Text between the bracket at `openIndex` and its matching close, skipping quoted strings */
export function sliceBalanced(text: string, openIndex: number): BalancedSlice | null {
  const open = text[openIndex]
  const close = open === '{' ? '}' : open === '[' ? ']' : open === '(' ? ')' : null
  if (!close) return null

  let depth = 0
  let quote: string | null = null
  for (let i = openIndex; i < text.length; i++) {
    const ch = text[i]
    if (quote) {
      if (ch === '\\') {
        i++
      } else if (ch === quote) {
        quote = null
      }
      continue
    }
    if (ch === "'" || ch === '"') {
      quote = ch
    } else if (ch === open) {
      depth++
    } else if (ch === close) {
      depth--
      if (depth === 0) {
        return { inner: text.slice(openIndex + 1, i), end: i + 1 }
      }
    }
  }
  return null
}

/** Body of `<name> = {` / `<name> = [` found at the end of `match` */
function blockAfter(content: string, match: RegExpExecArray): string | null {
  return sliceBalanced(content, match.index + match[0].length - 1)?.inner ?? null
}

function parseListItems(inner: string): string[] {
  const items: string[] = []
  const itemPattern = new RegExp(`${QUOTED}|([^,\\s][^,]*)`, 'g')
  for (const match of inner.matchAll(itemPattern)) {
    if (match[3] !== undefined) {
      items.push(match[3].trim())
    } else {
      items.push(unescapePy(match[1] ?? match[2] ?? ''))
    }
  }
  return items
}

/** `'key': [ ... ]` entries of a dict body, in order */
function parseListEntries(body: string): Array<[string, string[]]> {
  const entries: Array<[string, string[]]> = []
  const keyPattern = new RegExp(`(?:${QUOTED})\\s*:\\s*\\[`, 'g')
  let match: RegExpExecArray | null
  while ((match = keyPattern.exec(body)) !== null) {
    const list = sliceBalanced(body, match.index + match[0].length - 1)
    if (!list) break
    entries.push([quotedValue(match, 1), parseListItems(list.inner)])
    keyPattern.lastIndex = list.end
  }
  return entries
}

/** `'key': <number>` entries of a dict body, in order */
function parseNumberEntries(body: string): Array<[string, number]> {
  const pattern = new RegExp(`(?:${QUOTED})\\s*:\\s*(${NUMBER})`, 'g')
  return Array.from(body.matchAll(pattern), (match): [string, number] => [
    unescapePy(match[1] ?? match[2] ?? ''),
    Number(match[3]),
  ])
}

function parseStringEntries(body: string): Array<[string, string]> {
  const pattern = new RegExp(`(?:${QUOTED})\\s*:\\s*(?:${QUOTED})`, 'g')
  return Array.from(body.matchAll(pattern), (match): [string, string] => [
    unescapePy(match[1] ?? match[2] ?? ''),
    unescapePy(match[3] ?? match[4] ?? ''),
  ])
}

function dictBody(content: string, variable: string): string | null {
  const match = new RegExp(`\\b${escapeRegExp(variable)}\\s*=\\s*\\{`).exec(content)
  return match ? blockAfter(content, match) : null
}

function toVector(values: number[] | null): Vector3 {
  if (!values || values.length < 3) return { x: 0, y: 0, z: 0 }
  return { x: values[0], y: values[1], z: values[2] }
}

// =============================================================================
// Tabular
// =============================================================================

export function inferDtype(values: string[]): string {
  if (values.length === 0) return 'string'
  if (values.every((value) => /^-?\d+$/.test(value))) return 'int'
  if (values.every((value) => /^-?\d+(\.\d+)?$/.test(value))) return 'float'
  if (values.every((value) => value === 'True' || value === 'False')) return 'bool'
  return 'string'
}

function extractTabularFromDict(content: string, match: RegExpExecArray): WindowPayload | null {
  const body = blockAfter(content, match)
  if (body === null) return null

  const entries = parseListEntries(body)
  if (entries.length === 0) return null

  const declared = new Map(parseStringEntries(dictBody(content, 'dtypes') ?? ''))
  const columns = entries.map(([column]) => column)
  const rowCount = Math.max(...entries.map(([, values]) => values.length))
  const rows: string[][] = []
  for (let row = 0; row < rowCount; row++) {
    rows.push(entries.map(([, values]) => values[row] ?? ''))
  }

  const dtypes: Record<string, string> = {}
  for (const [column, values] of entries) {
    dtypes[column] = declared.get(column) ?? inferDtype(values)
  }

  const data: DataFrameData = { columns, rows, dtypes }
  return { kind: 'tabular', data }
}

function extractTabularPlaceholder(): WindowPayload {
  return {
    kind: 'tabular',
    data: { columns: ['imported_column'], rows: [], dtypes: { imported_column: 'string' } },
  }
}

// =============================================================================
// Chart
// =============================================================================

function detectChartType(content: string): string {
  if (/plt\.scatter\(|ax\.scatter\(/.test(content)) return 'scatter'
  if (/plt\.bar\(|ax\.bar\(/.test(content)) return 'bar'
  if (/plt\.fill_between\(/.test(content)) return 'area'
  return 'line'
}

function extractChart(content: string): WindowPayload {
  const data: ChartData = {
    title: callArgument(content, 'plt.title') ?? findTitle(content) ?? 'Imported Chart',
    chartType: commentValue(content, 'Chart Type') ?? detectChartType(content),
    xLabel: callArgument(content, 'plt.xlabel') ?? 'X',
    yLabel: callArgument(content, 'plt.ylabel') ?? 'Y',
    xData: assignedNumberList(content, 'x_data') ?? assignedNumberList(content, 'x') ?? [],
    yData: assignedNumberList(content, 'y_data') ?? assignedNumberList(content, 'y') ?? [],
  }

  const color = keywordArgument(content, 'color')
  if (color) data.color = color
  const style = keywordArgument(content, 'linestyle')
  if (style) data.style = style

  return { kind: 'chart', data }
}

// =============================================================================
// Point Cloud
// =============================================================================

function buildPoints(
  xs: number[],
  ys: number[],
  zs: number[],
  intensities: number[] | null
): PointData[] {
  const count = Math.min(xs.length, ys.length, zs.length)
  const points: PointData[] = []
  for (let i = 0; i < count; i++) {
    const point: PointData = { x: xs[i], y: ys[i], z: zs[i] }
    if (intensities && i < intensities.length) {
      point.intensity = intensities[i]
    }
    points.push(point)
  }
  return points
}

function pointCloudShell(content: string, points: PointData[]): PointCloudData {
  const parameters: Record<string, number> = {}
  for (const [key, value] of parseNumberEntries(dictBody(content, 'parameters') ?? '')) {
    parameters[key] = value
  }

  return {
    title: findTitle(content) ?? 'Imported Point Cloud',
    xAxisLabel: callArgument(content, 'ax.set_xlabel') ?? 'X',
    yAxisLabel: callArgument(content, 'ax.set_ylabel') ?? 'Y',
    zAxisLabel: callArgument(content, 'ax.set_zlabel') ?? 'Z',
    demoType: commentValue(content, 'Demo Type') ?? 'imported',
    parameters,
    points,
  }
}

function extractPointCloudArrays(content: string): WindowPayload | null {
  const points = buildPoints(
    assignedNumberList(content, 'x_points') ?? [],
    assignedNumberList(content, 'y_points') ?? [],
    assignedNumberList(content, 'z_points') ?? [],
    assignedNumberList(content, 'intensities')
  )
  if (points.length === 0) return null
  return { kind: 'pointcloud', data: pointCloudShell(content, points) }
}

function extractPointCloudDict(content: string): WindowPayload | null {
  const lists = new Map<string, number[]>()
  const keyPattern = new RegExp(`(?:${QUOTED})\\s*:\\s*\\[`, 'g')
  let match: RegExpExecArray | null
  while ((match = keyPattern.exec(content)) !== null) {
    const list = sliceBalanced(content, match.index + match[0].length - 1)
    if (!list) break
    const key = quotedValue(match, 1)
    if (!lists.has(key)) {
      lists.set(key, numberList(list.inner))
    }
    keyPattern.lastIndex = list.end
  }

  const points = buildPoints(
    lists.get('x') ?? [],
    lists.get('y') ?? [],
    lists.get('z') ?? [],
    lists.get('intensity') ?? lists.get('intensities') ?? null
  )
  if (points.length === 0) return null
  return { kind: 'pointcloud', data: pointCloudShell(content, points) }
}

// =============================================================================
// Volume Metrics
// =============================================================================

export function categorizeMetrics(title: string): string {
  const lower = title.toLowerCase()
  if (lower.includes('performance') || lower.includes('metric')) return 'performance'
  if (lower.includes('model') || /\bml\b/.test(lower)) return 'model'
  if (lower.includes('system') || lower.includes('resource')) return 'system'
  return 'general'
}

function extractVolumeDict(content: string, match: RegExpExecArray): WindowPayload | null {
  const body = blockAfter(content, match)
  if (body === null) return null

  const metrics: Record<string, number> = {}
  for (const [name, value] of parseNumberEntries(body)) {
    metrics[name] = value
  }
  if (Object.keys(metrics).length === 0) return null

  const title = findTitle(content) ?? 'Imported Volume Data'
  const data: VolumeData = {
    title,
    category: commentValue(content, 'Category') ?? categorizeMetrics(title),
    metrics,
  }
  const unit = commentValue(content, 'Unit')
  if (unit) data.unit = unit

  return { kind: 'volume', data }
}

function extractVolumeAssignments(content: string): WindowPayload | null {
  const metrics: Record<string, number> = {}
  const pattern = new RegExp(`^[ \\t]*([A-Za-z_]\\w*)[ \\t]*=[ \\t]*(${NUMBER})[ \\t]*$`, 'gm')
  for (const match of content.matchAll(pattern)) {
    metrics[match[1]] = Number(match[2])
  }
  if (Object.keys(metrics).length === 0) return null

  return { kind: 'volume', data: { title: 'Extracted Metrics', category: 'general', metrics } }
}

// =============================================================================
// 3D Model
// =============================================================================

function extractModel3D(content: string, match: RegExpExecArray): WindowPayload | null {
  const vertexBlock = blockAfter(content, match)
  if (vertexBlock === null) return null

  const triple = new RegExp(`\\[\\s*(${NUMBER})\\s*,\\s*(${NUMBER})\\s*,\\s*(${NUMBER})\\s*\\]`, 'g')
  const vertices: Vector3[] = Array.from(vertexBlock.matchAll(triple), (vertex) => ({
    x: Number(vertex[1]),
    y: Number(vertex[2]),
    z: Number(vertex[3]),
  }))
  if (vertices.length === 0) return null

  const facesMatch = /\bfaces\s*=\s*\[/.exec(content)
  const faceBlock = facesMatch ? blockAfter(content, facesMatch) : null
  const faces = faceBlock
    ? Array.from(faceBlock.matchAll(/\[([^[\]]*)\]/g), (face) =>
        numberList(face[1]).filter((index) => Number.isInteger(index))
      ).filter((face) => face.length > 0)
    : []

  const materials: Material3D[] = Array.from(
    content.matchAll(/^[ \t]*# Material: (.*) \(([^()]*)\)[ \t]*$/gm),
    (material) => ({ name: material[1], color: material[2] })
  )

  const scale = Number(commentValue(content, 'Scale'))

  const data: Model3DData = {
    title: findTitle(content) ?? 'Imported Model',
    modelType: commentValue(content, 'Model Type') ?? 'imported',
    scale: Number.isFinite(scale) && scale > 0 ? scale : 1,
    vertices,
    faces,
    materials,
    position: toVector(assignedNumberList(content, 'position')),
    rotation: toVector(assignedNumberList(content, 'rotation')),
  }
  return { kind: 'model3d', data }
}

// =============================================================================
// Registry
// =============================================================================

export const TABULAR_MATCHERS: PayloadMatcher[] = [
  { name: 'data-dict', pattern: /\bdata\s*=\s*\{/, extract: extractTabularFromDict },
  { name: 'dataframe-constructor', pattern: /pd\.DataFrame\(/, extract: extractTabularPlaceholder },
]

export const CHART_MATCHERS: PayloadMatcher[] = [
  { name: 'data-arrays', pattern: /\bx_data\s*=\s*(?:np\.array\()?\[/, extract: extractChart },
  { name: 'plot-call', pattern: /plt\.(?:plot|scatter|bar)\(/, extract: extractChart },
]

export const POINT_CLOUD_MATCHERS: PayloadMatcher[] = [
  {
    name: 'point-arrays',
    pattern: /\bx_points\s*=\s*(?:np\.array\()?\[/,
    extract: extractPointCloudArrays,
  },
  { name: 'points-dict', pattern: /\bpoints_data\s*=\s*\{/, extract: extractPointCloudDict },
  { name: 'coordinate-lists', pattern: /['"]x['"]\s*:\s*\[/, extract: extractPointCloudDict },
]

export const VOLUME_MATCHERS: PayloadMatcher[] = [
  {
    name: 'metrics-dict',
    pattern: /\b(?:metrics|performance|volume_data|model_metrics)\s*=\s*\{/,
    extract: extractVolumeDict,
  },
  {
    name: 'metric-assignments',
    pattern: new RegExp(`^[ \\t]*[A-Za-z_]\\w*[ \\t]*=[ \\t]*${NUMBER}[ \\t]*$`, 'm'),
    extract: extractVolumeAssignments,
  },
]

export const MODEL3D_MATCHERS: PayloadMatcher[] = [
  { name: 'vertex-array', pattern: /\bvertices\s*=\s*(?:np\.array\()?\[/, extract: extractModel3D },
]

export class PayloadExtractorRegistry {
  private readonly matchers = new Map<WindowType, PayloadMatcher[]>()

  /**
   * Add a matcher for a window type. Appended after existing matchers unless `first` is set.
   */
  register(windowType: WindowType, matcher: PayloadMatcher, options: { first?: boolean } = {}): void {
    const existing = this.matchers.get(windowType) ?? []
    if (existing.some((entry) => entry.name === matcher.name)) {
      console.warn(
        `[PayloadExtractorRegistry] Overwriting matcher "${matcher.name}" for type: ${windowType}`
      )
    }
    const others = existing.filter((entry) => entry.name !== matcher.name)
    this.matchers.set(windowType, options.first ? [matcher, ...others] : [...others, matcher])
  }

  getMatchers(windowType: WindowType): PayloadMatcher[] {
    return [...(this.matchers.get(windowType) ?? [])]
  }

  extract(windowType: WindowType, content: string): ExtractionOutcome {
    for (const matcher of this.matchers.get(windowType) ?? []) {
      matcher.pattern.lastIndex = 0
      const match = matcher.pattern.exec(content)
      if (match) {
        return { payload: matcher.extract(content, match), matcher: matcher.name }
      }
    }
    return { payload: null, matcher: null }
  }
}

export function createDefaultExtractorRegistry(): PayloadExtractorRegistry {
  const registry = new PayloadExtractorRegistry()
  const defaults: Array<[WindowType, PayloadMatcher[]]> = [
    ['tabular', TABULAR_MATCHERS],
    ['chart', CHART_MATCHERS],
    ['spatial', POINT_CLOUD_MATCHERS],
    ['pointcloud', POINT_CLOUD_MATCHERS],
    ['volume', VOLUME_MATCHERS],
    ['model3d', MODEL3D_MATCHERS],
  ]
  for (const [windowType, matchers] of defaults) {
    matchers.forEach((matcher) => registry.register(windowType, matcher))
  }
  return registry
}

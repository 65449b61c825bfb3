jest.mock('@/lib/utils/debug-logger', () => ({
  debugLog: jest.fn(),
}))

import {
  analyzeNotebook,
  decodeNotebook,
  exportDocument,
  exportToJSON,
  importNotebook,
  joinSourceLines,
  parseNotebookSource,
  toSourceLines,
  validateNotebook,
} from '@/lib/notebook/notebook-codec'
import { NotebookImportError } from '@/lib/notebook/errors'
import { WindowRegistry } from '@/lib/windows/window-registry'
import type { ChartData, DataFrameData } from '@/lib/windows/types'

const EXPORT_DATE = new Date('2024-05-10T08:30:00.000Z')

const createChart = (): ChartData => ({
  title: 'Weekly signups',
  chartType: 'line',
  xLabel: 'Week',
  yLabel: 'Signups',
  xData: [1, 2, 3],
  yData: [10, 14, 9],
})

const createTable = (): DataFrameData => ({
  columns: ['city', 'population'],
  rows: [
    ['Lyon', '522000'],
    ['Nantes', '320000'],
  ],
  dtypes: { city: 'string', population: 'int' },
})

const windowCell = (windowId: number, windowType: unknown, source: unknown = []) => ({
  cell_type: 'code',
  metadata: { window_id: windowId, window_type: windowType },
  source,
})

describe('source lines', () => {
  it('keeps the newline on every line but the last', () => {
    expect(toSourceLines('a\nb\nc')).toEqual(['a\n', 'b\n', 'c'])
    expect(toSourceLines('')).toEqual([])
  })

  it('joins self-terminated lines as they are', () => {
    expect(joinSourceLines(['a\n', 'b'])).toBe('a\nb')
  })

  it('joins bare lines with newlines', () => {
    expect(joinSourceLines(['a', 'b'])).toBe('a\nb')
  })

  it('accepts a plain string source', () => {
    expect(joinSourceLines('x = 1')).toBe('x = 1')
    expect(joinSourceLines(null)).toBe('')
  })
})

describe('exportDocument', () => {
  it('writes one cell per window in id order with the aggregate block', () => {
    const registry = new WindowRegistry()
    registry.create('tabular', 2)
    registry.create('chart', 1)
    registry.addTag(1, 'a')
    registry.updateTemplate(2, 'markdown')

    const document = exportDocument(registry, { now: EXPORT_DATE })

    expect(document.nbformat).toBe(4)
    expect(document.nbformat_minor).toBe(5)
    expect(document.cells.map((cell) => cell.metadata.window_id)).toEqual([1, 2])
    expect(document.cells[0].cell_type).toBe('code')
    expect(document.cells[0].execution_count).toBeNull()
    expect(document.cells[0].outputs).toEqual([])
    expect(document.cells[1].cell_type).toBe('markdown')
    expect('execution_count' in document.cells[1]).toBe(false)
    expect(document.metadata.spatial_export).toEqual({
      export_date: '2024-05-10T08:30:00.000Z',
      total_windows: 2,
      window_types: ['Charts', 'DataFrame Viewer'],
      export_templates: ['Plain Text', 'Markdown Only'],
      all_tags: ['a'],
      created_by: 'spatial-notebook-workspace',
      platform_version: '1.0',
    })
  })

  it('writes cell metadata with wire labels', () => {
    const registry = new WindowRegistry({ now: () => EXPORT_DATE })
    registry.create('chart', 1, { x: 1, y: 2, z: 3, width: 400, height: 300 })

    const [cell] = exportDocument(registry, { now: EXPORT_DATE }).cells

    expect(cell.metadata).toEqual({
      window_id: 1,
      window_type: 'Charts',
      export_template: 'Plain Text',
      tags: [],
      position: { x: 1, y: 2, z: 3, width: 400, height: 300 },
      state: { minimized: false, maximized: false, opacity: 1 },
      timestamps: { created: '2024-05-10T08:30:00.000Z', modified: '2024-05-10T08:30:00.000Z' },
    })
  })

  it('serializes with one-space indentation and a trailing newline', () => {
    const registry = new WindowRegistry()
    registry.create('volume')

    const text = exportToJSON(registry, { now: EXPORT_DATE })

    expect(text.endsWith('}\n')).toBe(true)
    expect(text.startsWith('{\n "cells": [')).toBe(true)
    expect(JSON.parse(text)).toEqual(exportDocument(registry, { now: EXPORT_DATE }))
  })
})

describe('importNotebook', () => {
  it('assigns fresh ids after the existing ones, ignoring embedded window ids', () => {
    const registry = new WindowRegistry()
    registry.create('chart', 1)
    registry.create('chart', 2)
    registry.create('chart', 5)

    const result = importNotebook(
      { cells: [windowCell(1, 'Charts'), windowCell(2, 'Volume')] },
      registry
    )

    // "Volume" is not a known window type
    expect(result.restoredWindows.map((record) => record.id)).toEqual([6])

    const second = importNotebook(
      { cells: [windowCell(1, 'Charts'), windowCell(2, 'Model Metric Viewer')] },
      registry
    )
    expect(second.restoredWindows.map((record) => record.id)).toEqual([7, 8])
    expect(Array.from(second.idMapping.entries())).toEqual([
      [1, 7],
      [2, 8],
    ])
  })

  it('maps a two-cell document onto ids 6 and 7 when 1, 2 and 5 are taken', () => {
    const registry = new WindowRegistry()
    registry.create('chart', 1)
    registry.create('chart', 2)
    registry.create('chart', 5)

    const result = importNotebook(
      { cells: [windowCell(1, 'Charts'), windowCell(2, 'DataFrame Viewer')] },
      registry
    )

    expect(result.restoredWindows.map((record) => record.id)).toEqual([6, 7])
    expect(registry.listAll().map((record) => record.id)).toEqual([1, 2, 5, 6, 7])
    expect(registry.isOpen(6)).toBe(false)
  })

  it('reproduces position, tags and template through a round trip', () => {
    const source = new WindowRegistry()
    const record = source.create('tabular', 1, { x: 1, y: 2, z: 3, width: 400, height: 300 })
    source.updateTags(record.id, ['a', 'b'])
    source.updateTemplate(record.id, 'pandas')

    const target = new WindowRegistry()
    const [restored] = importNotebook(exportToJSON(source), target).restoredWindows

    expect(restored.position).toEqual({ x: 1, y: 2, z: 3, width: 400, height: 300 })
    expect(restored.state.tags).toEqual(['a', 'b'])
  })

  it('keeps the depth of a volumetric window', () => {
    const source = new WindowRegistry()
    source.create('volume', 1, { x: 0, y: 0, z: 0, width: 400, height: 300, depth: 250 })

    const document = exportDocument(source)
    const [restored] = importNotebook(exportToJSON(source), new WindowRegistry()).restoredWindows

    expect(document.cells[0].metadata.position.depth).toBe(250)
    expect(restored.position).toEqual({ x: 0, y: 0, z: 0, width: 400, height: 300, depth: 250 })
    expect(restored.state.exportTemplate).toBe('pandas')
    expect(restored.windowType).toBe('tabular')
  })

  it('recovers chart and table payloads from generated code', () => {
    const source = new WindowRegistry()
    source.create('chart', 1)
    source.updateChartData(1, createChart())
    source.create('tabular', 2)
    source.updateTabularData(2, createTable())

    const restored = importNotebook(exportToJSON(source), new WindowRegistry()).restoredWindows

    expect(restored[0].state.exportTemplate).toBe('matplotlib')
    expect(restored[0].state.payload).toEqual({ kind: 'chart', data: createChart() })
    expect(restored[1].state.exportTemplate).toBe('pandas')
    expect(restored[1].state.payload).toEqual({ kind: 'tabular', data: createTable() })
  })

  it('keeps the full cell source as the window content', () => {
    const result = decodeNotebook({ cells: [windowCell(3, 'Spatial Editor', ['line one\n', 'line two'])] }, 1)

    expect(result.restoredWindows[0].state.content).toBe('line one\nline two')
  })
})

describe('decodeNotebook', () => {
  it('isolates a malformed cell and restores the others', () => {
    const result = decodeNotebook(
      {
        cells: [
          windowCell(1, 'Charts', ['# one']),
          windowCell(2, 42),
          windowCell(3, 'Spatial Editor', 'free text'),
        ],
      },
      1
    )

    expect(result.restoredWindows.map((record) => record.id)).toEqual([1, 2])
    expect(result.restoredWindows.map((record) => record.windowType)).toEqual(['chart', 'spatial'])
    expect(result.errors).toEqual([
      { cellIndex: 1, originalWindowId: 2, message: 'window_type must be a string, got number' },
    ])
    expect(Array.from(result.idMapping.entries())).toEqual([
      [1, 1],
      [3, 2],
    ])
  })

  it('skips cells without window metadata', () => {
    const result = decodeNotebook(
      {
        cells: [
          { cell_type: 'markdown', source: ['# Notes'] },
          { cell_type: 'code', metadata: {}, source: [] },
          'not a cell',
          windowCell(9, 'Charts'),
        ],
      },
      4
    )

    expect(result.restoredWindows.map((record) => record.id)).toEqual([4])
    expect(result.errors).toEqual([])
  })

  it('falls back to defaults for malformed metadata fields', () => {
    const result = decodeNotebook(
      {
        cells: [
          {
            cell_type: 'code',
            metadata: {
              window_type: 'chart',
              position: { x: 'left', y: 5 },
              state: { opacity: 'half', minimized: true },
              tags: ['keep', 7, 'keep'],
              export_template: 'Unknown Template',
            },
            source: [],
          },
        ],
      },
      1
    )

    const [record] = result.restoredWindows
    expect(record.position).toEqual({ x: 0, y: 5, z: 0, width: 400, height: 300 })
    expect(record.state.isMinimized).toBe(true)
    expect(record.state.opacity).toBe(1)
    expect(record.state.tags).toEqual(['keep'])
    expect(record.state.exportTemplate).toBe('plain')
  })

  it('throws a typed error for text that is not JSON', () => {
    expect(() => decodeNotebook('{"cells": [', 1)).toThrow(NotebookImportError)
    try {
      parseNotebookSource('nope')
    } catch (error) {
      expect(error).toBeInstanceOf(NotebookImportError)
      expect(error instanceof NotebookImportError && error.code).toBe('invalid-json')
    }
  })

  it('throws a typed error for a document without cells', () => {
    expect.assertions(1)
    try {
      decodeNotebook('{"metadata": {}}', 1)
    } catch (error) {
      expect(error instanceof NotebookImportError && error.code).toBe('invalid-notebook-format')
    }
  })

  it('reads the workspace block when present', () => {
    const result = decodeNotebook(
      {
        cells: [],
        metadata: { workspace_metadata: { id: 'ws-1', name: 'Demo', category: 'Analysis' } },
      },
      1
    )

    expect(result.workspaceMetadata).toEqual({
      id: 'ws-1',
      name: 'Demo',
      description: '',
      category: 'Analysis',
      is_template: false,
      created_date: '',
      modified_date: '',
      tags: [],
      version: '1.0',
    })
  })
})

describe('analyzeNotebook', () => {
  it('counts window cells and reads the legacy aggregate block', () => {
    const analysis = analyzeNotebook(
      JSON.stringify({
        cells: [
          { ...windowCell(1, 'Charts'), metadata: { window_type: 'Charts', export_template: 'Plain Text' } },
          windowCell(2, 'Charts'),
          { cell_type: 'markdown', metadata: {}, source: [] },
        ],
        metadata: {
          visionos_export: {
            export_date: '2023-01-01T00:00:00.000Z',
            total_windows: 2,
            window_types: ['Charts'],
            export_templates: ['Plain Text'],
            all_tags: [],
          },
        },
      })
    )

    expect(analysis.totalCells).toBe(3)
    expect(analysis.windowCells).toBe(2)
    expect(analysis.windowTypes).toEqual(['Charts'])
    expect(analysis.exportTemplates).toEqual(['Plain Text'])
    expect(analysis.metadata?.total_windows).toBe(2)
  })

  it('counts only window types that import accepts', () => {
    const analysis = analyzeNotebook({
      cells: [
        windowCell(1, 'chart'),
        windowCell(2, 'Hologram'),
        { cell_type: 'code', metadata: { window_type: 7 }, source: [] },
      ],
    })

    expect(analysis.windowCells).toBe(1)
    expect(analysis.windowTypes).toEqual(['Charts'])
  })

  it('validates only documents that carry windows or the aggregate block', () => {
    expect(validateNotebook('{"cells": []}')).toBe(false)
    expect(validateNotebook('not json')).toBe(false)
    expect(validateNotebook({ cells: [windowCell(1, 'Charts')] })).toBe(true)

    const registry = new WindowRegistry()
    expect(validateNotebook(exportToJSON(registry))).toBe(true)
  })
})

jest.mock('@/lib/utils/debug-logger', () => ({
  debugLog: jest.fn(),
}))

import os from 'os'
import path from 'path'
import * as fs from 'fs-extra'
import { NotebookServerAdapter } from '@/lib/adapters/notebook-server-adapter'
import {
  autosaveFileName,
  LocalFileDestination,
  RemoteServerDestination,
  WorkspaceDestination,
  type SaveContext,
} from '@/lib/autosave/destinations'
import { WindowRegistry } from '@/lib/windows/window-registry'

// Local time, so the formatted name does not depend on the machine's zone
const SAVE_TIME = new Date(2024, 5, 1, 10, 0, 5)
const context: SaveContext = { trigger: 'manual-save', timestamp: SAVE_TIME }

describe('autosaveFileName', () => {
  it('formats the timestamp into the file name', () => {
    expect(autosaveFileName(SAVE_TIME)).toBe('autosave_2024-06-01_10-00-05.ipynb')
  })
})

describe('LocalFileDestination', () => {
  let directory: string
  let registry: WindowRegistry

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'autosave-dest-'))
    registry = new WindowRegistry()
    registry.create('chart', 1)
    registry.create('volume', 2)
  })

  afterEach(async () => {
    await fs.remove(directory)
  })

  it('overwrites a fixed file when not timestamped', async () => {
    const destination = new LocalFileDestination({
      directory,
      timestamped: false,
      fileName: 'autosave_workspace.ipynb',
    })

    const first = await destination.save(registry, context)
    registry.removeWindow(2)
    const second = await destination.save(registry, context)

    const filePath = path.join(directory, 'autosave_workspace.ipynb')
    expect(first.location).toBe(filePath)
    expect(second.location).toBe(filePath)

    const written = JSON.parse(await fs.readFile(filePath, 'utf8'))
    expect(written.metadata.spatial_export.total_windows).toBe(1)
    expect(written.metadata.spatial_export.export_date).toBe(SAVE_TIME.toISOString())
    expect(await fs.readdir(directory)).toEqual(['autosave_workspace.ipynb'])
  })

  it('writes one file per save when timestamped', async () => {
    const destination = new LocalFileDestination({
      directory: path.join(directory, 'nested'),
      timestamped: true,
      fileName: 'unused.ipynb',
    })

    const outcome = await destination.save(registry, context)

    expect(outcome.location).toBe(path.join(directory, 'nested', 'autosave_2024-06-01_10-00-05.ipynb'))
    expect(await fs.pathExists(path.join(directory, 'nested', 'autosave_2024-06-01_10-00-05.ipynb'))).toBe(true)
  })
})

describe('RemoteServerDestination', () => {
  it('uploads into the remote directory and reports the contents URL', async () => {
    const urls: string[] = []
    const fetchImpl: typeof fetch = async (input) => {
      urls.push(String(input))
      return new Response(
        JSON.stringify({ name: 'x.ipynb', path: 'drafts/x.ipynb', type: 'notebook', content: null }),
        { status: 201 }
      )
    }
    const adapter = new NotebookServerAdapter({ baseUrl: 'http://notebooks.test', timeoutMs: 1000, fetchImpl })
    const destination = new RemoteServerDestination(adapter, { remoteDirectory: 'drafts/' })

    const outcome = await destination.save(new WindowRegistry(), context)

    const expected = 'http://notebooks.test/api/contents/drafts/autosave_2024-06-01_10-00-05.ipynb'
    expect(urls).toEqual([expected])
    expect(outcome.location).toBe(expected)
  })
})

describe('WorkspaceDestination', () => {
  it('saves the active workspace through the store', async () => {
    const registry = new WindowRegistry()
    const saveWorkspace = jest.fn(async () => ({ filePath: '/workspaces/demo.ipynb' }))
    const destination = new WorkspaceDestination({ saveWorkspace }, () => 'ws-1')

    await expect(destination.save(registry)).resolves.toEqual({ location: '/workspaces/demo.ipynb' })
    expect(saveWorkspace).toHaveBeenCalledWith('ws-1', registry)
  })

  it('fails when no workspace is active', async () => {
    const destination = new WorkspaceDestination({ saveWorkspace: jest.fn() }, () => null)

    await expect(destination.save(new WindowRegistry())).rejects.toThrow('No active workspace to save')
  })
})

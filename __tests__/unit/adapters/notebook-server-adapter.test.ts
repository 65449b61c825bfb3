import { NotebookServerAdapter, NotebookServerError } from '@/lib/adapters/notebook-server-adapter'
import type { NotebookDocument } from '@/lib/notebook/types'
import { ReadableStream } from 'stream/web'

type RecordedCall = { url: string; init: RequestInit | undefined }

const createDocument = (): NotebookDocument => ({
  cells: [],
  metadata: {
    kernelspec: { display_name: 'Python 3', language: 'python', name: 'python3' },
    language_info: { name: 'python', version: '3.9.0' },
    spatial_export: {
      export_date: '2024-06-01T10:00:00.000Z',
      total_windows: 0,
      window_types: [],
      export_templates: [],
      all_tags: [],
    },
  },
  nbformat: 4,
  nbformat_minor: 5,
})

const contentsModel = (path: string) => ({
  name: path.split('/').pop(),
  path,
  type: 'notebook',
  last_modified: '2024-06-01T10:00:00Z',
  content: null,
})

function createFetch(respond: () => Response | Promise<Response>) {
  const calls: RecordedCall[] = []
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init })
    return respond()
  }
  return { calls, fetchImpl }
}

describe('NotebookServerAdapter', () => {
  it('PUTs the notebook to the contents API with the token header', async () => {
    const { calls, fetchImpl } = createFetch(
      () => new Response(JSON.stringify(contentsModel('autosave/nb 1.ipynb')), { status: 200 })
    )
    const adapter = new NotebookServerAdapter({
      baseUrl: 'http://notebooks.test/',
      token: 'test-secret',
      timeoutMs: 1000,
      fetchImpl,
    })

    const model = await adapter.saveNotebook('autosave/nb 1.ipynb', createDocument())

    expect(model.path).toBe('autosave/nb 1.ipynb')
    expect(calls).toHaveLength(1)
    expect(calls[0].url).toBe('http://notebooks.test/api/contents/autosave/nb%201.ipynb')
    expect(calls[0].init?.method).toBe('PUT')

    const headers = new Headers(calls[0].init?.headers)
    expect(headers.get('Authorization')).toBe('token test-secret')
    expect(headers.get('Content-Type')).toBe('application/json')
    expect(JSON.parse(String(calls[0].init?.body))).toEqual({
      type: 'notebook',
      format: 'json',
      content: createDocument(),
    })
  })

  it('omits the authorization header without a token', async () => {
    const { calls, fetchImpl } = createFetch(
      () => new Response(JSON.stringify(contentsModel('a.ipynb')), { status: 200 })
    )
    const adapter = new NotebookServerAdapter({ baseUrl: 'http://notebooks.test', timeoutMs: 1000, fetchImpl })

    await adapter.getNotebook('a.ipynb')

    expect(calls[0].url).toBe('http://notebooks.test/api/contents/a.ipynb?type=notebook&content=1')
    expect(new Headers(calls[0].init?.headers).has('Authorization')).toBe(false)
  })

  it('throws the HTTP status for a rejected save', async () => {
    const { fetchImpl } = createFetch(() => new Response('forbidden', { status: 403 }))
    const adapter = new NotebookServerAdapter({ baseUrl: 'http://notebooks.test', timeoutMs: 1000, fetchImpl })

    await expect(adapter.saveNotebook('a.ipynb', createDocument())).rejects.toEqual(
      new NotebookServerError(403, 'Failed to save notebook: 403')
    )
  })

  it('rejects a response that is not JSON', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {})
    const { fetchImpl } = createFetch(() => new Response('<html>', { status: 200 }))
    const adapter = new NotebookServerAdapter({ baseUrl: 'http://notebooks.test', timeoutMs: 1000, fetchImpl })

    await expect(adapter.saveNotebook('a.ipynb', createDocument())).rejects.toMatchObject({
      status: 200,
      message: 'INVALID_RESPONSE',
    })
    errorSpy.mockRestore()
  })

  it('aborts a request that exceeds the timeout', async () => {
    const fetchImpl: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
      })
    const adapter = new NotebookServerAdapter({ baseUrl: 'http://notebooks.test', timeoutMs: 10, fetchImpl })

    await expect(adapter.saveNotebook('a.ipynb', createDocument())).rejects.toMatchObject({
      status: null,
      message: 'Request timed out after 10ms',
    })
  })

  it('times out when the body stalls after the headers', async () => {
    const fetchImpl: typeof fetch = async () => new Response(new ReadableStream({ start() {} }), { status: 200 })
    const adapter = new NotebookServerAdapter({ baseUrl: 'http://notebooks.test', timeoutMs: 20, fetchImpl })

    await expect(adapter.saveNotebook('a.ipynb', createDocument())).rejects.toMatchObject({
      status: null,
      message: 'Request timed out after 20ms',
    })
  })

  it('reports an unreachable server as disconnected', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {})
    const fetchImpl: typeof fetch = () => Promise.reject(new Error('ECONNREFUSED'))
    const adapter = new NotebookServerAdapter({ baseUrl: 'http://notebooks.test', timeoutMs: 1000, fetchImpl })

    await expect(adapter.checkConnection()).resolves.toBe(false)
    warnSpy.mockRestore()
  })
})

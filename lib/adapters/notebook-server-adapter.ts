import { z } from 'zod'
import type { NotebookDocument } from '../notebook/types'

export class NotebookServerError extends Error {
  constructor(
    public readonly status: number | null,
    message: string
  ) {
    super(message)
    this.name = 'NotebookServerError'
  }
}

export interface NotebookServerAdapterOptions {
  baseUrl: string
  token?: string
  /** Covers the whole exchange, response body included */
  timeoutMs: number
  fetchImpl?: typeof fetch
}

const ContentsModelSchema = z.object({
  name: z.string(),
  path: z.string(),
  type: z.string(),
  last_modified: z.string().optional(),
  content: z.unknown(),
})

export type ContentsModel = z.infer<typeof ContentsModelSchema>

async function parseJson(response: Response): Promise<unknown> {
  const text = await response.text()
  try {
    return JSON.parse(text)
  } catch (error) {
    console.error('[NotebookServerAdapter] Failed to parse JSON', error, text.slice(0, 200))
    throw new NotebookServerError(response.status, 'INVALID_RESPONSE')
  }
}

function encodeContentsPath(path: string): string {
  return path
    .split('/')
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join('/')
}

/**
 * Client for the notebook server contents API.
 */
export class NotebookServerAdapter {
  private readonly baseUrl: string
  private readonly fetchImpl: typeof fetch

  constructor(private readonly options: NotebookServerAdapterOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.fetchImpl = options.fetchImpl ?? fetch
  }

  contentsUrl(path: string): string {
    return `${this.baseUrl}/api/contents/${encodeContentsPath(path)}`
  }

  saveNotebook(path: string, document: NotebookDocument): Promise<ContentsModel> {
    return this.request(
      this.contentsUrl(path),
      {
        method: 'PUT',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ type: 'notebook', format: 'json', content: document }),
      },
      (response) => {
        if (!response.ok) {
          throw new NotebookServerError(response.status, `Failed to save notebook: ${response.status}`)
        }
        return this.parseContents(response)
      }
    )
  }

  getNotebook(path: string): Promise<ContentsModel> {
    return this.request(`${this.contentsUrl(path)}?type=notebook&content=1`, { method: 'GET' }, (response) => {
      if (!response.ok) {
        throw new NotebookServerError(response.status, `Failed to load notebook: ${response.status}`)
      }
      return this.parseContents(response)
    })
  }

  async checkConnection(): Promise<boolean> {
    try {
      return await this.request(`${this.baseUrl}/api`, { method: 'GET' }, async (response) => response.ok)
    } catch (error) {
      console.warn('[NotebookServerAdapter] Server unreachable:', error)
      return false
    }
  }

  private async parseContents(response: Response): Promise<ContentsModel> {
    const parsed = ContentsModelSchema.safeParse(await parseJson(response))
    if (!parsed.success) {
      throw new NotebookServerError(response.status, 'INVALID_RESPONSE')
    }
    return parsed.data
  }

  /**
   * Send a request and read its response with `read`, all under one timeout.
   * A server that stalls after the headers still times out.
   */
  private async request<T>(
    url: string,
    init: RequestInit,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const headers = new Headers(init.headers)
    if (this.options.token) {
      headers.set('Authorization', `token ${this.options.token}`)
    }

    const controller = new AbortController()
    const timeoutError = new NotebookServerError(null, `Request timed out after ${this.options.timeoutMs}ms`)
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(timeoutError)
      }, this.options.timeoutMs)
    })

    const exchange = async (): Promise<T> => {
      let response: Response
      try {
        response = await this.fetchImpl(url, { ...init, headers, signal: controller.signal })
      } catch (error) {
        if (controller.signal.aborted) throw timeoutError
        throw new NotebookServerError(
          null,
          `Request failed: ${error instanceof Error ? error.message : String(error)}`
        )
      }
      return read(response)
    }

    try {
      return await Promise.race([exchange(), timeout])
    } finally {
      clearTimeout(timer)
    }
  }
}

import axios from 'axios'
import type { AxiosAdapter, AxiosInstance } from 'axios'
import type { Logger } from 'pino'
import type { z } from 'zod'
import type { Credential } from '../types/credentials.js'
import type { AppConfig } from './config.js'
import type {
  DocumentListing,
  GranolaDocument,
  ListDocumentsOptions,
  RejectedDocument,
  TranscriptEntry,
} from '../types/granola.js'
import { AuthError, NetworkError, ParseError, errorMessage } from './errors.js'
import { logger as defaultLogger } from './logger.js'
import {
  describeIssues,
  documentsResponseSchema,
  granolaDocumentSchema,
  transcriptResponseSchema,
} from './schemas.js'

export interface GranolaClientOptions {
  readonly baseUrl: string
  readonly clientVersion: string
  readonly pageSize: number
  readonly requestDelayMs: number
  readonly retryCount: number
  readonly retryDelayMs: number
  readonly timeoutMs: number
  // テスト用のプロセス内アダプタ
  readonly adapter?: AxiosAdapter
  readonly logger?: Logger
}

/** ダウンローダーが使うAPIの面 */
export interface GranolaApi {
  listDocuments(options: ListDocumentsOptions): Promise<DocumentListing>
  getTranscript(documentId: string): Promise<TranscriptEntry[] | null>
}

export function clientOptionsFromConfig(config: AppConfig, log?: Logger): GranolaClientOptions {
  return {
    baseUrl: config.apiBase,
    clientVersion: config.clientVersion,
    pageSize: config.pageSize,
    requestDelayMs: config.requestDelayMs,
    retryCount: config.retryCount,
    retryDelayMs: config.retryDelayMs,
    timeoutMs: config.requestTimeoutMs,
    ...(log ? { logger: log } : {}),
  }
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve()
  }
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function toClientError(path: string, error: unknown): AuthError | NetworkError {
  if (!axios.isAxiosError(error)) {
    return new NetworkError(`Request to ${path} failed: ${errorMessage(error)}`, { cause: error })
  }
  const status = error.response?.status
  if (status === 401 || status === 403) {
    return new AuthError(`Granola API rejected the access token (HTTP ${status})`, { cause: error })
  }
  if (status !== undefined) {
    return new NetworkError(`HTTP ${status} from ${path}`, { status, cause: error })
  }
  return new NetworkError(`Request to ${path} failed: ${error.message}`, { cause: error })
}

function documentLabel(raw: unknown, position: number): string {
  if (typeof raw === 'object' && raw !== null) {
    if ('title' in raw && typeof raw.title === 'string' && raw.title) {
      return raw.title
    }
    if ('id' in raw && typeof raw.id === 'string' && raw.id) {
      return raw.id
    }
  }
  return `document #${position + 1}`
}

// 通信エラー・429・5xxのみ再試行する
function isRetryable(error: AuthError | NetworkError): boolean {
  if (!(error instanceof NetworkError)) {
    return false
  }
  return error.status === undefined || error.status === 429 || error.status >= 500
}

export class GranolaClient implements GranolaApi {
  private readonly http: AxiosInstance
  private readonly log: Logger

  constructor(credential: Credential, private readonly options: GranolaClientOptions) {
    this.log = options.logger ?? defaultLogger
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        Authorization: `Bearer ${credential.accessToken}`,
        'Content-Type': 'application/json',
        Accept: '*/*',
        'User-Agent': `Granola/${options.clientVersion}`,
        'X-Client-Version': options.clientVersion,
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    })
  }

  /** 全ドキュメントをoffsetページングで取得する。形式の合わないものはrejectedに回す */
  async listDocuments({ includePanel }: ListDocumentsOptions): Promise<DocumentListing> {
    const limit = this.options.pageSize
    const documents: GranolaDocument[] = []
    const rejected: RejectedDocument[] = []
    let offset = 0

    for (;;) {
      this.log.debug({ offset, limit }, 'Fetching documents')
      const page = await this.post(
        '/v2/get-documents',
        { limit, offset, include_last_viewed_panel: includePanel },
        documentsResponseSchema
      )
      const docs = page.docs ?? []
      if (docs.length === 0) {
        break
      }
      for (const [index, raw] of docs.entries()) {
        const parsed = granolaDocumentSchema.safeParse(raw)
        if (parsed.success) {
          documents.push(parsed.data)
          continue
        }
        const rejection = {
          label: documentLabel(raw, offset + index),
          reason: `unexpected document format: ${describeIssues(parsed.error)}`,
        }
        this.log.warn(rejection, `Skipping malformed document ${rejection.label}`)
        rejected.push(rejection)
      }
      if (docs.length < limit) {
        break
      }
      offset += limit
      await sleep(this.options.requestDelayMs)
    }

    this.log.info(
      { count: documents.length, rejected: rejected.length },
      `Successfully fetched ${documents.length} documents`
    )
    return { documents, rejected }
  }

  /** トランスクリプトが存在しない(404)場合はnull */
  async getTranscript(documentId: string): Promise<TranscriptEntry[] | null> {
    try {
      return await this.post(
        '/v1/get-document-transcript',
        { document_id: documentId },
        transcriptResponseSchema
      )
    } catch (error) {
      if (error instanceof NetworkError && error.status === 404) {
        this.log.debug({ documentId }, 'No transcript found for document')
        return null
      }
      throw error
    }
  }

  private async post<S extends z.ZodTypeAny>(path: string, body: unknown, schema: S): Promise<z.infer<S>> {
    const data = await this.request(path, body)
    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      throw new ParseError(`Unexpected response from ${path}: ${describeIssues(parsed.error)}`, {
        source: path,
      })
    }
    return parsed.data
  }

  private async request(path: string, body: unknown): Promise<unknown> {
    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.http.post<unknown>(path, body)
        return response.data
      } catch (error) {
        const failure = toClientError(path, error)
        if (attempt < this.options.retryCount && isRetryable(failure)) {
          this.log.warn(
            { path, attempt: attempt + 1, err: failure },
            `Request failed, retrying in ${this.options.retryDelayMs}ms`
          )
          await sleep(this.options.retryDelayMs)
          continue
        }
        throw failure
      }
    }
  }
}

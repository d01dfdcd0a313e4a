import { mkdir } from 'node:fs/promises'
import { basename, resolve } from 'node:path'
import type { Logger } from 'pino'
import type { GranolaDocument } from '../types/granola.js'
import type { DownloadResult } from '../types/sync.js'
import { filterByDays } from './date-filter.js'
import { AuthError, errorMessage } from './errors.js'
import { buildFileName } from './filenames.js'
import type { GranolaApi } from './granola-client.js'
import { sleep } from './granola-client.js'
import { logger as defaultLogger } from './logger.js'
import { OutputPlanner, commitOutput, readJsonDocumentId, toJson } from './output.js'

export interface DownloadOptions {
  readonly client: GranolaApi
  readonly outputDir: string
  readonly days?: number
  readonly force?: boolean
  readonly now?: Date
  // 1件ごとにAPIを呼ぶ場合の間隔
  readonly requestDelayMs?: number
  readonly logger?: Logger
}

export interface DownloadJob<T> {
  readonly kind: string
  readonly includePanel: boolean
  // falseならドキュメント一覧だけで完結し、1件ごとの待機も不要
  readonly fetchesPerItem: boolean
  // nullは「この会議には保存するデータが無い」
  buildRecord(document: GranolaDocument, downloadedAt: Date): Promise<T | null>
}

/** 一覧取得 → 期間で絞り込み → 1件ずつ保存。1件の失敗でバッチは止めない */
export async function downloadDocuments<T>(options: DownloadOptions, job: DownloadJob<T>): Promise<DownloadResult> {
  const log = options.logger ?? defaultLogger
  const now = options.now ?? new Date()
  const force = options.force ?? false

  await mkdir(options.outputDir, { recursive: true })
  log.info(`Output directory: ${resolve(options.outputDir)}`)

  log.info('Fetching documents from Granola API...')
  const listing = await options.client.listDocuments({ includePanel: job.includePanel })
  const documents = filterByDays(listing.documents, options.days, (doc) => doc.created_at, now, log)

  let downloaded = 0
  let skipped = 0
  // 形式の合わないドキュメントは期間に関係なく失敗として数える
  let failed = listing.rejected.length
  const errors = listing.rejected.map(({ label, reason }) => `${label}: ${reason}`)

  if (documents.length === 0) {
    log.warn('No documents found matching criteria.')
    return { downloaded, skipped, failed, errors }
  }

  log.info(`Starting ${job.kind} download for ${documents.length} documents...`)
  const planner = new OutputPlanner(options.outputDir, '.json', force, readJsonDocumentId)

  for (const [index, document] of documents.entries()) {
    const title = document.title || 'Untitled'
    log.info(`Processing [${index + 1}/${documents.length}]: ${title}`)

    const decision = await planner.plan(buildFileName(document.title, document.created_at, '.json', now), document.id)
    if (decision.action === 'skip') {
      log.debug(`Skipping ${basename(decision.path)} (already exists)`)
      skipped++
      continue
    }

    try {
      const record = await job.buildRecord(document, new Date())
      if (record === null) {
        log.warn(`No ${job.kind} available for: ${title}`)
        failed++
        errors.push(`${title}: no ${job.kind} available`)
      } else {
        await commitOutput(decision, toJson(record))
        log.debug(`Saved: ${basename(decision.path)}`)
        downloaded++
      }
    } catch (error) {
      // トークン失効は後続も全て失敗するので中断
      if (error instanceof AuthError) {
        throw error
      }
      log.error({ err: error, documentId: document.id }, `Error processing ${title}: ${errorMessage(error)}`)
      failed++
      errors.push(`${title}: ${errorMessage(error)}`)
    }

    if (job.fetchesPerItem) {
      await sleep(options.requestDelayMs ?? 0)
    }
  }

  log.info(
    { downloaded, skipped, failed, outputDir: resolve(options.outputDir) },
    `Download complete: ${downloaded} downloaded, ${skipped} skipped (already exist), ${failed} failed`
  )
  return { downloaded, skipped, failed, errors }
}

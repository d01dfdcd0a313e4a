import { mkdir, readdir, readFile } from 'node:fs/promises'
import { basename, join, resolve } from 'node:path'
import type { Logger } from 'pino'
import type { z } from 'zod'
import type { StoredMeeting, StoredTranscript } from '../types/granola.js'
import type { ConvertResult } from '../types/sync.js'
import { filterByDays } from './date-filter.js'
import { AppError, ParseError, errorMessage } from './errors.js'
import { buildFileName } from './filenames.js'
import { logger as defaultLogger } from './logger.js'
import { renderMeetingMarkdown } from './markdown.js'
import type { MeetingPair } from './markdown.js'
import { OutputPlanner, commitOutput, pathExists, readMarkdownDocumentId } from './output.js'
import { describeIssues, storedMeetingSchema, storedTranscriptSchema } from './schemas.js'

export interface ConvertOptions {
  readonly transcriptsDir: string
  readonly meetingsDir: string
  readonly outputDir: string
  readonly force?: boolean
  readonly days?: number
  readonly now?: Date
  readonly logger?: Logger
}

interface Tally {
  failed: number
  readonly errors: string[]
}

async function listJsonFiles(dir: string): Promise<string[]> {
  const names = await readdir(dir)
  return names.filter((name) => name.endsWith('.json')).sort()
}

export async function readRecordFile<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>> {
  let data: unknown
  try {
    data = JSON.parse(await readFile(path, 'utf-8'))
  } catch (error) {
    throw new ParseError(`Invalid JSON in ${basename(path)}: ${errorMessage(error)}`, { source: path, cause: error })
  }
  const parsed = schema.safeParse(data)
  if (!parsed.success) {
    throw new ParseError(`Unexpected format in ${basename(path)}: ${describeIssues(parsed.error)}`, { source: path })
  }
  return parsed.data
}

/** ディレクトリ内のJSONをdocument_idごとに読む。壊れたファイルは記録して飛ばす */
async function readRecords<T extends { document_id: string; download_timestamp?: string | null }>(
  dir: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  tally: Tally,
  log: Logger
): Promise<Map<string, T>> {
  const records = new Map<string, T>()
  if (!(await pathExists(dir))) {
    log.warn(`Input directory '${dir}' does not exist, continuing without it`)
    return records
  }

  const files = await listJsonFiles(dir)
  log.info(`Found ${files.length} JSON files in ${resolve(dir)}`)

  for (const file of files) {
    try {
      const record = await readRecordFile(join(dir, file), schema)
      const previous = records.get(record.document_id)
      // 同じ会議が複数ファイルにある場合は新しくダウンロードした方を使う
      if (previous && (previous.download_timestamp ?? '') > (record.download_timestamp ?? '')) {
        log.debug(`Ignoring older copy ${file} of ${record.document_id}`)
        continue
      }
      records.set(record.document_id, record)
    } catch (error) {
      log.error({ err: error }, `Error reading ${file}: ${errorMessage(error)}`)
      tally.failed++
      tally.errors.push(`${file}: ${errorMessage(error)}`)
    }
  }
  return records
}

/** transcripts/ と meetings/ をdocument_idで突き合わせてMarkdownを書き出す */
export async function convertToMarkdown(options: ConvertOptions): Promise<ConvertResult> {
  const log = options.logger ?? defaultLogger
  const now = options.now ?? new Date()
  const force = options.force ?? false

  const [hasTranscripts, hasMeetings] = await Promise.all([
    pathExists(options.transcriptsDir),
    pathExists(options.meetingsDir),
  ])
  if (!hasTranscripts && !hasMeetings) {
    throw new AppError(
      `Input directories '${options.transcriptsDir}' and '${options.meetingsDir}' do not exist`
    )
  }

  await mkdir(options.outputDir, { recursive: true })
  log.info(`Output directory: ${resolve(options.outputDir)}`)

  const tally: Tally = { failed: 0, errors: [] }
  const transcripts = await readRecords<StoredTranscript>(options.transcriptsDir, storedTranscriptSchema, tally, log)
  const meetings = await readRecords<StoredMeeting>(options.meetingsDir, storedMeetingSchema, tally, log)

  const ids = [...new Set([...transcripts.keys(), ...meetings.keys()])]
  const pairs = filterByDays(
    ids.map((id): MeetingPair & { readonly id: string } => ({
      id,
      transcript: transcripts.get(id),
      meeting: meetings.get(id),
    })),
    options.days,
    (pair) => pair.meeting?.created_at || pair.transcript?.created_at,
    now,
    log
  )

  let converted = 0
  let skipped = 0
  if (pairs.length === 0) {
    log.warn('No meetings found to convert.')
  }

  const planner = new OutputPlanner(options.outputDir, '.md', force, readMarkdownDocumentId)
  for (const pair of pairs) {
    const title = pair.meeting?.title || pair.transcript?.title
    const createdAt = pair.meeting?.created_at || pair.transcript?.created_at
    const label = title || pair.id
    log.info(`Converting: ${label}`)

    try {
      const decision = await planner.plan(buildFileName(title, createdAt, '.md', now), pair.id)
      if (decision.action === 'skip') {
        log.debug(`Skipping ${basename(decision.path)} (already exists)`)
        skipped++
        continue
      }
      await commitOutput(decision, renderMeetingMarkdown(pair))
      log.debug(`Converted ${pair.id} -> ${basename(decision.path)}`)
      converted++
    } catch (error) {
      log.error({ err: error, documentId: pair.id }, `Error converting ${label}: ${errorMessage(error)}`)
      tally.failed++
      tally.errors.push(`${label}: ${errorMessage(error)}`)
    }
  }

  log.info(
    { converted, skipped, failed: tally.failed, outputDir: resolve(options.outputDir) },
    `Conversion complete: ${converted} converted, ${skipped} skipped (already exist), ${tally.failed} failed`
  )
  return { converted, skipped, failed: tally.failed, errors: tally.errors }
}

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { GranolaDocument, ListDocumentsOptions, TranscriptEntry } from '../types/granola.js'
import type { GranolaApi } from './granola-client.js'
import { buildMeetingRecord, downloadMeetings } from './meetings.js'
import { silentLogger } from '../testing/axios-stub.js'

const DOWNLOADED_AT = new Date('2026-03-10T08:00:00Z')

const document: GranolaDocument = {
  id: 'doc-retro',
  title: 'Retro',
  created_at: '2026-03-06T16:00:00Z',
  updated_at: '2026-03-06T17:05:00Z',
  notes_plain: 'Keep demos short',
  notes_markdown: '- Keep demos short',
  notes: { type: 'doc', content: [] },
  last_viewed_panel: { content: 'We agreed to keep demos short.' },
  public: true,
  user_id: 'user-1',
  google_calendar_event: { id: 'evt-1' },
  workspace_id: null,
}

describe('buildMeetingRecord', () => {
  it('should group document fields into sections', () => {
    const record = buildMeetingRecord(document, DOWNLOADED_AT)

    expect(record).toEqual({
      document_id: 'doc-retro',
      title: 'Retro',
      created_at: '2026-03-06T16:00:00Z',
      updated_at: '2026-03-06T17:05:00Z',
      download_timestamp: '2026-03-10T08:00:00.000Z',
      metadata: {
        public: true,
        transcribe: false,
        privacy_mode_enabled: false,
        valid_meeting: false,
        user_id: 'user-1',
        deleted_at: null,
        template_id: null,
        sharing_settings: null,
        workspace_id: null,
      },
      notes: {
        notes_plain: 'Keep demos short',
        notes_markdown: '- Keep demos short',
        notes: { type: 'doc', content: [] },
        last_viewed_panel: { content: 'We agreed to keep demos short.' },
      },
      calendar_info: {
        google_calendar_event: { id: 'evt-1' },
        outlook_event: null,
        zoom_meeting: null,
      },
      raw_document: document,
    })
  })

  it('should fill defaults for a sparse document', () => {
    const record = buildMeetingRecord({ id: 'doc-empty' }, DOWNLOADED_AT)

    expect(record.title).toBe('Untitled Meeting')
    expect(record.created_at).toBe('')
    expect(record.updated_at).toBe('')
    expect(record.notes).toEqual({ notes_plain: '', notes_markdown: '', notes: null, last_viewed_panel: null })
  })
})

describe('downloadMeetings', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'meetings-test-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should request the summary panel and save the meeting', async () => {
    const listCalls: ListDocumentsOptions[] = []
    const client: GranolaApi = {
      async listDocuments(options) {
        listCalls.push(options)
        return { documents: [document], rejected: [] }
      },
      async getTranscript(): Promise<TranscriptEntry[] | null> {
        throw new Error('meeting download must not fetch transcripts')
      },
    }

    const result = await downloadMeetings({ client, outputDir: dir, logger: silentLogger() })

    expect(result).toEqual({ downloaded: 1, skipped: 0, failed: 0, errors: [] })
    expect(listCalls).toEqual([{ includePanel: true }])
    const saved = JSON.parse(await readFile(join(dir, '2026-03-06_Retro.json'), 'utf-8'))
    expect(saved.notes.last_viewed_panel).toEqual({ content: 'We agreed to keep demos short.' })
    expect(saved.metadata.public).toBe(true)
  })
})

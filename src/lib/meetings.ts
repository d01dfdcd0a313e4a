import type { GranolaDocument, MeetingFile } from '../types/granola.js'
import type { DownloadResult } from '../types/sync.js'
import type { DownloadOptions } from './downloader.js'
import { downloadDocuments } from './downloader.js'

// APIのキーが無ければfallback（nullを含め、値があればそのまま）
function field(document: GranolaDocument, key: string, fallback: unknown = null): unknown {
  const value = document[key]
  return value === undefined ? fallback : value
}

/** APIのドキュメントを保存用の構造に整理する */
export function buildMeetingRecord(document: GranolaDocument, downloadedAt: Date): MeetingFile {
  return {
    document_id: document.id,
    title: document.title || 'Untitled Meeting',
    created_at: document.created_at ?? '',
    updated_at: document.updated_at ?? '',
    download_timestamp: downloadedAt.toISOString(),
    metadata: {
      public: field(document, 'public', false),
      transcribe: field(document, 'transcribe', false),
      privacy_mode_enabled: field(document, 'privacy_mode_enabled', false),
      valid_meeting: field(document, 'valid_meeting', false),
      user_id: field(document, 'user_id', ''),
      deleted_at: field(document, 'deleted_at'),
      template_id: field(document, 'template_id'),
      sharing_settings: field(document, 'sharing_settings'),
      workspace_id: field(document, 'workspace_id'),
    },
    notes: {
      notes_plain: document.notes_plain ?? '',
      notes_markdown: document.notes_markdown ?? '',
      notes: field(document, 'notes'),
      last_viewed_panel: field(document, 'last_viewed_panel'),
    },
    calendar_info: {
      google_calendar_event: field(document, 'google_calendar_event'),
      outlook_event: field(document, 'outlook_event'),
      zoom_meeting: field(document, 'zoom_meeting'),
    },
    raw_document: document,
  }
}

/** 会議メタデータ・メモ・AIサマリーを meetings/YYYY-MM-DD_title.json に保存 */
export function downloadMeetings(options: DownloadOptions): Promise<DownloadResult> {
  return downloadDocuments<MeetingFile>(options, {
    kind: 'meeting',
    includePanel: true,
    fetchesPerItem: false,
    buildRecord: async (document, downloadedAt) => buildMeetingRecord(document, downloadedAt),
  })
}

import type { z } from 'zod'
import type {
  granolaDocumentSchema,
  storedMeetingSchema,
  storedTranscriptSchema,
  transcriptEntrySchema,
} from '../lib/schemas.js'

export type GranolaDocument = z.infer<typeof granolaDocumentSchema>
export type TranscriptEntry = z.infer<typeof transcriptEntrySchema>
export type StoredTranscript = z.infer<typeof storedTranscriptSchema>
export type StoredMeeting = z.infer<typeof storedMeetingSchema>

export interface ListDocumentsOptions {
  // 会議メタデータ取得時のみAIサマリーパネルを含める
  readonly includePanel: boolean
}

/** 形式が想定と違い処理できなかったドキュメント */
export interface RejectedDocument {
  // タイトルかID、どちらも読めなければ一覧上の位置
  readonly label: string
  readonly reason: string
}

export interface DocumentListing {
  readonly documents: GranolaDocument[]
  readonly rejected: RejectedDocument[]
}

/** transcripts/ に保存する1会議分のJSON */
export interface TranscriptFile {
  readonly document_id: string
  readonly title: string
  readonly created_at: string
  readonly updated_at: string | null
  readonly download_timestamp: string
  readonly transcript_entries: readonly TranscriptEntry[]
}

/** meetings/ に保存する1会議分のJSON */
export interface MeetingFile {
  readonly document_id: string
  readonly title: string
  readonly created_at: string
  readonly updated_at: string
  readonly download_timestamp: string
  readonly metadata: {
    readonly public: unknown
    readonly transcribe: unknown
    readonly privacy_mode_enabled: unknown
    readonly valid_meeting: unknown
    readonly user_id: unknown
    readonly deleted_at: unknown
    readonly template_id: unknown
    readonly sharing_settings: unknown
    readonly workspace_id: unknown
  }
  readonly notes: {
    readonly notes_plain: string
    readonly notes_markdown: string
    readonly notes: unknown
    readonly last_viewed_panel: unknown
  }
  readonly calendar_info: {
    readonly google_calendar_event: unknown
    readonly outlook_event: unknown
    readonly zoom_meeting: unknown
  }
  readonly raw_document: GranolaDocument
}

import type { TranscriptFile } from '../types/granola.js'
import type { DownloadResult } from '../types/sync.js'
import type { DownloadOptions } from './downloader.js'
import { downloadDocuments } from './downloader.js'

/** 会議ごとのトランスクリプトを transcripts/YYYY-MM-DD_title.json に保存 */
export function downloadTranscripts(options: DownloadOptions): Promise<DownloadResult> {
  return downloadDocuments<TranscriptFile>(options, {
    kind: 'transcript',
    includePanel: false,
    fetchesPerItem: true,
    async buildRecord(document, downloadedAt) {
      const entries = await options.client.getTranscript(document.id)
      if (entries === null) {
        return null
      }
      return {
        document_id: document.id,
        title: document.title || 'Untitled',
        created_at: document.created_at ?? '',
        updated_at: document.updated_at ?? null,
        download_timestamp: downloadedAt.toISOString(),
        transcript_entries: entries,
      }
    },
  })
}

import type { StoredMeeting, StoredTranscript, TranscriptEntry } from '../types/granola.js'
import { renderProseMirror } from './prosemirror.js'

const OFFSET_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i

function offsetMinutes(suffix: string): number {
  if (suffix.toUpperCase() === 'Z') {
    return 0
  }
  const digits = suffix.replace(':', '')
  const sign = digits.startsWith('-') ? -1 : 1
  const hours = Number(digits.slice(1, 3))
  const minutes = Number(digits.slice(3, 5))
  return sign * (hours * 60 + minutes)
}

/**
 * タイムスタンプ自身のオフセットでの壁時計時刻（UTCゲッターで読む）
 * オフセットの無い日時はそのままの時刻として扱う
 */
export function wallClock(iso: string): Date | null {
  const suffix = OFFSET_SUFFIX.exec(iso)?.[1]
  const normalized = suffix === undefined && iso.includes('T') ? `${iso}Z` : iso
  const time = Date.parse(normalized)
  if (Number.isNaN(time)) {
    return null
  }
  return new Date(time + (suffix === undefined ? 0 : offsetMinutes(suffix)) * 60_000)
}

const pad = (value: number): string => String(value).padStart(2, '0')

/** 例: Tuesday, March 04, 2025 at 03:30 PM */
export function formatDateTime(iso: string): string {
  const date = wallClock(iso)
  if (!date) {
    return iso
  }
  const weekday = date.toLocaleDateString('en-US', { weekday: 'long', timeZone: 'UTC' })
  const month = date.toLocaleDateString('en-US', { month: 'long', timeZone: 'UTC' })
  const hours = date.getUTCHours()
  const period = hours < 12 ? 'AM' : 'PM'
  return `${weekday}, ${month} ${pad(date.getUTCDate())}, ${date.getUTCFullYear()} at ${pad(hours % 12 || 12)}:${pad(date.getUTCMinutes())} ${period}`
}

/** トランスクリプト行の HH:MM:SS */
export function formatClock(iso: string): string {
  const date = wallClock(iso)
  if (!date) {
    return iso
  }
  return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
}

export function speakerName(entry: TranscriptEntry): string {
  if (entry.source === 'microphone') {
    return 'me'
  }
  return entry.speaker || 'them'
}

function sortEntries(entries: readonly TranscriptEntry[]): TranscriptEntry[] {
  const first = entries[0]
  if (first?.sequence_number !== undefined && first.sequence_number !== null) {
    return [...entries].sort((a, b) => (a.sequence_number ?? 0) - (b.sequence_number ?? 0))
  }
  if (first?.start_timestamp) {
    return [...entries].sort((a, b) => {
      const left = a.start_timestamp ?? ''
      const right = b.start_timestamp ?? ''
      return left < right ? -1 : left > right ? 1 : 0
    })
  }
  return [...entries]
}

export function formatTranscriptEntries(entries: readonly TranscriptEntry[]): string {
  if (entries.length === 0) {
    return '*No transcript available*'
  }

  const lines: string[] = []
  for (const entry of sortEntries(entries)) {
    const text = (entry.text ?? '').trim()
    if (!text) {
      continue
    }
    const speaker = speakerName(entry)
    if (entry.start_timestamp) {
      lines.push(`**[${formatClock(entry.start_timestamp)}] ${speaker}:** ${text}`)
    } else {
      lines.push(`**${speaker}:** ${text}`)
    }
  }
  return lines.join('\n\n')
}

const plural = (count: number, unit: string): string => `${count} ${unit}${count === 1 ? '' : 's'}`

/** 最初の開始から最後の終了までのおおよその長さ */
export function calculateDuration(entries: readonly TranscriptEntry[]): string {
  const starts = entries.map((e) => (e.start_timestamp ? Date.parse(e.start_timestamp) : Number.NaN)).filter((t) => !Number.isNaN(t))
  const ends = entries.map((e) => (e.end_timestamp ? Date.parse(e.end_timestamp) : Number.NaN)).filter((t) => !Number.isNaN(t))
  if (starts.length === 0 || ends.length === 0) {
    return 'Unknown'
  }

  const first = starts.reduce((min, t) => Math.min(min, t))
  const last = ends.reduce((max, t) => Math.max(max, t))
  const seconds = Math.max(0, Math.floor((last - first) / 1000))
  const hours = Math.floor(seconds / 3600)
  const minutes = Math.floor((seconds % 3600) / 60)
  if (hours > 0) {
    return `${plural(hours, 'hour')} ${plural(minutes, 'minute')}`
  }
  return plural(minutes, 'minute')
}

export interface TranscriptStats {
  readonly totalEntries: number
  readonly speakers: number
  readonly words: number
}

export function getTranscriptStats(entries: readonly TranscriptEntry[]): TranscriptStats {
  const speakers = new Set(entries.map(speakerName))
  const words = entries.reduce(
    (sum, entry) => sum + (entry.text ?? '').split(/\s+/).filter(Boolean).length,
    0
  )
  return { totalEntries: entries.length, speakers: speakers.size, words }
}

/** AIサマリーパネル: contentがProseMirrorならMarkdown化、文字列ならそのまま */
export function renderSummary(panel: unknown): string | null {
  if (typeof panel !== 'object' || panel === null || !('content' in panel)) {
    return null
  }
  const content = panel.content
  if (typeof content === 'string') {
    return content.trim() || null
  }
  return renderProseMirror(content) || null
}

export function renderNotes(notes: StoredMeeting['notes']): string | null {
  if (!notes) {
    return null
  }
  return notes.notes_markdown?.trim() || renderProseMirror(notes.notes) || notes.notes_plain?.trim() || null
}

export interface MeetingPair {
  readonly transcript?: StoredTranscript
  readonly meeting?: StoredMeeting
}

const FOOTER = '*Downloaded from Granola and converted to Markdown*'

/** 1会議分のMarkdown。片方のデータが無ければその節を省く */
export function renderMeetingMarkdown({ transcript, meeting }: MeetingPair): string {
  const title = meeting?.title || transcript?.title || 'Untitled Meeting'
  const createdAt = meeting?.created_at || transcript?.created_at
  const updatedAt = meeting?.updated_at || transcript?.updated_at
  const documentId = meeting?.document_id ?? transcript?.document_id ?? ''
  const entries = transcript?.transcript_entries ?? []

  const header = [
    `# ${title}`,
    '',
    `**Date:** ${createdAt ? formatDateTime(createdAt) : 'Unknown'}`,
    `**Updated:** ${updatedAt ? formatDateTime(updatedAt) : 'Unknown'}`,
    ...(transcript ? [`**Duration:** ${calculateDuration(entries)}`] : []),
    `**Document ID:** \`${documentId}\``,
  ].join('\n')

  const sections = [header]

  const summary = renderSummary(meeting?.notes?.last_viewed_panel)
  if (summary) {
    sections.push(`## Summary\n\n${summary}`)
  }

  const notes = renderNotes(meeting?.notes)
  if (notes) {
    sections.push(`## Notes\n\n${notes}`)
  }

  if (transcript) {
    const stats = getTranscriptStats(entries)
    sections.push(
      [
        '## Meeting Statistics',
        '',
        `- **Total Entries:** ${stats.totalEntries}`,
        `- **Speakers:** ${stats.speakers}`,
        `- **Total Words:** ${stats.words}`,
      ].join('\n')
    )
    sections.push(`## Transcript\n\n${formatTranscriptEntries(entries)}`)
  }

  sections.push(FOOTER)
  return `${sections.join('\n\n---\n\n')}\n`
}

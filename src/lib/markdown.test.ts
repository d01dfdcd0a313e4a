import { describe, it, expect } from '@jest/globals'
import type { StoredMeeting, StoredTranscript, TranscriptEntry } from '../types/granola.js'
import {
  calculateDuration,
  formatClock,
  formatDateTime,
  formatTranscriptEntries,
  getTranscriptStats,
  renderMeetingMarkdown,
  renderNotes,
  renderSummary,
} from './markdown.js'

describe('formatDateTime', () => {
  it('should format UTC timestamps', () => {
    expect(formatDateTime('2025-03-04T15:30:00Z')).toBe('Tuesday, March 04, 2025 at 03:30 PM')
  })

  it('should keep the wall clock of the timestamp offset', () => {
    expect(formatDateTime('2025-03-04T23:30:00-08:00')).toBe('Tuesday, March 04, 2025 at 11:30 PM')
  })

  it('should treat timestamps without offset as wall clock time', () => {
    expect(formatDateTime('2025-03-04T00:05:00')).toBe('Tuesday, March 04, 2025 at 12:05 AM')
  })

  it('should return unparseable values unchanged', () => {
    expect(formatDateTime('sometime')).toBe('sometime')
  })
})

describe('formatClock', () => {
  it('should format HH:MM:SS', () => {
    expect(formatClock('2025-03-04T09:00:05.250Z')).toBe('09:00:05')
  })
})

describe('formatTranscriptEntries', () => {
  it('should sort by sequence number and label speakers', () => {
    const entries: TranscriptEntry[] = [
      { sequence_number: 2, text: 'Sounds good', source: 'system', start_timestamp: '2025-03-04T09:00:10Z' },
      { sequence_number: 1, text: ' Morning all ', source: 'microphone', start_timestamp: '2025-03-04T09:00:05Z' },
      { sequence_number: 3, text: '   ', source: 'system' },
    ]

    expect(formatTranscriptEntries(entries)).toBe(
      '**[09:00:05] me:** Morning all\n\n**[09:00:10] them:** Sounds good'
    )
  })

  it('should sort by start time when there is no sequence number', () => {
    const entries: TranscriptEntry[] = [
      { text: 'Second', speaker: 'Ana', start_timestamp: '2025-03-04T09:01:00Z' },
      { text: 'First', speaker: 'Ben', start_timestamp: '2025-03-04T09:00:00Z' },
    ]

    expect(formatTranscriptEntries(entries)).toBe('**[09:00:00] Ben:** First\n\n**[09:01:00] Ana:** Second')
  })

  it('should omit the time when an entry has none', () => {
    expect(formatTranscriptEntries([{ text: 'Hello', source: 'microphone' }])).toBe('**me:** Hello')
  })

  it('should show a placeholder for an empty transcript', () => {
    expect(formatTranscriptEntries([])).toBe('*No transcript available*')
  })
})

describe('calculateDuration', () => {
  it('should measure from the first start to the last end', () => {
    const entries: TranscriptEntry[] = [
      { start_timestamp: '2025-03-04T09:00:00Z', end_timestamp: '2025-03-04T09:00:20Z' },
      { start_timestamp: '2025-03-04T09:30:00Z', end_timestamp: '2025-03-04T10:05:30Z' },
    ]

    expect(calculateDuration(entries)).toBe('1 hour 5 minutes')
  })

  it('should use the singular for one minute', () => {
    expect(
      calculateDuration([{ start_timestamp: '2025-03-04T09:00:00Z', end_timestamp: '2025-03-04T09:01:30Z' }])
    ).toBe('1 minute')
  })

  it('should handle very long transcripts', () => {
    const base = Date.parse('2025-03-04T09:00:00Z')
    const entries: TranscriptEntry[] = Array.from({ length: 200_000 }, (_, i) => ({
      start_timestamp: new Date(base + i * 10).toISOString(),
      end_timestamp: new Date(base + i * 10 + 5).toISOString(),
    }))

    // 最後の終了は 09:33:19.995
    expect(calculateDuration(entries)).toBe('33 minutes')
  })

  it('should be Unknown without timestamps', () => {
    expect(calculateDuration([{ text: 'hi' }])).toBe('Unknown')
    expect(calculateDuration([])).toBe('Unknown')
  })
})

describe('getTranscriptStats', () => {
  it('should count entries, speakers and words', () => {
    const entries: TranscriptEntry[] = [
      { text: 'Hello there', source: 'microphone' },
      { text: 'Hi', source: 'system' },
      { text: '  ', speaker: 'Ana' },
    ]

    expect(getTranscriptStats(entries)).toEqual({ totalEntries: 3, speakers: 3, words: 3 })
  })
})

describe('renderSummary / renderNotes', () => {
  it('should render a string panel as is', () => {
    expect(renderSummary({ content: ' We agreed. ' })).toBe('We agreed.')
  })

  it('should render a ProseMirror panel', () => {
    const panel = { content: { type: 'doc', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'Ship it' }] }] } }

    expect(renderSummary(panel)).toBe('Ship it')
  })

  it('should return null without a panel', () => {
    expect(renderSummary(null)).toBeNull()
    expect(renderSummary({ content: '' })).toBeNull()
  })

  it('should prefer Markdown notes, then ProseMirror, then plain text', () => {
    const prose = { type: 'doc', content: [{ type: 'paragraph', content: [{ type: 'text', text: 'from prose' }] }] }

    expect(renderNotes({ notes_markdown: '- md', notes: prose, notes_plain: 'plain' })).toBe('- md')
    expect(renderNotes({ notes_markdown: '', notes: prose, notes_plain: 'plain' })).toBe('from prose')
    expect(renderNotes({ notes_markdown: '', notes: null, notes_plain: 'plain' })).toBe('plain')
    expect(renderNotes({ notes_markdown: '', notes_plain: '' })).toBeNull()
  })
})

describe('renderMeetingMarkdown', () => {
  const meeting: StoredMeeting = {
    document_id: 'doc-1',
    title: 'Retro',
    created_at: '2025-03-04T15:30:00Z',
    updated_at: '2025-03-04T16:00:00Z',
    notes: {
      notes_markdown: '- Keep demos short',
      last_viewed_panel: { content: 'We agreed.' },
    },
  }
  const transcript: StoredTranscript = {
    document_id: 'doc-1',
    title: 'Retro',
    created_at: '2025-03-04T15:30:00Z',
    transcript_entries: [
      {
        text: 'Hello team',
        source: 'microphone',
        start_timestamp: '2025-03-04T15:30:00Z',
        end_timestamp: '2025-03-04T15:31:30Z',
      },
    ],
  }

  it('should combine meeting and transcript into one document', () => {
    expect(renderMeetingMarkdown({ meeting, transcript })).toBe(
      [
        '# Retro',
        '',
        '**Date:** Tuesday, March 04, 2025 at 03:30 PM',
        '**Updated:** Tuesday, March 04, 2025 at 04:00 PM',
        '**Duration:** 1 minute',
        '**Document ID:** `doc-1`',
        '',
        '---',
        '',
        '## Summary',
        '',
        'We agreed.',
        '',
        '---',
        '',
        '## Notes',
        '',
        '- Keep demos short',
        '',
        '---',
        '',
        '## Meeting Statistics',
        '',
        '- **Total Entries:** 1',
        '- **Speakers:** 1',
        '- **Total Words:** 2',
        '',
        '---',
        '',
        '## Transcript',
        '',
        '**[15:30:00] me:** Hello team',
        '',
        '---',
        '',
        '*Downloaded from Granola and converted to Markdown*',
        '',
      ].join('\n')
    )
  })

  it('should omit transcript sections for a meeting without transcript', () => {
    const markdown = renderMeetingMarkdown({ meeting })

    expect(markdown).not.toContain('**Duration:**')
    expect(markdown).not.toContain('## Transcript')
    expect(markdown).toContain('## Notes\n\n- Keep demos short')
  })

  it('should fall back to Unknown dates and the default title', () => {
    const markdown = renderMeetingMarkdown({ transcript: { document_id: 'doc-2', transcript_entries: [] } })

    expect(markdown.startsWith('# Untitled Meeting\n\n**Date:** Unknown\n**Updated:** Unknown\n**Duration:** Unknown\n')).toBe(true)
    expect(markdown).toContain('## Transcript\n\n*No transcript available*')
  })
})

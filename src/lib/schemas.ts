import { z } from 'zod'

// トークンはJSON文字列で保存されていることが多いがオブジェクトの場合もある
const tokenContainerSchema = z.union([z.string(), z.record(z.unknown())])

export const credentialFileSchema = z
  .object({
    workos_tokens: tokenContainerSchema.nullish(),
    cognito_tokens: tokenContainerSchema.nullish(),
  })
  .passthrough()

export const tokenDataSchema = z
  .object({
    access_token: z.string().nullish(),
    refresh_token: z.string().nullish(),
    expires_at: z.number().nullish(),
    expires_in: z.number().nullish(),
    obtained_at: z.number().nullish(),
  })
  .passthrough()

export const granolaDocumentSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().nullish(),
    created_at: z.string().nullish(),
    updated_at: z.string().nullish(),
    notes_plain: z.string().nullish(),
    notes_markdown: z.string().nullish(),
    notes: z.unknown(),
    last_viewed_panel: z.unknown(),
  })
  .passthrough()

// ドキュメントは1件ずつ検証する（1件の不正でページ全体を捨てない）
export const documentsResponseSchema = z
  .object({
    docs: z.array(z.unknown()).nullish(),
  })
  .passthrough()

export const transcriptEntrySchema = z
  .object({
    id: z.string().nullish(),
    text: z.string().nullish(),
    source: z.string().nullish(),
    speaker: z.string().nullish(),
    start_timestamp: z.string().nullish(),
    end_timestamp: z.string().nullish(),
    sequence_number: z.number().nullish(),
    is_final: z.boolean().nullish(),
  })
  .passthrough()

export const transcriptResponseSchema = z.array(transcriptEntrySchema)

// ダウンロード済みファイル（convert時に読み込む）
export const storedTranscriptSchema = z
  .object({
    document_id: z.string().min(1),
    title: z.string().nullish(),
    created_at: z.string().nullish(),
    updated_at: z.string().nullish(),
    download_timestamp: z.string().nullish(),
    transcript_entries: z.array(transcriptEntrySchema).nullish(),
  })
  .passthrough()

export const storedMeetingSchema = z
  .object({
    document_id: z.string().min(1),
    title: z.string().nullish(),
    created_at: z.string().nullish(),
    updated_at: z.string().nullish(),
    download_timestamp: z.string().nullish(),
    notes: z
      .object({
        notes_plain: z.string().nullish(),
        notes_markdown: z.string().nullish(),
        notes: z.unknown(),
        last_viewed_panel: z.unknown(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough()

/** zodのエラーを1行のメッセージにまとめる */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

import { extname } from 'node:path'

const INVALID_CHARS = /[<>:"/\\|?*\u0000-\u001f\u007f]/g
const MAX_LENGTH = 100
const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})/

/** タイトルをファイル名として使える文字列にする */
export function sanitizeFilename(title: string | null | undefined): string {
  if (!title || title.trim() === '') {
    return 'untitled'
  }
  const joined = title.replace(INVALID_CHARS, '').split(/\s+/).filter(Boolean).join('_')
  const trimmed = joined.replace(/^_+|_+$/g, '').slice(0, MAX_LENGTH)
  return trimmed || 'untitled'
}

function formatLocalDate(date: Date): string {
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `${year}-${month}-${day}`
}

/** created_at の日付部分（タイムスタンプ自身のオフセット基準）。読めなければ当日 */
export function datePrefix(createdAt: string | null | undefined, now: Date): string {
  if (createdAt && !Number.isNaN(Date.parse(createdAt))) {
    const match = ISO_DATE_PREFIX.exec(createdAt)
    if (match?.[1]) {
      return match[1]
    }
  }
  return formatLocalDate(now)
}

/** YYYY-MM-DD_<title><ext> */
export function buildFileName(
  title: string | null | undefined,
  createdAt: string | null | undefined,
  extension: string,
  now: Date
): string {
  return `${datePrefix(createdAt, now)}_${sanitizeFilename(title)}${extension}`
}

/** 同名の別会議と衝突したときのファイル名 */
export function withIdSuffix(fileName: string, documentId: string): string {
  const extension = extname(fileName)
  const stem = fileName.slice(0, fileName.length - extension.length)
  return `${stem}_${sanitizeFilename(documentId).slice(0, 8)}${extension}`
}

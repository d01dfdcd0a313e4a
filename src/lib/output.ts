import { access, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { extname, join } from 'node:path'
import { withIdSuffix } from './filenames.js'

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

export function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`
}

/** 一時ファイルに書いてからrenameする（途中終了で壊れたファイルを残さない） */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const temporary = `${path}.${process.pid}.tmp`
  try {
    await writeFile(temporary, content, 'utf-8')
    await rename(temporary, path)
  } catch (error) {
    await rm(temporary, { force: true })
    throw error
  }
}

/** 既存JSONのdocument_id。読めなければnull */
export async function readJsonDocumentId(path: string): Promise<string | null> {
  try {
    const data: unknown = JSON.parse(await readFile(path, 'utf-8'))
    if (typeof data === 'object' && data !== null && 'document_id' in data && typeof data.document_id === 'string') {
      return data.document_id
    }
    return null
  } catch {
    return null
  }
}

const MARKDOWN_ID_LINE = /^\*\*Document ID:\*\* `([^`]+)`$/m

/** 変換済みMarkdownのヘッダーからdocument_idを読む */
export async function readMarkdownDocumentId(path: string): Promise<string | null> {
  try {
    const match = MARKDOWN_ID_LINE.exec(await readFile(path, 'utf-8'))
    return match?.[1] ?? null
  } catch {
    return null
  }
}

export type OutputDecision =
  // staleは同じ会議の旧名ファイル（タイトル変更後）。書き込み後に消す
  | { readonly action: 'write'; readonly path: string; readonly stale?: string }
  | { readonly action: 'skip'; readonly path: string }

/** 出力を書き、タイトル変更で残った旧ファイルを消す */
export async function commitOutput(
  decision: Extract<OutputDecision, { action: 'write' }>,
  content: string
): Promise<void> {
  await writeFileAtomic(decision.path, content)
  if (decision.stale !== undefined) {
    await rm(decision.stale, { force: true })
  }
}

interface DirectoryIndex {
  // ファイル名 → document_id（読めないファイルはnull）
  readonly owners: Map<string, string | null>
  // document_id → ファイル名
  readonly files: Map<string, string>
}

/**
 * 1会議1ファイルの出力先を決める
 * - 同じ会議の既存ファイルは名前が変わっていても見つけ、forceでなければスキップ
 * - 同名の別会議（今回の実行内・既存ファイル）とはID付きの名前に逃がす
 */
export class OutputPlanner {
  private readonly claimed = new Map<string, string>()
  private index?: Promise<DirectoryIndex>

  constructor(
    private readonly dir: string,
    private readonly extension: string,
    private readonly force: boolean,
    private readonly readOwner: (path: string) => Promise<string | null>
  ) {}

  async plan(fileName: string, documentId: string): Promise<OutputDecision> {
    if (!this.index) {
      this.index = this.buildIndex()
    }
    const { owners, files } = await this.index
    const existing = files.get(documentId)

    if (existing !== undefined && !this.force) {
      this.claimed.set(existing, documentId)
      return { action: 'skip', path: join(this.dir, existing) }
    }

    const candidates = [fileName, withIdSuffix(fileName, documentId)]
    for (const [position, candidate] of candidates.entries()) {
      const last = position === candidates.length - 1
      const owner = this.claimed.get(candidate) ?? owners.get(candidate)
      if (!last && typeof owner === 'string' && owner !== documentId) {
        continue
      }

      this.claimed.set(candidate, documentId)
      const path = join(this.dir, candidate)
      if (owners.has(candidate) && !this.force) {
        return { action: 'skip', path }
      }
      if (existing !== undefined && existing !== candidate) {
        return { action: 'write', path, stale: join(this.dir, existing) }
      }
      return { action: 'write', path }
    }

    throw new Error(`No output file name available for ${documentId}`)
  }

  private async buildIndex(): Promise<DirectoryIndex> {
    const owners = new Map<string, string | null>()
    const files = new Map<string, string>()
    if (!(await pathExists(this.dir))) {
      return { owners, files }
    }

    const names = (await readdir(this.dir)).filter((name) => extname(name) === this.extension).sort()
    for (const name of names) {
      const owner = await this.readOwner(join(this.dir, name))
      owners.set(name, owner)
      if (owner !== null && !files.has(owner)) {
        files.set(owner, name)
      }
    }
    return { owners, files }
  }
}

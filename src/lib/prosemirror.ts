/**
 * Granolaのメモ・AIサマリー（ProseMirror JSON）をMarkdownにする
 * 未知のノードは子要素だけを出力する
 */
import { z } from 'zod'

export interface ProseMirrorMark {
  type: string
  attrs?: Record<string, unknown> | null
}

export interface ProseMirrorNode {
  type: string
  text?: string | null
  attrs?: Record<string, unknown> | null
  marks?: ProseMirrorMark[] | null
  content?: ProseMirrorNode[] | null
}

const markSchema: z.ZodType<ProseMirrorMark> = z.object({
  type: z.string(),
  attrs: z.record(z.unknown()).nullish(),
})

const nodeSchema: z.ZodType<ProseMirrorNode> = z.lazy(() =>
  z.object({
    type: z.string(),
    text: z.string().nullish(),
    attrs: z.record(z.unknown()).nullish(),
    marks: z.array(markSchema).nullish(),
    content: z.array(nodeSchema).nullish(),
  })
)

function applyMark(text: string, mark: ProseMirrorMark): string {
  switch (mark.type) {
    case 'bold':
    case 'strong':
      return `**${text}**`
    case 'italic':
    case 'em':
      return `*${text}*`
    case 'code':
      return `\`${text}\``
    case 'strike':
    case 'strikethrough':
      return `~~${text}~~`
    case 'link': {
      const href = mark.attrs?.href
      return typeof href === 'string' ? `[${text}](${href})` : text
    }
    default:
      return text
  }
}

function renderInline(nodes: readonly ProseMirrorNode[] | null | undefined): string {
  return (nodes ?? [])
    .map((node) => {
      if (node.type === 'text') {
        return (node.marks ?? []).reduce(applyMark, node.text ?? '')
      }
      if (node.type === 'hardBreak') {
        return '\n'
      }
      return renderInline(node.content)
    })
    .join('')
}

function indent(text: string, prefix: string, includeFirst: boolean): string {
  return text
    .split('\n')
    .map((line, index) => (index === 0 && !includeFirst) || line === '' ? line : `${prefix}${line}`)
    .join('\n')
}

function renderListItem(item: ProseMirrorNode, marker: string): string {
  const blocks = renderBlocks(item.content)
  const [first, ...rest] = blocks
  if (first === undefined) {
    return marker.trimEnd()
  }
  const pad = ' '.repeat(marker.length)
  return [marker + indent(first, pad, false), ...rest.map((block) => indent(block, pad, true))].join('\n')
}

function headingLevel(node: ProseMirrorNode): number {
  const level = node.attrs?.level
  return typeof level === 'number' ? Math.min(Math.max(Math.trunc(level), 1), 6) : 1
}

function renderBlock(node: ProseMirrorNode): string {
  switch (node.type) {
    case 'paragraph':
      return renderInline(node.content)
    case 'heading':
      return `${'#'.repeat(headingLevel(node))} ${renderInline(node.content)}`
    case 'bulletList':
      return (node.content ?? []).map((item) => renderListItem(item, '- ')).join('\n')
    case 'orderedList': {
      const start = typeof node.attrs?.start === 'number' ? node.attrs.start : 1
      return (node.content ?? []).map((item, index) => renderListItem(item, `${start + index}. `)).join('\n')
    }
    case 'blockquote':
      return indent(renderBlocks(node.content).join('\n\n'), '> ', true)
    case 'codeBlock':
      return `\`\`\`\n${renderInline(node.content)}\n\`\`\``
    case 'horizontalRule':
      return '---'
    case 'text':
    case 'hardBreak':
      return renderInline([node])
    default:
      return renderBlocks(node.content).join('\n\n')
  }
}

function renderBlocks(nodes: readonly ProseMirrorNode[] | null | undefined): string[] {
  return (nodes ?? []).map(renderBlock).filter((block) => block.trim() !== '')
}

/** ProseMirrorドキュメントでなければnull、中身が空なら空文字 */
export function renderProseMirror(value: unknown): string | null {
  const parsed = nodeSchema.safeParse(value)
  if (!parsed.success) {
    return null
  }
  return renderBlock(parsed.data).trim()
}

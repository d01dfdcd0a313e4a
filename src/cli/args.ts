import { parseArgs } from 'node:util'
import { UsageError, errorMessage } from '../lib/errors.js'

export interface CommonArgs {
  readonly verbose: boolean
  readonly force: boolean
  readonly output: string
  readonly days: number | undefined
  readonly help: boolean
}

export interface ConvertArgs extends CommonArgs {
  readonly transcripts: string
  readonly meetings: string
}

const COMMON_OPTIONS = {
  verbose: { type: 'boolean', short: 'v', default: false },
  force: { type: 'boolean', short: 'f', default: false },
  output: { type: 'string', short: 'o' },
  days: { type: 'string', short: 'd' },
  help: { type: 'boolean', short: 'h', default: false },
} as const

export function parseDays(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined
  }
  const days = Number(raw)
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(days) || days <= 0) {
    throw new UsageError(`--days must be a positive integer, got '${raw}'`)
  }
  return days
}

// parseArgsのTypeErrorをUsageErrorに変換する
function parse<T>(run: () => T): T {
  try {
    return run()
  } catch (error) {
    throw new UsageError(errorMessage(error), { cause: error })
  }
}

export function parseDownloadArgs(argv: readonly string[], defaultOutput: string): CommonArgs {
  const { values } = parse(() =>
    parseArgs({ args: [...argv], options: COMMON_OPTIONS, strict: true, allowPositionals: false })
  )
  return {
    verbose: values.verbose,
    force: values.force,
    output: values.output || defaultOutput,
    days: parseDays(values.days),
    help: values.help,
  }
}

export function parseConvertArgs(argv: readonly string[]): ConvertArgs {
  const { values } = parse(() =>
    parseArgs({
      args: [...argv],
      options: {
        ...COMMON_OPTIONS,
        transcripts: { type: 'string', short: 't' },
        meetings: { type: 'string', short: 'm' },
      },
      strict: true,
      allowPositionals: false,
    })
  )
  return {
    verbose: values.verbose,
    force: values.force,
    output: values.output || 'markdown',
    days: parseDays(values.days),
    help: values.help,
    transcripts: values.transcripts || 'transcripts',
    meetings: values.meetings || 'meetings',
  }
}

const COMMON_USAGE = `  -o, --output DIR   output directory (default: %OUTPUT%)
  -d, --days N       only process meetings from the last N days
  -f, --force        overwrite existing files
  -v, --verbose      enable debug logging
  -h, --help         show this help`

export function usage(command: string, description: string, defaultOutput: string, extra = ''): string {
  const lines = [`Usage: ${command} [options]`, '', description, '', 'Options:']
  if (extra) {
    lines.push(extra)
  }
  lines.push(COMMON_USAGE.replace('%OUTPUT%', defaultOutput))
  return `${lines.join('\n')}\n`
}

#!/usr/bin/env node
import 'dotenv/config'
import { loadConfig, resolveLogFile } from '../lib/config.js'
import { convertToMarkdown } from '../lib/converter.js'
import { createLogger } from '../lib/logger.js'
import type { ConvertArgs } from './args.js'
import { parseConvertArgs, usage } from './args.js'
import { EXIT_FAILURE, EXIT_OK, reportUsageError, runCommand } from './run.js'

const USAGE = usage(
  'convert-to-markdown',
  'Convert downloaded transcript and meeting JSON files into one Markdown document per meeting.',
  'markdown',
  `  -t, --transcripts DIR  transcript JSON directory (default: transcripts)
  -m, --meetings DIR     meeting JSON directory (default: meetings)`
)

export async function main(argv: readonly string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let args: ConvertArgs
  try {
    args = parseConvertArgs(argv)
  } catch (error) {
    return reportUsageError(error, USAGE)
  }
  if (args.help) {
    process.stdout.write(USAGE)
    return EXIT_OK
  }

  const config = loadConfig(env)
  const log = createLogger({
    verbose: args.verbose,
    level: config.logLevel,
    logFile: resolveLogFile(config, 'markdown_converter.log'),
  })

  return runCommand(log, 'Conversion', async () => {
    await convertToMarkdown({
      transcriptsDir: args.transcripts,
      meetingsDir: args.meetings,
      outputDir: args.output,
      days: args.days,
      force: args.force,
      logger: log,
    })
  })
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code
    },
    (error: unknown) => {
      console.error(error)
      process.exitCode = EXIT_FAILURE
    }
  )
}

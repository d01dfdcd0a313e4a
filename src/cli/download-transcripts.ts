#!/usr/bin/env node
import 'dotenv/config'
import { loadConfig, resolveLogFile, validateConfig } from '../lib/config.js'
import { defaultCredentialsPath, loadCredentials } from '../lib/credentials.js'
import { GranolaClient, clientOptionsFromConfig } from '../lib/granola-client.js'
import { createLogger } from '../lib/logger.js'
import { downloadTranscripts } from '../lib/transcripts.js'
import type { CommonArgs } from './args.js'
import { parseDownloadArgs, usage } from './args.js'
import { EXIT_FAILURE, EXIT_OK, reportUsageError, runCommand } from './run.js'

const USAGE = usage(
  'download-transcripts',
  'Download Granola meeting transcripts via API and save them as JSON files.',
  'transcripts'
)

export async function main(argv: readonly string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let args: CommonArgs
  try {
    args = parseDownloadArgs(argv, 'transcripts')
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
    logFile: resolveLogFile(config, 'transcript_downloader.log'),
  })

  return runCommand(log, 'Download', async () => {
    validateConfig(config)
    log.info('Loading Granola credentials...')
    const credential = await loadCredentials(config.credentialsPath ?? defaultCredentialsPath(), log)
    const client = new GranolaClient(credential, clientOptionsFromConfig(config, log))
    await downloadTranscripts({
      client,
      outputDir: args.output,
      days: args.days,
      force: args.force,
      requestDelayMs: config.requestDelayMs,
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

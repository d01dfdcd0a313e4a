import type { Logger } from 'pino'
import { UsageError, errorMessage } from '../lib/errors.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

/** 引数エラーは使い方を表示して終了コード2 */
export function reportUsageError(error: unknown, usageText: string): number {
  if (!(error instanceof UsageError)) {
    throw error
  }
  process.stderr.write(`${error.message}\n\n${usageText}`)
  return EXIT_USAGE
}

/** 致命的エラーはログに残して終了コード1。項目ごとの失敗は成功扱い */
export async function runCommand(log: Logger, name: string, command: () => Promise<void>): Promise<number> {
  try {
    await command()
    return EXIT_OK
  } catch (error) {
    log.error({ err: error }, `${name} failed: ${errorMessage(error)}`)
    return EXIT_FAILURE
  }
}

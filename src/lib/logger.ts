import pino from 'pino'
import type { Logger } from 'pino'

// pinoレベル → severity マッピング
const SEVERITY_MAP: Record<number, string> = {
  10: 'DEBUG',     // trace
  20: 'DEBUG',     // debug
  30: 'INFO',      // info
  40: 'WARNING',   // warn
  50: 'ERROR',     // error
  60: 'CRITICAL',  // fatal
}

export interface LoggerOptions {
  readonly level?: string
  readonly verbose?: boolean
  readonly logFile?: string
  readonly serviceName?: string
  // テストでログをキャプチャするための出力先
  readonly destination?: pino.DestinationStream
}

function isLevel(value: string): value is pino.LevelWithSilent {
  return value === 'silent' || value in pino.levels.values
}

export function resolveLevel(options: Pick<LoggerOptions, 'level' | 'verbose'>): pino.LevelWithSilent {
  if (options.verbose) {
    return 'debug'
  }
  const level = options.level || process.env.LOG_LEVEL || 'info'
  return isLevel(level) ? level : 'info'
}

/** 標準出力と（指定があれば）ログファイルの両方に書くロガーを生成 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const streams: pino.StreamEntry[] = [
    { level: 'trace', stream: options.destination ?? process.stdout },
  ]
  if (options.logFile) {
    streams.push({
      level: 'trace',
      stream: pino.destination({ dest: options.logFile, append: true, mkdir: true, sync: true }),
    })
  }

  return pino(
    {
      level: resolveLevel(options),
      formatters: {
        level(_label, number) {
          return {
            severity: SEVERITY_MAP[number] || 'DEFAULT',
          }
        },
      },
      // ISO 8601タイムスタンプ
      timestamp: pino.stdTimeFunctions.isoTime,
      // pinoデフォルトの"pid","hostname"を除外
      base: {
        'service.name': options.serviceName || process.env.SERVICE_NAME || 'meeting-notes-export',
      },
      messageKey: 'message',
    },
    pino.multistream(streams)
  )
}

export const logger = createLogger()

import { AppError } from './errors.js'

export interface AppConfig {
  readonly credentialsPath: string | undefined
  readonly apiBase: string
  readonly clientVersion: string
  readonly pageSize: number
  readonly requestDelayMs: number
  readonly retryCount: number
  readonly retryDelayMs: number
  readonly requestTimeoutMs: number
  readonly logLevel: string
  // undefined: スクリプト既定のファイル, '': ファイル出力なし
  readonly logFile: string | undefined
}

function toNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback
  }
  return Number(value)
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    credentialsPath: env.GRANOLA_CREDENTIALS_PATH || undefined,
    apiBase: env.GRANOLA_API_BASE || 'https://api.granola.ai',
    clientVersion: env.GRANOLA_CLIENT_VERSION || '5.354.0',
    pageSize: toNumber(env.PAGE_SIZE, 100),
    requestDelayMs: toNumber(env.REQUEST_DELAY_MS, 100),
    retryCount: toNumber(env.RETRY_COUNT, 1),
    retryDelayMs: toNumber(env.RETRY_DELAY_MS, 1000),
    requestTimeoutMs: toNumber(env.REQUEST_TIMEOUT_MS, 30000),
    logLevel: env.LOG_LEVEL || 'info',
    logFile: env.LOG_FILE,
  }
}

export function validateConfig(config: AppConfig): void {
  const numeric: Record<string, number> = {
    PAGE_SIZE: config.pageSize,
    REQUEST_DELAY_MS: config.requestDelayMs,
    RETRY_COUNT: config.retryCount,
    RETRY_DELAY_MS: config.retryDelayMs,
    REQUEST_TIMEOUT_MS: config.requestTimeoutMs,
  }
  for (const [key, value] of Object.entries(numeric)) {
    if (!Number.isInteger(value) || value < 0) {
      throw new AppError(`${key} must be a non-negative integer`)
    }
  }
  if (config.pageSize === 0) {
    throw new AppError('PAGE_SIZE must be greater than 0')
  }
  if (!/^https?:\/\//.test(config.apiBase)) {
    throw new AppError('GRANOLA_API_BASE must be an http(s) URL')
  }
}

/** LOG_FILEの設定からスクリプトのログファイルを決める */
export function resolveLogFile(config: AppConfig, fallback: string): string | undefined {
  if (config.logFile === undefined) {
    return fallback
  }
  return config.logFile || undefined
}

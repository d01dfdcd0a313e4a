/** エラー分類: AuthErrorは致命的、NetworkError/ParseErrorは項目単位でスキップ */
export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** 認証情報が無い・壊れている・APIに拒否された */
export class AuthError extends AppError {}

export class NetworkError extends AppError {
  readonly status: number | undefined

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.status = options.status
  }
}

/** APIレスポンスやローカルJSONが想定の形をしていない */
export class ParseError extends AppError {
  readonly source: string | undefined

  constructor(message: string, options: { source?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.source = options.source
  }
}

/** CLI引数の誤り */
export class UsageError extends AppError {}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message
  }
  return String(error)
}

export interface DownloadResult {
  readonly downloaded: number
  readonly skipped: number
  readonly failed: number
  readonly errors: readonly string[]
}

export interface ConvertResult {
  readonly converted: number
  readonly skipped: number
  readonly failed: number
  readonly errors: readonly string[]
}

import type { Logger } from 'pino'

const DAY_MS = 24 * 60 * 60 * 1000

export function cutoffFor(days: number, now: Date): Date {
  return new Date(now.getTime() - days * DAY_MS)
}

/**
 * 直近N日に作成されたものだけ残す
 * 日付が無い・読めないものは期間内と判断できないので除外する
 */
export function filterByDays<T>(
  items: readonly T[],
  days: number | undefined,
  createdAt: (item: T) => string | null | undefined,
  now: Date,
  log: Logger
): T[] {
  if (days === undefined) {
    return [...items]
  }

  const cutoff = cutoffFor(days, now).getTime()
  const kept = items.filter((item) => {
    const value = createdAt(item)
    const time = value ? Date.parse(value) : Number.NaN
    if (Number.isNaN(time)) {
      log.debug({ createdAt: value ?? null }, 'Excluding item without a usable creation date')
      return false
    }
    return time >= cutoff
  })

  log.info(`Filtered to ${kept.length} of ${items.length} items from the last ${days} days`)
  return kept
}

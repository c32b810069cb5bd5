// Logging streaks over calendar-day keys (YYYY-MM-DD)
// Every date is validated before it reaches streak math; a bad key throws

import { format, isValid, parseISO, subDays, differenceInCalendarDays } from 'date-fns'

const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/

export interface StreakSummary {
  currentStreak: number
  longestStreak: number
}

/**
 * Parse a YYYY-MM-DD key into a local-midnight Date.
 * Rejects impossible days such as 2024-02-30.
 */
export function parseDateKey(key: string): Date {
  if (!DATE_KEY.test(key)) {
    throw new Error(`Invalid date key: "${key}" (expected YYYY-MM-DD)`)
  }
  if (!isDateKey(key)) {
    throw new Error(`Invalid date key: "${key}" is not a calendar day`)
  }
  return parseISO(key)
}

export function isDateKey(key: string): boolean {
  if (!DATE_KEY.test(key)) return false
  const date = parseISO(key)
  return isValid(date) && format(date, 'yyyy-MM-dd') === key
}

/** Normalize a Date or a date key to a validated YYYY-MM-DD key */
export function toDateKey(date: Date | string): string {
  if (typeof date === 'string') {
    parseDateKey(date)
    return date
  }
  if (!isValid(date)) {
    throw new Error('Invalid date: received an invalid Date instance')
  }
  return format(date, 'yyyy-MM-dd')
}

function validateAll(loggedDates: Iterable<string>): Set<string> {
  const keys = new Set<string>()
  for (const key of loggedDates) {
    parseDateKey(key)
    keys.add(key)
  }
  return keys
}

/**
 * Consecutive logged days ending at `from`. A gap on `from` itself yields 0.
 */
export function currentStreak(loggedDates: Iterable<string>, from: Date | string): number {
  const keys = validateAll(loggedDates)
  const start = parseDateKey(toDateKey(from))

  let streak = 0
  // Bounded by the number of logged days
  while (streak < keys.size && keys.has(format(subDays(start, streak), 'yyyy-MM-dd'))) {
    streak++
  }
  return streak
}

/**
 * Longest run of consecutive calendar days anywhere in the set.
 */
export function longestStreak(loggedDates: Iterable<string>): number {
  const sorted = Array.from(validateAll(loggedDates)).sort()
  if (sorted.length === 0) return 0

  let longest = 1
  let run = 1
  for (let i = 1; i < sorted.length; i++) {
    const delta = differenceInCalendarDays(parseDateKey(sorted[i]), parseDateKey(sorted[i - 1]))
    if (delta === 1) {
      run++
      if (run > longest) longest = run
    } else {
      run = 1
    }
  }
  return longest
}

export function summarizeStreaks(loggedDates: Iterable<string>, from: Date | string): StreakSummary {
  const keys = validateAll(loggedDates)
  return {
    currentStreak: currentStreak(keys, from),
    longestStreak: longestStreak(keys),
  }
}

import { describe, it, expect } from 'vitest'
import {
  currentStreak,
  isDateKey,
  longestStreak,
  parseDateKey,
  summarizeStreaks,
  toDateKey,
} from '../log-streak'
import { TODAY, WEEK_OF_LOGS } from './fixtures/metrics-fixtures'

// ─── Date keys ───────────────────────────────────────────────────────

describe('parseDateKey', () => {
  it('parses a calendar day to local midnight', () => {
    const date = parseDateKey('2024-02-29')
    expect(date.getFullYear()).toBe(2024)
    expect(date.getMonth()).toBe(1)
    expect(date.getDate()).toBe(29)
    expect(date.getHours()).toBe(0)
  })

  it('rejects malformed keys', () => {
    expect(() => parseDateKey('2024-6-1')).toThrow('Invalid date key')
    expect(() => parseDateKey('June 1')).toThrow('Invalid date key')
  })

  it('rejects impossible days', () => {
    expect(() => parseDateKey('2023-02-29')).toThrow('is not a calendar day')
    expect(() => parseDateKey('2024-13-01')).toThrow('Invalid date key')
  })
})

describe('isDateKey', () => {
  it('accepts only real YYYY-MM-DD days', () => {
    expect(isDateKey('2024-06-15')).toBe(true)
    expect(isDateKey('2024-06-31')).toBe(false)
    expect(isDateKey('2024/06/15')).toBe(false)
  })
})

describe('toDateKey', () => {
  it('formats a Date in local time', () => {
    expect(toDateKey(new Date(2024, 5, 15, 23, 30))).toBe('2024-06-15')
  })

  it('passes a valid key through', () => {
    expect(toDateKey('2024-06-15')).toBe('2024-06-15')
  })

  it('throws for an invalid Date', () => {
    expect(() => toDateKey(new Date('nope'))).toThrow('Invalid date')
  })
})

// ─── Streaks ─────────────────────────────────────────────────────────

describe('currentStreak', () => {
  it('counts consecutive days ending at the start date', () => {
    expect(currentStreak(WEEK_OF_LOGS, TODAY)).toBe(7)
    expect(currentStreak(['2024-06-14', '2024-06-15'], '2024-06-15')).toBe(2)
  })

  it('is 0 when the start date itself was not logged', () => {
    expect(currentStreak(['2024-06-13', '2024-06-14'], '2024-06-15')).toBe(0)
  })

  it('is 0 for no logs', () => {
    expect(currentStreak([], '2024-06-15')).toBe(0)
  })

  it('crosses month and year boundaries', () => {
    expect(currentStreak(['2023-12-30', '2023-12-31', '2024-01-01'], '2024-01-01')).toBe(3)
  })

  it('accepts a Date as the start', () => {
    expect(currentStreak(['2024-06-14', '2024-06-15'], new Date(2024, 5, 15))).toBe(2)
  })

  it('throws on a malformed logged date', () => {
    expect(() => currentStreak(['2024-06-15', 'yesterday'], '2024-06-15')).toThrow('Invalid date key')
  })
})

describe('longestStreak', () => {
  it('finds the longest run anywhere in the set', () => {
    const logs = ['2024-06-01', '2024-06-02', '2024-06-03', '2024-06-04', '2024-06-05', '2024-06-07']
    expect(longestStreak(logs)).toBe(5)
  })

  it('ignores duplicates and input order', () => {
    expect(longestStreak(['2024-06-03', '2024-06-01', '2024-06-02', '2024-06-02'])).toBe(3)
  })

  it('is 0 for no logs and 1 for a single day', () => {
    expect(longestStreak([])).toBe(0)
    expect(longestStreak(['2024-06-01'])).toBe(1)
  })
})

describe('summarizeStreaks', () => {
  it('reports a broken current streak alongside the longest run', () => {
    const logs = ['2024-06-01', '2024-06-02', '2024-06-03', '2024-06-04', '2024-06-05', '2024-06-07']
    expect(summarizeStreaks(logs, '2024-06-09')).toEqual({ currentStreak: 0, longestStreak: 5 })
  })

  it('keeps longest at least as large as current', () => {
    const summary = summarizeStreaks(WEEK_OF_LOGS, TODAY)
    expect(summary.currentStreak).toBe(7)
    expect(summary.longestStreak).toBeGreaterThanOrEqual(summary.currentStreak)
  })
})

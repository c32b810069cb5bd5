// Day-keyed records (wearable metrics, quick logs)
// One record per calendar date; writes are upserts

import { endOfMonth, format, isValid, parse, subDays } from 'date-fns'
import type { DailyMetric, DailyMetricField, QuickLog } from '@/types'
import { DAILY_METRIC_FIELDS, mean } from './health-constants'
import { parseDateKey, toDateKey } from './log-streak'

export interface DailyMetricSummary {
  daysRequested: number
  daysWithData: number
  metrics: DailyMetric[]               // Newest first
  averages: Record<DailyMetricField, number | null> | null
}

export interface CalendarEntry {
  date: string
  mood: number
  energy: number
}

/**
 * Insert `record`, or replace the existing record for the same date.
 * Returns a new list sorted newest first.
 */
export function upsertByDate<T extends { date: string }>(records: readonly T[], record: T): T[] {
  parseDateKey(record.date)
  return [...records.filter(r => r.date !== record.date), record]
    .sort((a, b) => b.date.localeCompare(a.date))
}

export function indexByDate<T extends { date: string }>(records: readonly T[]): Map<string, T> {
  const map = new Map<string, T>()
  for (const record of records) {
    map.set(record.date, record)
  }
  return map
}

export function loggedDates(logs: readonly QuickLog[]): Set<string> {
  return new Set(logs.map(log => log.date))
}

/**
 * Metrics within [endDate - days, endDate] and per-field averages over the values
 * actually present. A field with no value in the window averages to null; a day whose
 * fields are all null does not count toward daysWithData.
 */
export function summarizeDailyMetrics(
  metrics: readonly DailyMetric[],
  endDate: Date | string,
  days: number
): DailyMetricSummary {
  const end = toDateKey(endDate)
  const cutoff = format(subDays(parseDateKey(end), days), 'yyyy-MM-dd')

  const inWindow = metrics
    .filter(m => m.date >= cutoff && m.date <= end)
    .sort((a, b) => b.date.localeCompare(a.date))

  if (inWindow.length === 0) {
    return { daysRequested: days, daysWithData: 0, metrics: [], averages: null }
  }

  const average = (field: DailyMetricField): number | null =>
    mean(inWindow.map(m => m[field]).filter((v): v is number => v !== null))

  const averages: Record<DailyMetricField, number | null> = {
    steps: average('steps'),
    sleepHours: average('sleepHours'),
    hrvAvgMs: average('hrvAvgMs'),
    restingHeartRate: average('restingHeartRate'),
    activeEnergyKcal: average('activeEnergyKcal'),
    weightKg: average('weightKg'),
  }

  return {
    daysRequested: days,
    daysWithData: new Set(inWindow.filter(hasMetricData).map(m => m.date)).size,
    metrics: inWindow,
    averages,
  }
}

/**
 * Mood/energy entries for one YYYY-MM month, oldest first (heatmap input).
 */
export function quickLogCalendar(logs: readonly QuickLog[], month: string): CalendarEntry[] {
  const start = /^\d{4}-\d{2}$/.test(month) ? parse(month, 'yyyy-MM', new Date(2000, 0, 1)) : new Date(NaN)
  if (!isValid(start)) {
    throw new Error(`Invalid date month: "${month}" (expected YYYY-MM)`)
  }
  const first = format(start, 'yyyy-MM-dd')
  const last = format(endOfMonth(start), 'yyyy-MM-dd')

  return logs
    .filter(log => log.date >= first && log.date <= last)
    .sort((a, b) => a.date.localeCompare(b.date))
    .map(log => ({ date: log.date, mood: log.mood, energy: log.energy }))
}

/** True when at least one field of the day carries a value */
export function hasMetricData(metric: DailyMetric): boolean {
  return DAILY_METRIC_FIELDS.some(field => metric[field] !== null)
}

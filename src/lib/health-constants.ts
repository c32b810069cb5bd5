// Daily metric bounds and numeric helpers
// Defines physiologically reasonable bounds to catch illogical wearable values early

import type { DailyMetricField } from '@/types'

export const METRIC_BOUNDS: Record<DailyMetricField, {
  min: number
  max: number
  unit: string
}> = {
  steps: { min: 0, max: 100000, unit: 'steps' },
  sleepHours: { min: 0, max: 24, unit: 'h' },
  hrvAvgMs: { min: 5, max: 250, unit: 'ms' },
  restingHeartRate: { min: 25, max: 150, unit: 'bpm' },
  activeEnergyKcal: { min: 0, max: 8000, unit: 'kcal' },
  weightKg: { min: 20, max: 350, unit: 'kg' },
}

export const DAILY_METRIC_FIELDS: readonly DailyMetricField[] = [
  'steps', 'sleepHours', 'hrvAvgMs', 'restingHeartRate', 'activeEnergyKcal', 'weightKg',
]

export function validateMetricValue(field: DailyMetricField, value: number): boolean {
  if (!isFinite(value)) return false
  const bounds = METRIC_BOUNDS[field]
  return value >= bounds.min && value <= bounds.max
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value))
}

/** Safe division that returns null instead of NaN/Infinity */
export function safeDivide(numerator: number, denominator: number): number | null {
  if (!isFinite(numerator) || !isFinite(denominator) || denominator === 0) return null
  const result = numerator / denominator
  return isFinite(result) ? result : null
}

/** Mean of the values, or null for an empty list */
export function mean(values: number[]): number | null {
  if (values.length === 0) return null
  return safeDivide(values.reduce((a, b) => a + b, 0), values.length)
}

export function roundTo(value: number, decimals: number): number {
  const f = Math.pow(10, decimals)
  return Math.round(value * f) / f
}

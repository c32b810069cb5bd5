import { describe, it, expect, vi, afterEach } from 'vitest'
import type { VitalityComponentKey } from '@/types'
import {
  aggregateComponents,
  buildVitalityReport,
  computeVitalityScore,
  computeVitalityTrend,
  VITALITY_COMPONENTS,
  type RawComponent,
} from '../vitality-score'
import { createEngineConfig } from '../engine-config'
import { dailyMetric, GOOD_DAY, TODAY, WEEK_OF_LOGS } from './fixtures/metrics-fixtures'

afterEach(() => {
  vi.restoreAllMocks()
})

function weightSum(score: ReturnType<typeof computeVitalityScore>): number {
  return VITALITY_COMPONENTS.reduce((sum, key) => sum + score.components[key].weight, 0)
}

// ─── computeVitalityScore ────────────────────────────────────────────

describe('computeVitalityScore', () => {
  it('scores a full day with every component available', () => {
    // 0.30*100 + 0.25*100 + 0.20*100 + 0.15*80 + 0.10*100 = 97
    const result = computeVitalityScore(GOOD_DAY, 80, 7)
    expect(result.score).toBe(97)
    expect(result.score).toBeGreaterThanOrEqual(85)
    expect(result.insufficientData).toBe(false)
    expect(result.components.sleep.weight).toBe(0.3)
    expect(result.components.clinical.weight).toBe(0.15)
    expect(result.components.consistency.weight).toBe(0.1)
  })

  it('describes each component value', () => {
    const { components } = computeVitalityScore(GOOD_DAY, 80, 3)
    expect(components.sleep.value).toBe('7.5h')
    expect(components.recovery.value).toBe('HRV 65ms / RHR 55')
    expect(components.activity.value).toBe('9000 steps')
    expect(components.clinical.value).toBe('Blood work')
    expect(components.consistency.value).toBe('3-day streak')
  })

  it('falls back to consistency alone when there is no data', () => {
    const result = computeVitalityScore(null, null, 0)
    expect(result.score).toBe(0)
    expect(result.insufficientData).toBe(false)
    expect(result.components.consistency.weight).toBe(1)
    expect(result.components.consistency.available).toBe(true)
    expect(result.components.sleep).toEqual({ score: 0, weight: 0, value: 'No data', available: false })
  })

  it('redistributes missing weight proportionally', () => {
    // sleep 0.30 and consistency 0.10 → 0.75 / 0.25
    const result = computeVitalityScore(dailyMetric(TODAY, { sleepHours: 8 }), null, 0)
    expect(result.components.sleep.weight).toBe(0.75)
    expect(result.components.consistency.weight).toBe(0.25)
    expect(result.score).toBe(75)
  })

  it('rounds reported weights so they still sum to 1', () => {
    // 0.30 / 0.25 / 0.10 over 0.65 → 46.15 / 38.46 / 15.38 hundredths
    const metric = dailyMetric(TODAY, { sleepHours: 8, hrvAvgMs: 60 })
    const result = computeVitalityScore(metric, null, 0)
    expect(result.components.sleep.weight).toBe(0.46)
    expect(result.components.recovery.weight).toBe(0.39)
    expect(result.components.consistency.weight).toBe(0.15)
    expect(weightSum(result)).toBeCloseTo(1, 10)
  })

  it('treats a zero wellness score as no clinical data', () => {
    const result = computeVitalityScore(GOOD_DAY, 0, 7)
    expect(result.components.clinical.available).toBe(false)
    expect(result.score).toBe(100)
  })

  it('scores a well-rested, active day with recent labs in the top band', () => {
    // 0.30*100 + 0.25*100 + 0.20*100 + 0.15*90 + 0.10*100 = 98.5
    const metric = dailyMetric(TODAY, { sleepHours: 8, hrvAvgMs: 70, restingHeartRate: 55, steps: 9000 })
    const result = computeVitalityScore(metric, 90, 7)
    expect(result.score).toBeGreaterThanOrEqual(98)
    expect(result.score).toBeLessThanOrEqual(99)
    expect(result.score).toBeGreaterThanOrEqual(85)
    expect(result.score).toBeLessThanOrEqual(100)
    expect(result.components.recovery.score).toBe(100)
    expect(result.components.clinical.score).toBe(90)
  })

  it('treats non-finite metric values as missing', () => {
    const metric = dailyMetric(TODAY, { sleepHours: NaN, steps: Infinity, hrvAvgMs: 60 })
    const result = computeVitalityScore(metric, null, 0)
    expect(result.components.sleep.available).toBe(false)
    expect(result.components.activity.available).toBe(false)
    // recovery 0.25 and consistency 0.10 → 100 * 0.25 / 0.35 = 71.4
    expect(result.score).toBe(71)
    expect(Number.isNaN(result.score)).toBe(false)
  })

  it('is stable for identical input', () => {
    expect(computeVitalityScore(GOOD_DAY, 70, 2)).toEqual(computeVitalityScore(GOOD_DAY, 70, 2))
  })
})

// ─── aggregateComponents ─────────────────────────────────────────────

describe('aggregateComponents', () => {
  const missing: RawComponent = { score: 0, value: 'No data', available: false }

  it('flags insufficient data when nothing is available', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const raw: Record<VitalityComponentKey, RawComponent> = {
      sleep: missing,
      recovery: missing,
      activity: missing,
      clinical: missing,
      consistency: missing,
    }
    const result = aggregateComponents(raw)
    expect(result.score).toBe(0)
    expect(result.insufficientData).toBe(true)
    expect(weightSum(result)).toBe(0)
    expect(warn).toHaveBeenCalledOnce()
  })

  it('sums weights to 1 for every availability subset', () => {
    for (let mask = 1; mask < 32; mask++) {
      const raw: Record<VitalityComponentKey, RawComponent> = {
        sleep: mask & 1 ? { score: 50, value: 'x', available: true } : missing,
        recovery: mask & 2 ? { score: 50, value: 'x', available: true } : missing,
        activity: mask & 4 ? { score: 50, value: 'x', available: true } : missing,
        clinical: mask & 8 ? { score: 50, value: 'x', available: true } : missing,
        consistency: mask & 16 ? { score: 50, value: 'x', available: true } : missing,
      }
      const result = aggregateComponents(raw)
      expect(weightSum(result)).toBeCloseTo(1, 10)
      expect(result.score).toBe(50)
    }
  })
})

// ─── Trend and report ────────────────────────────────────────────────

describe('computeVitalityTrend', () => {
  const input = { metrics: [GOOD_DAY], loggedDates: WEEK_OF_LOGS, wellnessScore: 80, endDate: TODAY }

  it('covers the seven prior days plus the end date', () => {
    const trend = computeVitalityTrend(input)
    expect(trend).toHaveLength(8)
    expect(trend[0].date).toBe('2024-06-08')
    expect(trend[7].date).toBe(TODAY)
  })

  it('scores each day with its own metric and streak', () => {
    const trend = computeVitalityTrend(input)
    // 06-08: clinical 80 at 0.6, no streak
    expect(trend[0].score).toBe(48)
    // 06-09: plus a 1-day streak (14) at 0.4
    expect(trend[1].score).toBe(54)
    expect(trend[7].score).toBe(97)
  })

  it('uses the configured window', () => {
    const trend = computeVitalityTrend(input, createEngineConfig({ vitalityTrendDays: 3 }))
    expect(trend.map(p => p.date)).toEqual(['2024-06-12', '2024-06-13', '2024-06-14', '2024-06-15'])
  })
})

describe('buildVitalityReport', () => {
  it('returns today with components and the trend ending today', () => {
    const report = buildVitalityReport({
      metrics: [GOOD_DAY],
      loggedDates: new Set(WEEK_OF_LOGS),
      wellnessScore: 80,
      endDate: TODAY,
    })
    expect(report.date).toBe(TODAY)
    expect(report.vitality.score).toBe(97)
    expect(report.trend).toHaveLength(8)
    expect(report.trend[7]).toEqual({ date: TODAY, score: 97 })
  })
})

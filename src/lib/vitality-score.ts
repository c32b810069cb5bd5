// Vitality Score
// Blends five pillars into one 0-100 daily score:
// Sleep (30%), Recovery (25%), Activity (20%), Clinical (15%), Consistency (10%)
// Pillars without data are dropped and their weight redistributed proportionally.

import { format, subDays } from 'date-fns'
import type {
  DailyMetric,
  VitalityComponent,
  VitalityComponentKey,
  VitalityScore,
  VitalityTrendPoint,
} from '@/types'
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './engine-config'
import { roundTo } from './health-constants'
import { currentStreak, parseDateKey, toDateKey } from './log-streak'
import { indexByDate } from './daily-records'
import {
  scoreActivity,
  scoreClinical,
  scoreConsistency,
  scoreRecovery,
  scoreSleep,
} from './vitality-scorers'

// ─── Types ──────────────────────────────────────────────────────────────────

export const VITALITY_COMPONENTS: readonly VitalityComponentKey[] = [
  'sleep', 'recovery', 'activity', 'clinical', 'consistency',
]

export interface RawComponent {
  score: number
  value: string
  available: boolean
}

export interface VitalityTrendInput {
  metrics: DailyMetric[]
  loggedDates: Iterable<string>
  wellnessScore: number | null
  endDate: Date | string
}

export interface VitalityReport {
  date: string
  vitality: VitalityScore
  trend: VitalityTrendPoint[]
}

const NO_DATA: RawComponent = { score: 0, value: 'No data', available: false }

// ─── Weight Redistribution ──────────────────────────────────────────────────

/**
 * Round effective weights to hundredths so the available ones still sum to 1.00.
 * Largest remainder: floor every weight, then hand the missing hundredths to the
 * largest fractional parts (ties go to the earlier component).
 */
function roundWeights(exact: Map<VitalityComponentKey, number>): Map<VitalityComponentKey, number> {
  const entries = Array.from(exact.entries()).map(([key, weight]) => {
    const hundredths = roundTo(weight * 100, 6)
    return { key, floor: Math.floor(hundredths), fraction: hundredths - Math.floor(hundredths) }
  })

  let missing = 100 - entries.reduce((sum, e) => sum + e.floor, 0)
  const byFraction = [...entries].sort((a, b) => b.fraction - a.fraction)
  for (const entry of byFraction) {
    if (missing <= 0) break
    entry.floor++
    missing--
  }

  return new Map(entries.map(e => [e.key, e.floor / 100]))
}

/**
 * Combine raw component scores using weight redistribution.
 * With no available component the score is 0 and flagged, never a confident number.
 */
export function aggregateComponents(
  raw: Record<VitalityComponentKey, RawComponent>,
  weights: Record<VitalityComponentKey, number> = DEFAULT_ENGINE_CONFIG.vitalityWeights
): VitalityScore {
  const available = VITALITY_COMPONENTS.filter(key => raw[key].available)
  const availableWeight = available.reduce((sum, key) => sum + weights[key], 0)
  const insufficientData = availableWeight <= 0

  const exact = new Map<VitalityComponentKey, number>()
  if (!insufficientData) {
    for (const key of available) {
      exact.set(key, weights[key] / availableWeight)
    }
  }
  const reported = insufficientData ? exact : roundWeights(exact)

  const toComponent = (key: VitalityComponentKey): VitalityComponent => {
    const component = raw[key]
    if (!exact.has(key)) {
      return { score: 0, weight: 0, value: component.value, available: false }
    }
    return {
      score: component.score,
      weight: reported.get(key) ?? 0,
      value: component.value,
      available: true,
    }
  }

  const components: Record<VitalityComponentKey, VitalityComponent> = {
    sleep: toComponent('sleep'),
    recovery: toComponent('recovery'),
    activity: toComponent('activity'),
    clinical: toComponent('clinical'),
    consistency: toComponent('consistency'),
  }
  const total = available.reduce((sum, key) => sum + raw[key].score * (exact.get(key) ?? 0), 0)

  if (insufficientData) {
    console.warn('[Vitality] No component has data; reporting 0 with insufficientData flag')
  }

  return {
    score: insufficientData ? 0 : Math.round(total),
    components,
    insufficientData,
  }
}

// ─── Single Day ─────────────────────────────────────────────────────────────

// NaN and Infinity count as missing
function finiteOrNull(value: number | null | undefined): number | null {
  return value !== null && value !== undefined && Number.isFinite(value) ? value : null
}

function recoveryValue(hrv: number | null, rhr: number | null): string {
  const parts: string[] = []
  if (hrv !== null) parts.push(`HRV ${hrv}ms`)
  if (rhr !== null) parts.push(`RHR ${rhr}`)
  return parts.join(' / ')
}

/**
 * Vitality Score for one day from that day's metric (if any), the latest lab wellness
 * score and the logging streak ending that day.
 */
export function computeVitalityScore(
  metric: DailyMetric | null,
  wellnessScore: number | null,
  logStreak: number,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): VitalityScore {
  const sleepHours = finiteOrNull(metric?.sleepHours)
  const hrv = finiteOrNull(metric?.hrvAvgMs)
  const rhr = finiteOrNull(metric?.restingHeartRate)
  const steps = finiteOrNull(metric?.steps)

  const recovery = scoreRecovery(hrv, rhr)
  const clinical = scoreClinical(wellnessScore)
  const streak = Math.max(0, Math.floor(logStreak))

  const raw: Record<VitalityComponentKey, RawComponent> = {
    sleep: sleepHours !== null
      ? { score: scoreSleep(sleepHours), value: `${sleepHours}h`, available: true }
      : NO_DATA,
    recovery: recovery !== null
      ? { score: recovery, value: recoveryValue(hrv, rhr), available: true }
      : NO_DATA,
    activity: steps !== null
      ? { score: scoreActivity(steps), value: `${steps} steps`, available: true }
      : NO_DATA,
    clinical: clinical !== null
      ? { score: clinical, value: 'Blood work', available: true }
      : NO_DATA,
    // A streak of 0 is still a valid data point
    consistency: { score: scoreConsistency(streak), value: `${streak}-day streak`, available: true },
  }

  return aggregateComponents(raw, config.vitalityWeights)
}

// ─── Trend ──────────────────────────────────────────────────────────────────

/**
 * One point per day from endDate - trendDays through endDate, each computed exactly
 * like a single day with that day's metric and streak.
 */
export function computeVitalityTrend(
  input: VitalityTrendInput,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): VitalityTrendPoint[] {
  const end = parseDateKey(toDateKey(input.endDate))
  const metricsByDate = indexByDate(input.metrics)
  const logged = Array.from(input.loggedDates)

  const trend: VitalityTrendPoint[] = []
  for (let i = config.vitalityTrendDays; i >= 0; i--) {
    const date = format(subDays(end, i), 'yyyy-MM-dd')
    const result = computeVitalityScore(
      metricsByDate.get(date) ?? null,
      input.wellnessScore,
      currentStreak(logged, date),
      config
    )
    trend.push({ date, score: result.score })
  }
  return trend
}

/**
 * Today's score with its component breakdown plus the trend leading up to it.
 */
export function buildVitalityReport(
  input: VitalityTrendInput,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): VitalityReport {
  const date = toDateKey(input.endDate)
  const logged = Array.from(input.loggedDates)
  const metric = indexByDate(input.metrics).get(date) ?? null

  return {
    date,
    vitality: computeVitalityScore(metric, input.wellnessScore, currentStreak(logged, date), config),
    trend: computeVitalityTrend({ ...input, loggedDates: logged }, config),
  }
}

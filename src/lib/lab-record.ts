// Lab record processing
// One extracted lab report → classified markers, wellness score, health age, insights.
// Records wait for human verification before they count toward dashboards.

import type {
  BiomarkerReading,
  BiomarkerStatus,
  ClassifiedBiomarker,
  CorrelationInsight,
} from '@/types'
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './engine-config'
import {
  applyVerificationEdits,
  calculateHealthAge,
  calculateWellnessScore,
  classifyReadings,
  normalizeMarkerName,
  type BiomarkerEdit,
} from './biomarker-classifier'
import { detectCorrelations, mergeCorrelations } from './biomarker-correlations'
import { buildSupplementProtocol, type SupplementProtocolEntry } from './supplement-protocol'
import { mean } from './health-constants'

// ─── Types ──────────────────────────────────────────────────────────────────

export type LabRecordStatus = 'pending_verification' | 'completed' | 'failed'

export interface LabContext {
  chronologicalAge?: number | null
  externalCorrelations?: CorrelationInsight[]
}

export interface LabAnalysis {
  biomarkers: ClassifiedBiomarker[]
  wellnessScore: number
  healthAge: number | null
  correlations: CorrelationInsight[]
  supplementProtocol: SupplementProtocolEntry[]
  keyFindings: string[]
  recommendations: string[]
  summary: string
  unclassified: string[]               // Marker names with no usable range
}

export interface LabRecord extends LabAnalysis {
  recordDate: string | null            // YYYY-MM-DD as printed on the report
  status: LabRecordStatus
  errorMessage: string | null
}

export interface BiomarkerTrend {
  id: string                           // "vitamin_d"
  title: string
  value: number
  unit: string
  status: BiomarkerStatus | null
  trendPoints: number[]                // Oldest → newest
}

const MAX_TREND_RECORDS = 10
const MAX_TREND_POINTS = 5
const OPTIMAL_CATEGORY_SCORE = 100
const ABNORMAL_CATEGORY_SCORE = 70

// ─── Processing ─────────────────────────────────────────────────────────────

function summarize(biomarkers: readonly ClassifiedBiomarker[]): string {
  const low = biomarkers.filter(b => b.status === 'low').map(b => b.name)
  const high = biomarkers.filter(b => b.status === 'high').map(b => b.name)

  const parts: string[] = []
  if (low.length > 0) parts.push(`Low levels detected: ${low.join(', ')}.`)
  if (high.length > 0) parts.push(`Elevated levels detected: ${high.join(', ')}.`)
  if (parts.length === 0) parts.push('All biomarkers are within optimal range.')
  return parts.join(' ')
}

/**
 * Derive everything a lab report contributes. Status is always recomputed from value
 * and range; externally supplied correlations are kept and detected ones appended
 * when their condition is new.
 */
export function processLabRecord(
  readings: readonly BiomarkerReading[],
  context: LabContext = {},
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): LabAnalysis {
  const biomarkers = classifyReadings(readings)
  const wellnessScore = calculateWellnessScore(biomarkers, config)
  const abnormal = biomarkers.filter(b => b.status === 'low' || b.status === 'high')
  const unclassified = biomarkers.filter(b => b.status === null).map(b => b.name)

  if (unclassified.length > 0) {
    console.warn(`[Labs] ${unclassified.length} biomarker(s) could not be classified: ${unclassified.join(', ')}`)
  }

  // Health age needs at least one classified marker behind the wellness score
  const age = context.chronologicalAge ?? null
  const hasClinicalData = unclassified.length < biomarkers.length
  return {
    biomarkers,
    wellnessScore,
    healthAge: age !== null && hasClinicalData ? calculateHealthAge(age, wellnessScore, config) : null,
    correlations: mergeCorrelations(context.externalCorrelations ?? [], detectCorrelations(biomarkers)),
    supplementProtocol: buildSupplementProtocol(biomarkers),
    keyFindings: abnormal.map(b => `${b.name} is ${b.status}`),
    recommendations: abnormal.map(b => `Address ${b.name} levels`),
    summary: summarize(biomarkers),
    unclassified,
  }
}

/** A freshly extracted record, held until a human approves it */
export function createLabRecord(
  readings: readonly BiomarkerReading[],
  recordDate: string | null,
  context: LabContext = {},
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): LabRecord {
  return {
    ...processLabRecord(readings, context, config),
    recordDate,
    status: 'pending_verification',
    errorMessage: null,
  }
}

/**
 * Apply human edits. Approval reprocesses the record and marks it completed.
 * Rejection keeps the edited markers but leaves every derived value untouched.
 */
export function verifyLabRecord(
  record: LabRecord,
  edits: readonly BiomarkerEdit[],
  approved: boolean,
  context: LabContext = {},
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): LabRecord {
  const biomarkers = applyVerificationEdits(record.biomarkers, edits)

  if (!approved) {
    return { ...record, biomarkers, status: 'failed', errorMessage: 'User rejected extracted data' }
  }

  return {
    ...processLabRecord(biomarkers, context, config),
    recordDate: record.recordDate,
    status: 'completed',
    errorMessage: null,
  }
}

// ─── Dashboard Views ────────────────────────────────────────────────────────

/**
 * Per-category score: optimal markers count 100, out-of-range 70, averaged and rounded.
 * Unclassified markers are left out; a missing category is "other".
 */
export function categoryBreakdown(readings: readonly ClassifiedBiomarker[]): Record<string, number> {
  const scores = new Map<string, number[]>()
  for (const reading of readings) {
    if (reading.status === null) continue
    const category = reading.category ?? 'other'
    const list = scores.get(category) ?? []
    list.push(reading.status === 'optimal' ? OPTIMAL_CATEGORY_SCORE : ABNORMAL_CATEGORY_SCORE)
    scores.set(category, list)
  }

  const breakdown: Record<string, number> = {}
  for (const [category, values] of scores) {
    breakdown[category] = Math.round(mean(values) ?? 0)
  }
  return breakdown
}

function newestFirst(records: readonly LabRecord[]): LabRecord[] {
  return records
    .filter(r => r.status === 'completed')
    .sort((a, b) => (b.recordDate ?? '').localeCompare(a.recordDate ?? ''))
}

/**
 * Per-marker history across the newest completed records. Markers keep first-seen order
 * (newest record first); each carries its latest value and up to five points.
 */
export function buildBiomarkerTrends(records: readonly LabRecord[], limit = 6): BiomarkerTrend[] {
  const history = new Map<string, ClassifiedBiomarker[]>()
  for (const record of newestFirst(records).slice(0, MAX_TREND_RECORDS)) {
    for (const biomarker of record.biomarkers) {
      const key = normalizeMarkerName(biomarker.name)
      const points = history.get(key) ?? []
      points.push(biomarker)
      history.set(key, points)
    }
  }

  const trends: BiomarkerTrend[] = []
  for (const [key, points] of history) {
    const latest = points[0]
    trends.push({
      id: key.replace(/ /g, '_'),
      title: latest.name,
      value: latest.value,
      unit: latest.unit,
      status: latest.status,
      trendPoints: points.slice(0, MAX_TREND_POINTS).reverse().map(p => p.value),
    })
  }
  return trends.slice(0, Math.max(0, limit))
}

/** Wellness score of the newest completed record, or null when there is none */
export function latestWellnessScore(records: readonly LabRecord[]): number | null {
  return newestFirst(records)[0]?.wellnessScore ?? null
}

// Biomarker Classifier
// Status against a reference range, the penalty-based wellness score, and health age

import type { BiomarkerReading, BiomarkerStatus, ClassifiedBiomarker } from '@/types'
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './engine-config'
import { clamp } from './health-constants'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface BiomarkerEdit {
  name: string
  value: number
  unit?: string
  status?: BiomarkerStatus             // Explicit human override
}

// ─── Classification ─────────────────────────────────────────────────────────

/** Lowercase, trimmed, single-spaced marker name used for every lookup */
export function normalizeMarkerName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ')
}

/**
 * Status of a value against an inclusive [min, max] range.
 */
export function classify(value: number, min: number, max: number): BiomarkerStatus {
  if (value < min) return 'low'
  if (value > max) return 'high'
  return 'optimal'
}

/**
 * A verified override wins; otherwise the status is derived from the reference range.
 * No range (or an unusable one) means the marker stays unclassified.
 */
export function classifyReading(reading: BiomarkerReading): BiomarkerStatus | null {
  if (reading.statusOverride) return reading.statusOverride
  const range = reading.referenceRange
  if (!range || !isFinite(reading.value) || !isFinite(range.min) || !isFinite(range.max)) return null
  if (range.min > range.max) return null
  return classify(reading.value, range.min, range.max)
}

export function classifyReadings(readings: readonly BiomarkerReading[]): ClassifiedBiomarker[] {
  return readings.map(reading => ({
    ...reading,
    status: classifyReading(reading),
    confidence: reading.confidence ?? 1,
  }))
}

export function isAbnormal(status: BiomarkerStatus | null): status is 'low' | 'high' {
  return status === 'low' || status === 'high'
}

// ─── Wellness Score ─────────────────────────────────────────────────────────

/**
 * 100 minus a flat penalty per out-of-range marker, clamped to [0, 100].
 * Only classified markers count; with none the score is 0 (no clinical data).
 */
export function calculateWellnessScore(
  readings: readonly BiomarkerReading[],
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): number {
  const statuses = readings.map(classifyReading).filter((s): s is BiomarkerStatus => s !== null)
  if (statuses.length === 0) return 0

  const abnormal = statuses.filter(isAbnormal).length
  return clamp(100 - abnormal * config.wellnessPenaltyPerMarker, 0, 100)
}

// ─── Health Age ─────────────────────────────────────────────────────────────

// Heuristic curve: +10y at score 0, no change at 80, -3y at 100
const AGE_PENALTY_AT_ZERO = 10
const NEUTRAL_SCORE = 80
const AGE_BONUS_AT_FULL = 3

export function calculateHealthAge(
  chronologicalAge: number,
  wellnessScore: number,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): number | null {
  if (!isFinite(chronologicalAge) || chronologicalAge <= 0 || !isFinite(wellnessScore)) return null

  const score = clamp(wellnessScore, 0, 100)
  const adjustment = score <= NEUTRAL_SCORE
    ? AGE_PENALTY_AT_ZERO * (NEUTRAL_SCORE - score) / NEUTRAL_SCORE
    : -AGE_BONUS_AT_FULL * (score - NEUTRAL_SCORE) / (100 - NEUTRAL_SCORE)

  const ceiling = chronologicalAge + config.healthAgeCeilingOffset
  return Math.max(config.healthAgeFloor, Math.min(ceiling, Math.round(chronologicalAge + adjustment)))
}

// ─── Human Verification ─────────────────────────────────────────────────────

/**
 * Apply one round of human edits. Each unverified reading matched by name gets the new
 * value/unit (the extracted value is kept in originalValue), an optional status override
 * and verified=true. Status is then recomputed for every reading. Verified readings are
 * never edited again. The input array is not mutated.
 */
export function applyVerificationEdits(
  readings: readonly BiomarkerReading[],
  edits: readonly BiomarkerEdit[]
): ClassifiedBiomarker[] {
  const editMap = new Map(edits.map(e => [normalizeMarkerName(e.name), e]))

  const edited = readings.map((reading): BiomarkerReading => {
    const edit = editMap.get(normalizeMarkerName(reading.name))
    if (!edit || reading.verified) return reading

    const valueChanged = edit.value !== reading.value
    return {
      ...reading,
      value: edit.value,
      unit: edit.unit ?? reading.unit,
      originalValue: valueChanged ? reading.value : reading.originalValue ?? null,
      statusOverride: edit.status ?? reading.statusOverride ?? null,
      verified: true,
    }
  })

  return classifyReadings(edited)
}

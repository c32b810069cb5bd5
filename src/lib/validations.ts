import { z } from 'zod'
import type { BiomarkerReading, DailyMetric, PreviousOffer, QuickLog } from '@/types'
import type { BiomarkerEdit } from './biomarker-classifier'
import { DAILY_METRIC_FIELDS, METRIC_BOUNDS, validateMetricValue } from './health-constants'
import { isDateKey } from './log-streak'

// Common field schemas
const dateKeySchema = z.string().refine(isDateKey, { message: 'Invalid date (expected YYYY-MM-DD)' })
const finiteNumber = z.number().finite()
const statusSchema = z.enum(['low', 'optimal', 'high'])

// Biomarker schemas
const referenceRangeSchema = z.object({
  min: finiteNumber,
  max: finiteNumber,
})

// Extraction payloads spell these fields in snake_case
const SNAKE_CASE_READING_FIELDS = [
  ['reference_range', 'referenceRange'],
  ['status_override', 'statusOverride'],
  ['original_value', 'originalValue'],
] as const

function acceptSnakeCaseFields(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) return input
  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(input))
  for (const [snake, camel] of SNAKE_CASE_READING_FIELDS) {
    if (snake in fields && fields[camel] === undefined) {
      fields[camel] = fields[snake]
    }
    delete fields[snake]
  }
  return fields
}

// Incoming status is accepted but discarded: status is always derived from value and range.
// A human override is kept so verified readings classify the same after a round trip.
export const biomarkerReadingSchema = z.preprocess(acceptSnakeCaseFields, z.object({
  name: z.string().trim().min(1).max(200),
  value: finiteNumber,
  unit: z.string().max(50).default(''),
  referenceRange: referenceRangeSchema.nullable().optional(),
  status: statusSchema.nullable().optional(),
  statusOverride: statusSchema.nullable().optional(),
  category: z.string().max(50).nullable().optional(),
  confidence: z.number().min(0).max(1).nullable().optional(),
  verified: z.boolean().optional(),
  originalValue: finiteNumber.nullable().optional(),
}).transform((r): BiomarkerReading => ({
  name: r.name,
  value: r.value,
  unit: r.unit,
  referenceRange: r.referenceRange ?? null,
  statusOverride: r.statusOverride ?? null,
  category: r.category ?? null,
  confidence: r.confidence ?? null,
  verified: r.verified ?? false,
  originalValue: r.originalValue ?? null,
})))

export const biomarkerEditSchema = z.object({
  name: z.string().trim().min(1).max(200),
  value: finiteNumber,
  unit: z.string().max(50).optional(),
  status: statusSchema.optional(),
})

// Daily record schemas
const metricValueSchema = finiteNumber.nullable().optional()

export const dailyMetricSchema = z.object({
  date: dateKeySchema,
  steps: metricValueSchema,
  sleepHours: metricValueSchema,
  hrvAvgMs: metricValueSchema,
  restingHeartRate: metricValueSchema,
  activeEnergyKcal: metricValueSchema,
  weightKg: metricValueSchema,
})

export const quickLogSchema = z.object({
  date: dateKeySchema,
  mood: z.number().int().min(1).max(5),
  energy: z.number().int().min(1).max(5),
  symptoms: z.array(z.string().trim().min(1).max(100)).default([]).transform(s => Array.from(new Set(s))),
  notes: z.string().max(1000).nullable().optional(),
})

// Retention schemas
export const previousOfferSchema = z.object({
  type: z.string().min(1),
  createdAt: z.coerce.date(),
})

// Helper to validate and return typed result
export function validate<S extends z.ZodTypeAny>(schema: S, data: unknown):
  | { success: true; data: z.output<S> }
  | { success: false; error: string } {
  const result = schema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  const errors = result.error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')
  return { success: false, error: errors }
}

function decode<S extends z.ZodTypeAny>(schema: S, data: unknown, label: string): z.output<S> {
  const result = validate(schema, data)
  if (!result.success) {
    throw new Error(`Invalid ${label}: ${result.error}`)
  }
  return result.data
}

// Decoders: unknown in, typed records out, or throw

export function parseBiomarkerReadings(data: unknown): BiomarkerReading[] {
  return decode(z.array(biomarkerReadingSchema), data, 'biomarker reading')
}

export function parseBiomarkerEdits(data: unknown): BiomarkerEdit[] {
  return decode(z.array(biomarkerEditSchema), data, 'biomarker edit')
}

/**
 * Decode one wearable day. Values outside physiological bounds are dropped to null
 * rather than clamped, so they never reach a score.
 */
export function parseDailyMetric(data: unknown): DailyMetric {
  const raw = decode(dailyMetricSchema, data, 'daily metric')
  const metric: DailyMetric = {
    date: raw.date,
    steps: null,
    sleepHours: null,
    hrvAvgMs: null,
    restingHeartRate: null,
    activeEnergyKcal: null,
    weightKg: null,
  }

  for (const field of DAILY_METRIC_FIELDS) {
    const value = raw[field] ?? null
    if (value === null) continue
    if (validateMetricValue(field, value)) {
      metric[field] = value
    } else {
      const { min, max, unit } = METRIC_BOUNDS[field]
      console.warn(`[Metrics] Dropping ${field}=${value} on ${raw.date}: outside ${min}-${max} ${unit}`)
    }
  }
  return metric
}

export function parseQuickLog(data: unknown): QuickLog {
  const raw = decode(quickLogSchema, data, 'quick log')
  return { ...raw, notes: raw.notes ?? null }
}

export function parsePreviousOffers(data: unknown): PreviousOffer[] {
  return decode(z.array(previousOfferSchema), data, 'previous offer')
}

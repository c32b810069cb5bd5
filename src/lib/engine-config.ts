// Engine configuration
// Constructed once by the caller and passed explicitly; nothing here is module state

import { z } from 'zod'
import type { VitalityComponentKey } from '@/types'

export interface EngineConfig {
  vitalityWeights: Record<VitalityComponentKey, number>
  offerCooldownDays: number
  healthAgeFloor: number
  healthAgeCeilingOffset: number       // Health age never exceeds age + this
  wellnessPenaltyPerMarker: number
  vitalityTrendDays: number            // Prior days included before the end date
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  vitalityWeights: Object.freeze({
    sleep: 0.30,
    recovery: 0.25,
    activity: 0.20,
    clinical: 0.15,
    consistency: 0.10,
  }),
  offerCooldownDays: 90,
  healthAgeFloor: 18,
  healthAgeCeilingOffset: 10,
  wellnessPenaltyPerMarker: 10,
  vitalityTrendDays: 7,
})

const weightSchema = z.number().min(0).max(1)

const engineConfigSchema = z.object({
  vitalityWeights: z.object({
    sleep: weightSchema,
    recovery: weightSchema,
    activity: weightSchema,
    clinical: weightSchema,
    consistency: weightSchema,
  }).refine(
    (w) => Math.abs(w.sleep + w.recovery + w.activity + w.clinical + w.consistency - 1) <= 0.001,
    { message: 'Vitality weights must sum to 1' }
  ),
  offerCooldownDays: z.number().int().min(0).max(3650),
  healthAgeFloor: z.number().int().min(0).max(120),
  healthAgeCeilingOffset: z.number().min(0).max(50),
  wellnessPenaltyPerMarker: z.number().min(0).max(100),
  vitalityTrendDays: z.number().int().min(0).max(365),
})

const envSchema = z.object({
  OFFER_COOLDOWN_DAYS: z.coerce.number().int().optional(),
  HEALTH_AGE_FLOOR: z.coerce.number().int().optional(),
  VITALITY_TREND_DAYS: z.coerce.number().int().optional(),
})

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws when the merged config is out of range.
 */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const merged = {
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    vitalityWeights: { ...DEFAULT_ENGINE_CONFIG.vitalityWeights, ...overrides.vitalityWeights },
  }
  const parsed = engineConfigSchema.safeParse(merged)
  if (!parsed.success) {
    throw new Error(`Invalid engine config: ${formatIssues(parsed.error)}`)
  }
  return parsed.data
}

/**
 * Build a config from environment variables. Callers pass process.env (or a test map);
 * unset variables keep their defaults.
 */
export function loadEngineConfig(env: Record<string, string | undefined>): EngineConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new Error(`Invalid engine config: ${formatIssues(parsed.error)}`)
  }

  const overrides: Partial<EngineConfig> = {}
  if (parsed.data.OFFER_COOLDOWN_DAYS !== undefined) overrides.offerCooldownDays = parsed.data.OFFER_COOLDOWN_DAYS
  if (parsed.data.HEALTH_AGE_FLOOR !== undefined) overrides.healthAgeFloor = parsed.data.HEALTH_AGE_FLOOR
  if (parsed.data.VITALITY_TREND_DAYS !== undefined) overrides.vitalityTrendDays = parsed.data.VITALITY_TREND_DAYS

  return createEngineConfig(overrides)
}

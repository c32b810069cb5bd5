// Correlation Rule Engine
// Flat table of marker-status conjunctions; a rule fires when every predicate holds

import type {
  BiomarkerReading,
  BiomarkerStatus,
  CorrelationInsight,
  CorrelationSeverity,
} from '@/types'
import { classifyReading, normalizeMarkerName } from './biomarker-classifier'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface MarkerPredicate {
  aliases: string[]                    // Lowercase names the marker may appear under
  status: BiomarkerStatus
}

export interface CorrelationRule {
  condition: string
  severity: CorrelationSeverity
  markers: string[]                    // Display names reported on the insight
  predicates: MarkerPredicate[]
  insight: string
}

// ─── Rule Table ─────────────────────────────────────────────────────────────
// Evaluated in this order; output keeps it

export const CORRELATION_RULES: readonly CorrelationRule[] = [
  {
    condition: 'Iron Deficiency Anemia',
    severity: 'warning',
    markers: ['Ferritin', 'Hemoglobin'],
    predicates: [
      { aliases: ['ferritin'], status: 'low' },
      { aliases: ['hemoglobin', 'hgb', 'hb'], status: 'low' },
    ],
    insight: 'Both iron storage (ferritin) and oxygen-carrying capacity (hemoglobin) are low. This pattern strongly suggests iron deficiency anemia.',
  },
  {
    condition: 'Metabolic Syndrome',
    severity: 'critical',
    markers: ['Glucose', 'Triglycerides', 'HDL'],
    predicates: [
      { aliases: ['fasting glucose', 'glucose'], status: 'high' },
      { aliases: ['triglycerides'], status: 'high' },
      { aliases: ['hdl', 'hdl cholesterol', 'hdl-c'], status: 'low' },
    ],
    insight: 'High blood sugar combined with high triglycerides and low HDL is a classic pattern of insulin resistance and metabolic syndrome.',
  },
  {
    condition: 'Hypothyroidism',
    severity: 'warning',
    markers: ['TSH', 'Free T3'],
    predicates: [
      { aliases: ['tsh', 'thyroid stimulating hormone'], status: 'high' },
      { aliases: ['free t3', 'ft3'], status: 'low' },
    ],
    insight: 'High TSH with low Free T3 suggests the thyroid is underperforming or T4 to T3 conversion is poor.',
  },
  {
    condition: 'Elevated Cardiovascular Risk',
    severity: 'critical',
    markers: ['LDL Cholesterol', 'CRP'],
    predicates: [
      { aliases: ['ldl', 'ldl cholesterol', 'ldl-c'], status: 'high' },
      { aliases: ['crp', 'c-reactive protein', 'hs-crp'], status: 'high' },
    ],
    insight: 'Elevated LDL combined with high inflammation (CRP) significantly increases cardiovascular risk.',
  },
  {
    condition: 'B12 Deficiency / Methylation Issues',
    severity: 'warning',
    markers: ['Vitamin B12', 'Homocysteine'],
    predicates: [
      { aliases: ['vitamin b12', 'b12'], status: 'low' },
      { aliases: ['homocysteine'], status: 'high' },
    ],
    insight: 'Low B12 with elevated homocysteine indicates B12 deficiency affecting methylation pathways.',
  },
  {
    condition: 'Liver Stress',
    severity: 'warning',
    markers: ['ALT', 'AST'],
    predicates: [
      { aliases: ['alt', 'alanine aminotransferase'], status: 'high' },
      { aliases: ['ast', 'aspartate aminotransferase'], status: 'high' },
    ],
    insight: 'ALT and AST are both elevated, a pattern that points to liver cell stress worth rechecking.',
  },
  {
    condition: 'Impaired Glucose Regulation',
    severity: 'warning',
    markers: ['Glucose', 'HbA1c'],
    predicates: [
      { aliases: ['fasting glucose', 'glucose'], status: 'high' },
      { aliases: ['hba1c', 'hemoglobin a1c'], status: 'high' },
    ],
    insight: 'Fasting glucose and HbA1c are both high, so blood sugar has been elevated over weeks, not just on the test day.',
  },
]

// ─── Detection ──────────────────────────────────────────────────────────────

function predicateHolds(
  statuses: Map<string, BiomarkerStatus | null>,
  predicate: MarkerPredicate
): boolean {
  const alias = predicate.aliases.find(a => statuses.has(a))
  return alias !== undefined && statuses.get(alias) === predicate.status
}

/**
 * Detect known multi-marker patterns. Missing markers keep a rule silent.
 * Later readings with the same name replace earlier ones.
 */
export function detectCorrelations(
  readings: readonly BiomarkerReading[],
  rules: readonly CorrelationRule[] = CORRELATION_RULES
): CorrelationInsight[] {
  const statuses = new Map<string, BiomarkerStatus | null>()
  for (const reading of readings) {
    statuses.set(normalizeMarkerName(reading.name), classifyReading(reading))
  }

  return rules
    .filter(rule => rule.predicates.every(p => predicateHolds(statuses, p)))
    .map(rule => ({
      markers: [...rule.markers],
      insight: rule.insight,
      severity: rule.severity,
      condition: rule.condition,
    }))
}

/**
 * Keep externally supplied insights and append detected ones whose condition is new.
 */
export function mergeCorrelations(
  external: readonly CorrelationInsight[],
  detected: readonly CorrelationInsight[]
): CorrelationInsight[] {
  const known = new Set(
    external.map(c => c.condition).filter((c): c is string => c !== null)
  )
  const merged = [...external]
  for (const insight of detected) {
    if (insight.condition !== null && !known.has(insight.condition)) {
      merged.push(insight)
      known.add(insight.condition)
    }
  }
  return merged
}

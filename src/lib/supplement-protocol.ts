// Supplement protocol for out-of-range biomarkers

import type { BiomarkerReading } from '@/types'
import { classifyReading, normalizeMarkerName } from './biomarker-classifier'

export type SupplementPriority = 'essential' | 'recommended' | 'optional'

export interface SupplementSuggestion {
  name: string
  dosage: string
  reason: string
  priority: SupplementPriority
}

export interface SupplementProtocolEntry extends SupplementSuggestion {
  biomarkerLink: string
}

const IRON_BISGLYCINATE = 'Iron Bisglycinate'
const IRON_DOSAGE = '25-50mg every other day with vitamin C'

// Keyed by normalized marker name, then status
const SUPPLEMENT_TABLE: Record<string, { low?: SupplementSuggestion; high?: SupplementSuggestion }> = {
  'vitamin d': {
    low: { name: 'Vitamin D3 + K2', dosage: '5000 IU D3 + 100mcg K2 daily with fatty meal', reason: 'D3 is better absorbed than D2. K2 directs calcium to bone rather than arteries.', priority: 'essential' },
  },
  'iron': {
    low: { name: IRON_BISGLYCINATE, dosage: IRON_DOSAGE, reason: 'Bisglycinate is gentle on the stomach. Take with 500mg vitamin C for absorption.', priority: 'essential' },
  },
  'vitamin b12': {
    low: { name: 'Methylcobalamin B12', dosage: '1000-2000mcg sublingual daily', reason: 'Methylcobalamin is the active form. Sublingual delivery bypasses digestion issues.', priority: 'essential' },
  },
  'magnesium': {
    low: { name: 'Magnesium Glycinate', dosage: '300-400mg before bed', reason: 'Glycinate supports sleep and is well absorbed. Avoid the oxide form.', priority: 'recommended' },
  },
  'hdl cholesterol': {
    low: { name: 'Omega-3 Fish Oil', dosage: '2-3g EPA+DHA daily with food', reason: 'High-dose omega-3s raise HDL and lower triglycerides.', priority: 'recommended' },
  },
  'homocysteine': {
    high: { name: 'Methylated B-Complex', dosage: '1 capsule daily with food', reason: 'Methylfolate and methylcobalamin support homocysteine metabolism.', priority: 'essential' },
  },
  'folate': {
    low: { name: 'Methylfolate (5-MTHF)', dosage: '400-800mcg daily', reason: 'Active folate that needs no conversion. Supports DNA synthesis and methylation.', priority: 'essential' },
  },
  'zinc': {
    low: { name: 'Zinc Picolinate', dosage: '15-30mg daily with food', reason: 'Picolinate is well absorbed. Supports immune function and hormone production.', priority: 'recommended' },
  },
  'calcium': {
    low: { name: 'Calcium Citrate + D3', dosage: '500mg calcium + 1000 IU D3, 2x daily', reason: 'Citrate is absorbed without food. D3 is needed for calcium absorption.', priority: 'recommended' },
  },
  'ferritin': {
    low: { name: IRON_BISGLYCINATE, dosage: IRON_DOSAGE, reason: 'Low ferritin indicates depleted iron stores. Bisglycinate is gentle on the stomach.', priority: 'essential' },
  },
}

const PRIORITY_ORDER: Record<SupplementPriority, number> = {
  essential: 0,
  recommended: 1,
  optional: 2,
}

/**
 * One entry per out-of-range marker that has a protocol, essential first.
 * Array.prototype.sort is stable, so reading order holds within a tier.
 */
export function buildSupplementProtocol(readings: readonly BiomarkerReading[]): SupplementProtocolEntry[] {
  const entries: SupplementProtocolEntry[] = []

  for (const reading of readings) {
    const status = classifyReading(reading)
    if (status !== 'low' && status !== 'high') continue

    const suggestion = SUPPLEMENT_TABLE[normalizeMarkerName(reading.name)]?.[status]
    if (suggestion) {
      entries.push({ ...suggestion, biomarkerLink: reading.name })
    }
  }

  return entries.sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority])
}

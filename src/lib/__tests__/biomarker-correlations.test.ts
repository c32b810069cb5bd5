import { describe, it, expect } from 'vitest'
import type { CorrelationInsight } from '@/types'
import { CORRELATION_RULES, detectCorrelations, mergeCorrelations } from '../biomarker-correlations'
import { ANEMIA_PANEL, METABOLIC_PANEL, reading } from './fixtures/metrics-fixtures'

describe('CORRELATION_RULES', () => {
  it('has unique conditions', () => {
    const conditions = CORRELATION_RULES.map(r => r.condition)
    expect(new Set(conditions).size).toBe(conditions.length)
  })
})

// ─── detectCorrelations ──────────────────────────────────────────────

describe('detectCorrelations', () => {
  it('reports iron deficiency anemia for low ferritin and low hemoglobin', () => {
    const result = detectCorrelations(ANEMIA_PANEL)
    expect(result).toHaveLength(1)
    expect(result[0].condition).toBe('Iron Deficiency Anemia')
    expect(result[0].severity).toBe('warning')
    expect(result[0].markers).toEqual(['Ferritin', 'Hemoglobin'])
  })

  it('reports metabolic syndrome as critical', () => {
    const result = detectCorrelations(METABOLIC_PANEL)
    expect(result.map(r => r.condition)).toEqual(['Metabolic Syndrome'])
    expect(result[0].severity).toBe('critical')
  })

  it('stays silent when a required marker is missing', () => {
    expect(detectCorrelations([reading('Ferritin', 15, 30, 400)])).toEqual([])
  })

  it('stays silent when a marker has the wrong status', () => {
    const panel = [reading('Ferritin', 15, 30, 400), reading('Hemoglobin', 20, 13.5, 17.5)]
    expect(detectCorrelations(panel)).toEqual([])
  })

  it('stays silent for unclassified markers', () => {
    const panel = [reading('Ferritin', 15, 30, 400), { name: 'Hemoglobin', value: 10, unit: 'g/dL' }]
    expect(detectCorrelations(panel)).toEqual([])
  })

  it('matches marker aliases case-insensitively', () => {
    const panel = [
      reading('LDL', 190, 0, 100),
      reading('hs-CRP', 5, 0, 3),
    ]
    expect(detectCorrelations(panel).map(r => r.condition)).toEqual(['Elevated Cardiovascular Risk'])
  })

  it('evaluates rules independently and keeps table order', () => {
    const panel = [
      ...METABOLIC_PANEL,
      ...ANEMIA_PANEL,
      reading('HbA1c', 6.4, 4, 5.6),
    ]
    expect(detectCorrelations(panel).map(r => r.condition)).toEqual([
      'Iron Deficiency Anemia',
      'Metabolic Syndrome',
      'Impaired Glucose Regulation',
    ])
  })

  it('detects thyroid, methylation and liver patterns', () => {
    const panel = [
      reading('TSH', 6, 0.4, 4),
      reading('Free T3', 2, 2.3, 4.2),
      reading('Vitamin B12', 150, 200, 900),
      reading('Homocysteine', 18, 5, 15),
      reading('ALT', 80, 7, 56),
      reading('AST', 70, 10, 40),
    ]
    expect(detectCorrelations(panel).map(r => r.condition)).toEqual([
      'Hypothyroidism',
      'B12 Deficiency / Methylation Issues',
      'Liver Stress',
    ])
  })
})

// ─── mergeCorrelations ───────────────────────────────────────────────

describe('mergeCorrelations', () => {
  const external: CorrelationInsight = {
    markers: ['Ferritin', 'Hemoglobin'],
    insight: 'Supplied by extraction',
    severity: 'info',
    condition: 'Iron Deficiency Anemia',
  }

  it('keeps external insights and drops detected duplicates by condition', () => {
    const merged = mergeCorrelations([external], detectCorrelations(ANEMIA_PANEL))
    expect(merged).toEqual([external])
  })

  it('appends detected insights with a new condition', () => {
    const merged = mergeCorrelations([external], detectCorrelations(METABOLIC_PANEL))
    expect(merged.map(c => c.condition)).toEqual(['Iron Deficiency Anemia', 'Metabolic Syndrome'])
  })

  it('never deduplicates insights without a condition', () => {
    const unnamed: CorrelationInsight = { markers: [], insight: 'note', severity: 'info', condition: null }
    expect(mergeCorrelations([unnamed, unnamed], [])).toHaveLength(2)
  })
})

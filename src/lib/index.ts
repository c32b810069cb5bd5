// Public surface of the scoring engine

export * from './engine-config'
export * from './health-constants'
export * from './log-streak'
export * from './daily-records'
export * from './biomarker-classifier'
export * from './biomarker-correlations'
export * from './vitality-scorers'
export * from './vitality-score'
export * from './nutrient-mapping'
export * from './supplement-protocol'
export * from './offer-engine'
export * from './lab-record'
export * from './validations'
export type * from '../types'

// Shared record shapes handed to the engine by its collaborators

// Biomarker status as derived from a reference range
export type BiomarkerStatus = 'low' | 'optimal' | 'high'

export interface ReferenceRange {
  min: number
  max: number
}

// One clinical measurement as supplied by lab extraction
export interface BiomarkerReading {
  name: string
  value: number
  unit: string
  referenceRange?: ReferenceRange | null
  status?: BiomarkerStatus | null      // Derived; always recomputed, never trusted from input
  statusOverride?: BiomarkerStatus | null  // Set only by a human verification edit
  category?: string | null             // "vitamins", "lipids", ...
  confidence?: number | null           // 0-1, extraction trust (display only)
  verified?: boolean
  originalValue?: number | null        // Extracted value before a verification edit
}

// A reading after classification. status is null when it cannot be classified.
export interface ClassifiedBiomarker extends BiomarkerReading {
  status: BiomarkerStatus | null
  confidence: number
}

// One wearable-derived day. Each field is independently nullable.
export interface DailyMetric {
  date: string                         // YYYY-MM-DD
  steps: number | null
  sleepHours: number | null
  hrvAvgMs: number | null
  restingHeartRate: number | null
  activeEnergyKcal: number | null
  weightKg: number | null
}

export type DailyMetricField = Exclude<keyof DailyMetric, 'date'>

// One subjective entry per day
export interface QuickLog {
  date: string                         // YYYY-MM-DD
  mood: number                         // 1-5
  energy: number                       // 1-5
  symptoms: string[]
  notes: string | null
}

export type CorrelationSeverity = 'info' | 'warning' | 'critical'

export interface CorrelationInsight {
  markers: string[]
  insight: string
  severity: CorrelationSeverity
  condition: string | null
}

export type VitalityComponentKey = 'sleep' | 'recovery' | 'activity' | 'clinical' | 'consistency'

export interface VitalityComponent {
  score: number
  weight: number                       // Effective weight, 2 decimals
  value: string                        // "7.5h", "HRV 45ms / RHR 58"
  available: boolean
}

export interface VitalityScore {
  score: number                        // 0-100
  components: Record<VitalityComponentKey, VitalityComponent>
  insufficientData: boolean            // true when no component had data
}

export interface VitalityTrendPoint {
  date: string
  score: number
}

export type RetentionOfferType = 'discount' | 'pause' | 'downgrade' | 'extension'

export interface RetentionOffer {
  type: RetentionOfferType
  title: string
  description: string
  details: {
    discountPercent?: number
    durationMonths?: number
    pauseMonths?: number
    extensionDays?: number
  }
}

export type ChurnReasonCategory =
  | 'price'
  | 'usage'
  | 'competition'
  | 'features'
  | 'technical'
  | 'temporary'
  | 'other'

export interface PreviousOffer {
  type: string
  createdAt: Date
}

export type DietaryPreference = 'omnivore' | 'vegetarian' | 'vegan' | 'keto' | 'paleo' | 'pescatarian'


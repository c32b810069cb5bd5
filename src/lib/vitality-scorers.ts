// Vitality component scorers
// Each maps one raw metric to 0-100 through the shared lerp primitive

import { clamp } from './health-constants'

/**
 * Linear interpolation: maps `value` from [domainMin, domainMax] to [scoreMin, scoreMax].
 * The domain fraction is clamped to [0, 1] before scaling, so the result never leaves
 * the score bounds. Rounded to an integer.
 */
export function lerp(
  value: number,
  domainMin: number,
  domainMax: number,
  scoreMin: number,
  scoreMax: number
): number {
  if (domainMax === domainMin) return scoreMax
  const t = clamp((value - domainMin) / (domainMax - domainMin), 0, 1)
  return Math.round(scoreMin + t * (scoreMax - scoreMin))
}

/** 7-9h = 100, 5h = 20, 10h+ = 60 */
export function scoreSleep(hours: number): number {
  if (hours >= 7 && hours <= 9) return 100
  if (hours < 7) return lerp(hours, 5, 7, 20, 100)
  return lerp(hours, 9, 10, 100, 60)
}

/** >=60ms = 100, <=20ms = 20 */
export function scoreHrv(ms: number): number {
  return lerp(ms, 20, 60, 20, 100)
}

/** <=60bpm = 100, >=80bpm = 30. Lower is better. */
export function scoreRestingHeartRate(bpm: number): number {
  return lerp(bpm, 60, 80, 100, 30)
}

export function scoreRecovery(hrvMs: number | null, restingHeartRate: number | null): number | null {
  if (hrvMs !== null && restingHeartRate !== null) {
    return Math.round((scoreHrv(hrvMs) + scoreRestingHeartRate(restingHeartRate)) / 2)
  }
  if (hrvMs !== null) return scoreHrv(hrvMs)
  if (restingHeartRate !== null) return scoreRestingHeartRate(restingHeartRate)
  return null
}

/** >=8000 steps = 100, <=2000 = 20 */
export function scoreActivity(steps: number): number {
  return lerp(steps, 2000, 8000, 20, 100)
}

// Reuses the latest lab wellness score; shared across days until new labs land
export function scoreClinical(wellnessScore: number | null): number | null {
  if (wellnessScore === null || !isFinite(wellnessScore) || wellnessScore <= 0) return null
  return Math.round(clamp(wellnessScore, 0, 100))
}

/** 7+ day streak = 100, 0 = 0 */
export function scoreConsistency(streak: number): number {
  return lerp(streak, 0, 7, 0, 100)
}

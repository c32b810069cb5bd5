// Retention offer selection
// Cancellation reason → offer, with a per-type cooldown so the same kind of offer is not repeated

import { differenceInMilliseconds } from 'date-fns'
import type { ChurnReasonCategory, PreviousOffer, RetentionOffer } from '@/types'
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './engine-config'

const DAY_MS = 24 * 60 * 60 * 1000

// Catalog order is also the fallback scan order
export const OFFER_CATALOG: ReadonlyArray<{ reason: ChurnReasonCategory; offer: RetentionOffer }> = [
  {
    reason: 'price',
    offer: {
      type: 'discount',
      title: '50% Off for 3 Months',
      description: 'Stay on Pro at half price for the next 3 months.',
      details: { discountPercent: 50, durationMonths: 3 },
    },
  },
  {
    reason: 'usage',
    offer: {
      type: 'extension',
      title: '30 Days Free',
      description: 'Here are 30 extra days to explore every Pro feature.',
      details: { extensionDays: 30 },
    },
  },
  {
    reason: 'temporary',
    offer: {
      type: 'pause',
      title: 'Pause Your Subscription',
      description: 'Pause for up to 3 months. Your data stays where it is.',
      details: { pauseMonths: 3 },
    },
  },
  {
    reason: 'features',
    offer: {
      type: 'extension',
      title: '30 Days Free + Feature Request',
      description: 'Tell us what you need and get 30 free days while we work on it.',
      details: { extensionDays: 30 },
    },
  },
  {
    reason: 'competition',
    offer: {
      type: 'discount',
      title: '30% Off for 6 Months',
      description: 'Stay with us at 30% off for the next 6 months.',
      details: { discountPercent: 30, durationMonths: 6 },
    },
  },
  {
    reason: 'technical',
    offer: {
      type: 'extension',
      title: '30 Days Free While We Fix It',
      description: 'Sorry for the trouble. Here are 30 free days while the issue is fixed.',
      details: { extensionDays: 30 },
    },
  },
  {
    reason: 'other',
    offer: {
      type: 'discount',
      title: '25% Off for 3 Months',
      description: 'How about 25% off for the next 3 months?',
      details: { discountPercent: 25, durationMonths: 3 },
    },
  },
]

function catalogOffer(reason: string | null): RetentionOffer {
  const match = OFFER_CATALOG.find(entry => entry.reason === reason)
    ?? OFFER_CATALOG.find(entry => entry.reason === 'other')
  if (!match) {
    throw new Error('Offer catalog is missing the "other" entry')
  }
  return match.offer
}

function inCooldown(
  type: string,
  previousOffers: readonly PreviousOffer[],
  now: Date,
  cooldownMs: number
): boolean {
  return previousOffers.some(prev =>
    prev.type === type && differenceInMilliseconds(now, prev.createdAt) < cooldownMs
  )
}

/**
 * Default offer for the reason (unknown or null reasons use "other"). When an offer of
 * the same type was shown within the cooldown, the first catalog offer of a different
 * type that is not itself in cooldown is returned instead; null when none qualifies.
 */
export function selectOffer(
  reasonCategory: ChurnReasonCategory | string | null,
  previousOffers: readonly PreviousOffer[],
  now: Date,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): RetentionOffer | null {
  const cooldownMs = config.offerCooldownDays * DAY_MS
  const offer = catalogOffer(reasonCategory)

  if (!inCooldown(offer.type, previousOffers, now, cooldownMs)) {
    return offer
  }

  const fallback = OFFER_CATALOG.find(entry =>
    entry.offer.type !== offer.type && !inCooldown(entry.offer.type, previousOffers, now, cooldownMs)
  )
  return fallback?.offer ?? null
}

/** Copy of the catalog (admin display) */
export function getOfferConfigs(): { reason: ChurnReasonCategory; offer: RetentionOffer }[] {
  return OFFER_CATALOG.map(({ reason, offer }) => ({
    reason,
    offer: { ...offer, details: { ...offer.details } },
  }))
}

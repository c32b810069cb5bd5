// Nutrient Mapping
// Out-of-range biomarkers → nutrients to prioritise, foods that supply them, and a rotating meal plan

import { z } from 'zod'
import type { BiomarkerReading, DietaryPreference } from '@/types'
import nutrientMapData from './data/nutrient-map.json'
import { classifyReading, normalizeMarkerName } from './biomarker-classifier'

// ─── Schema ─────────────────────────────────────────────────────────────────

const foodCategorySchema = z.enum(['protein', 'vegetable', 'fruit', 'grain', 'fat', 'dairy', 'legume'])

const foodRecommendationSchema = z.object({
  name: z.string().min(1),
  category: foodCategorySchema,
  nutrients: z.array(z.string()),
  why: z.string(),
  serving: z.string(),
  tags: z.array(z.string()),
})

const directionSchema = z.object({
  nutrients: z.array(z.string()).min(1),
  foods: z.array(foodRecommendationSchema),
})

const nutrientEntrySchema = z.object({
  key: z.string().min(1),
  aliases: z.array(z.string()),
  low: directionSchema.optional(),
  high: directionSchema.optional(),
})

export type FoodCategory = z.infer<typeof foodCategorySchema>
export type FoodRecommendation = z.infer<typeof foodRecommendationSchema>
export type NutrientEntry = z.infer<typeof nutrientEntrySchema>

export interface NutrientNeed {
  nutrient: string
  reason: string                       // "Vitamin D is low (18 ng/mL)"
  biomarker: string
  status: 'low' | 'high'
}

export interface NutrientAnalysis {
  needs: NutrientNeed[]
  foods: FoodRecommendation[]
}

export type MealType = 'breakfast' | 'lunch' | 'dinner' | 'snack'

export interface MealPlanDay {
  day: number
  dayName: string
  meals: { type: MealType; foods: FoodRecommendation[] }[]
}

// Validated once at module load; a malformed table is a build defect, not user input
export const NUTRIENT_MAP: readonly NutrientEntry[] = z.array(nutrientEntrySchema).parse(nutrientMapData)

// ─── Lookup ─────────────────────────────────────────────────────────────────

function tokenize(name: string): string[] {
  return name.split(/[^a-z0-9]+/).filter(Boolean)
}

function containsTokens(haystack: readonly string[], needle: readonly string[]): boolean {
  return needle.length > 0 && needle.every(token => haystack.includes(token))
}

/**
 * Exact key/alias match first, then the first key whose words all appear in the name
 * (or the other way round). Matching is on whole words, so "AST" never hits "fasting".
 * Both passes follow table order.
 */
export function findNutrientEntry(name: string): NutrientEntry | null {
  const normalized = normalizeMarkerName(name)
  if (!normalized) return null

  const exact = NUTRIENT_MAP.find(entry =>
    entry.key === normalized || entry.aliases.includes(normalized)
  )
  if (exact) return exact

  const words = tokenize(normalized)
  return NUTRIENT_MAP.find(entry => {
    const keyWords = tokenize(entry.key)
    return containsTokens(words, keyWords) || containsTokens(keyWords, words)
  }) ?? null
}

// ─── Analysis ───────────────────────────────────────────────────────────────

export function analyzeNutrientNeeds(readings: readonly BiomarkerReading[]): NutrientAnalysis {
  const needs: NutrientNeed[] = []
  const foods = new Map<string, FoodRecommendation>()

  for (const reading of readings) {
    const status = classifyReading(reading)
    if (status !== 'low' && status !== 'high') continue

    const direction = findNutrientEntry(reading.name)?.[status]
    if (!direction) continue

    for (const nutrient of direction.nutrients) {
      needs.push({
        nutrient,
        reason: `${reading.name} is ${status} (${reading.value} ${reading.unit})`,
        biomarker: reading.name,
        status,
      })
    }
    for (const food of direction.foods) {
      if (!foods.has(food.name)) foods.set(food.name, food)
    }
  }

  return { needs, foods: Array.from(foods.values()) }
}

// ─── Diet Filter ────────────────────────────────────────────────────────────

const SEAFOOD_KEYWORDS = ['salmon', 'fish', 'sardine', 'clam', 'oyster', 'mackerel']

function isSeafood(food: FoodRecommendation): boolean {
  const name = food.name.toLowerCase()
  return food.category === 'protein' && SEAFOOD_KEYWORDS.some(k => name.includes(k))
}

function fitsDiet(food: FoodRecommendation, diet: DietaryPreference): boolean {
  switch (diet) {
    case 'omnivore':
      return true
    case 'vegetarian':
    case 'vegan':
    case 'keto':
      return food.tags.includes(diet)
    case 'paleo':
      return food.tags.includes('gluten-free')
    case 'pescatarian':
      return food.tags.includes('vegetarian') || isSeafood(food)
  }
}

/**
 * Foods that fit the diet and whose name contains none of the allergies (case-insensitive).
 */
export function filterByDiet(
  foods: readonly FoodRecommendation[],
  diet: DietaryPreference,
  allergies: readonly string[] = []
): FoodRecommendation[] {
  const blocked = allergies.map(a => a.trim().toLowerCase()).filter(a => a.length > 0)
  return foods.filter(food => {
    if (!fitsDiet(food, diet)) return false
    const name = food.name.toLowerCase()
    return !blocked.some(allergy => name.includes(allergy))
  })
}

// ─── Meal Plan ──────────────────────────────────────────────────────────────

const DAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday']

function pick<T>(items: readonly T[], index: number): T | null {
  return items.length > 0 ? items[index % items.length] : null
}

function present<T>(...items: (T | null)[]): T[] {
  return items.filter((item): item is T => item !== null)
}

/**
 * Rotate foods through breakfast, lunch, dinner and snack by category so consecutive
 * days differ whenever a category has more than one food.
 */
export function generateMealPlan(foods: readonly FoodRecommendation[], days = 7): MealPlanDay[] {
  const byCategory = (category: FoodCategory) => foods.filter(f => f.category === category)
  const proteins = byCategory('protein')
  const vegetables = byCategory('vegetable')
  const fats = byCategory('fat')
  const grains = byCategory('grain')
  const fruits = byCategory('fruit')
  const legumes = byCategory('legume')

  const plan: MealPlanDay[] = []
  for (let i = 0; i < Math.max(0, Math.floor(days)); i++) {
    let breakfast = present(pick(grains, i), pick(fruits, i), pick(proteins, i + 1))
    if (breakfast.length === 0) breakfast = present(pick(fats, i))

    plan.push({
      day: i + 1,
      dayName: DAY_NAMES[i % DAY_NAMES.length],
      meals: [
        { type: 'breakfast', foods: breakfast },
        { type: 'lunch', foods: present(pick(proteins, i), pick(vegetables, i), pick(legumes, i)) },
        { type: 'dinner', foods: present(pick(proteins, i + 2), pick(vegetables, i + 1), pick(fats, i)) },
        { type: 'snack', foods: present(pick(fats, i + 1), pick(fruits, i + 1)) },
      ],
    })
  }
  return plan
}

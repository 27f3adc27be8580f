/**
 * Display choice for one respondent's label:value answers. Numbers and
 * unique entries (names, emails, dates) stay a label:value table; short
 * repeated categories become a checkmark grid with one column per selection.
 */

import { parseCoordinate } from './valueFormat'

const SHORT_VALUE_MAX_LENGTH = 30
const MAX_CATEGORICAL_UNIQUE_RATIO = 0.5
const CHECKMARK_SELECTIONS: [number, number] = [2, 10]
const CHECKMARK_UNIQUE_RATIO_MAX = 0.7

const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i
const SHORT_DATE = /^\d{1,2}[/-]\d{1,2}[/-]\d{2,4}$/

export interface CheckmarkRow {
  label: string
  header: string
  /** One flag per selection column */
  selected: boolean[]
}

export interface CheckmarkGrid {
  selections: string[]
  rows: CheckmarkRow[]
}

/** Integer, decimal or formatted number ("1,200", "$5", "40%") */
export function isNumericValue(value: string): boolean {
  const cleaned = value.replace(/[,$%]/g, '').trim()
  return NUMBER.test(cleaned)
}

export function valuesAreNumericData(values: string[]): boolean {
  const nonEmpty = values.map((v) => v.trim()).filter(Boolean)
  if (nonEmpty.length === 0) return false
  const ratio = nonEmpty.filter(isNumericValue).length / nonEmpty.length
  if (ratio >= 0.7) return true
  return new Set(nonEmpty).size > 5 && ratio >= 0.5
}

function looksLikeDataEntry(value: string): boolean {
  if (value.includes('@') && value.includes('.')) return true
  if (SHORT_DATE.test(value)) return true
  return value.split(/\s+/).length >= 2 && value.length > 10
}

export function valuesAreUniqueData(values: string[]): boolean {
  const nonEmpty = values.map((v) => v.trim()).filter(Boolean)
  if (nonEmpty.length === 0) return false
  const unique = new Set(nonEmpty)
  if (unique.size / nonEmpty.length > MAX_CATEGORICAL_UNIQUE_RATIO) return true
  if (unique.size > 5 && new Set([...unique].map((v) => v.length)).size > 3) return true
  const entries = nonEmpty.filter(looksLikeDataEntry).length
  return entries > 0 && entries >= nonEmpty.length * 0.3
}

const isCategory = (part: string) => part.length <= SHORT_VALUE_MAX_LENGTH && !isNumericValue(part)

/** Short non-numeric categories in a value, or null when it is not a selection */
function selectionsOf(value: string): string[] | null {
  const v = value.trim()
  if (v.includes(',') && !parseCoordinate(v)) {
    const parts = v.split(',').map((p) => p.trim()).filter(Boolean)
    return parts.every(isCategory) ? parts : null
  }
  return isCategory(v) ? [v] : null
}

/** A checkmark grid when every answer is a short category drawn from a small repeated set; otherwise null. */
export function checkmarkGrid(items: { label: string; header: string; value: string }[]): CheckmarkGrid | null {
  if (items.length === 0) return null
  const values = items.map((item) => item.value)
  if (valuesAreNumericData(values) || valuesAreUniqueData(values)) return null

  const perItem: string[][] = []
  for (const item of items) {
    const selections = selectionsOf(item.value)
    if (!selections) return null
    perItem.push(selections)
  }
  const selections = [...new Set(perItem.flat())].sort()
  const [min, max] = CHECKMARK_SELECTIONS
  if (selections.length < min || selections.length > max) return null
  if (selections.length / items.length > CHECKMARK_UNIQUE_RATIO_MAX) return null

  return {
    selections,
    rows: items.map((item, i) => ({
      label: item.label,
      header: item.header,
      selected: selections.map((s) => perItem[i].includes(s)),
    })),
  }
}

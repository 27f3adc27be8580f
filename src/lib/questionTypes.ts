/**
 * Archetype classification. An ordered table of rules; the first rule whose
 * test passes decides. Declared metadata always comes first, so a definition
 * file overrides whatever the column structure suggests.
 */

import { ARCHETYPES, type Archetype, type ColumnKey, type QuestionMetadata } from '../types'
import { isHierarchical, isMultiValue } from './valueFormat'

export interface ClassifierInput {
  keys: ColumnKey[]
  metadata?: QuestionMetadata
  /** Non-blank values of the group, all respondents */
  values: string[]
}

export interface ClassifierRule {
  id: string
  archetype: Archetype
  test: (input: ClassifierInput) => boolean
}

export interface Classification {
  archetype: Archetype
  rule: string
}

function hasMatrixShape(keys: ColumnKey[]): boolean {
  const twoLevel = keys.filter((k) => k.indices.length === 2 && !k.suffix)
  const rows = new Set(twoLevel.map((k) => k.indices[0]))
  const cols = new Set(twoLevel.map((k) => k.indices[1]))
  return rows.size >= 2 && cols.size >= 2
}

const declaredRules: ClassifierRule[] = ARCHETYPES.map((archetype): ClassifierRule => ({
  id: `declared-${archetype}`,
  archetype,
  test: ({ metadata }) => metadata?.archetype === archetype,
}))

export const CLASSIFIER_RULES: readonly ClassifierRule[] = [
  ...declaredRules,
  { id: 'matrix-indices', archetype: 'matrix', test: ({ keys }) => keys.length > 1 && hasMatrixShape(keys) },
  { id: 'multi-column', archetype: 'form', test: ({ keys }) => keys.length > 1 },
  { id: 'delimited-values', archetype: 'multiSelect', test: ({ values }) => values.some((v) => isMultiValue(v)) },
  { id: 'hierarchy-values', archetype: 'drillDown', test: ({ values }) => values.some(isHierarchical) },
  { id: 'fallback', archetype: 'single', test: () => true },
]

export function classifyGroup(input: ClassifierInput, rules: readonly ClassifierRule[] = CLASSIFIER_RULES): Classification {
  for (const rule of rules) {
    if (rule.test(input)) return { archetype: rule.archetype, rule: rule.id }
  }
  return { archetype: 'single', rule: 'fallback' }
}

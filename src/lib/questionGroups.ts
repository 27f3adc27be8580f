/**
 * Group export columns into questions by base id (Q5_1, Q5_2 → Q5), resolve
 * row/column labels, and classify each group.
 * Groups keep the order in which their first column appears in the export.
 */

import type { ColumnKey, GroupColumn, MetadataMap, QuestionGroup, QuestionMetadata, ResponseTable } from '../types'
import { parseColumnKey } from './columnKeys'
import { getAnswerLabel, getChoiceLabel } from './definitionFile'
import { classifyGroup } from './questionTypes'
import { extractMatrixLabels } from './questionText'

const groupKey = (key: ColumnKey) => `${key.role}:${key.baseId}`

/** Every header lands in exactly one partition; partitions in encounter order. */
export function partitionColumns(headers: string[]): ColumnKey[][] {
  const byBase = new Map<string, ColumnKey[]>()
  for (const header of headers) {
    const key = parseColumnKey(header)
    const k = groupKey(key)
    const existing = byBase.get(k)
    if (existing) existing.push(key)
    else byBase.set(k, [key])
  }
  return [...byBase.values()]
}

const withSuffix = (label: string, suffix?: string) => (suffix ? (label ? `${label} (${suffix})` : suffix) : label)

/**
 * Label lookup order: definition labels, header-text labels, then "Row N" /
 * "Column N" from the sub-index.
 */
export function resolveColumnLabels(key: ColumnKey, meta?: QuestionMetadata, headerText?: string): GroupColumn {
  if (key.role === 'timing') return { key, rowLabel: key.suffix ?? key.header, columnLabel: '' }
  if (key.role === 'system') return { key, rowLabel: key.header, columnLabel: '' }

  const fromHeader = extractMatrixLabels(headerText)
  const [rowIndex, colIndex] = key.indices

  if (rowIndex !== undefined && colIndex !== undefined) {
    return {
      key,
      rowLabel: withSuffix(getChoiceLabel(meta, rowIndex) ?? fromHeader.row ?? `Row ${rowIndex}`, key.suffix),
      columnLabel: getAnswerLabel(meta, colIndex) ?? fromHeader.column ?? `Column ${colIndex}`,
    }
  }
  if (rowIndex !== undefined) {
    const label = getChoiceLabel(meta, rowIndex) ?? fromHeader.column ?? fromHeader.row ?? `Row ${rowIndex}`
    return { key, rowLabel: withSuffix(label, key.suffix), columnLabel: '' }
  }
  const label = fromHeader.column ?? fromHeader.row ?? (key.suffix ? '' : key.header)
  return { key, rowLabel: withSuffix(label, key.suffix), columnLabel: '' }
}

/** Definition text, else the longest question text in the header row, else the base id */
export function resolveQuestionText(baseId: string, keys: ColumnKey[], meta?: QuestionMetadata, headerText?: Record<string, string>): string {
  if (meta?.text) return meta.text
  let best = ''
  for (const key of keys) {
    const base = extractMatrixLabels(headerText?.[key.header]).base
    if (base.length > best.length) best = base
  }
  return best || baseId
}

export function buildQuestionGroups(table: ResponseTable, metadata: MetadataMap = new Map()): QuestionGroup[] {
  return partitionColumns(table.headers).map((keys): QuestionGroup => {
    const { baseId, role } = keys[0]
    const meta = role === 'system' ? undefined : metadata.get(baseId)
    const values: string[] = []
    for (const row of table.rows) {
      for (const key of keys) {
        const v = row.values[key.header]
        if (v) values.push(v)
      }
    }
    const { archetype, rule } = classifyGroup({ keys, metadata: meta, values })
    return {
      baseId,
      role,
      text: resolveQuestionText(baseId, keys, meta, table.headerText),
      columns: keys.map((key) => resolveColumnLabels(key, meta, table.headerText?.[key.header])),
      archetype,
      rule,
      metadataSource: meta ? 'definition' : 'inferred',
    }
  })
}

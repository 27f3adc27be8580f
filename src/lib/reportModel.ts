/**
 * Report model: one block per (question group, respondent) with formatted
 * answers. Groups nobody answered are dropped. Everything the renderer needs
 * is computed here so components stay presentational.
 */

import type { Archetype, FormattedValue, GroupColumn, QuestionGroup, RespondentInfo, ResponseRow, ResponseTable } from '../types'
import type { DefinitionFormat } from './definitionFile'
import { checkmarkGrid, type CheckmarkGrid } from './formDisplay'
import { buildMatrixLayout, fillMatrix, type GridAxis, type GridCell } from './matrixGrid'
import { formatValue, isNumericCode, splitHierarchy, splitMultiValue } from './valueFormat'

export interface LabelledValue {
  label: string
  header: string
  value: FormattedValue
}

export interface MatrixAnswer {
  rows: GridAxis[]
  columns: GridAxis[]
  cells: { header: string | null; value: FormattedValue }[][]
}

export type Answer =
  | { archetype: 'single'; value: FormattedValue }
  | { archetype: 'form'; items: LabelledValue[]; checkmarks?: CheckmarkGrid }
  | { archetype: 'matrix'; grid: MatrixAnswer; extras: LabelledValue[] }
  | { archetype: 'multiSelect'; items: string[] }
  | { archetype: 'drillDown'; trails: string[][] }

export interface ResponseBlock {
  respondent: RespondentInfo
  rowIndex: number
  answer: Answer
  /** Non-empty columns for this respondent */
  answeredColumns: number
}

export interface ReportQuestion {
  group: QuestionGroup
  blocks: ResponseBlock[]
}

export interface ReportSummary {
  respondents: number
  questions: number
  matrixQuestions: number
}

export interface Report {
  title: string
  generatedAt: string
  summary: ReportSummary
  questions: ReportQuestion[]
  debug: boolean
  typeCounts: Record<Archetype, number>
  metadataFormat: DefinitionFormat | null
  warnings: string[]
}

export interface ReportModelOptions {
  title: string
  debug?: boolean
  includeTiming?: boolean
  metadataFormat?: DefinitionFormat | null
  warnings?: string[]
  now?: Date
}

export function hasResponse(row: ResponseRow, group: QuestionGroup): boolean {
  return group.columns.some((c) => (row.values[c.key.header] ?? '').trim() !== '')
}

export function isShown(group: QuestionGroup, includeTiming = false): boolean {
  return group.role === 'question' || (includeTiming && group.role === 'timing')
}

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

/** e.g. "October 19, 2026 at 09:05 AM" */
export function formatGeneratedAt(date: Date): string {
  const h = date.getHours()
  const hour12 = String(h % 12 === 0 ? 12 : h % 12).padStart(2, '0')
  const minute = String(date.getMinutes()).padStart(2, '0')
  return `${MONTHS[date.getMonth()]} ${date.getDate()}, ${date.getFullYear()} at ${hour12}:${minute} ${h < 12 ? 'AM' : 'PM'}`
}

/** Row label, plus the column label for two-level columns shown outside a grid */
function columnDisplayLabel(col: GroupColumn): string {
  return col.columnLabel ? `${col.rowLabel} - ${col.columnLabel}` : col.rowLabel
}

function answeredColumns(columns: GroupColumn[], row: ResponseRow): { col: GroupColumn; raw: string }[] {
  const out: { col: GroupColumn; raw: string }[] = []
  for (const col of columns) {
    const raw = row.values[col.key.header] ?? ''
    if (raw.trim()) out.push({ col, raw })
  }
  return out
}

function labelledValues(columns: GroupColumn[], row: ResponseRow, questionText: string): LabelledValue[] {
  return answeredColumns(columns, row).map(({ col, raw }) => ({
    label: columnDisplayLabel(col),
    header: col.key.header,
    value: formatValue(raw, { questionText, header: col.key.header }),
  }))
}

function formAnswer(columns: GroupColumn[], row: ResponseRow, questionText: string): Answer {
  const items = labelledValues(columns, row, questionText)
  const checkmarks = checkmarkGrid(
    answeredColumns(columns, row).map(({ col, raw }) => ({ label: columnDisplayLabel(col), header: col.key.header, value: raw }))
  )
  return checkmarks ? { archetype: 'form', items, checkmarks } : { archetype: 'form', items }
}

/**
 * One column per choice: a selection code or the choice text itself reads as the
 * choice label; anything else (an "Other" text entry) keeps its label.
 */
function selectedChoices(columns: GroupColumn[], row: ResponseRow): string[] {
  return answeredColumns(columns, row).map(({ col, raw }) => {
    const label = columnDisplayLabel(col)
    const value = raw.trim()
    if (isNumericCode(value) || value === label) return label
    return `${label}: ${value}`
  })
}

function nonEmptyValues(group: QuestionGroup, row: ResponseRow): string[] {
  return group.columns.map((c) => row.values[c.key.header] ?? '').filter((v) => v.trim() !== '')
}

export function buildAnswer(group: QuestionGroup, row: ResponseRow): Answer {
  const questionText = group.text
  switch (group.archetype) {
    case 'matrix': {
      const layout = buildMatrixLayout(group)
      const cells = fillMatrix(layout, row.values).map((r) =>
        r.map((cell: GridCell) => ({
          header: cell.header,
          value: formatValue(cell.value, { questionText, header: cell.header ?? undefined }),
        }))
      )
      return {
        archetype: 'matrix',
        grid: { rows: layout.rows, columns: layout.columns, cells },
        extras: labelledValues(layout.extras, row, questionText),
      }
    }
    case 'form':
      return formAnswer(group.columns, row, questionText)
    case 'multiSelect':
      if (group.columns.length > 1) return { archetype: 'multiSelect', items: selectedChoices(group.columns, row) }
      return { archetype: 'multiSelect', items: nonEmptyValues(group, row).flatMap(splitMultiValue) }
    case 'drillDown':
      return { archetype: 'drillDown', trails: nonEmptyValues(group, row).map(splitHierarchy) }
    case 'single': {
      // Declared single answers spread over several columns read as a form
      if (group.columns.length > 1) return formAnswer(group.columns, row, questionText)
      const col = group.columns[0]
      return { archetype: 'single', value: formatValue(row.values[col.key.header], { questionText, header: col.key.header }) }
    }
  }
}

export function buildReport(table: ResponseTable, groups: QuestionGroup[], options: ReportModelOptions): Report {
  const typeCounts: Record<Archetype, number> = { single: 0, form: 0, matrix: 0, multiSelect: 0, drillDown: 0 }
  const questions: ReportQuestion[] = []

  for (const group of groups) {
    if (!isShown(group, options.includeTiming)) continue
    const blocks: ResponseBlock[] = []
    for (const row of table.rows) {
      if (!hasResponse(row, group)) continue
      blocks.push({
        respondent: row.respondent,
        rowIndex: row.index,
        answer: buildAnswer(group, row),
        answeredColumns: nonEmptyValues(group, row).length,
      })
    }
    if (blocks.length === 0) continue
    questions.push({ group, blocks })
    if (group.role === 'question') typeCounts[group.archetype] += 1
  }

  const questionGroups = questions.filter((q) => q.group.role === 'question')
  return {
    title: options.title,
    generatedAt: formatGeneratedAt(options.now ?? new Date()),
    summary: {
      respondents: table.rows.length,
      questions: questionGroups.length,
      matrixQuestions: questionGroups.filter((q) => q.group.archetype === 'matrix').length,
    },
    questions,
    debug: options.debug ?? false,
    typeCounts,
    metadataFormat: options.metadataFormat ?? null,
    warnings: options.warnings ?? [],
  }
}

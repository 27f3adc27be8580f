export const ARCHETYPES = ['single', 'form', 'matrix', 'multiSelect', 'drillDown'] as const

/** Rendering category inferred (or declared) for a group of columns */
export type Archetype = (typeof ARCHETYPES)[number]

/** What a column carries: a survey answer, a system field of the export, or page timing */
export type ColumnRole = 'question' | 'system' | 'timing'

/** Header decomposed into base question id, sub-indices and an optional suffix (e.g. Q4_2_TEXT) */
export interface ColumnKey {
  header: string
  baseId: string
  /** 0 indices: single answer; 1: form/list item; 2: matrix row, column */
  indices: string[]
  suffix?: string
  role: ColumnRole
}

/** Who answered: display name, response id and email, as found in the export's system columns */
export interface RespondentInfo {
  name: string
  responseId: string
  email: string
}

/** One respondent. Every header has an entry; blank cells are '' */
export interface ResponseRow {
  readonly index: number
  readonly respondent: RespondentInfo
  readonly values: Readonly<Record<string, string>>
}

/** Parsed response export */
export interface ResponseTable {
  headers: string[]
  /** Question text row of a Qualtrics export, keyed by header */
  headerText?: Record<string, string>
  rows: ResponseRow[]
  delimiter: string
  warnings: string[]
}

/** Labels and type for one question, from the survey-definition file */
export interface QuestionMetadata {
  id: string
  text: string
  archetype?: Archetype
  /** Raw type of the definition (e.g. "Matrix/Likert/SingleAnswer"), shown in debug output */
  sourceType?: string
  /** Row / choice labels by choice id */
  choices: Record<string, string>
  choiceOrder: string[]
  /** Column / answer labels by answer id */
  answers: Record<string, string>
  answerOrder: string[]
}

export type MetadataMap = Map<string, QuestionMetadata>

/** A column inside a group, with labels resolved from metadata, header text or placeholders */
export interface GroupColumn {
  key: ColumnKey
  rowLabel: string
  columnLabel: string
}

/** Columns sharing one base question id */
export interface QuestionGroup {
  baseId: string
  text: string
  role: ColumnRole
  columns: GroupColumn[]
  archetype: Archetype
  /** Id of the classifier rule that picked the archetype */
  rule: string
  metadataSource: 'definition' | 'inferred'
}

/** A single cell value after content detection */
export type FormattedValue =
  | { kind: 'empty' }
  | { kind: 'plain'; text: string }
  | { kind: 'url'; href: string; text: string; attachment?: string }
  | { kind: 'file'; name: string }
  | { kind: 'json'; pretty: string }
  | { kind: 'date'; iso: string; text: string }
  | { kind: 'coordinate'; x: string; y: string }
  | { kind: 'timing'; label: string; text: string }
  | { kind: 'hierarchy'; segments: string[] }
  | { kind: 'list'; items: string[]; separator: string }
  | { kind: 'longText'; paragraphs: string[] }
  | { kind: 'code'; codes: string[] }

export type ContentClass = FormattedValue['kind']

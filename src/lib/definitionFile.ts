/**
 * Survey-definition loader. Reads a Qualtrics QSF file or a plain JSON/YAML
 * definition into QuestionMetadata keyed by export tag. Never throws: a
 * missing or malformed file yields an empty map and a warning.
 */

import { existsSync, readFileSync } from 'node:fs'
import { extname } from 'node:path'
import { load as yamlParse } from 'js-yaml'
import { z } from 'zod'
import { ARCHETYPES, type Archetype, type MetadataMap, type QuestionMetadata } from '../types'
import { stripBom } from './encoding'
import { errorMessage, MetadataUnavailableError } from './errors'
import { silentLogger, type Logger } from './logger'
import { cleanHtmlText } from './questionText'

export type DefinitionFormat = 'qsf' | 'definition'

export interface LoadedDefinition {
  metadata: MetadataMap
  format: DefinitionFormat | null
  warnings: string[]
}

// ─────────────────────────────────────────────
// QSF
// ─────────────────────────────────────────────

/**
 * QuestionType[/Selector[/SubSelector]] → archetype, most specific key first.
 * Types not listed (MC single answer, TE single line, sliders, text blocks)
 * declare nothing and the column structure decides.
 */
const QSF_TYPE_MAP: Record<string, Archetype> = {
  Matrix: 'matrix',
  SBS: 'matrix',
  'TE/FORM': 'form',
  'MC/MAVR': 'multiSelect',
  'MC/MAHR': 'multiSelect',
  'MC/MACOL': 'multiSelect',
}

const idSchema = z.union([z.string(), z.number()]).transform(String)

const labelSchema = z.union([
  z.object({ Display: z.string().optional(), Text: z.string().optional() }).passthrough(),
  z.string(),
  z.number(),
])
type QsfLabel = z.infer<typeof labelSchema>

/** QSF stores an empty choice set as [] */
const labelMapSchema = z.union([
  z.record(labelSchema),
  z.array(labelSchema).transform((arr) => Object.fromEntries(arr.map((v, i) => [String(i + 1), v]))),
])

const qsfPayloadSchema = z
  .object({
    DataExportTag: z.string().optional(),
    QuestionText: z.string().optional(),
    QuestionType: z.string().optional(),
    Selector: z.string().optional(),
    SubSelector: z.string().nullable().optional(),
    Choices: labelMapSchema.optional(),
    ChoiceOrder: z.array(idSchema).optional(),
    Answers: labelMapSchema.optional(),
    AnswerOrder: z.array(idSchema).optional(),
    ColumnLabels: labelMapSchema.optional(),
  })
  .passthrough()

const qsfSchema = z
  .object({
    SurveyElements: z.array(
      z
        .object({
          Element: z.string(),
          PrimaryAttribute: z.string().optional(),
          Payload: z.unknown(),
        })
        .passthrough()
    ),
  })
  .passthrough()

function qsfArchetype(type: string, selector?: string, subSelector?: string | null): Archetype | undefined {
  const keys = [`${type}/${selector}/${subSelector}`, `${type}/${selector}`, type]
  for (const k of keys) {
    const found = QSF_TYPE_MAP[k]
    if (found) return found
  }
  return undefined
}

function labelText(value: QsfLabel, fallback: string): string {
  if (typeof value === 'string') return cleanHtmlText(value)
  if (typeof value === 'number') return String(value)
  return cleanHtmlText(value.Display ?? value.Text ?? fallback)
}

/** Labels in the declared order, falling back to key order */
function orderedLabels(
  raw: Record<string, QsfLabel> | undefined,
  order: string[] | undefined,
  fallbackPrefix: string
): { labels: Record<string, string>; order: string[] } {
  const labels: Record<string, string> = {}
  if (!raw) return { labels, order: [] }
  const ids = order && order.length > 0 ? order.filter((id) => id in raw) : Object.keys(raw)
  for (const id of ids) labels[id] = labelText(raw[id], `${fallbackPrefix} ${id}`)
  return { labels, order: ids }
}

function parseQsf(doc: z.infer<typeof qsfSchema>, warnings: string[]): MetadataMap {
  const out: MetadataMap = new Map()
  for (const element of doc.SurveyElements) {
    if (element.Element !== 'SQ') continue
    const payload = qsfPayloadSchema.safeParse(element.Payload)
    if (!payload.success) {
      warnings.push(`Skipped definition element ${element.PrimaryAttribute ?? '(unnamed)'}: ${payload.error.issues[0]?.message ?? 'invalid payload'}.`)
      continue
    }
    const p = payload.data
    const tag = p.DataExportTag?.trim()
    if (!tag) continue

    const choices = orderedLabels(p.Choices, p.ChoiceOrder, 'Choice')
    let answers = orderedLabels(p.Answers, p.AnswerOrder, 'Answer')
    if (answers.order.length === 0 && p.ColumnLabels) answers = orderedLabels(p.ColumnLabels, undefined, 'Column')

    const type = p.QuestionType ?? ''
    const meta: QuestionMetadata = {
      id: tag,
      text: cleanHtmlText(p.QuestionText),
      sourceType: [type, p.Selector, p.SubSelector].filter(Boolean).join('/'),
      choices: choices.labels,
      choiceOrder: choices.order,
      answers: answers.labels,
      answerOrder: answers.order,
    }
    const archetype = qsfArchetype(type, p.Selector, p.SubSelector)
    if (archetype) meta.archetype = archetype
    out.set(tag, meta)
  }
  return out
}

// ─────────────────────────────────────────────
// PLAIN DEFINITION
// ─────────────────────────────────────────────

const labelRecord = z.record(z.union([z.string(), z.number()]).transform(String))

const plainDefinitionSchema = z.object({
  questions: z.record(
    z.object({
      text: z.string().optional(),
      type: z.enum(ARCHETYPES).optional(),
      rows: labelRecord.optional(),
      choices: labelRecord.optional(),
      columns: labelRecord.optional(),
    })
  ),
})

function parsePlainDefinition(doc: z.infer<typeof plainDefinitionSchema>): MetadataMap {
  const out: MetadataMap = new Map()
  for (const [id, q] of Object.entries(doc.questions)) {
    const choices = { ...(q.choices ?? {}), ...(q.rows ?? {}) }
    const answers = { ...(q.columns ?? {}) }
    const meta: QuestionMetadata = {
      id,
      text: cleanHtmlText(q.text),
      choices,
      choiceOrder: Object.keys(choices),
      answers,
      answerOrder: Object.keys(answers),
    }
    if (q.type) {
      meta.archetype = q.type
      meta.sourceType = q.type
    }
    out.set(id, meta)
  }
  return out
}

// ─────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────

function unavailable(message: string, warnings: string[], logger: Logger, cause?: unknown): LoadedDefinition {
  const issue = new MetadataUnavailableError(message, { cause })
  warnings.push(issue.message)
  logger.warn(issue.message)
  return { metadata: new Map(), format: null, warnings }
}

/** Parse definition text. `yaml` selects the YAML reader; JSON otherwise. */
export function parseDefinitionText(text: string, yaml = false, logger: Logger = silentLogger): LoadedDefinition {
  const warnings: string[] = []
  let doc: unknown
  try {
    doc = yaml ? yamlParse(text) : JSON.parse(text)
  } catch (e) {
    return unavailable(`Definition file could not be parsed: ${errorMessage(e)}. Falling back to header inference.`, warnings, logger, e)
  }

  const qsf = qsfSchema.safeParse(doc)
  if (qsf.success) {
    const metadata = parseQsf(qsf.data, warnings)
    for (const w of warnings) logger.warn(w)
    logger.info(`Parsed ${metadata.size} questions from QSF definition`)
    return { metadata, format: 'qsf', warnings }
  }
  const plain = plainDefinitionSchema.safeParse(doc)
  if (plain.success) {
    const metadata = parsePlainDefinition(plain.data)
    logger.info(`Parsed ${metadata.size} questions from definition`)
    return { metadata, format: 'definition', warnings }
  }
  return unavailable('Definition file has neither "SurveyElements" nor "questions". Falling back to header inference.', warnings, logger)
}

/** No path: empty metadata without a warning. Unreadable path: empty metadata with a warning. */
export function loadDefinitionFile(path: string | undefined, logger: Logger = silentLogger): LoadedDefinition {
  if (!path) return { metadata: new Map(), format: null, warnings: [] }
  if (!existsSync(path)) return unavailable(`Definition file not found: ${path}. Falling back to header inference.`, [], logger)
  let text: string
  try {
    text = readFileSync(path, 'utf-8')
  } catch (e) {
    return unavailable(`Definition file could not be read: ${errorMessage(e)}.`, [], logger, e)
  }
  const ext = extname(path).toLowerCase()
  return parseDefinitionText(stripBom(text), ext === '.yaml' || ext === '.yml', logger)
}

// ─────────────────────────────────────────────
// LABEL LOOKUP
// ─────────────────────────────────────────────

/**
 * Export columns use either the definition's own ids or 1-based positions in
 * the display order. Try the id first, then the position.
 */
function lookupLabel(labels: Record<string, string>, order: string[], index: string): string | undefined {
  if (index in labels) return labels[index]
  const pos = Number(index)
  if (Number.isInteger(pos) && pos >= 1 && pos <= order.length) return labels[order[pos - 1]]
  return undefined
}

export function getChoiceLabel(meta: QuestionMetadata | undefined, index: string): string | undefined {
  return meta ? lookupLabel(meta.choices, meta.choiceOrder, index) : undefined
}

export function getAnswerLabel(meta: QuestionMetadata | undefined, index: string): string | undefined {
  return meta ? lookupLabel(meta.answers, meta.answerOrder, index) : undefined
}

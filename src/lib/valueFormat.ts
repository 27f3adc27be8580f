/**
 * Content detection for a single cell. Rules run top to bottom and the first
 * match wins; anything no rule claims is plain text. Nothing here throws and
 * nothing here escapes: escaping is left to the renderer for every kind.
 */

import type { ContentClass, FormattedValue } from '../types'
import { isTimingHeader } from './columnKeys'

const LONG_TEXT_THRESHOLD = 200
const NUMERIC_CODE_MAX = 20
const NUMERIC_CODE_RANGE: [number, number] = [100, 300]
const MULTI_VALUE_AVG_LENGTH_MAX = 40

export const FILE_EXTENSIONS = [
  '.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx', '.jpg', '.jpeg',
  '.png', '.gif', '.mp3', '.mp4', '.zip', '.csv', '.txt',
]

/** Question wording that means numbers are real answers, not selection codes */
const NUMERIC_QUESTION_KEYWORDS = [
  'number', 'count', 'total', 'how many', 'percent', '%', 'year', 'age',
  'score', 'hours', 'fee', 'salary', 'amount', '$', 'dollar', 'phone', 'zip',
  'size', 'rate', 'ratio', 'rank', 'rating', 'scale', 'slider', 'nps',
]

const URL_PREFIX = /^(https?:\/\/|www\.|ftp:\/\/)/i
const HIERARCHY_SEPARATORS = [' >> ', ' → ', ' > ']
const LIST_SEPARATORS = ['|', ';', ',']
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/
const COORDINATE_PATTERNS = [
  /^(-?\d+(?:\.\d*)?)\s*,\s*(-?\d+(?:\.\d*)?)$/,
  /^\(\s*(-?\d+(?:\.\d*)?)\s*,\s*(-?\d+(?:\.\d*)?)\s*\)$/,
  /^(-?\d+(?:\.\d*)?)\s*:\s*(-?\d+(?:\.\d*)?)$/,
  /^x:\s*(-?\d+(?:\.\d*)?)\s*,?\s*y:\s*(-?\d+(?:\.\d*)?)$/i,
]

export interface FormatContext {
  questionText?: string
  header?: string
}

// ─────────────────────────────────────────────
// PREDICATES
// ─────────────────────────────────────────────

export function isUrl(value: string): boolean {
  return URL_PREFIX.test(value.trim())
}

export function hasFileExtension(value: string): boolean {
  const lower = value.trim().toLowerCase().replace(/[?#].*$/, '')
  return FILE_EXTENSIONS.some((ext) => lower.endsWith(ext))
}

export function parseCoordinate(value: string): { x: string; y: string } | null {
  const v = value.trim()
  for (const p of COORDINATE_PATTERNS) {
    const m = v.match(p)
    if (m) return { x: m[1], y: m[2] }
  }
  return null
}

export function parseJsonValue(value: string): string | null {
  const v = value.trim()
  const looksJson = (v.startsWith('{') && v.endsWith('}')) || (v.startsWith('[') && v.endsWith(']'))
  if (!looksJson) return null
  try {
    return JSON.stringify(JSON.parse(v), null, 2)
  } catch {
    return null
  }
}

export function parseIsoDate(value: string): string | null {
  const m = value.trim().match(ISO_DATE)
  if (!m) return null
  const month = Number(m[2])
  const day = Number(m[3])
  const daysInMonth = new Date(Date.UTC(Number(m[1]), month, 0)).getUTCDate()
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth) return null
  if (m[4] !== undefined && (Number(m[4]) > 23 || Number(m[5]) > 59)) return null
  return value.trim().replace(' ', 'T')
}

export function hierarchySeparator(value: string): string | null {
  return HIERARCHY_SEPARATORS.find((sep) => value.includes(sep)) ?? null
}

export function isHierarchical(value: string): boolean {
  return hierarchySeparator(value) !== null
}

const isSmallCode = (part: string) => /^\d{1,3}$/.test(part.trim())

/** A delimited list of short items; comma-separated codes and coordinates are not lists. */
export function isMultiValue(value: string, separator = ','): boolean {
  if (!value.includes(separator)) return false
  const parts = value.split(separator)
  if (parts.every(isSmallCode)) return false
  if (parseCoordinate(value)) return false
  const items = parts.map((p) => p.trim()).filter(Boolean)
  if (items.length < 2) return false
  const avg = items.reduce((sum, p) => sum + p.length, 0) / items.length
  return avg <= MULTI_VALUE_AVG_LENGTH_MAX
}

export function listSeparator(value: string): string | null {
  return LIST_SEPARATORS.find((sep) => isMultiValue(value, sep)) ?? null
}

/** Split a multi-select answer into its items, in order */
export function splitMultiValue(value: string): string[] {
  const sep = listSeparator(value) ?? ','
  return value.split(sep).map((p) => p.trim()).filter(Boolean)
}

export function splitHierarchy(value: string): string[] {
  const sep = hierarchySeparator(value)
  if (!sep) return [value.trim()]
  return value.split(sep).map((p) => p.trim()).filter(Boolean)
}

/** Small integers look like unlabelled selection codes unless the question asks for a number. */
export function isNumericCode(value: string, questionText = ''): boolean {
  const v = value.trim()
  if (!v) return false
  const q = questionText.toLowerCase()
  if (NUMERIC_QUESTION_KEYWORDS.some((k) => q.includes(k))) return false
  if (v.includes(',')) return v.split(',').every(isSmallCode)
  if (!/^\d+$/.test(v)) return false
  const n = Number(v)
  if (n >= 1 && n <= NUMERIC_CODE_MAX) return true
  return n >= NUMERIC_CODE_RANGE[0] && n <= NUMERIC_CODE_RANGE[1] && n % 100 !== 0
}

// ─────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────

function formatTiming(value: string, header: string): FormattedValue {
  const suffix = header.replace(/\s+/g, '')
  if (/ClickCount$/.test(suffix)) return { kind: 'timing', label: 'Clicks', text: value }
  const label = /PageSubmit$/.test(suffix)
    ? 'Page time'
    : /FirstClick$/.test(suffix)
      ? 'First click'
      : /LastClick$/.test(suffix)
        ? 'Last click'
        : 'Time'
  const seconds = Number(value)
  if (!value.trim() || Number.isNaN(seconds)) return { kind: 'timing', label, text: value }
  if (seconds >= 60) return { kind: 'timing', label, text: `${Math.floor(seconds / 60)}m ${Math.floor(seconds % 60)}s` }
  return { kind: 'timing', label, text: `${seconds.toFixed(1)}s` }
}

function formatUrl(value: string): FormattedValue {
  const text = value.trim()
  const href = /^(https?|ftp):\/\//i.test(text) ? text : `https://${text}`
  if (!hasFileExtension(text)) return { kind: 'url', href, text }
  const attachment = text.replace(/[?#].*$/, '').split('/').pop() || text
  return { kind: 'url', href, text, attachment }
}

function formatCodes(value: string): FormattedValue {
  return { kind: 'code', codes: value.split(',').map((c) => c.trim()) }
}

interface ValueRule {
  kind: ContentClass
  format: (value: string, ctx: FormatContext) => FormattedValue | null
}

/** Ordered detection rules; a rule returning null passes to the next one */
export const VALUE_RULES: ValueRule[] = [
  { kind: 'empty', format: (v) => (v.trim() === '' ? { kind: 'empty' } : null) },
  { kind: 'timing', format: (v, ctx) => (ctx.header && isTimingHeader(ctx.header) ? formatTiming(v, ctx.header) : null) },
  { kind: 'url', format: (v) => (isUrl(v) ? formatUrl(v) : null) },
  { kind: 'file', format: (v) => (hasFileExtension(v) ? { kind: 'file', name: v.trim() } : null) },
  {
    kind: 'json',
    format: (v) => {
      const pretty = parseJsonValue(v)
      return pretty === null ? null : { kind: 'json', pretty }
    },
  },
  {
    kind: 'date',
    format: (v) => {
      const iso = parseIsoDate(v)
      return iso === null ? null : { kind: 'date', iso, text: v.trim() }
    },
  },
  {
    kind: 'coordinate',
    format: (v) => {
      const c = parseCoordinate(v)
      return c ? { kind: 'coordinate', ...c } : null
    },
  },
  { kind: 'hierarchy', format: (v) => (isHierarchical(v) ? { kind: 'hierarchy', segments: splitHierarchy(v) } : null) },
  {
    kind: 'list',
    format: (v) => {
      const separator = listSeparator(v)
      return separator ? { kind: 'list', separator, items: v.split(separator).map((p) => p.trim()).filter(Boolean) } : null
    },
  },
  {
    kind: 'longText',
    format: (v) =>
      v.trim().length > LONG_TEXT_THRESHOLD
        ? { kind: 'longText', paragraphs: v.split('\n').map((p) => p.trim()).filter(Boolean) }
        : null,
  },
  { kind: 'code', format: (v, ctx) => (isNumericCode(v, ctx.questionText) ? formatCodes(v) : null) },
]

export function formatValue(value: string | null | undefined, ctx: FormatContext = {}): FormattedValue {
  const v = value ?? ''
  for (const rule of VALUE_RULES) {
    const out = rule.format(v, ctx)
    if (out) return out
  }
  return { kind: 'plain', text: v.trim() }
}

/** Content class only, for tests and debug output */
export function detectContentClass(value: string | null | undefined, ctx: FormatContext = {}): ContentClass {
  return formatValue(value, ctx).kind
}

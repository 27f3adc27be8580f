/**
 * Question text cleanup for definition files (HTML) and export header rows
 * ("Question text - Row label - Column label").
 */

/** Editor placeholders and instructions that clutter question text */
const BOILERPLATE_PATTERNS: RegExp[] = [
  /\s*Click to write the question text\s*/gi,
  /\s*Click to write Choice \d+\s*/gi,
  /\s*Please answer the following\.?\s*/gi,
  /\s*RESPONSE NEEDED\s*/gi,
  /\s*ACTION NEEDED\s*/gi,
]

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '–',
  mdash: '—',
  hellip: '…',
  rsquo: '’',
  lsquo: '‘',
  rdquo: '”',
  ldquo: '“',
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body[0] === '#') {
      const code = body[1] === 'x' || body[1] === 'X' ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10)
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match
  })
}

function stripBoilerplate(text: string): string {
  let out = text
  for (const pattern of BOILERPLATE_PATTERNS) out = out.replace(pattern, ' ')
  return out
}

const collapseWhitespace = (text: string) => text.replace(/\s+/g, ' ').trim()

/** Definition-file text: decode entities, drop tags and boilerplate, normalize whitespace. */
export function cleanHtmlText(text: string | null | undefined): string {
  if (!text) return ''
  const decoded = decodeEntities(text)
  const noTags = decoded.replace(/<[^>]+>/g, ' ')
  return collapseWhitespace(stripBoilerplate(noTags))
}

/** Header-row text: boilerplate removed, stray leading/trailing dashes dropped. */
export function cleanQuestionText(text: string | null | undefined): string {
  if (!text) return ''
  return collapseWhitespace(
    stripBoilerplate(text)
      .replace(/^\s*-\s*/, '')
      .replace(/\s*-\s*$/, '')
      .replace(/\s*-\s*-\s*/g, ' ')
      .replace(/\t+/g, ' ')
  )
}

export interface HeaderLabels {
  base: string
  row?: string
  column?: string
}

const DATE_RANGE_MARK = '\u0000'

/**
 * Split header text on " - ". The last two parts are the row and column labels
 * when there are three or more parts. Year ranges ("2024 - 2025") are kept whole.
 */
export function extractMatrixLabels(text: string | null | undefined): HeaderLabels {
  const cleaned = cleanQuestionText(text)
  if (!cleaned) return { base: '' }
  const protectedText = cleaned.replace(/(\d{4})\s*-\s*(\d{4})/g, `$1${DATE_RANGE_MARK}$2`)
  const parts = protectedText.split(/\s+-\s+/).map((p) => p.split(DATE_RANGE_MARK).join(' - '))
  if (parts.length >= 3) {
    return { base: parts.slice(0, -2).join(' - '), row: parts[parts.length - 2], column: parts[parts.length - 1] }
  }
  if (parts.length === 2) return { base: parts[0], row: parts[1] }
  return { base: parts[0] }
}

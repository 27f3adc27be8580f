import Papa from 'papaparse'
import type { RespondentInfo, ResponseRow, ResponseTable } from '../types'
import { stripBom } from './encoding'
import { InputNotFoundError, MalformedRowError } from './errors'
import { silentLogger, type Logger } from './logger'

/** Third header row of a Qualtrics export: {"ImportId":"QID1"} per column */
function isImportIdRow(cells: string[]): boolean {
  return cells.some((c) => /^\{\s*"ImportId"/.test(c.trim()))
}

function buildHeaders(rawHeaders: string[], warnings: string[]): string[] {
  const seen = new Map<string, number>()
  return rawHeaders.map((h, j) => {
    const base = (h != null ? String(h).trim() : '') || `Column ${j + 1}`
    const count = (seen.get(base) ?? 0) + 1
    seen.set(base, count)
    if (count === 1) return base
    const renamed = `${base} (${count})`
    warnings.push(`Duplicate column "${base}" renamed to "${renamed}".`)
    return renamed
  })
}

/** Display name priority: recipient name, email, external reference, response id, anonymous. */
export function getRespondentInfo(values: Readonly<Record<string, string>>, index: number): RespondentInfo {
  const get = (key: string) => (values[key] ?? '').trim()
  const first = get('RecipientFirstName')
  const last = get('RecipientLastName')
  const email = get('RecipientEmail')
  const responseId = get('ResponseId')
  const externalRef = get('ExternalReference')

  let name: string
  if (first) name = `${first} ${last}`.trim()
  else if (email) name = email
  else if (externalRef) name = externalRef
  else if (responseId) name = responseId
  else name = `Anonymous #${index + 1}`

  return { name, responseId, email }
}

/**
 * Parse a delimited survey export. The delimiter is detected; header rows of a
 * Qualtrics export (ids, question text, ImportId) are recognised. Rows with a
 * different cell count than the header are padded or truncated with a warning.
 */
export function parseResponseTable(text: string, logger: Logger = silentLogger): ResponseTable {
  const parsed = Papa.parse<string[]>(stripBom(text ?? ''), { skipEmptyLines: 'greedy' })
  const rows = Array.isArray(parsed?.data) ? parsed.data : []
  if (rows.length === 0 || rows[0].every((c) => !c || !String(c).trim())) {
    throw new InputNotFoundError('Response table has no header row.')
  }

  const warnings: string[] = []
  for (const e of parsed.errors ?? []) {
    // FieldMismatch only arises with header: true; cell counts are checked below
    if (e.type === 'Delimiter') continue
    warnings.push(e.row !== undefined ? `Row ${e.row + 1}: ${e.message}` : e.message)
  }

  const headers = buildHeaders(rows[0], warnings)
  let dataStart = 1
  let headerText: Record<string, string> | undefined
  if (rows.length > 2 && isImportIdRow(rows[2])) {
    const textRow = rows[1]
    const byHeader: Record<string, string> = {}
    headers.forEach((h, j) => {
      byHeader[h] = (textRow[j] ?? '').trim()
    })
    headerText = byHeader
    dataStart = 3
  } else if (rows.length > 1 && isImportIdRow(rows[1])) {
    dataStart = 2
  }
  logger.debug(`Header rows: ${dataStart} (${headerText ? 'with' : 'without'} question text)`)

  const dataRows: ResponseRow[] = []
  for (let i = dataStart; i < rows.length; i++) {
    const raw = rows[i]
    const rowNumber = i + 1
    if (raw.length !== headers.length) {
      const issue = new MalformedRowError(
        rowNumber,
        raw.length < headers.length
          ? `Row ${rowNumber} has ${raw.length} of ${headers.length} cells; missing cells treated as blank.`
          : `Row ${rowNumber} has ${raw.length} cells for ${headers.length} columns; extra cells ignored.`
      )
      warnings.push(issue.message)
      logger.warn(issue.message)
    }
    const values: Record<string, string> = {}
    headers.forEach((h, j) => {
      const cell = raw[j]
      values[h] = typeof cell === 'string' ? cell.trim() : ''
    })
    const index = dataRows.length
    dataRows.push({ index, respondent: getRespondentInfo(values, index), values })
  }

  return {
    headers,
    headerText,
    rows: dataRows,
    delimiter: parsed.meta?.delimiter ?? ',',
    warnings,
  }
}

/**
 * Column header decomposition: Q1 / Q1_2 / Q1_2_3 / Q1_TEXT / Q1_4_TEXT.
 * Never fails: a header without index structure is its own base id.
 */

import type { ColumnKey } from '../types'

/** System fields of a Qualtrics export; not survey answers */
export const SYSTEM_COLUMNS: ReadonlySet<string> = new Set([
  'StartDate',
  'EndDate',
  'Status',
  'IPAddress',
  'Progress',
  'Duration (in seconds)',
  'Finished',
  'RecordedDate',
  'ResponseId',
  'RecipientLastName',
  'RecipientFirstName',
  'RecipientEmail',
  'ExternalReference',
  'LocationLatitude',
  'LocationLongitude',
  'DistributionChannel',
  'UserLanguage',
  'Browser',
  'Version',
  'Operating System',
  'Resolution',
  'DeviceType',
  'Q_TotalDuration',
  'Q_URL',
  'Q_BallotBoxStuffing',
  'Q_RelevantIDDuplicate',
])

/** Page timing suffixes; a timing question Q7 exports Q7_First Click, Q7_Page Submit, … */
const TIMING_SUFFIX = /^(.+?)_(Page Submit|First Click|Last Click|Click Count|PageSubmit|FirstClick|LastClick|ClickCount)$/

/** Lazy base, up to two numeric indices, optional alphabetic suffix */
const QUESTION_KEY = /^(.+?)((?:_\d+){0,2})(?:_([A-Za-z][A-Za-z0-9 ]*))?$/

/** Export suffixes that attach to a question without a sub-index (Q1_TEXT, Q3_DO, file upload Q9_Id/Name/Size/Type) */
const BARE_SUFFIXES: ReadonlySet<string> = new Set(['TEXT', 'DO', 'Id', 'Name', 'Size', 'Type'])

export function isTimingHeader(header: string): boolean {
  return TIMING_SUFFIX.test(header.trim())
}

export function parseColumnKey(rawHeader: string): ColumnKey {
  const header = rawHeader.trim()
  if (SYSTEM_COLUMNS.has(header)) return { header, baseId: header, indices: [], role: 'system' }

  const timing = header.match(TIMING_SUFFIX)
  if (timing) {
    return { header, baseId: timing[1], indices: [], suffix: timing[2], role: 'timing' }
  }

  const m = header.match(QUESTION_KEY)
  if (!m) return { header, baseId: header, indices: [], role: 'question' }
  const indices = m[2] ? m[2].slice(1).split('_') : []
  // email_work stays whole; only indexed headers or known export suffixes split
  if (m[3] && indices.length === 0 && !BARE_SUFFIXES.has(m[3])) {
    return { header, baseId: header, indices: [], role: 'question' }
  }
  const key: ColumnKey = { header, baseId: m[1], indices, role: 'question' }
  if (m[3]) key.suffix = m[3]
  return key
}

/** Numeric indices first by value, then anything else alphabetically */
export function compareIndex(a: string, b: string): number {
  const an = /^\d+$/.test(a)
  const bn = /^\d+$/.test(b)
  if (an && bn) return Number(a) - Number(b)
  if (an) return -1
  if (bn) return 1
  return a.toLowerCase().localeCompare(b.toLowerCase())
}

import type { GroupColumn, QuestionGroup } from '../types'
import { compareIndex } from './columnKeys'

export interface GridAxis {
  index: string
  label: string
}

/** Respondent-independent shape of a matrix question */
export interface MatrixLayout {
  rows: GridAxis[]
  columns: GridAxis[]
  /** cells[r][c] is the column holding that cell, or null when the export has none */
  cells: (GroupColumn | null)[][]
  /** Group columns that are not grid cells (e.g. Q3_4_TEXT), shown below the grid */
  extras: GroupColumn[]
}

export interface GridCell {
  header: string | null
  value: string
}

const SINGLE_COLUMN = '1'

/**
 * Two-level keys place a cell at (row, column). A matrix declared by the
 * definition but exported with one-level keys becomes a single "Response"
 * column. Rows are sorted by index; columns keep export order.
 */
export function buildMatrixLayout(group: QuestionGroup): MatrixLayout {
  const twoLevel = group.columns.filter((c) => c.key.indices.length === 2 && !c.key.suffix)
  const oneLevel = group.columns.filter((c) => c.key.indices.length === 1 && !c.key.suffix)
  const placed = twoLevel.length > 0 ? twoLevel : oneLevel
  const position = (c: GroupColumn): [string, string] => [c.key.indices[0], c.key.indices[1] ?? SINGLE_COLUMN]

  const rowLabels = new Map<string, string>()
  const colLabels = new Map<string, string>()
  const byCell = new Map<string, GroupColumn>()
  for (const col of placed) {
    const [r, c] = position(col)
    if (!rowLabels.has(r)) rowLabels.set(r, col.rowLabel)
    if (!colLabels.has(c)) colLabels.set(c, col.columnLabel || 'Response')
    byCell.set(`${r}\u0000${c}`, col)
  }

  const rows = [...rowLabels.keys()].sort(compareIndex).map((index) => ({ index, label: rowLabels.get(index) ?? index }))
  const columns = [...colLabels].map(([index, label]) => ({ index, label }))
  const cells = rows.map((r) => columns.map((c) => byCell.get(`${r.index}\u0000${c.index}`) ?? null))
  const placedSet = new Set(placed)

  return { rows, columns, cells, extras: group.columns.filter((c) => !placedSet.has(c)) }
}

/** Cell values for one respondent; always rows × columns, missing cells blank */
export function fillMatrix(layout: MatrixLayout, values: Readonly<Record<string, string>>): GridCell[][] {
  return layout.cells.map((row) =>
    row.map((col) => (col ? { header: col.key.header, value: values[col.key.header] ?? '' } : { header: null, value: '' }))
  )
}

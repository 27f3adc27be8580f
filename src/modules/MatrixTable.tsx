import type { MatrixAnswer } from '../lib/reportModel'
import { styles } from '../theme'
import { FormattedValueView } from './FormattedValueView'

/** Column labels across the top, row labels down the left, one cell per (row, column). */
export function MatrixTable({ grid }: { grid: MatrixAnswer }) {
  return (
    <div style={{ overflowX: 'auto' }}>
      <table className="matrix-table" style={{ borderCollapse: 'collapse', width: '100%' }}>
        <thead>
          <tr>
            <th style={styles.tableHeader} />
            {grid.columns.map((c) => (
              <th key={c.index} scope="col" style={styles.tableHeader}>
                {c.label}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {grid.rows.map((r, i) => (
            <tr key={r.index}>
              <th scope="row" style={{ ...styles.tableCell, fontWeight: 600, textAlign: 'left' }}>
                {r.label}
              </th>
              {grid.cells[i].map((cell, j) => (
                <td key={j} style={styles.tableCell} data-column={cell.header ?? undefined}>
                  <FormattedValueView value={cell.value} />
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}

import type { CheckmarkGrid } from '../lib/formDisplay'
import { styles, theme } from '../theme'
import { EMPTY_MARKER } from './FormattedValueView'

const CHECK = '✓'

/** Selections across the top, one row per labelled answer */
export function CheckmarkTable({ grid }: { grid: CheckmarkGrid }) {
  return (
    <div style={{ overflowX: 'auto' }}>
      <table className="checkmark-table" style={{ borderCollapse: 'collapse', width: '100%' }}>
        <thead>
          <tr>
            <th style={styles.tableHeader} />
            {grid.selections.map((s) => (
              <th key={s} scope="col" style={styles.tableHeader}>
                {s}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {grid.rows.map((row) => (
            <tr key={row.header}>
              <th scope="row" style={{ ...styles.tableCell, fontWeight: 600, textAlign: 'left' }}>
                {row.label}
              </th>
              {row.selected.map((on, j) => (
                <td key={j} style={{ ...styles.tableCell, textAlign: 'center' }}>
                  {on ? (
                    <span style={{ color: theme.colors.accent, fontWeight: 700 }}>{CHECK}</span>
                  ) : (
                    <span style={styles.emptyCell}>{EMPTY_MARKER}</span>
                  )}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}

import type { Answer, LabelledValue } from '../lib/reportModel'
import { styles } from '../theme'
import { CheckmarkTable } from './CheckmarkTable'
import { Breadcrumb, FormattedValueView } from './FormattedValueView'
import { MatrixTable } from './MatrixTable'

export function LabelledValues({ items }: { items: LabelledValue[] }) {
  return (
    <table className="form-table" style={{ borderCollapse: 'collapse', width: '100%' }}>
      <tbody>
        {items.map((item) => (
          <tr key={item.header}>
            <th scope="row" style={{ ...styles.tableCell, ...styles.textLabel, width: '35%', textAlign: 'left' }}>
              {item.label}
            </th>
            <td style={styles.tableCell}>
              <FormattedValueView value={item.value} />
            </td>
          </tr>
        ))}
      </tbody>
    </table>
  )
}

export function AnswerView({ answer }: { answer: Answer }) {
  switch (answer.archetype) {
    case 'single':
      return (
        <div style={styles.textBody}>
          <FormattedValueView value={answer.value} />
        </div>
      )
    case 'form':
      return answer.checkmarks ? <CheckmarkTable grid={answer.checkmarks} /> : <LabelledValues items={answer.items} />
    case 'matrix':
      return (
        <>
          <MatrixTable grid={answer.grid} />
          {answer.extras.length > 0 && (
            <div style={{ marginTop: 8 }}>
              <LabelledValues items={answer.extras} />
            </div>
          )}
        </>
      )
    case 'multiSelect':
      return (
        <ul className="multi-select" style={{ margin: 0, paddingLeft: 20, ...styles.textBody }}>
          {answer.items.map((item, i) => (
            <li key={i}>{item}</li>
          ))}
        </ul>
      )
    case 'drillDown':
      return (
        <div style={styles.textBody}>
          {answer.trails.map((segments, i) => (
            <div key={i}>
              <Breadcrumb segments={segments} />
            </div>
          ))}
        </div>
      )
  }
}

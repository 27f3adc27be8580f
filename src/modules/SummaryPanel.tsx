import type { Report } from '../lib/reportModel'
import { ARCHETYPES } from '../types'
import { styles } from '../theme'

function Stat({ label, value }: { label: string; value: number }) {
  return (
    <div style={styles.summaryStat} data-stat={label}>
      <span style={styles.summaryValue}>{value}</span>
      <span style={styles.textLabel}>{label}</span>
    </div>
  )
}

export function SummaryPanel({ report }: { report: Report }) {
  const { summary } = report
  return (
    <header className="summary" style={styles.appHeader}>
      <h1 style={styles.textHero}>{report.title}</h1>
      <p style={styles.appDesc}>{`Generated ${report.generatedAt}`}</p>
      <div style={styles.summaryGrid}>
        <Stat label="Respondents" value={summary.respondents} />
        <Stat label="Questions" value={summary.questions} />
        <Stat label="Matrix questions" value={summary.matrixQuestions} />
      </div>
    </header>
  )
}

/** Classification overview, only in debug mode */
export function DebugPanel({ report }: { report: Report }) {
  return (
    <section className="debug-info" style={{ ...styles.debugPanel, marginBottom: 24 }}>
      <strong>Debug</strong>
      <div>{`labels from: ${report.metadataFormat ?? 'column headers'}`}</div>
      <ul style={{ margin: '4px 0', paddingLeft: 18 }}>
        {ARCHETYPES.map((a) => (
          <li key={a}>{`${a}: ${report.typeCounts[a]}`}</li>
        ))}
      </ul>
      {report.warnings.length > 0 && (
        <ul style={{ margin: '4px 0', paddingLeft: 18, ...styles.warning }}>
          {report.warnings.map((w, i) => (
            <li key={i}>{w}</li>
          ))}
        </ul>
      )}
    </section>
  )
}

import type { Report } from '../lib/reportModel'
import { documentCss, styles, theme } from '../theme'
import { QuestionCard } from './QuestionCard'
import { DebugPanel, SummaryPanel } from './SummaryPanel'

export function ReportDocument({ report }: { report: Report }) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{report.title}</title>
        <style dangerouslySetInnerHTML={{ __html: documentCss }} />
      </head>
      <body style={styles.root}>
        <main style={styles.main}>
          <SummaryPanel report={report} />
          {report.debug && <DebugPanel report={report} />}
          {report.questions.length === 0 && (
            <p style={{ ...styles.textBody, color: theme.colors.textMuted }}>No responses to show.</p>
          )}
          {report.questions.map((q) => (
            <QuestionCard key={`${q.group.role}:${q.group.baseId}`} question={q} debug={report.debug} />
          ))}
        </main>
      </body>
    </html>
  )
}

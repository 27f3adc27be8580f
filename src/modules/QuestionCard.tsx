import type { ReportQuestion, ResponseBlock } from '../lib/reportModel'
import { styles } from '../theme'
import { AnswerView } from './AnswerView'

function RespondentLine({ block }: { block: ResponseBlock }) {
  const { name, responseId } = block.respondent
  return (
    <div className="respondent" style={styles.respondent}>
      <strong>{name}</strong>
      {responseId && responseId !== name && <span style={{ marginLeft: 8 }}>{`(${responseId})`}</span>}
    </div>
  )
}

export function QuestionCard({ question, debug = false }: { question: ReportQuestion; debug?: boolean }) {
  const { group, blocks } = question
  return (
    <section className="question-card" id={`question-${group.baseId}`} style={styles.questionCard}>
      <header style={{ marginBottom: 8 }}>
        <span className="question-id" style={styles.questionId}>
          {group.baseId}
        </span>
        <h2 style={{ ...styles.textSection, display: 'inline' }}>{group.text}</h2>
        {debug && (
          <div className="debug-info" style={styles.debugPanel}>
            {`type: ${group.archetype} | columns: ${group.columns.length} | responses: ${blocks.length} | rule: ${group.rule} | labels: ${group.metadataSource}`}
          </div>
        )}
      </header>
      {blocks.map((block) => (
        <div key={block.rowIndex} className="response" style={styles.responseBlock}>
          <RespondentLine block={block} />
          <AnswerView answer={block.answer} />
          {debug && (
            <div className="debug-info" style={styles.debugPanel}>
              {`row: ${block.rowIndex + 1} | answered columns: ${block.answeredColumns} | rendered as: ${block.answer.archetype}`}
            </div>
          )}
        </div>
      ))}
    </section>
  )
}

import { describe, it, expect } from 'vitest'
import type { MetadataMap } from '../types'
import { parseResponseTable } from './csvParse'
import { buildQuestionGroups } from './questionGroups'
import { buildReport, formatGeneratedAt, hasResponse, type Report } from './reportModel'

const NOW = new Date(2026, 9, 19, 9, 5)

function reportFor(csv: string, includeTiming = false): Report {
  const table = parseResponseTable(csv)
  return buildReport(table, buildQuestionGroups(table), { title: 'Test report', includeTiming, now: NOW })
}

const SURVEY = [
  'ResponseId,RecipientFirstName,RecipientLastName,Q1_1_1,Q1_1_2,Q1_2_1,Q1_2_2,Q2,Q3,Q4_1,Q4_2',
  'R_1,Ada,Lovelace,a,b,c,d,"A, B, C",,x,',
  'R_2,,,,,,,,,,',
].join('\n')

describe('buildReport', () => {
  it('shows answered question groups in export order and skips blank ones', () => {
    const report = reportFor(SURVEY)
    expect(report.questions.map((q) => q.group.baseId)).toEqual(['Q1', 'Q2', 'Q4'])
    expect(report.questions.map((q) => q.blocks.length)).toEqual([1, 1, 1])
    expect(report.questions[0].blocks[0].respondent.name).toBe('Ada Lovelace')
  })

  it('counts respondents, questions and matrix questions', () => {
    const report = reportFor(SURVEY)
    expect(report.summary).toEqual({ respondents: 2, questions: 3, matrixQuestions: 1 })
    expect(report.typeCounts).toEqual({ single: 0, form: 1, matrix: 1, multiSelect: 1, drillDown: 0 })
    expect(report.generatedAt).toBe('October 19, 2026 at 09:05 AM')
  })

  it('builds one answer shape per archetype', () => {
    const [q1, q2, q4] = reportFor(SURVEY).questions
    const matrix = q1.blocks[0].answer
    expect(matrix.archetype).toBe('matrix')
    if (matrix.archetype === 'matrix') {
      expect(matrix.grid.cells.map((r) => r.map((c) => c.value))).toEqual([
        [{ kind: 'plain', text: 'a' }, { kind: 'plain', text: 'b' }],
        [{ kind: 'plain', text: 'c' }, { kind: 'plain', text: 'd' }],
      ])
    }
    expect(q2.blocks[0].answer).toEqual({ archetype: 'multiSelect', items: ['A', 'B', 'C'] })
    expect(q4.blocks[0].answer).toEqual({
      archetype: 'form',
      items: [{ label: 'Row 1', header: 'Q4_1', value: { kind: 'plain', text: 'x' } }],
    })
    expect(q4.blocks[0].answeredColumns).toBe(1)
  })

  it('names the chosen columns of a declared multi-select', () => {
    const metadata: MetadataMap = new Map([
      [
        'Q5',
        {
          id: 'Q5',
          text: 'Favourite colours',
          archetype: 'multiSelect',
          choices: { '1': 'Red', '2': 'Green', '3': 'Blue', '4': 'Other' },
          choiceOrder: ['1', '2', '3', '4'],
          answers: {},
          answerOrder: [],
        },
      ],
    ])
    const table = parseResponseTable('Q5_1,Q5_2,Q5_3,Q5_4,Q5_4_TEXT\n1,,1,1,Purple\nRed,Green,,,')
    const report = buildReport(table, buildQuestionGroups(table, metadata), { title: 'Test report', now: NOW })
    expect(report.questions[0].blocks.map((b) => b.answer)).toEqual([
      { archetype: 'multiSelect', items: ['Red', 'Blue', 'Other', 'Other (TEXT): Purple'] },
      { archetype: 'multiSelect', items: ['Red', 'Green'] },
    ])
  })

  it('labels two-level columns outside a grid with row and column', () => {
    const report = reportFor('Q3_1_1,Q3_1_2\nx,y')
    expect(report.questions[0].blocks[0].answer).toEqual({
      archetype: 'form',
      items: [
        { label: 'Row 1 - Column 1', header: 'Q3_1_1', value: { kind: 'plain', text: 'x' } },
        { label: 'Row 1 - Column 2', header: 'Q3_1_2', value: { kind: 'plain', text: 'y' } },
      ],
    })
  })

  it('shows repeated short categories as a checkmark grid', () => {
    const answer = reportFor('Q6_1,Q6_2,Q6_3,Q6_4\nYes,No,Yes,Yes').questions[0].blocks[0].answer
    expect(answer.archetype).toBe('form')
    if (answer.archetype === 'form') {
      expect(answer.checkmarks).toEqual({
        selections: ['No', 'Yes'],
        rows: [
          { label: 'Row 1', header: 'Q6_1', selected: [false, true] },
          { label: 'Row 2', header: 'Q6_2', selected: [true, false] },
          { label: 'Row 3', header: 'Q6_3', selected: [false, true] },
          { label: 'Row 4', header: 'Q6_4', selected: [false, true] },
        ],
      })
      expect(answer.items.map((i) => i.label)).toEqual(['Row 1', 'Row 2', 'Row 3', 'Row 4'])
    }
  })

  it('keeps numeric answers in a label:value table', () => {
    const answer = reportFor('Q6_1,Q6_2,Q6_3,Q6_4\n12,40,12,12').questions[0].blocks[0].answer
    expect(answer.archetype === 'form' && answer.checkmarks).toBeFalsy()
  })

  it('renders drill-down answers as trails', () => {
    const report = reportFor('Q5\nEurope > France')
    expect(report.questions[0].blocks[0].answer).toEqual({ archetype: 'drillDown', trails: [['Europe', 'France']] })
  })

  it('shows timing groups only when asked', () => {
    const csv = 'Q1,Q7_Page Submit\nyes,12'
    expect(reportFor(csv).questions.map((q) => q.group.baseId)).toEqual(['Q1'])
    const withTiming = reportFor(csv, true)
    expect(withTiming.questions.map((q) => q.group.baseId)).toEqual(['Q1', 'Q7'])
    expect(withTiming.summary.questions).toBe(1)
    expect(withTiming.questions[1].blocks[0].answer).toEqual({
      archetype: 'single',
      value: { kind: 'timing', label: 'Page time', text: '12.0s' },
    })
  })

  it('an export without answers yields an empty report', () => {
    const report = reportFor('ResponseId,Q1,Q2\nR_1,,\nR_2,,')
    expect(report.questions).toEqual([])
    expect(report.summary).toEqual({ respondents: 2, questions: 0, matrixQuestions: 0 })
  })
})

describe('reportModel helpers', () => {
  it('hasResponse is true when any column of the group is filled', () => {
    const table = parseResponseTable('ResponseId,Q1_1,Q1_2\nR_1,,  \nR_2,,b')
    const group = buildQuestionGroups(table)[1]
    expect(table.rows.map((r) => hasResponse(r, group))).toEqual([false, true])
  })

  it('formatGeneratedAt uses a 12-hour clock', () => {
    expect(formatGeneratedAt(new Date(2026, 0, 2, 0, 7))).toBe('January 2, 2026 at 12:07 AM')
    expect(formatGeneratedAt(new Date(2026, 0, 2, 13, 30))).toBe('January 2, 2026 at 01:30 PM')
  })
})

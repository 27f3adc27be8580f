import { describe, it, expect } from 'vitest'
import type { MetadataMap, QuestionMetadata } from '../types'
import { parseResponseTable } from './csvParse'
import { buildQuestionGroups, partitionColumns, resolveColumnLabels } from './questionGroups'
import { parseColumnKey } from './columnKeys'

function makeMetadata(overrides: Partial<QuestionMetadata> & { id: string }): QuestionMetadata {
  return { text: '', choices: {}, choiceOrder: [], answers: {}, answerOrder: [], ...overrides }
}

describe('questionGroups', () => {
  it('every header lands in exactly one group, in encounter order', () => {
    const headers = ['ResponseId', 'Q10', 'Q2_1', 'Q1_1', 'Q2_2', 'Q1_2', 'Q7_Page Submit', 'Column 3']
    const groups = partitionColumns(headers)
    expect(groups.map((g) => g[0].baseId)).toEqual(['ResponseId', 'Q10', 'Q2', 'Q1', 'Q7', 'Column 3'])
    expect(groups.map((g) => g.map((k) => k.header))).toEqual([
      ['ResponseId'],
      ['Q10'],
      ['Q2_1', 'Q2_2'],
      ['Q1_1', 'Q1_2'],
      ['Q7_Page Submit'],
      ['Column 3'],
    ])
    const flat = groups.flat().map((k) => k.header)
    expect(flat.sort()).toEqual([...headers].sort())
  })

  it('unindexed headers sharing a prefix stay in their own groups', () => {
    const groups = partitionColumns(['email_work', 'email_home', 'Q2_TEXT', 'Q2_DO'])
    expect(groups.map((g) => g.map((k) => k.header))).toEqual([['email_work'], ['email_home'], ['Q2_TEXT', 'Q2_DO']])
    const [work] = buildQuestionGroups(parseResponseTable('email_work,email_home\na@example.com,b@example.com'))
    expect(work).toMatchObject({ baseId: 'email_work', archetype: 'single' })
  })

  it('keeps a question and its timing columns in separate groups', () => {
    const groups = partitionColumns(['Q7', 'Q7_First Click'])
    expect(groups.map((g) => g.map((k) => k.role))).toEqual([['question'], ['timing']])
  })

  it('labels sub-indices Row N / Column N without metadata', () => {
    const table = parseResponseTable('Q1_1_1,Q1_1_2,Q1_2_1,Q1_2_2,Q4_2_TEXT\na,b,c,d,e')
    const [q1, q4] = buildQuestionGroups(table)
    expect(q1.archetype).toBe('matrix')
    expect(q1.rule).toBe('matrix-indices')
    expect(q1.metadataSource).toBe('inferred')
    expect(q1.text).toBe('Q1')
    expect(q1.columns.map((c) => [c.rowLabel, c.columnLabel])).toEqual([
      ['Row 1', 'Column 1'],
      ['Row 1', 'Column 2'],
      ['Row 2', 'Column 1'],
      ['Row 2', 'Column 2'],
    ])
    expect(q4.columns[0].rowLabel).toBe('Row 2 (TEXT)')
  })

  it('uses header text for question text when there is no metadata', () => {
    const csv = ['Q9_1', 'Tell us about yourself', '"{""ImportId"":""QID9_1""}"', 'Ada'].join('\n')
    const [q9] = buildQuestionGroups(parseResponseTable(csv))
    expect(q9.text).toBe('Tell us about yourself')
    expect(q9.columns[0].rowLabel).toBe('Row 1')
  })

  it('takes row labels from "Question - Label" header text', () => {
    const csv = [
      'Q9_1,Q9_2',
      'Contact details - Name,Contact details - Email',
      '"{""ImportId"":""QID9_1""}","{""ImportId"":""QID9_2""}"',
      'Ada,ada@example.com',
    ].join('\n')
    const [q9] = buildQuestionGroups(parseResponseTable(csv))
    expect(q9.archetype).toBe('form')
    expect(q9.text).toBe('Contact details')
    expect(q9.columns.map((c) => c.rowLabel)).toEqual(['Name', 'Email'])
  })

  it('prefers definition labels and text', () => {
    const metadata: MetadataMap = new Map([
      [
        'Q1',
        makeMetadata({
          id: 'Q1',
          text: 'Rate us',
          choices: { '1': 'Speed', '2': 'Price' },
          choiceOrder: ['1', '2'],
          answers: { '1': 'Poor', '2': 'Good' },
          answerOrder: ['1', '2'],
        }),
      ],
    ])
    const table = parseResponseTable('Q1_1_1,Q1_1_2,Q1_2_1,Q1_2_2\na,b,c,d')
    const [q1] = buildQuestionGroups(table, metadata)
    expect(q1.text).toBe('Rate us')
    expect(q1.metadataSource).toBe('definition')
    expect(q1.columns[1]).toMatchObject({ rowLabel: 'Speed', columnLabel: 'Good' })
  })

  it('resolveColumnLabels names timing and system columns after themselves', () => {
    expect(resolveColumnLabels(parseColumnKey('Q7_First Click')).rowLabel).toBe('First Click')
    expect(resolveColumnLabels(parseColumnKey('StartDate')).rowLabel).toBe('StartDate')
    expect(resolveColumnLabels(parseColumnKey('Q1_TEXT')).rowLabel).toBe('TEXT')
  })
})

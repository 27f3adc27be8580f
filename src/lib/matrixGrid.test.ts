import { describe, it, expect } from 'vitest'
import type { MetadataMap, QuestionMetadata } from '../types'
import { parseResponseTable } from './csvParse'
import { buildMatrixLayout, fillMatrix } from './matrixGrid'
import { buildQuestionGroups } from './questionGroups'

function groupFor(csv: string, metadata?: MetadataMap) {
  return buildQuestionGroups(parseResponseTable(csv), metadata)[0]
}

describe('matrixGrid', () => {
  it('fills missing cells so the grid stays rectangular', () => {
    const layout = buildMatrixLayout(groupFor('Q1_1_1,Q1_1_2,Q1_2_1'))
    expect(layout.rows).toEqual([
      { index: '1', label: 'Row 1' },
      { index: '2', label: 'Row 2' },
    ])
    expect(layout.columns).toEqual([
      { index: '1', label: 'Column 1' },
      { index: '2', label: 'Column 2' },
    ])
    const cells = fillMatrix(layout, { Q1_1_1: 'a', Q1_1_2: 'b', Q1_2_1: '' })
    expect(cells).toEqual([
      [
        { header: 'Q1_1_1', value: 'a' },
        { header: 'Q1_1_2', value: 'b' },
      ],
      [
        { header: 'Q1_2_1', value: '' },
        { header: null, value: '' },
      ],
    ])
    for (const row of cells) expect(row).toHaveLength(layout.columns.length)
  })

  it('sorts rows by index and keeps column order from the export', () => {
    const layout = buildMatrixLayout(groupFor('Q2_10_2,Q2_2_2,Q2_10_1,Q2_2_1'))
    expect(layout.rows.map((r) => r.index)).toEqual(['2', '10'])
    expect(layout.columns.map((c) => c.index)).toEqual(['2', '1'])
  })

  it('moves suffix columns out of the grid', () => {
    const layout = buildMatrixLayout(groupFor('Q3_1_1,Q3_1_2,Q3_2_1,Q3_2_2,Q3_2_TEXT'))
    expect(layout.extras.map((c) => c.key.header)).toEqual(['Q3_2_TEXT'])
    expect(layout.cells.flat().filter(Boolean)).toHaveLength(4)
  })

  it('a declared matrix with one-level keys gets a single Response column', () => {
    const q5: QuestionMetadata = {
      id: 'Q5',
      text: 'Rate',
      archetype: 'matrix',
      choices: { '1': 'Speed', '2': 'Price' },
      choiceOrder: ['1', '2'],
      answers: {},
      answerOrder: [],
    }
    const metadata: MetadataMap = new Map([['Q5', q5]])
    const layout = buildMatrixLayout(groupFor('Q5_1,Q5_2', metadata))
    expect(layout.columns).toEqual([{ index: '1', label: 'Response' }])
    expect(layout.rows).toEqual([
      { index: '1', label: 'Speed' },
      { index: '2', label: 'Price' },
    ])
  })
})

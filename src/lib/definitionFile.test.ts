import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, beforeAll, describe, it, expect } from 'vitest'
import { getAnswerLabel, getChoiceLabel, loadDefinitionFile, parseDefinitionText } from './definitionFile'

const qsf = {
  SurveyEntry: { SurveyName: 'Test survey' },
  SurveyElements: [
    { Element: 'BL', PrimaryAttribute: 'Survey Blocks', Payload: [] },
    {
      Element: 'SQ',
      PrimaryAttribute: 'QID1',
      Payload: {
        DataExportTag: 'Q1',
        QuestionText: '<b>Rate</b> our service',
        QuestionType: 'Matrix',
        Selector: 'Likert',
        SubSelector: 'SingleAnswer',
        Choices: { '4': { Display: 'Speed' }, '7': { Display: 'Price' } },
        ChoiceOrder: [4, 7],
        Answers: { '1': { Display: 'Poor' }, '2': { Display: 'Good' } },
        AnswerOrder: [1, 2],
      },
    },
    {
      Element: 'SQ',
      PrimaryAttribute: 'QID2',
      Payload: { DataExportTag: 'Q2', QuestionText: 'Pick all that apply', QuestionType: 'MC', Selector: 'MAVR', SubSelector: 'TX', Choices: [] },
    },
    {
      Element: 'SQ',
      PrimaryAttribute: 'QID3',
      Payload: { DataExportTag: 'Q3', QuestionText: 'Pick one', QuestionType: 'MC', Selector: 'SAVR' },
    },
  ],
}

describe('parseDefinitionText', () => {
  it('reads QSF questions by export tag with declared types', () => {
    const { metadata, format, warnings } = parseDefinitionText(JSON.stringify(qsf))
    expect(format).toBe('qsf')
    expect(warnings).toEqual([])
    expect([...metadata.keys()]).toEqual(['Q1', 'Q2', 'Q3'])

    const q1 = metadata.get('Q1')
    expect(q1?.text).toBe('Rate our service')
    expect(q1?.archetype).toBe('matrix')
    expect(q1?.sourceType).toBe('Matrix/Likert/SingleAnswer')
    expect(q1?.choiceOrder).toEqual(['4', '7'])
    expect(metadata.get('Q2')?.archetype).toBe('multiSelect')
    expect(metadata.get('Q3')?.archetype).toBeUndefined()
  })

  it('looks labels up by id, then by 1-based position', () => {
    const q1 = parseDefinitionText(JSON.stringify(qsf)).metadata.get('Q1')
    expect(getChoiceLabel(q1, '4')).toBe('Speed')
    expect(getChoiceLabel(q1, '2')).toBe('Price')
    expect(getChoiceLabel(q1, '9')).toBeUndefined()
    expect(getAnswerLabel(q1, '2')).toBe('Good')
    expect(getAnswerLabel(undefined, '1')).toBeUndefined()
  })

  it('reads a plain YAML definition', () => {
    const yaml = [
      'questions:',
      '  Q3:',
      '    text: Favourite colours',
      '    type: multiSelect',
      '  Q4:',
      '    text: Rate',
      '    rows:',
      '      1: Speed',
      '      2: Price',
      '    columns:',
      '      1: Poor',
      '      2: Good',
    ].join('\n')
    const { metadata, format } = parseDefinitionText(yaml, true)
    expect(format).toBe('definition')
    expect(metadata.get('Q3')?.archetype).toBe('multiSelect')
    expect(metadata.get('Q4')?.archetype).toBeUndefined()
    expect(metadata.get('Q4')?.choices).toEqual({ '1': 'Speed', '2': 'Price' })
    expect(getAnswerLabel(metadata.get('Q4'), '2')).toBe('Good')
  })

  it('returns empty metadata with a warning for malformed content', () => {
    const broken = parseDefinitionText('{oops')
    expect(broken.metadata.size).toBe(0)
    expect(broken.format).toBeNull()
    expect(broken.warnings[0]).toMatch(/^Definition file could not be parsed: /)

    expect(parseDefinitionText('{"foo": 1}').warnings).toEqual([
      'Definition file has neither "SurveyElements" nor "questions". Falling back to header inference.',
    ])
  })
})

describe('loadDefinitionFile', () => {
  let dir: string

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'survey-definition-'))
  })

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('no path is a valid state without warnings', () => {
    expect(loadDefinitionFile(undefined)).toEqual({ metadata: new Map(), format: null, warnings: [] })
  })

  it('warns when the file does not exist', () => {
    const path = join(dir, 'missing.qsf')
    expect(loadDefinitionFile(path).warnings).toEqual([`Definition file not found: ${path}. Falling back to header inference.`])
  })

  it('picks the YAML reader by extension', () => {
    const path = join(dir, 'survey.yml')
    writeFileSync(path, 'questions:\n  Q1:\n    text: Hello\n', 'utf-8')
    const loaded = loadDefinitionFile(path)
    expect(loaded.format).toBe('definition')
    expect(loaded.metadata.get('Q1')?.text).toBe('Hello')
  })

  it('reads a QSF file', () => {
    const path = join(dir, 'survey.qsf')
    writeFileSync(path, JSON.stringify(qsf), 'utf-8')
    expect(loadDefinitionFile(path).metadata.size).toBe(3)
  })
})

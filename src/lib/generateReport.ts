/**
 * One report run: read and decode the export, load the definition, group and
 * classify columns, build the model, render, then write the document once.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs'
import type { ResponseTable } from '../types'
import type { ReportOptions } from './config'
import { parseResponseTable } from './csvParse'
import { loadDefinitionFile, type LoadedDefinition } from './definitionFile'
import { decodeExport } from './encoding'
import { errorMessage, InputNotFoundError, OutputWriteError } from './errors'
import { silentLogger, type Logger } from './logger'
import { buildQuestionGroups } from './questionGroups'
import { renderReportHtml } from './renderReport'
import { buildReport, type Report } from './reportModel'

export interface GenerateResult {
  outputPath: string
  respondents: number
  questions: number
  warnings: string[]
}

export interface ComposeInput {
  table: ResponseTable
  definition: LoadedDefinition
  options: Pick<ReportOptions, 'title' | 'debug' | 'includeTiming'>
  now?: Date
  logger?: Logger
}

/** In-memory part of a run, no file access */
export function composeReport({ table, definition, options, now, logger = silentLogger }: ComposeInput): Report {
  const groups = buildQuestionGroups(table, definition.metadata)
  for (const g of groups) {
    logger.debug(`${g.baseId}: ${g.archetype} via ${g.rule} (${g.columns.length} columns, ${g.metadataSource})`)
  }
  return buildReport(table, groups, {
    title: options.title,
    debug: options.debug,
    includeTiming: options.includeTiming,
    metadataFormat: definition.format,
    warnings: [...table.warnings, ...definition.warnings],
    now,
  })
}

export function readResponseTable(inputPath: string, logger: Logger = silentLogger): ResponseTable {
  if (!existsSync(inputPath)) throw new InputNotFoundError(`Input file not found: ${inputPath}`)
  let buf: Buffer
  try {
    buf = readFileSync(inputPath)
  } catch (e) {
    throw new InputNotFoundError(`Input file could not be read: ${errorMessage(e)}`, { cause: e })
  }
  const { text, encoding } = decodeExport(buf)
  logger.debug(`Decoded ${inputPath} as ${encoding}`)
  const table = parseResponseTable(text, logger)
  logger.info(`Loaded ${table.rows.length} responses with ${table.headers.length} columns`)
  return table
}

export function generateReport(options: ReportOptions, logger: Logger = silentLogger, now: Date = new Date()): GenerateResult {
  const table = readResponseTable(options.inputPath, logger)
  const definition = loadDefinitionFile(options.definitionPath, logger)
  const report = composeReport({ table, definition, options, now, logger })
  const html = renderReportHtml(report)

  try {
    writeFileSync(options.outputPath, html, 'utf-8')
  } catch (e) {
    throw new OutputWriteError(`Could not write report to ${options.outputPath}: ${errorMessage(e)}`, { cause: e })
  }
  logger.info(`Report written to ${options.outputPath}`)

  return {
    outputPath: options.outputPath,
    respondents: report.summary.respondents,
    questions: report.summary.questions,
    warnings: report.warnings,
  }
}

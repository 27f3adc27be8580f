#!/usr/bin/env node
/**
 * survey-report CLI
 *
 * Usage:
 *   survey-report responses.csv
 *   survey-report responses.csv -q survey.qsf -o report.html
 *   survey-report responses.csv --debug --log
 */

import { pathToFileURL } from 'node:url'
import { DEFAULT_LOG_PATH, resolveOptions, type ReportOptionsInput } from './lib/config'
import { errorMessage, ReportError } from './lib/errors'
import { generateReport } from './lib/generateReport'
import { createLogger, type Logger } from './lib/logger'

export const HELP_TEXT = `
survey-report - Render survey responses to a static HTML report

Usage:
  survey-report [options] <input.csv>

Options:
  -q, --definition <file>   Survey definition (.qsf, .json, .yaml)
  -o, --output <file>       Output HTML file (default: survey_report.html)
  -d, --debug               Show classification details in the report
  -l, --log [file]          Write a log file (default: debug.log); also --log=<file>
  --timing                  Include page timing questions
  -h, --help                Show this help

Environment:
  SURVEY_REPORT_OUTPUT, SURVEY_REPORT_DEBUG, SURVEY_REPORT_LOG
`

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'error'; message: string }
  | { kind: 'run'; options: Partial<ReportOptionsInput> }

const VALUE_OPTIONS: ReadonlySet<string> = new Set(['-q', '--definition', '-o', '--output'])

function positionalFrom(args: string[], from: number): boolean {
  for (let j = from; j < args.length; j++) {
    if (VALUE_OPTIONS.has(args[j])) j++
    else if (!args[j].startsWith('-')) return true
  }
  return false
}

export function parseArgs(args: string[]): ParsedArgs {
  const options: Partial<ReportOptionsInput> = {}
  const positional: string[] = []

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const takeValue = (): string | null => {
      const next = args[i + 1]
      if (next === undefined || next.startsWith('-')) return null
      i++
      return next
    }

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' }
      case '-q':
      case '--definition': {
        const v = takeValue()
        if (v === null) return { kind: 'error', message: `${arg} requires a file path` }
        options.definitionPath = v
        break
      }
      case '-o':
      case '--output': {
        const v = takeValue()
        if (v === null) return { kind: 'error', message: `${arg} requires a file path` }
        options.outputPath = v
        break
      }
      case '-d':
      case '--debug':
        options.debug = true
        break
      case '-l':
      case '--log': {
        // The file is optional: a path is the log file only if the input comes before or after it
        const next = args[i + 1]
        if (next !== undefined && !next.startsWith('-') && (positional.length > 0 || positionalFrom(args, i + 2))) {
          options.logPath = next
          i++
        } else {
          options.logPath = DEFAULT_LOG_PATH
        }
        break
      }
      case '--timing':
        options.includeTiming = true
        break
      default:
        if (arg.startsWith('--log=')) {
          options.logPath = arg.slice('--log='.length) || DEFAULT_LOG_PATH
          break
        }
        if (arg.startsWith('-')) return { kind: 'error', message: `Unknown option: ${arg}` }
        positional.push(arg)
    }
  }

  if (positional.length === 0) return { kind: 'error', message: 'Input file required' }
  if (positional.length > 1) return { kind: 'error', message: `Unexpected argument: ${positional[1]}` }
  options.inputPath = positional[0]
  return { kind: 'run', options }
}

/** Returns the process exit code */
export function main(args: string[], env: NodeJS.ProcessEnv = process.env): number {
  const parsed = parseArgs(args)
  if (parsed.kind === 'help') {
    console.log(HELP_TEXT)
    return 0
  }
  if (parsed.kind === 'error') {
    console.error(`Error: ${parsed.message}`)
    console.error(HELP_TEXT)
    return 1
  }

  const resolved = resolveOptions(parsed.options, env)
  if (!resolved.ok) {
    for (const issue of resolved.issues) console.error(`Error: ${issue}`)
    return 1
  }
  const options = resolved.options

  let logger: Logger
  try {
    logger = createLogger({ level: options.debug ? 'debug' : 'warn', filePath: options.logPath })
  } catch (e) {
    console.error(`Error: could not open log file ${options.logPath}: ${errorMessage(e)}`)
    return 1
  }

  try {
    const result = generateReport(options, logger)
    console.log(`✓ Report written to ${result.outputPath}`)
    console.log(`  ${result.respondents} respondents, ${result.questions} questions`)
    if (result.warnings.length > 0) console.log(`  ${result.warnings.length} warning(s); see log for details`)
    return 0
  } catch (e) {
    if (e instanceof ReportError) {
      logger.error(e.message)
    } else {
      logger.error(`Unexpected failure: ${errorMessage(e)}`)
      if (e instanceof Error && e.stack) logger.debug(e.stack)
    }
    return 1
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exit(main(process.argv.slice(2)))
}

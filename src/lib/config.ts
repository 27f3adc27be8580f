import { z } from 'zod'

export const DEFAULT_OUTPUT_PATH = 'survey_report.html'
export const DEFAULT_LOG_PATH = 'debug.log'

const flag = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === 'boolean' ? v : /^(1|true|yes|on)$/i.test(v.trim())))

export const reportOptionsSchema = z
  .object({
    inputPath: z.string().min(1, 'An input file is required.'),
    definitionPath: z.string().min(1).optional(),
    outputPath: z.string().min(1).default(DEFAULT_OUTPUT_PATH),
    debug: flag.default(false),
    logPath: z.string().min(1).optional(),
    includeTiming: flag.default(false),
    title: z.string().min(1).default('Survey Report'),
  })
  .strict()

export type ReportOptions = z.infer<typeof reportOptionsSchema>
export type ReportOptionsInput = z.input<typeof reportOptionsSchema>

/** Options read from SURVEY_REPORT_* variables. CLI flags override these. */
export function optionsFromEnv(env: NodeJS.ProcessEnv): Partial<ReportOptionsInput> {
  const out: Partial<ReportOptionsInput> = {}
  if (env.SURVEY_REPORT_OUTPUT) out.outputPath = env.SURVEY_REPORT_OUTPUT
  if (env.SURVEY_REPORT_DEBUG) out.debug = env.SURVEY_REPORT_DEBUG
  if (env.SURVEY_REPORT_LOG) out.logPath = env.SURVEY_REPORT_LOG
  return out
}

export type ResolvedOptions =
  | { ok: true; options: ReportOptions }
  | { ok: false; issues: string[] }

export function resolveOptions(
  cli: Partial<ReportOptionsInput>,
  env: NodeJS.ProcessEnv = {}
): ResolvedOptions {
  const parsed = reportOptionsSchema.safeParse({ ...optionsFromEnv(env), ...cli })
  if (parsed.success) return { ok: true, options: parsed.data }
  return {
    ok: false,
    issues: parsed.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)),
  }
}

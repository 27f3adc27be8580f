import type { CSSProperties } from 'react'

export const theme = {
  colors: {
    accent: '#0173b2',
    text: '#1f2933',
    textMuted: '#52606d',
    textFaded: '#9aa5b1',
    border: '#d9e2ec',
    background: '#f5f7fa',
    surface: '#ffffff',
    surfaceMuted: '#f0f4f8',
    debug: '#de8f05',
    matrix: '#029e73',
    link: '#0173b2',
  },
  font: {
    family: "-apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, 'Helvetica Neue', Arial, sans-serif",
    mono: "'SFMono-Regular', Consolas, 'Liberation Mono', Menlo, monospace",
  },
} as const

export const styles = {
  root: {
    fontFamily: theme.font.family,
    color: theme.colors.text,
    background: theme.colors.background,
    margin: 0,
    lineHeight: 1.5,
  },
  main: { maxWidth: 960, margin: '0 auto', padding: '24px 16px 48px' },
  appHeader: {
    background: theme.colors.surface,
    border: `1px solid ${theme.colors.border}`,
    borderTop: `4px solid ${theme.colors.accent}`,
    borderRadius: 8,
    padding: '20px 24px',
    marginBottom: 24,
  },
  appDesc: { margin: '4px 0 0', fontSize: 13, color: theme.colors.textMuted },
  textHero: { margin: 0, fontSize: 26, fontWeight: 700 },
  textSection: { margin: '0 0 4px', fontSize: 18, fontWeight: 600 },
  textLabel: { fontSize: 13, fontWeight: 600, color: theme.colors.textMuted },
  textBody: { fontSize: 14, lineHeight: 1.6 },
  summaryGrid: { display: 'flex', flexWrap: 'wrap', gap: 12, marginTop: 16 },
  summaryStat: {
    flex: '1 1 140px',
    background: theme.colors.surfaceMuted,
    borderRadius: 6,
    padding: '10px 14px',
  },
  summaryValue: { display: 'block', fontSize: 22, fontWeight: 700, color: theme.colors.accent },
  questionCard: {
    background: theme.colors.surface,
    border: `1px solid ${theme.colors.border}`,
    borderRadius: 8,
    padding: '16px 20px',
    marginBottom: 20,
  },
  questionId: {
    display: 'inline-block',
    fontSize: 12,
    fontWeight: 600,
    color: theme.colors.surface,
    background: theme.colors.accent,
    borderRadius: 4,
    padding: '1px 8px',
    marginRight: 8,
  },
  responseBlock: {
    borderTop: `1px solid ${theme.colors.border}`,
    padding: '12px 0 4px',
  },
  respondent: { fontSize: 13, color: theme.colors.textMuted, marginBottom: 6 },
  tableHeader: {
    padding: '6px 10px',
    borderBottom: `2px solid ${theme.colors.border}`,
    background: theme.colors.surfaceMuted,
    fontSize: 12,
    fontWeight: 600,
    textAlign: 'left',
  },
  tableCell: { padding: '6px 10px', borderBottom: `1px solid ${theme.colors.border}`, fontSize: 13, verticalAlign: 'top' },
  emptyCell: { color: theme.colors.textFaded },
  pre: {
    fontFamily: theme.font.mono,
    fontSize: 12,
    background: theme.colors.surfaceMuted,
    borderRadius: 4,
    padding: 10,
    margin: 0,
    overflowX: 'auto',
    whiteSpace: 'pre-wrap',
  },
  badge: {
    display: 'inline-block',
    fontSize: 11,
    borderRadius: 10,
    padding: '1px 8px',
    background: theme.colors.surfaceMuted,
    color: theme.colors.textMuted,
  },
  debugPanel: {
    marginTop: 8,
    padding: '6px 10px',
    fontSize: 12,
    fontFamily: theme.font.mono,
    borderLeft: `3px solid ${theme.colors.debug}`,
    background: '#fff8eb',
  },
  warning: { fontSize: 13, color: '#8a4b08' },
} satisfies Record<string, CSSProperties>

/** Rules inline styles cannot express */
export const documentCss = `
*{box-sizing:border-box}
a{color:${theme.colors.link}}
.matrix-table tbody tr:nth-child(even) td,.checkmark-table tbody tr:nth-child(even) td{background:${theme.colors.surfaceMuted}}
@media print{
  body{background:#fff}
  .question-card{break-inside:avoid}
  .debug-info{display:none}
}
`

import { renderToStaticMarkup } from 'react-dom/server'
import { ReportDocument } from '../modules/ReportDocument'
import type { Report } from './reportModel'

/** Whole document as one string; React escapes every text node and attribute. */
export function renderReportHtml(report: Report): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(<ReportDocument report={report} />)}`
}

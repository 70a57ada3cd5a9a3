export {
  exportColumns,
  exportDelimited,
  flattenRecord,
  formatCell,
  quoteCell,
  toDelimited,
  HEADER_MODES,
  isHeaderMode,
} from './exporter.js';
export type { ExportColumn, ExportOptions, HeaderMode } from './exporter.js';
export { buildIssueReport, writeIssueReport } from './report.js';
export type { IssueReport, IssueReportInput } from './report.js';

export { VERSION, parseDiffArgs, usageText } from './command.js';
export type { DiffCommand } from './command.js';
export { formatArchivedOrgs, formatCommits, listArchivedOrgs, listCommits } from './orgs.js';
export type { ArchivedOrg } from './orgs.js';
export {
  DIFF_PAGE_TEMPLATE,
  REPORT_LIST_TEMPLATE,
  itemSlug,
  renderDiffHtml,
  renderDiffPage,
  renderReportList,
} from './render.js';
export type { DiffPageFields, ReportListFields } from './render.js';
export {
  DEFAULT_FIRST_REF,
  DEFAULT_SECOND_REF,
  generateDiffReport,
  openSettingsRepository,
} from './report.js';
export type { DiffReportOptions, DiffReportResult } from './report.js';

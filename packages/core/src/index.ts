export {
  DashboardGitError,
  UsageError,
  ConfigError,
  SetupError,
  TemplateError,
  errorMessage,
  exitCodeForError,
} from './errors.js';
export type { DashboardGitErrorCode } from './errors.js';
export { createLogger, silentLogger, isLogLevel, LOG_LEVELS } from './log.js';
export type { Logger, LoggerOptions, LogLevel } from './log.js';
export {
  resolveConfig,
  loadConfigFile,
  requireApiKey,
  CONFIG_DEFAULTS,
  DEFAULT_CONFIG_FILE,
  BACKUP_FORMATS,
} from './config.js';
export type { BackupFormat, ConfigFile, ResolvedConfig, ResolveConfigOptions } from './config.js';
export { reportStamp, scanStamp, verboseDate, formatDuration } from './time.js';
export { orgLayout, orgWebLayout, templatesDir, REPO_INIT_FILE } from './layout.js';
export type { OrgLayout, OrgWebLayout } from './layout.js';
export {
  GitRepository,
  GitCommandError,
  execGit,
  parseNameStatus,
  parseOnelineLog,
  partitionChanges,
} from './git.js';
export type {
  ChangeKind,
  ChangeSet,
  ChangedPath,
  CommitInfo,
  GitIdentity,
  GitResult,
  GitRunner,
  OnelineCommit,
} from './git.js';
export { escapeHtml, renderTemplate, loadTemplate, templatePlaceholders } from './template.js';
export type { TemplateFields } from './template.js';
export {
  ORG_INDEX_TEMPLATE,
  SCAN_HISTORY_LIMIT,
  emptyOrgSummary,
  loadOrgSummary,
  publishOrgSummary,
  recordDiffReport,
  recordScan,
  renderDiffItems,
  renderOrgIndex,
} from './org-summary.js';
export type { DiffItem, DiffRecord, LastScan, OrgSummary, ScanCommit } from './org-summary.js';
export { parseArgs, hasFlag } from './args.js';
export type { ParsedArgv } from './args.js';

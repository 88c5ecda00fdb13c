export { archiveOrganization, estimateOrganization, fetchEntityLists, formatOrganizations } from './archive.js';
export type { ArchiveOptions, ArchiveResult } from './archive.js';
export {
  CatalogError,
  DEFAULT_CATALOG,
  EXPORTED_OPERATIONS_FILE,
  exportOperationsCsv,
  findRule,
  findUnusedOperations,
  isSkipped,
  loadEndpointCatalog,
  parseEndpointCatalog,
  parseListCell,
  parseLogic,
} from './catalog.js';
export type { EndpointCatalog, EndpointRule, RuleLogic } from './catalog.js';
export {
  commitMessage,
  commitSettings,
  ensureOrgDirectories,
  ensureRepository,
  recentScans,
  resetSettingsTree,
  writeScanLog,
} from './committer.js';
export type { ScanLogRecord } from './committer.js';
export { ArchiveContext, filterByTag, networkEntities } from './context.js';
export type { EntityLists, NetworkEntity } from './context.js';
export { deviceFamily } from './device-family.js';
export type { DeviceFamily } from './device-family.js';
export { estimateScan, formatEstimate } from './estimate.js';
export type { ScanEstimate } from './estimate.js';
export { executeCalls, runPool } from './executor.js';
export type { PhaseStats } from './executor.js';
export { deviceDirectory, networkDirectory, settingFileName } from './file-names.js';
export { collectMetrics } from './metrics.js';
export type { ArchiveMetrics } from './metrics.js';
export { DEFAULT_FINGERPRINTS_DIR, SettingsWriter, loadFingerprints } from './persistence.js';
export type { SettingsReader, WriteOutcome } from './persistence.js';
export { PHASES } from './planner.js';
export type { Phase, PhaseName, PlanInput, PlannedCall } from './planner.js';

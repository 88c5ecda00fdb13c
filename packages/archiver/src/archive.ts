/**
 * One archival run for one organization, and the two read-only commands
 * that share its client: listing organizations and estimating a scan.
 */

import { join } from 'node:path';

import {
  GitRepository,
  formatDuration,
  loadOrgSummary,
  orgLayout,
  orgWebLayout,
  publishOrgSummary,
  recordScan,
  scanStamp,
  silentLogger,
  templatesDir,
  verboseDate,
  type GitRunner,
  type Logger,
  type ResolvedConfig,
} from '@dashboard-git/core';
import {
  buildOperationTable,
  extractGetOperations,
  type DashboardClient,
  type Organization,
} from '@dashboard-git/dashboard-client';

import { EXPORTED_OPERATIONS_FILE, exportOperationsCsv, findUnusedOperations, loadEndpointCatalog } from './catalog.js';
import {
  commitSettings,
  ensureOrgDirectories,
  ensureRepository,
  recentScans,
  resetSettingsTree,
  writeScanLog,
} from './committer.js';
import { ArchiveContext, filterByTag, type EntityLists } from './context.js';
import { estimateScan, type ScanEstimate } from './estimate.js';
import { addStats, emptyStats, executeCalls, type PhaseStats } from './executor.js';
import { deviceDirectory, networkDirectory } from './file-names.js';
import { collectMetrics, type ArchiveMetrics } from './metrics.js';
import { DEFAULT_FINGERPRINTS_DIR, SettingsWriter, loadFingerprints } from './persistence.js';
import { PHASES } from './planner.js';

export interface ArchiveOptions {
  config: ResolvedConfig;
  orgId: string;
  /** Limits the run to networks carrying this tag. */
  tag?: string;
  client: DashboardClient;
  git?: GitRunner;
  logger?: Logger;
  now?: () => Date;
}

export interface ArchiveResult {
  organization: Organization;
  commit?: string;
  stats: PhaseStats;
  metrics: ArchiveMetrics;
  unusedOperations: string[];
  scanLog: string;
  indexPage: string;
  durationMs: number;
}

async function createEntityDirectories(writer: SettingsWriter, context: ArchiveContext): Promise<void> {
  for (const device of context.devices) {
    await writer.ensureDirectory(deviceDirectory(device));
  }
  for (const entity of context.networkEntities()) {
    await writer.ensureDirectory(networkDirectory(entity));
  }
}

export async function archiveOrganization(opts: ArchiveOptions): Promise<ArchiveResult> {
  const { config, orgId, client } = opts;
  const logger = opts.logger ?? silentLogger;
  const now = opts.now ?? (() => new Date());
  const startedAt = now();

  const layout = orgLayout(config.basePath, orgId);
  ensureOrgDirectories(layout, logger);

  const organization = await client.getOrganization(orgId);
  logger.info(`Archiving ${organization.name} (${orgId})`);

  const repo = new GitRepository(layout.settingsDir, { runner: opts.git, identity: config.git });
  await ensureRepository(repo, organization, logger);

  const openApi = await client.getOrganizationOpenApiSpec(orgId);
  const liveOperations = extractGetOperations(openApi);
  await exportOperationsCsv(liveOperations, join(layout.scaninfoDir, EXPORTED_OPERATIONS_FILE));
  const operations = buildOperationTable(openApi);
  logger.debug(`Live API has ${liveOperations.length} GET operations`);

  const catalog = await loadEndpointCatalog(join(layout.scaninfoDir, config.operationsFile), { logger });
  const fingerprints = await loadFingerprints(
    config.defaultConfigsDir ? [DEFAULT_FINGERPRINTS_DIR, config.defaultConfigsDir] : [DEFAULT_FINGERPRINTS_DIR]
  );

  await resetSettingsTree(layout.settingsDir);
  const writer = new SettingsWriter({ root: layout.settingsDir, format: config.backupFormat, fingerprints });
  const context = new ArchiveContext(orgId);

  let stats = emptyStats();
  for (const phase of PHASES) {
    if (phase.name === 'devices') {
      if (opts.tag) {
        context.applyTagFilter(opts.tag);
        logger.info(
          `Tag ${opts.tag}: ${context.networks.length} networks and ${context.devices.length} devices selected`
        );
      }
      await createEntityDirectories(writer, context);
    }

    const calls = phase.plan({
      catalog,
      operations,
      organizationId: orgId,
      entities: context,
      archived: writer,
      logger: logger.child(phase.name),
    });
    logger.info(`Archiving ${phase.title}: ${calls.length} calls`);

    const phaseStats = await executeCalls(calls, {
      client,
      operations,
      context,
      writer,
      concurrency: config.maxConcurrentRequests,
      logger: logger.child(phase.name),
    });
    stats = addStats(stats, phaseStats);
  }

  const finishedAt = now();
  const commit = await commitSettings(repo, finishedAt, logger);

  const unusedOperations = findUnusedOperations(liveOperations, catalog, context.completedOperations);
  if (unusedOperations.length > 0) {
    logger.warn(
      `${unusedOperations.length} GET operations in the live API were not called during this run. ` +
        `Review ${catalog.path} and mark them 'skipped' to silence this: ${unusedOperations.join(', ')}`
    );
  }

  const metrics = await collectMetrics(layout.settingsDir);
  const durationMs = finishedAt.getTime() - startedAt.getTime();

  const scanLog = await writeScanLog(
    layout.scaninfoDir,
    {
      scanEnd: scanStamp(finishedAt),
      orgId,
      orgName: organization.name,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs,
      tag: opts.tag ?? null,
      requests: client.requestCount,
      calls: {
        planned: stats.planned,
        succeeded: stats.succeeded,
        failed: stats.failed,
        written: stats.outcomes.written,
        skippedEmpty: stats.outcomes.empty,
        skippedDefault: stats.outcomes.default,
        skippedUnassigned: stats.outcomes.unassigned,
      },
      commit: commit ?? null,
      unusedOperations,
    },
    finishedAt
  );

  const web = orgWebLayout(config.web.publishDir, orgId);
  const summary = recordScan(
    loadOrgSummary(web, organization.name),
    {
      completedAt: verboseDate(finishedAt),
      networks: metrics.networks,
      devices: metrics.devices,
      settings: metrics.totalSettings,
    },
    await recentScans(repo)
  );
  const indexPage = publishOrgSummary(web, templatesDir(config.web.publishDir), summary);

  logger.info(
    `Done in ${formatDuration(durationMs)}: ${stats.succeeded}/${stats.planned} calls succeeded, ` +
      `${metrics.totalSettings} settings archived`
  );

  return { organization, commit, stats, metrics, unusedOperations, scanLog, indexPage, durationMs };
}

export async function fetchEntityLists(client: DashboardClient, orgId: string, tag?: string): Promise<EntityLists> {
  const lists: EntityLists = {
    networks: await client.getOrganizationNetworks(orgId),
    templates: await client.getOrganizationConfigTemplates(orgId),
    devices: await client.getOrganizationDevices(orgId),
  };
  return tag ? filterByTag(lists, tag) : lists;
}

export async function estimateOrganization(client: DashboardClient, orgId: string, tag?: string): Promise<ScanEstimate> {
  return estimateScan(await fetchEntityLists(client, orgId, tag));
}

export function formatOrganizations(orgs: readonly Organization[]): string {
  return orgs.map((o) => `OrgId: ${o.id.padEnd(24)} - ${o.name}`).join('\n');
}

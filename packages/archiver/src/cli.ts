#!/usr/bin/env tsx

import { join } from 'node:path';

import {
  UsageError,
  createLogger,
  errorMessage,
  exitCodeForError,
  orgLayout,
  reportStamp,
  requireApiKey,
  resolveConfig,
} from '@dashboard-git/core';
import { DashboardClient } from '@dashboard-git/dashboard-client';

import { archiveOrganization, estimateOrganization, formatOrganizations } from './archive.js';
import { ensureOrgDirectories } from './committer.js';
import { VERSION, parseArchiveArgs } from './command.js';
import { formatEstimate } from './estimate.js';

async function main(): Promise<void> {
  const parsed = parseArchiveArgs(process.argv.slice(2));

  if (parsed.command === 'version') {
    process.stdout.write(`dashboard-archive ${VERSION}\n`);
    return;
  }

  const config = await resolveConfig({ configPath: parsed.configPath });
  let logger = createLogger('dashboard-archive', { level: config.logLevel });
  if (parsed.command === 'getsettings') {
    const layout = orgLayout(config.basePath, parsed.orgId);
    ensureOrgDirectories(layout, logger);
    logger = createLogger('dashboard-archive', {
      level: config.logLevel,
      file: join(layout.scaninfoDir, `archive-${reportStamp(new Date())}.log`),
    });
  }

  const client = new DashboardClient({
    apiKey: requireApiKey(config),
    baseUrl: config.apiBaseUrl,
    maxRetries: config.maxRetries,
    logger: logger.child('api'),
  });

  if (parsed.command === 'listorgs') {
    const orgs = await client.getOrganizations();
    process.stdout.write('This API key has access to the following organizations:\n');
    process.stdout.write(`${formatOrganizations(orgs)}\n`);
    return;
  }

  if (parsed.command === 'estimatescan') {
    logger.info('Working, please be patient while the organization is counted');
    const estimate = await estimateOrganization(client, parsed.orgId, parsed.tag);
    process.stdout.write(`${formatEstimate(parsed.orgId, estimate)}\n`);
    return;
  }

  const result = await archiveOrganization({ config, orgId: parsed.orgId, tag: parsed.tag, client, logger });

  process.stdout.write(
    [
      `Organization: ${result.organization.name} (${result.organization.id})`,
      `Commit: ${result.commit ?? 'none (nothing changed)'}`,
      `Org settings: ${result.metrics.orgSettings}`,
      `Devices: ${result.metrics.devices} (${result.metrics.deviceSettings} settings)`,
      `Networks: ${result.metrics.networks} (${result.metrics.networkSettings} settings)`,
      `Total settings: ${result.metrics.totalSettings}`,
      `Failed calls: ${result.stats.failed}`,
      `Scan log: ${result.scanLog}`,
      `Summary page: ${result.indexPage}`,
    ].join('\n') + '\n'
  );
}

main().catch((err: unknown) => {
  process.stderr.write(`${err instanceof UsageError ? err.message : `Error: ${errorMessage(err)}`}\n`);
  process.exitCode = exitCodeForError(err);
});

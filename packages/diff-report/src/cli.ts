#!/usr/bin/env tsx

import { UsageError, createLogger, errorMessage, exitCodeForError, resolveConfig } from '@dashboard-git/core';

import { VERSION, parseDiffArgs } from './command.js';
import { formatArchivedOrgs, formatCommits, listArchivedOrgs, listCommits } from './orgs.js';
import { generateDiffReport } from './report.js';

async function main(): Promise<void> {
  const parsed = parseDiffArgs(process.argv.slice(2));

  if (parsed.command === 'version') {
    process.stdout.write(`dashboard-diff ${VERSION}\n`);
    return;
  }

  const config = await resolveConfig({ configPath: parsed.configPath });
  const logger = createLogger('dashboard-diff', { level: config.logLevel });

  if (parsed.command === 'listorgs') {
    process.stdout.write('Organizations with an archived settings repository:\n');
    process.stdout.write(`${formatArchivedOrgs(await listArchivedOrgs(config))}\n`);
    return;
  }

  if (parsed.command === 'listcommits') {
    const commits = await listCommits(config, parsed.orgId);
    process.stdout.write(`Commits for organization ${parsed.orgId}:\n`);
    process.stdout.write(`${formatCommits(commits)}\n`);
    return;
  }

  const result = await generateDiffReport({
    config,
    orgId: parsed.orgId,
    firstRef: parsed.firstRef,
    secondRef: parsed.secondRef,
    logger,
  });

  process.stdout.write(
    [
      `Report: ${result.listPage}`,
      `Added: ${result.record.added}`,
      `Modified: ${result.record.modified}`,
      `Deleted: ${result.record.deleted}`,
      `Not rendered: ${result.other.length}`,
      `Summary page: ${result.indexPage}`,
    ].join('\n') + '\n'
  );
}

main().catch((err: unknown) => {
  process.stderr.write(`${err instanceof UsageError ? err.message : `Error: ${errorMessage(err)}`}\n`);
  process.exitCode = exitCodeForError(err);
});

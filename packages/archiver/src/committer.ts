/**
 * Repository committer: the on-disk side of an archival run.
 */

import { mkdirSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import { join } from 'node:path';

import {
  GitCommandError,
  REPO_INIT_FILE,
  SCAN_HISTORY_LIMIT,
  SetupError,
  errorMessage,
  scanStamp,
  silentLogger,
  verboseDate,
  type GitRepository,
  type Logger,
  type OrgLayout,
  type ScanCommit,
} from '@dashboard-git/core';

export const INITIAL_COMMIT_MESSAGE = 'Initial commit';

export function ensureOrgDirectories(layout: OrgLayout, logger: Logger = silentLogger): void {
  for (const dir of [layout.settingsDir, layout.scaninfoDir]) {
    try {
      const created = mkdirSync(dir, { recursive: true });
      if (created) logger.info(`Created ${dir}`);
    } catch (err) {
      throw new SetupError(`Unable to create ${dir}: ${errorMessage(err)}. Check permissions on ${layout.root}`, {
        cause: err,
      });
    }
  }
}

export function repositoryDescription(orgId: string, orgName: string): string {
  return `Dashboard settings repository for ${orgName} with orgid ${orgId}`;
}

/**
 * Initializes the settings repository on first use: description, an empty
 * `repo_init` marker and the initial commit. Returns true when it did.
 */
export async function ensureRepository(
  repo: GitRepository,
  org: { id: string; name: string },
  logger: Logger = silentLogger
): Promise<boolean> {
  if (await repo.isRepository()) return false;

  logger.info(`No git repository at ${repo.dir}; creating one`);
  await repo.init();
  await fs.writeFile(join(repo.dir, '.git', 'description'), `${repositoryDescription(org.id, org.name)}\n`, 'utf8');
  await fs.writeFile(join(repo.dir, REPO_INIT_FILE), '', 'utf8');
  await repo.addAll([REPO_INIT_FILE]);
  await repo.commit(INITIAL_COMMIT_MESSAGE);
  logger.info(`Created git repository at ${join(repo.dir, '.git')}`);
  return true;
}

/** Empties the settings tree, keeping `repo_init` and dot-entries, so removed settings show up as deletions. */
export async function resetSettingsTree(settingsDir: string): Promise<string[]> {
  const removed: string[] = [];
  for (const entry of await fs.readdir(settingsDir)) {
    if (entry === REPO_INIT_FILE || entry.startsWith('.')) continue;
    await fs.rm(join(settingsDir, entry), { recursive: true, force: true });
    removed.push(entry);
  }
  return removed.sort();
}

export function commitMessage(finishedAt: Date): string {
  return `Commit from dashboard scan finished on ${verboseDate(finishedAt)}`;
}

/**
 * Stages everything and commits. A failed commit (typically nothing to
 * commit) is logged and yields undefined.
 */
export async function commitSettings(
  repo: GitRepository,
  finishedAt: Date,
  logger: Logger = silentLogger
): Promise<string | undefined> {
  await repo.addAll();
  try {
    await repo.commit(commitMessage(finishedAt));
  } catch (err) {
    if (!(err instanceof GitCommandError)) throw err;
    logger.warn(`git commit returned an error: ${err.stdout.trim() || err.message}`);
    return undefined;
  }
  const hash = await repo.revParse('HEAD');
  logger.info(`Committed ${hash.slice(0, 12)} on ${await repo.activeBranch()}`);
  return hash;
}

/** The most recent scan commits, newest first, without the initial commit. */
export async function recentScans(repo: GitRepository, limit = SCAN_HISTORY_LIMIT): Promise<ScanCommit[]> {
  const commits = await repo.log(limit + 1);
  return commits.filter((c) => c.message !== INITIAL_COMMIT_MESSAGE).slice(0, limit);
}

export interface ScanLogRecord {
  scanEnd: string;
  orgId: string;
  orgName: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  tag: string | null;
  requests: number;
  calls: {
    planned: number;
    succeeded: number;
    failed: number;
    written: number;
    skippedEmpty: number;
    skippedDefault: number;
    skippedUnassigned: number;
  };
  commit: string | null;
  unusedOperations: string[];
}

export async function writeScanLog(scaninfoDir: string, record: ScanLogRecord, finishedAt: Date): Promise<string> {
  const file = join(scaninfoDir, `scanlog-${scanStamp(finishedAt)}.json`);
  await fs.writeFile(file, `${JSON.stringify(record, null, 2)}\n`, 'utf8');
  return file;
}

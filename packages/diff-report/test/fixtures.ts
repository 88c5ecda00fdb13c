import { mkdirSync, mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { GitCommandError, type GitRunner, type ResolvedConfig } from '@dashboard-git/core';

export const ORG_ID = '123';
export const FIRST_HASH = 'aaaa1111aaaa1111aaaa1111aaaa1111aaaa1111';
export const SECOND_HASH = 'bbbb2222bbbb2222bbbb2222bbbb2222bbbb2222';
export const FIRST_DATE = 'Sun Oct 18 05:00:00 2026 +0000';
export const SECOND_DATE = 'Mon Oct 19 05:00:00 2026 +0000';

export const ADMINS_DIFF = [
  'diff --git a/org_Admins.json b/org_Admins.json',
  'index 1111111..2222222 100644',
  '--- a/org_Admins.json',
  '+++ b/org_Admins.json',
  '@@ -1,3 +1,3 @@',
  ' [',
  '-    "ops"',
  '+    "noc"',
  ' ]',
  '',
].join('\n');

export function tempConfig(): ResolvedConfig {
  const root = mkdtempSync(join(tmpdir(), 'diff-report-'));
  return {
    apiBaseUrl: 'https://api.test/api/v1',
    basePath: join(root, 'orgs'),
    operationsFile: 'API_GET_operations.csv',
    git: { userName: 'Archiver', userEmail: 'archiver@example.test' },
    web: { publishDir: join(root, 'www') },
    maxConcurrentRequests: 2,
    maxRetries: 0,
    backupFormat: 'json',
    logLevel: 'info',
  };
}

export function makeSettingsDir(config: ResolvedConfig, orgId = ORG_ID): string {
  const dir = join(config.basePath, orgId, 'settings');
  mkdirSync(dir, { recursive: true });
  return dir;
}

export interface FakeGit {
  runner: GitRunner;
  calls: string[][];
}

/** Answers exact git argument lists; anything else fails the way git does. */
export function fakeGit(responses: Record<string, string>): FakeGit {
  const calls: string[][] = [];
  const runner: GitRunner = async (args) => {
    calls.push(args);
    const key = args.join(' ');
    const stdout = responses[key];
    if (stdout === undefined) throw new GitCommandError(args, 128, '', `fatal: unexpected ${key}`);
    return { stdout, stderr: '' };
  };
  return { runner, calls };
}

export function commitLine(hash: string, date: string, subject: string): string {
  return `${hash}\0${date}\0${subject}\n`;
}

/** A repository whose two newest commits differ by `nameStatus` (NUL-separated, as `-z` prints it). */
export function reportGit(nameStatus: string, diffs: Record<string, string> = {}): FakeGit {
  const responses: Record<string, string> = {
    'rev-parse --show-prefix': '\n',
    'log -n 1 --format=%H%x00%cd%x00%s HEAD~1 --': commitLine(FIRST_HASH, FIRST_DATE, 'Scan one'),
    'log -n 1 --format=%H%x00%cd%x00%s HEAD --': commitLine(SECOND_HASH, SECOND_DATE, 'Scan two'),
    [`diff --name-status -z ${FIRST_HASH} ${SECOND_HASH} --`]: nameStatus,
  };
  for (const [path, diff] of Object.entries(diffs)) {
    responses[`-c core.quotePath=false diff -W ${FIRST_HASH} ${SECOND_HASH} -- ${path}`] = diff;
  }
  return fakeGit(responses);
}

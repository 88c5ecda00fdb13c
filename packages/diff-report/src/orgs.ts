import { existsSync } from 'node:fs';
import * as fs from 'node:fs/promises';

import {
  GitRepository,
  loadOrgSummary,
  orgLayout,
  orgWebLayout,
  type GitRunner,
  type OnelineCommit,
  type ResolvedConfig,
} from '@dashboard-git/core';

import { openSettingsRepository } from './report.js';

export interface ArchivedOrg {
  id: string;
  /** From the org summary; the id when no scan has been published. */
  name: string;
}

/** Organizations under the base path that have a settings repository. */
export async function listArchivedOrgs(config: ResolvedConfig, runner?: GitRunner): Promise<ArchivedOrg[]> {
  if (!existsSync(config.basePath)) return [];

  const entries = await fs.readdir(config.basePath, { withFileTypes: true });
  const orgs: ArchivedOrg[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const { settingsDir } = orgLayout(config.basePath, entry.name);
    if (!existsSync(settingsDir)) continue;
    if (!(await new GitRepository(settingsDir, { runner }).isRepository())) continue;

    const summary = loadOrgSummary(orgWebLayout(config.web.publishDir, entry.name));
    orgs.push({ id: entry.name, name: summary.orgName });
  }
  return orgs.sort((a, b) => a.id.localeCompare(b.id));
}

export function formatArchivedOrgs(orgs: ArchivedOrg[]): string {
  if (orgs.length === 0) return 'No archived organizations found';
  return orgs.map((org) => `OrgId: ${org.id.padEnd(24)} - ${org.name}`).join('\n');
}

export async function listCommits(config: ResolvedConfig, orgId: string, runner?: GitRunner): Promise<OnelineCommit[]> {
  const repo = await openSettingsRepository(config, orgId, runner);
  return repo.log();
}

export function formatCommits(commits: OnelineCommit[]): string {
  return commits.map((c) => `${c.hash} ${c.message}`).join('\n');
}

import { join } from 'node:path';

/** File kept in every settings repository; survives the pre-scan reset. */
export const REPO_INIT_FILE = 'repo_init';

export interface OrgLayout {
  orgId: string;
  /** `<base>/<orgid>` */
  root: string;
  /** The git repository holding the archived settings. */
  settingsDir: string;
  /** Rule table, OpenAPI export, scan logs. */
  scaninfoDir: string;
}

export interface OrgWebLayout {
  orgId: string;
  /** `<publish>/orgs/<orgid>` */
  orgDir: string;
  indexPage: string;
  summaryFile: string;
  reportsDir: string;
  latestLink: string;
}

export function orgLayout(basePath: string, orgId: string): OrgLayout {
  const root = join(basePath, orgId);
  return {
    orgId,
    root,
    settingsDir: join(root, 'settings'),
    scaninfoDir: join(root, 'scaninfo'),
  };
}

export function orgWebLayout(publishDir: string, orgId: string): OrgWebLayout {
  const orgDir = join(publishDir, 'orgs', orgId);
  return {
    orgId,
    orgDir,
    indexPage: join(orgDir, 'index.html'),
    summaryFile: join(orgDir, 'summary.json'),
    reportsDir: join(orgDir, 'reports'),
    latestLink: join(orgDir, 'DBContent-Latest.html'),
  };
}

export function templatesDir(publishDir: string): string {
  return join(publishDir, 'templates');
}

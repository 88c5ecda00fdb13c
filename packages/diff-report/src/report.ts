/**
 * HTML report of the settings that changed between two commits of an
 * organization's settings repository.
 *
 * Output, under `<publishDir>/orgs/<orgid>/`:
 *   reports/<reportId>.html          every changed item, grouped by kind
 *   reports/<reportId>/<slug>.html   side-by-side diff of one item
 *   DBContent-Latest.html            symlink to the newest list page
 *   index.html, summary.json         org summary, re-rendered
 */

import { existsSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import { join } from 'node:path';

import {
  GitRepository,
  SetupError,
  loadOrgSummary,
  loadTemplate,
  orgLayout,
  orgWebLayout,
  partitionChanges,
  publishOrgSummary,
  recordDiffReport,
  reportStamp,
  silentLogger,
  templatesDir,
  verboseDate,
  type DiffItem,
  type DiffRecord,
  type GitRunner,
  type Logger,
  type ResolvedConfig,
} from '@dashboard-git/core';

import { DIFF_PAGE_TEMPLATE, REPORT_LIST_TEMPLATE, itemSlug, renderDiffPage, renderReportList } from './render.js';

export const DEFAULT_FIRST_REF = 'HEAD~1';
export const DEFAULT_SECOND_REF = 'HEAD';

export interface DiffReportOptions {
  config: ResolvedConfig;
  orgId: string;
  firstRef?: string;
  secondRef?: string;
  git?: GitRunner;
  logger?: Logger;
  now?: () => Date;
}

export interface DiffReportResult {
  record: DiffRecord;
  items: DiffItem[];
  /** Renames, copies and type changes; listed in the log only. */
  other: string[];
  listPage: string;
  indexPage: string;
  latestLink: string;
}

/** Opens the org's settings repository, failing when the archiver never created it. */
export async function openSettingsRepository(
  config: ResolvedConfig,
  orgId: string,
  runner?: GitRunner
): Promise<GitRepository> {
  const layout = orgLayout(config.basePath, orgId);
  const repo = new GitRepository(layout.settingsDir, { runner });
  if (!existsSync(layout.settingsDir) || !(await repo.isRepository())) {
    throw new SetupError(
      `No settings repository for organization ${orgId} at ${layout.settingsDir}; ` +
        'run dashboard-archive getsettings first'
    );
  }
  return repo;
}

export async function generateDiffReport(opts: DiffReportOptions): Promise<DiffReportResult> {
  const { config, orgId } = opts;
  const logger = opts.logger ?? silentLogger;
  const firstRef = opts.firstRef ?? DEFAULT_FIRST_REF;
  const secondRef = opts.secondRef ?? DEFAULT_SECOND_REF;
  const now = (opts.now ?? (() => new Date()))();

  const repo = await openSettingsRepository(config, orgId, opts.git);
  const first = await repo.commitInfo(firstRef);
  const second = await repo.commitInfo(secondRef);
  logger.info(`Comparing ${firstRef} (${first.hash.slice(0, 12)}) with ${secondRef} (${second.hash.slice(0, 12)})`);

  const changes = partitionChanges(await repo.changedPaths(first.hash, second.hash));
  for (const path of changes.other) {
    logger.info(`Not rendered (rename, copy or type change): ${path}`);
  }

  const templateDir = templatesDir(config.web.publishDir);
  const diffTemplate = loadTemplate(templateDir, DIFF_PAGE_TEMPLATE);
  const listTemplate = loadTemplate(templateDir, REPORT_LIST_TEMPLATE);
  for (const template of [diffTemplate, listTemplate]) {
    if (template.created) logger.info(`Copied default template to ${template.path}`);
  }

  const web = orgWebLayout(config.web.publishDir, orgId);
  const reportId = reportStamp(now);
  const itemDir = join(web.reportsDir, reportId);
  await fs.mkdir(itemDir, { recursive: true });

  const items: DiffItem[] = [];
  for (const kind of ['added', 'modified', 'deleted'] as const) {
    for (const path of changes[kind]) {
      const slug = itemSlug(path);
      const unifiedDiff = await repo.fileDiff(first.hash, second.hash, path);
      const page = renderDiffPage(diffTemplate.content, {
        firstRef,
        firstDate: first.date,
        secondRef,
        secondDate: second.date,
        path,
        reportId,
        unifiedDiff,
      });
      await fs.writeFile(join(itemDir, `${slug}.html`), page, 'utf-8');
      items.push({ kind, path, page: `reports/${reportId}/${encodeURIComponent(slug)}.html` });
    }
  }
  logger.info(
    `${changes.added.length} added, ${changes.modified.length} modified, ${changes.deleted.length} deleted`
  );

  const summary = loadOrgSummary(web);
  const listPage = join(web.reportsDir, `${reportId}.html`);
  await fs.writeFile(
    listPage,
    renderReportList(listTemplate.content, {
      orgId,
      orgName: summary.orgName,
      reportId,
      firstRef,
      firstDate: first.date,
      secondRef,
      secondDate: second.date,
      items,
    }),
    'utf-8'
  );

  const record: DiffRecord = {
    reportId,
    generatedAt: verboseDate(now),
    firstRef,
    firstHash: first.hash,
    firstDate: first.date,
    secondRef,
    secondHash: second.hash,
    secondDate: second.date,
    added: changes.added.length,
    modified: changes.modified.length,
    deleted: changes.deleted.length,
  };
  const indexPage = publishOrgSummary(web, templateDir, recordDiffReport(summary, record, items));

  await fs.rm(web.latestLink, { force: true });
  await fs.symlink(`reports/${reportId}.html`, web.latestLink);
  logger.info(`Report written to ${listPage}`);

  return { record, items, other: changes.other, listPage, indexPage, latestLink: web.latestLink };
}

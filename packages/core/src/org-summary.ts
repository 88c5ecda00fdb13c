/**
 * Per-organization summary page.
 *
 * The archiver and the diff reporter both contribute to `orgs/<orgid>/index.html`.
 * Neither edits the HTML: each updates `summary.json` and the page is
 * rendered again from the operator's template.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { SetupError, errorMessage } from './errors.js';
import type { OrgWebLayout } from './layout.js';
import { escapeHtml, loadTemplate, renderTemplate } from './template.js';

export const ORG_INDEX_TEMPLATE = fileURLToPath(new URL('../assets/templates/org-index.html', import.meta.url));

/** Scan commits shown on the page. */
export const SCAN_HISTORY_LIMIT = 10;

const ScanCommitSchema = z.object({
  hash: z.string(),
  message: z.string(),
});

const LastScanSchema = z.object({
  completedAt: z.string(),
  networks: z.number().int().nonnegative(),
  devices: z.number().int().nonnegative(),
  settings: z.number().int().nonnegative(),
});

const DiffItemSchema = z.object({
  kind: z.enum(['added', 'modified', 'deleted']),
  path: z.string(),
  /** Relative to the org directory. */
  page: z.string(),
});

const DiffRecordSchema = z.object({
  reportId: z.string(),
  generatedAt: z.string(),
  firstRef: z.string(),
  firstHash: z.string(),
  firstDate: z.string(),
  secondRef: z.string(),
  secondHash: z.string(),
  secondDate: z.string(),
  added: z.number().int().nonnegative(),
  modified: z.number().int().nonnegative(),
  deleted: z.number().int().nonnegative(),
});

const OrgSummarySchema = z.object({
  version: z.literal(1),
  orgId: z.string(),
  orgName: z.string(),
  lastScan: LastScanSchema.nullable(),
  scans: z.array(ScanCommitSchema),
  diffReports: z.array(DiffRecordSchema),
  latestDiff: z
    .object({
      record: DiffRecordSchema,
      items: z.array(DiffItemSchema),
    })
    .nullable(),
});

export type ScanCommit = z.infer<typeof ScanCommitSchema>;
export type LastScan = z.infer<typeof LastScanSchema>;
export type DiffItem = z.infer<typeof DiffItemSchema>;
export type DiffRecord = z.infer<typeof DiffRecordSchema>;
export type OrgSummary = z.infer<typeof OrgSummarySchema>;

export function emptyOrgSummary(orgId: string, orgName: string): OrgSummary {
  return { version: 1, orgId, orgName, lastScan: null, scans: [], diffReports: [], latestDiff: null };
}

export function loadOrgSummary(web: OrgWebLayout, orgName?: string): OrgSummary {
  if (!existsSync(web.summaryFile)) {
    return emptyOrgSummary(web.orgId, orgName ?? web.orgId);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(web.summaryFile, 'utf-8'));
  } catch (err) {
    throw new SetupError(`Could not read ${web.summaryFile}: ${errorMessage(err)}`, { cause: err });
  }

  const result = OrgSummarySchema.safeParse(parsed);
  if (!result.success) {
    throw new SetupError(`${web.summaryFile} is not a valid org summary: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return orgName ? { ...result.data, orgName } : result.data;
}

export function recordScan(summary: OrgSummary, lastScan: LastScan, scans: ScanCommit[]): OrgSummary {
  return { ...summary, lastScan, scans: scans.slice(0, SCAN_HISTORY_LIMIT) };
}

/** Newest report first. */
export function recordDiffReport(summary: OrgSummary, record: DiffRecord, items: DiffItem[]): OrgSummary {
  return {
    ...summary,
    diffReports: [record, ...summary.diffReports.filter((r) => r.reportId !== record.reportId)],
    latestDiff: { record, items },
  };
}

function scanRows(scans: ScanCommit[]): string {
  if (scans.length === 0) {
    return '<tr><td colspan="2">No scans recorded yet</td></tr>';
  }
  return scans
    .map((s) => `<tr><td><code>${escapeHtml(s.hash)}</code></td><td>${escapeHtml(s.message)}</td></tr>`)
    .join('\n');
}

function diffRows(reports: DiffRecord[]): string {
  if (reports.length === 0) {
    return '<tr><td colspan="5">No diff reports generated yet</td></tr>';
  }
  return reports
    .map(
      (r) =>
        `<tr><td><a href="reports/${encodeURIComponent(r.reportId)}.html">${escapeHtml(r.generatedAt)}</a></td>` +
        `<td><code>${escapeHtml(r.firstHash)}</code></td><td>${escapeHtml(r.firstDate)}</td>` +
        `<td><code>${escapeHtml(r.secondHash)}</code></td><td>${escapeHtml(r.secondDate)}</td></tr>`
    )
    .join('\n');
}

const KIND_HEADINGS: Record<DiffItem['kind'], string> = {
  added: 'Added',
  modified: 'Modified',
  deleted: 'Deleted',
};

/** `<h3>` per non-empty kind with one link per item. Shared with the report list page. */
export function renderDiffItems(items: DiffItem[], hrefFor: (item: DiffItem) => string): string {
  if (items.length === 0) {
    return '<p class="empty">No settings changed between these commits.</p>';
  }
  const sections: string[] = [];
  for (const kind of ['added', 'modified', 'deleted'] as const) {
    const ofKind = items.filter((i) => i.kind === kind);
    if (ofKind.length === 0) continue;
    const links = ofKind
      .map((i) => `<li><a href="${escapeHtml(hrefFor(i))}">${escapeHtml(i.path)}</a></li>`)
      .join('\n');
    sections.push(`<h3>${KIND_HEADINGS[kind]} (${ofKind.length})</h3>\n<ul>\n${links}\n</ul>`);
  }
  return sections.join('\n');
}

function latestDiffSection(summary: OrgSummary): string {
  const latest = summary.latestDiff;
  if (!latest) {
    return '<p class="empty">No diff report generated yet.</p>';
  }
  const { record } = latest;
  return (
    `<p>Settings affected between commit <code>${escapeHtml(record.firstRef)}</code> at ${escapeHtml(record.firstDate)}` +
    ` and commit <code>${escapeHtml(record.secondRef)}</code> at ${escapeHtml(record.secondDate)}:</p>\n` +
    renderDiffItems(latest.items, (item) => item.page)
  );
}

export function renderOrgIndex(template: string, summary: OrgSummary): string {
  const scan = summary.lastScan;
  return renderTemplate('org-index.html', template, {
    orgId: escapeHtml(summary.orgId),
    orgName: escapeHtml(summary.orgName),
    lastScan: scan ? escapeHtml(scan.completedAt) : 'never',
    networkCount: scan ? String(scan.networks) : '-',
    deviceCount: scan ? String(scan.devices) : '-',
    settingsCount: scan ? String(scan.settings) : '-',
    scanRows: scanRows(summary.scans),
    diffRows: diffRows(summary.diffReports),
    latestDiff: latestDiffSection(summary),
  });
}

/** Writes summary.json and re-renders index.html from the operator's template. */
export function publishOrgSummary(web: OrgWebLayout, templateDir: string, summary: OrgSummary): string {
  mkdirSync(web.orgDir, { recursive: true });
  const template = loadTemplate(templateDir, ORG_INDEX_TEMPLATE);
  const html = renderOrgIndex(template.content, summary);
  writeFileSync(web.summaryFile, `${JSON.stringify(summary, null, 2)}\n`, 'utf-8');
  writeFileSync(web.indexPage, html, 'utf-8');
  return web.indexPage;
}

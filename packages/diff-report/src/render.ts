import { fileURLToPath } from 'node:url';
import { html as diffToHtml } from 'diff2html';

import { escapeHtml, renderDiffItems, renderTemplate, type DiffItem } from '@dashboard-git/core';

export const DIFF_PAGE_TEMPLATE = fileURLToPath(new URL('../assets/templates/diff-page.html', import.meta.url));
export const REPORT_LIST_TEMPLATE = fileURLToPath(new URL('../assets/templates/report-list.html', import.meta.url));

/** `networks/N_1 - A/network_.json` → `networks-N_1 - A-network_.json` */
export function itemSlug(path: string): string {
  return path.replace(/\//g, '-');
}

/** Side-by-side HTML for one file's unified diff. */
export function renderDiffHtml(unifiedDiff: string): string {
  return diffToHtml(unifiedDiff, { outputFormat: 'side-by-side', drawFileList: false });
}

export interface DiffPageFields {
  /** Ref as given on the command line. */
  firstRef: string;
  firstDate: string;
  secondRef: string;
  secondDate: string;
  path: string;
  reportId: string;
  unifiedDiff: string;
}

export function renderDiffPage(template: string, page: DiffPageFields): string {
  return renderTemplate('diff-page.html', template, {
    commitA: escapeHtml(`${page.firstRef} scan datetime ${page.firstDate}`),
    commitB: escapeHtml(`${page.secondRef} scan datetime ${page.secondDate}`),
    object: escapeHtml(page.path),
    reportDate: escapeHtml(page.reportId),
    diff: renderDiffHtml(page.unifiedDiff),
  });
}

export interface ReportListFields {
  orgId: string;
  orgName: string;
  reportId: string;
  firstRef: string;
  firstDate: string;
  secondRef: string;
  secondDate: string;
  items: DiffItem[];
}

/**
 * The list page sits beside its item directory, so links drop the
 * leading `reports/` of each item's org-relative page.
 */
export function renderReportList(template: string, list: ReportListFields): string {
  return renderTemplate('report-list.html', template, {
    orgId: escapeHtml(list.orgId),
    orgName: escapeHtml(list.orgName),
    reportDate: escapeHtml(list.reportId),
    firstRef: escapeHtml(list.firstRef),
    firstDate: escapeHtml(list.firstDate),
    secondRef: escapeHtml(list.secondRef),
    secondDate: escapeHtml(list.secondDate),
    items: renderDiffItems(list.items, (item) => item.page.replace(/^reports\//, '')),
  });
}

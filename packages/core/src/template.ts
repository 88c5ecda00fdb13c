import { copyFileSync, existsSync, mkdirSync, readFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';

import { TemplateError } from './errors.js';

const PLACEHOLDER = /\{\{\s*([A-Za-z][A-Za-z0-9_]*)\s*\}\}/g;

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Named fields are inserted verbatim; escape text values with escapeHtml first. */
export type TemplateFields = Record<string, string>;

export function templatePlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (match[1]) names.add(match[1]);
  }
  return [...names];
}

/**
 * Fills `{{name}}` placeholders. Throws TemplateError when a placeholder has
 * no field or a field has no placeholder.
 */
export function renderTemplate(name: string, template: string, fields: TemplateFields): string {
  const placeholders = templatePlaceholders(template);

  const unresolved = placeholders.filter((p) => !Object.hasOwn(fields, p));
  if (unresolved.length > 0) {
    throw new TemplateError(name, `no value for placeholder(s) ${unresolved.map((p) => `{{${p}}}`).join(', ')}`);
  }

  const unplaced = Object.keys(fields).filter((f) => !placeholders.includes(f));
  if (unplaced.length > 0) {
    throw new TemplateError(name, `template has no placeholder for ${unplaced.map((p) => `{{${p}}}`).join(', ')}`);
  }

  return template.replace(PLACEHOLDER, (_whole, key: string) => fields[key] ?? '');
}

/**
 * Returns the operator's copy of a page template, first copying the bundled
 * default into `dir` when the operator has none.
 */
export function loadTemplate(dir: string, bundledPath: string): { path: string; content: string; created: boolean } {
  const path = join(dir, basename(bundledPath));
  let created = false;
  if (!existsSync(path)) {
    mkdirSync(dirname(path), { recursive: true });
    copyFileSync(bundledPath, path);
    created = true;
  }
  return { path, content: readFileSync(path, 'utf-8'), created };
}

/**
 * Endpoint catalog: the operator-editable rule table deciding which GET
 * operations run against which entities.
 *
 * The table lives at `<base>/<orgid>/scaninfo/<operationsFile>`. On the first
 * run for an organization it is seeded from the bundled default.
 */

import * as fs from 'node:fs/promises';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { DashboardGitError, errorMessage, silentLogger, type Logger } from '@dashboard-git/core';
import type { GetOperation } from '@dashboard-git/dashboard-client';

import { csvRecords, toQuotedCsv } from './csv.js';

export const DEFAULT_CATALOG = fileURLToPath(new URL('../assets/default_API_GET_operations.csv', import.meta.url));

export const EXPORTED_OPERATIONS_FILE = 'latest-openapi_GET_operations.csv';

export class CatalogError extends DashboardGitError {
  readonly file: string;
  readonly row: number;

  constructor(file: string, row: number, message: string, options?: { cause?: unknown }) {
    super('CATALOG_ERROR', `${file} row ${row}: ${message}`, options);
    this.file = file;
    this.row = row;
  }
}

/**
 * `all` applies wherever the rule's scope allows; `products` lists the
 * network product types the rule is limited to.
 */
export type RuleLogic =
  | { kind: 'all' | 'skipped' | 'script' | 'ssids' | 'non-template' | 'non-bound' }
  | { kind: 'products'; products: string[] };

export interface EndpointRule {
  operationId: string;
  /** First tag: `organizations`, `networks`, `devices` or a product type. */
  scope: string;
  tags: string[];
  logic: RuleLogic;
  /** Declared parameter names. */
  parameters: string[];
  description?: string;
  row: number;
}

export interface EndpointCatalog {
  path: string;
  rules: EndpointRule[];
  /** Seeded from the bundled default during this load. */
  bootstrapped: boolean;
}

const KEYWORD_LOGIC = ['skipped', 'script', 'ssids', 'non-template', 'non-bound'] as const;

export function parseLogic(text: string): RuleLogic {
  const value = text.trim();
  if (value === '') return { kind: 'all' };
  for (const kind of KEYWORD_LOGIC) {
    if (value === kind) return { kind };
  }
  const products = value
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  return { kind: 'products', products };
}

export function logicText(logic: RuleLogic): string {
  if (logic.kind === 'all') return '';
  if (logic.kind === 'products') return logic.products.join(',');
  return logic.kind;
}

const LITERAL_WORDS: Record<string, string> = { True: 'true', False: 'false', None: 'null' };
const LITERAL_ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r' };

/**
 * Rewrites a single-quoted list literal (`['a', 'b']`,
 * `[{'name': 'x', 'required': True}]`) as JSON. Older rule tables were
 * written in this form.
 */
export function listLiteralToJson(text: string): string {
  let out = '';
  let i = 0;
  while (i < text.length) {
    const ch = text[i] ?? '';

    if (ch === "'" || ch === '"') {
      let value = '';
      let j = i + 1;
      while (j < text.length && text[j] !== ch) {
        const c = text[j] ?? '';
        if (c === '\\' && j + 1 < text.length) {
          const next = text[j + 1] ?? '';
          value += LITERAL_ESCAPES[next] ?? next;
          j += 2;
          continue;
        }
        value += c;
        j += 1;
      }
      if (j >= text.length) throw new Error(`unterminated string at offset ${i}`);
      out += JSON.stringify(value);
      i = j + 1;
      continue;
    }

    const word = /^[A-Za-z_][A-Za-z0-9_]*/.exec(text.slice(i));
    if (word) {
      const mapped = LITERAL_WORDS[word[0]];
      if (mapped === undefined) throw new Error(`unexpected word "${word[0]}"`);
      out += mapped;
      i += word[0].length;
      continue;
    }

    out += ch;
    i += 1;
  }
  return out;
}

/** A JSON array, or failing that a single-quoted list literal. Empty cells are empty lists. */
export function parseListCell(cell: string): unknown[] {
  const text = cell.trim();
  if (text === '') return [];

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    value = JSON.parse(listLiteralToJson(text));
  }
  if (!Array.isArray(value)) throw new Error('expected a list');
  return value;
}

const TagsSchema = z.array(z.string().min(1)).min(1, 'at least one tag is required');
const ParametersSchema = z.array(z.union([z.string(), z.object({ name: z.string() }).passthrough()]));

function parseRule(file: string, row: number, values: Record<string, string>): EndpointRule {
  const operationId = (values['operationId'] ?? '').trim();
  if (!operationId) throw new CatalogError(file, row, 'operationId is empty');

  let tags: string[];
  let parameters: string[];
  try {
    const tagResult = TagsSchema.safeParse(parseListCell(values['tags'] ?? ''));
    if (!tagResult.success) throw new Error(tagResult.error.issues[0]?.message ?? 'invalid tags');
    tags = tagResult.data;

    const paramResult = ParametersSchema.safeParse(parseListCell(values['parameters'] ?? ''));
    if (!paramResult.success) throw new Error(paramResult.error.issues[0]?.message ?? 'invalid parameters');
    parameters = paramResult.data.map((p) => (typeof p === 'string' ? p : p.name));
  } catch (err) {
    if (err instanceof CatalogError) throw err;
    throw new CatalogError(file, row, `${operationId}: ${errorMessage(err)}`, { cause: err });
  }

  const description = values['description']?.trim();
  return {
    operationId,
    scope: tags[0] ?? '',
    tags,
    logic: parseLogic(values['Logic'] ?? ''),
    parameters,
    ...(description ? { description } : {}),
    row,
  };
}

export function parseEndpointCatalog(file: string, text: string): EndpointRule[] {
  const records = csvRecords(text);
  const first = records[0];
  if (!first) return [];
  for (const column of ['operationId', 'tags', 'Logic']) {
    if (!Object.hasOwn(first.values, column)) {
      throw new CatalogError(file, 1, `missing column "${column}"`);
    }
  }

  const seen = new Map<string, number>();
  const rules: EndpointRule[] = [];
  for (const { row, values } of records) {
    const rule = parseRule(file, row, values);
    const earlier = seen.get(rule.operationId);
    if (earlier !== undefined) {
      throw new CatalogError(file, row, `duplicate operationId ${rule.operationId} (first on row ${earlier})`);
    }
    seen.set(rule.operationId, row);
    rules.push(rule);
  }
  return rules;
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && Reflect.get(err, 'code') === 'ENOENT';
}

export async function loadEndpointCatalog(
  path: string,
  opts: { bundledDefault?: string; logger?: Logger } = {}
): Promise<EndpointCatalog> {
  const logger = opts.logger ?? silentLogger;
  let bootstrapped = false;
  let text: string;
  try {
    text = await fs.readFile(path, 'utf8');
  } catch (err) {
    if (!isMissingFile(err)) throw err;
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.copyFile(opts.bundledDefault ?? DEFAULT_CATALOG, path);
    bootstrapped = true;
    logger.warn(`No rule table at ${path}; copied the default. Edit it to tune future scans.`);
    text = await fs.readFile(path, 'utf8');
  }
  return { path, rules: parseEndpointCatalog(path, text), bootstrapped };
}

export function findRule(catalog: Pick<EndpointCatalog, 'rules'>, operationId: string): EndpointRule | undefined {
  return catalog.rules.find((r) => r.operationId === operationId);
}

export function isSkipped(catalog: Pick<EndpointCatalog, 'rules'>, operationId: string): boolean {
  return findRule(catalog, operationId)?.logic.kind === 'skipped';
}

/** GET operations of the live API as a quoted CSV, for comparison with the rule table. */
export async function exportOperationsCsv(operations: readonly GetOperation[], path: string): Promise<void> {
  const rows = operations.map(({ operation }) => ({
    operationId: operation.operationId,
    tags: JSON.stringify(operation.tags),
    description: operation.description ?? operation.summary ?? '',
    parameters: JSON.stringify(operation.parameters.map((p) => p.name)),
  }));
  await fs.writeFile(path, toQuotedCsv(rows, ['operationId', 'tags', 'description', 'parameters']), 'utf8');
}

/** Live operations neither called during the run nor marked `skipped`, in API order. */
export function findUnusedOperations(
  operations: readonly GetOperation[],
  catalog: Pick<EndpointCatalog, 'rules'>,
  completed: ReadonlySet<string>
): string[] {
  const skipped = new Set(catalog.rules.filter((r) => r.logic.kind === 'skipped').map((r) => r.operationId));
  return operations
    .map((o) => o.operation.operationId)
    .filter((id) => !completed.has(id) && !skipped.has(id));
}

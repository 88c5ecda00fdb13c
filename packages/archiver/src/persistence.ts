/**
 * Persistence writer: one response per file under the settings repository.
 *
 * Responses that carry no configuration (empty, an unassigned radio profile,
 * or a payload equal to a known default) are not written, so the repository
 * only holds settings someone changed.
 */

import { existsSync, readFileSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { isDeepStrictEqual } from 'node:util';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import { ConfigError, errorMessage, type BackupFormat } from '@dashboard-git/core';

export const DEFAULT_FINGERPRINTS_DIR = fileURLToPath(new URL('../assets/default-configs', import.meta.url));

export type WriteOutcome = 'written' | 'empty' | 'default' | 'unassigned';

export interface SettingsReader {
  /** Parsed content of a file archived earlier in the run, or undefined when there is none. */
  read(directory: string, fileName: string): unknown;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isEmptyPayload(payload: unknown): boolean {
  if (payload === null || payload === undefined || payload === '' || payload === 0 || payload === false) return true;
  if (Array.isArray(payload)) return payload.length === 0;
  if (isPlainObject(payload)) return Object.keys(payload).length === 0;
  return false;
}

/** A device radio-settings response with no RF profile assigned. */
export function isUnassignedRadio(payload: unknown): boolean {
  if (!isPlainObject(payload)) return false;
  const keys = Object.keys(payload).sort();
  return keys.length === 2 && keys[0] === 'rfProfileId' && keys[1] === 'serial' && !payload['rfProfileId'];
}

export function serializeJson(payload: unknown): string {
  return `${JSON.stringify(payload, null, 4)}\n`;
}

export function serializeYaml(payload: unknown): string {
  return `---\n${stringifyYaml(payload)}`;
}

/** Every `*.json` file of each directory, in name order. A directory that does not exist contributes nothing. */
export async function loadFingerprints(dirs: readonly string[]): Promise<unknown[]> {
  const fingerprints: unknown[] = [];
  for (const dir of dirs) {
    if (!existsSync(dir)) continue;
    const names = (await fs.readdir(dir)).filter((n) => n.endsWith('.json')).sort();
    for (const name of names) {
      const file = join(dir, name);
      try {
        const parsed: unknown = JSON.parse(await fs.readFile(file, 'utf8'));
        fingerprints.push(parsed);
      } catch (err) {
        throw new ConfigError(`Default config ${file} is not valid JSON: ${errorMessage(err)}`, { cause: err });
      }
    }
  }
  return fingerprints;
}

export interface SettingsWriterOptions {
  /** The settings repository. */
  root: string;
  format: BackupFormat;
  fingerprints: readonly unknown[];
}

export class SettingsWriter implements SettingsReader {
  readonly root: string;
  private readonly format: BackupFormat;
  private readonly fingerprints: readonly unknown[];

  constructor(opts: SettingsWriterOptions) {
    this.root = opts.root;
    this.format = opts.format;
    this.fingerprints = opts.fingerprints;
  }

  classify(payload: unknown): WriteOutcome {
    if (isEmptyPayload(payload)) return 'empty';
    if (isUnassignedRadio(payload)) return 'unassigned';
    if (this.fingerprints.some((f) => isDeepStrictEqual(f, payload))) return 'default';
    return 'written';
  }

  async ensureDirectory(directory: string): Promise<void> {
    await fs.mkdir(join(this.root, directory), { recursive: true });
  }

  /** `directory` is relative to the repository root; '' is the root itself. */
  async write(fileName: string, payload: unknown, directory = ''): Promise<WriteOutcome> {
    const outcome = this.classify(payload);
    if (outcome !== 'written') return outcome;

    const dir = join(this.root, directory);
    await fs.mkdir(dir, { recursive: true });
    if (this.format === 'json' || this.format === 'both') {
      await fs.writeFile(join(dir, `${fileName}.json`), serializeJson(payload), 'utf8');
    }
    if (this.format === 'yaml' || this.format === 'both') {
      await fs.writeFile(join(dir, `${fileName}.yaml`), serializeYaml(payload), 'utf8');
    }
    return outcome;
  }

  read(directory: string, fileName: string): unknown {
    const base = join(this.root, directory, fileName);
    if (existsSync(`${base}.json`)) {
      return JSON.parse(readFileSync(`${base}.json`, 'utf8'));
    }
    if (existsSync(`${base}.yaml`)) {
      return parseYaml(readFileSync(`${base}.yaml`, 'utf8'));
    }
    return undefined;
  }
}

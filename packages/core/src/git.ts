/**
 * Thin wrapper over the `git` binary for one settings repository.
 *
 * Every command goes through a GitRunner so tests can stand in for git
 * without touching a real repository.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { DashboardGitError } from './errors.js';

const execFileAsync = promisify(execFile);

export interface GitResult {
  stdout: string;
  stderr: string;
}

export type GitRunner = (args: string[], cwd: string) => Promise<GitResult>;

export class GitCommandError extends DashboardGitError {
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(args: string[], exitCode: number | null, stdout: string, stderr: string) {
    const detail = (stderr || stdout).trim().split('\n')[0] ?? '';
    super('GIT_ERROR', `git ${args.join(' ')} failed${exitCode === null ? '' : ` (exit ${exitCode})`}: ${detail}`);
    this.args = args;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

function readStreamField(err: object, key: 'stdout' | 'stderr'): string {
  const value: unknown = Reflect.get(err, key);
  return typeof value === 'string' ? value : '';
}

export const execGit: GitRunner = async (args, cwd) => {
  try {
    const { stdout, stderr } = await execFileAsync('git', args, {
      cwd,
      encoding: 'utf8',
      maxBuffer: 64 * 1024 * 1024,
    });
    return { stdout, stderr };
  } catch (err) {
    if (typeof err === 'object' && err !== null) {
      const code: unknown = Reflect.get(err, 'code');
      throw new GitCommandError(
        args,
        typeof code === 'number' ? code : null,
        readStreamField(err, 'stdout'),
        readStreamField(err, 'stderr')
      );
    }
    throw err;
  }
};

export interface GitIdentity {
  userName: string;
  userEmail: string;
}

export interface CommitInfo {
  hash: string;
  /** Committer date as git prints it (`%cd`). */
  date: string;
  subject: string;
}

export type ChangeKind = 'added' | 'modified' | 'deleted' | 'other';

export interface ChangedPath {
  kind: ChangeKind;
  /** Raw status letters from `--name-status` (`A`, `M`, `R087`, ...). */
  status: string;
  path: string;
}

export interface ChangeSet {
  added: string[];
  modified: string[];
  deleted: string[];
  other: string[];
}

function changeKind(status: string): ChangeKind {
  switch (status[0]) {
    case 'A':
      return 'added';
    case 'M':
      return 'modified';
    case 'D':
      return 'deleted';
    default:
      return 'other';
  }
}

/**
 * Parses `git diff --name-status -z` output: NUL-terminated status and path
 * fields, with paths left unquoted. Renames and copies carry two paths and
 * report the new one.
 */
export function parseNameStatus(output: string): ChangedPath[] {
  const fields = output.split('\0');
  const changes: ChangedPath[] = [];
  let i = 0;
  while (i < fields.length) {
    const status = fields[i++]?.trim() ?? '';
    if (!status) continue;
    const pathCount = status[0] === 'R' || status[0] === 'C' ? 2 : 1;
    const path = fields[i + pathCount - 1];
    i += pathCount;
    if (!path) continue;
    changes.push({ kind: changeKind(status), status, path });
  }
  return changes;
}

export function partitionChanges(changes: readonly ChangedPath[]): ChangeSet {
  const set: ChangeSet = { added: [], modified: [], deleted: [], other: [] };
  for (const change of changes) {
    set[change.kind].push(change.path);
  }
  return set;
}

export interface OnelineCommit {
  hash: string;
  message: string;
}

/** Parses `git log --pretty=oneline`. */
export function parseOnelineLog(output: string): OnelineCommit[] {
  const commits: OnelineCommit[] = [];
  for (const line of output.split('\n')) {
    const match = /^([0-9a-f]{7,64})\s+(.*)$/.exec(line.trim());
    if (match?.[1]) commits.push({ hash: match[1], message: match[2] ?? '' });
  }
  return commits;
}

export class GitRepository {
  readonly dir: string;
  private readonly run: GitRunner;
  private readonly identity?: GitIdentity;

  constructor(dir: string, opts: { runner?: GitRunner; identity?: GitIdentity } = {}) {
    this.dir = dir;
    this.run = opts.runner ?? execGit;
    this.identity = opts.identity;
  }

  async git(args: string[]): Promise<string> {
    const { stdout } = await this.run(args, this.dir);
    return stdout;
  }

  private identityArgs(): string[] {
    if (!this.identity) return [];
    return ['-c', `user.name=${this.identity.userName}`, '-c', `user.email=${this.identity.userEmail}`];
  }

  /** True only when `dir` itself is the top level of a work tree. */
  async isRepository(): Promise<boolean> {
    try {
      const top = (await this.git(['rev-parse', '--show-prefix'])).trim();
      return top === '';
    } catch (err) {
      if (err instanceof GitCommandError) return false;
      throw err;
    }
  }

  async init(): Promise<void> {
    await this.git(['init']);
  }

  async addAll(paths: string[] = ['.']): Promise<void> {
    await this.git(['add', '-A', '--', ...paths]);
  }

  async commit(message: string): Promise<string> {
    return this.git([...this.identityArgs(), 'commit', '-m', message]);
  }

  async activeBranch(): Promise<string> {
    return (await this.git(['rev-parse', '--abbrev-ref', 'HEAD'])).trim();
  }

  async revParse(ref: string): Promise<string> {
    return (await this.git(['rev-parse', '--verify', `${ref}^{commit}`])).trim();
  }

  async commitInfo(ref: string): Promise<CommitInfo> {
    const out = await this.git(['log', '-n', '1', '--format=%H%x00%cd%x00%s', ref, '--']);
    const [hash = '', date = '', subject = ''] = out.replace(/\n$/, '').split('\0');
    return { hash, date, subject };
  }

  async log(limit?: number): Promise<OnelineCommit[]> {
    const args = ['log', '--pretty=oneline'];
    if (limit !== undefined) args.push('-n', String(limit));
    return parseOnelineLog(await this.git(args));
  }

  async changedPaths(first: string, second: string): Promise<ChangedPath[]> {
    return parseNameStatus(await this.git(['diff', '--name-status', '-z', first, second, '--']));
  }

  /** Unified diff of one path with whole-function context (`-W`), headers unquoted. */
  async fileDiff(first: string, second: string, path: string): Promise<string> {
    return this.git(['-c', 'core.quotePath=false', 'diff', '-W', first, second, '--', path]);
  }
}

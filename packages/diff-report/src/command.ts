import { UsageError, hasFlag, parseArgs } from '@dashboard-git/core';

import { DEFAULT_FIRST_REF, DEFAULT_SECOND_REF } from './report.js';

export const VERSION = '0.3.0';

export function usageText(): string {
  return [
    'dashboard-diff: HTML reports of settings changes between archive commits',
    '',
    'Usage:',
    '  dashboard-diff listorgs                                        [--config <path>]',
    '  dashboard-diff listcommits <orgid>                             [--config <path>]',
    '  dashboard-diff getdiff <orgid> [firstCommit] [secondCommit]    [--config <path>]',
    '  dashboard-diff version',
    '',
    `getdiff compares ${DEFAULT_FIRST_REF} with ${DEFAULT_SECOND_REF} unless commits are given.`,
    '',
    'Exit codes:',
    '  0 = success',
    '  1 = run failed',
    '  2 = usage or configuration error',
  ].join('\n');
}

export type DiffCommand =
  | { command: 'listorgs'; configPath?: string }
  | { command: 'listcommits'; orgId: string; configPath?: string }
  | { command: 'getdiff'; orgId: string; firstRef: string; secondRef: string; configPath?: string }
  | { command: 'version' };

const ORG_ID = /^\d+$/;

function orgIdArg(command: string, positionals: string[]): string {
  const orgId = positionals[1];
  if (!orgId) throw new UsageError(`Usage: dashboard-diff ${command} <orgid>`);
  if (!ORG_ID.test(orgId)) throw new UsageError(`Organization id must be numeric, got "${orgId}"`);
  return orgId;
}

function noExtra(positionals: string[], allowed: number): void {
  if (positionals.length > allowed) throw new UsageError(`Unexpected argument: ${positionals[allowed]}`);
}

export function parseDiffArgs(argv: string[]): DiffCommand {
  if (argv.length === 0 || hasFlag(argv, '--help') || hasFlag(argv, '-h')) {
    throw new UsageError(usageText());
  }
  if (argv[0] === 'version' || hasFlag(argv, '--version')) {
    return { command: 'version' };
  }

  const { positionals, flags } = parseArgs(argv, ['--config']);
  const configPath = flags.get('--config');
  const common = typeof configPath === 'string' ? { configPath } : {};

  switch (positionals[0]) {
    case 'listorgs':
      noExtra(positionals, 1);
      return { command: 'listorgs', ...common };
    case 'listcommits': {
      const orgId = orgIdArg('listcommits', positionals);
      noExtra(positionals, 2);
      return { command: 'listcommits', orgId, ...common };
    }
    case 'getdiff': {
      const orgId = orgIdArg('getdiff', positionals);
      noExtra(positionals, 4);
      return {
        command: 'getdiff',
        orgId,
        firstRef: positionals[2] ?? DEFAULT_FIRST_REF,
        secondRef: positionals[3] ?? DEFAULT_SECOND_REF,
        ...common,
      };
    }
    default:
      throw new UsageError(usageText());
  }
}

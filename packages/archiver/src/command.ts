import { UsageError, hasFlag, parseArgs } from '@dashboard-git/core';

export const VERSION = '0.3.0';

export function usageText(): string {
  return [
    'dashboard-archive: archive Dashboard organization settings into git',
    '',
    'Usage:',
    '  dashboard-archive listorgs                       [--config <path>]',
    '  dashboard-archive estimatescan <orgid> [--tag <tag>] [--config <path>]',
    '  dashboard-archive getsettings  <orgid> [--tag <tag>] [--config <path>]',
    '  dashboard-archive version',
    '',
    'The API key is read from MERAKI_DASHBOARD_API_KEY.',
    '',
    'Exit codes:',
    '  0 = success',
    '  1 = run failed',
    '  2 = usage or configuration error',
  ].join('\n');
}

export type ArchiveCommand =
  | { command: 'listorgs'; configPath?: string }
  | { command: 'estimatescan'; orgId: string; tag?: string; configPath?: string }
  | { command: 'getsettings'; orgId: string; tag?: string; configPath?: string }
  | { command: 'version' };

const ORG_ID = /^\d+$/;

function orgIdArg(command: string, positionals: string[]): string {
  const orgId = positionals[1];
  if (!orgId) throw new UsageError(`Usage: dashboard-archive ${command} <orgid> [--tag <tag>]`);
  if (!ORG_ID.test(orgId)) throw new UsageError(`Organization id must be numeric, got "${orgId}"`);
  if (positionals.length > 2) throw new UsageError(`Unexpected argument: ${positionals[2]}`);
  return orgId;
}

export function parseArchiveArgs(argv: string[]): ArchiveCommand {
  if (argv.length === 0 || hasFlag(argv, '--help') || hasFlag(argv, '-h')) {
    throw new UsageError(usageText());
  }
  if (argv[0] === 'version' || hasFlag(argv, '--version')) {
    return { command: 'version' };
  }

  const { positionals, flags } = parseArgs(argv, ['--config', '--tag']);
  const configPath = flags.get('--config');
  const tag = flags.get('--tag');
  const common = {
    ...(typeof configPath === 'string' ? { configPath } : {}),
  };
  const tagged = typeof tag === 'string' ? { tag } : {};

  switch (positionals[0]) {
    case 'listorgs':
      if (positionals.length > 1) throw new UsageError(`Unexpected argument: ${positionals[1]}`);
      if (tag !== undefined) throw new UsageError('--tag does not apply to listorgs');
      return { command: 'listorgs', ...common };
    case 'estimatescan':
      return { command: 'estimatescan', orgId: orgIdArg('estimatescan', positionals), ...tagged, ...common };
    case 'getsettings':
      return { command: 'getsettings', orgId: orgIdArg('getsettings', positionals), ...tagged, ...common };
    default:
      throw new UsageError(usageText());
  }
}

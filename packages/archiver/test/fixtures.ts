import { mkdirSync } from 'node:fs';
import { join } from 'node:path';

import { GitCommandError, type GitRunner, type LogLevel, type Logger } from '@dashboard-git/core';
import type { Device, FetchLike, Network, ConfigTemplate, OpenApiDocument } from '@dashboard-git/dashboard-client';

import type { SettingsReader } from '../src/persistence.js';

export const ORG_ID = '123';

type Row = [operationId: string, tags: string[], logic: string];

const quote = (s: string) => `"${s.replace(/"/g, '""')}"`;

export function catalogCsv(rows: Row[]): string {
  const lines = rows.map(([op, tags, logic]) => `${op},${quote(JSON.stringify(tags))},${quote(logic)}`);
  return ['operationId,tags,Logic', ...lines].join('\n');
}

/** operationId, path, logic, tags */
const OPERATIONS: Array<[string, string, string, string[]]> = [
  ['getOrganization', '/organizations/{organizationId}', '', ['organizations', 'configure']],
  ['getOrganizationAdmins', '/organizations/{organizationId}/admins', '', ['organizations', 'configure', 'admins']],
  ['getOrganizationNetworks', '/organizations/{organizationId}/networks', '', ['organizations', 'configure', 'networks']],
  ['getOrganizationConfigTemplates', '/organizations/{organizationId}/configTemplates', '', ['organizations', 'configure']],
  ['getOrganizationDevices', '/organizations/{organizationId}/devices', '', ['organizations', 'configure', 'devices']],
  ['getOrganizationLicenses', '/organizations/{organizationId}/licenses', 'skipped', ['organizations', 'configure']],
  [
    'getOrganizationConfigTemplateSwitchProfiles',
    '/organizations/{organizationId}/configTemplates/{configTemplateId}/switch/profiles',
    'script',
    ['switch', 'configure', 'configTemplates', 'profiles'],
  ],
  [
    'getOrganizationConfigTemplateSwitchProfilePorts',
    '/organizations/{organizationId}/configTemplates/{configTemplateId}/switch/profiles/{profileId}/ports',
    'script',
    ['switch', 'configure', 'configTemplates', 'profiles', 'ports'],
  ],
  ['getDevice', '/devices/{serial}', '', ['devices', 'configure']],
  ['getDeviceWirelessRadioSettings', '/devices/{serial}/wireless/radio/settings', '', ['wireless', 'configure']],
  ['getDeviceSwitchPorts', '/devices/{serial}/switch/ports', '', ['switch', 'configure', 'ports']],
  ['getDeviceCameraSense', '/devices/{serial}/camera/sense', '', ['camera', 'configure', 'sense']],
  ['getDeviceLldpCdp', '/devices/{serial}/lldpCdp', 'skipped', ['devices', 'monitor']],
  ['getDeviceWirelessBluetoothSettings', '/devices/{serial}/wireless/bluetooth/settings', 'script', ['wireless', 'configure']],
  ['getNetwork', '/networks/{networkId}', '', ['networks', 'configure']],
  ['getNetworkFloorPlans', '/networks/{networkId}/floorPlans', 'non-template', ['networks', 'configure']],
  ['getNetworkFirmwareUpgrades', '/networks/{networkId}/firmwareUpgrades', 'non-bound', ['networks', 'configure']],
  ['getNetworkNetflow', '/networks/{networkId}/netflow', 'appliance', ['networks', 'configure']],
  ['getNetworkClients', '/networks/{networkId}/clients', 'skipped', ['networks', 'monitor']],
  ['getNetworkApplianceVlansSettings', '/networks/{networkId}/appliance/vlans/settings', '', ['appliance', 'configure']],
  ['getNetworkApplianceVlans', '/networks/{networkId}/appliance/vlans', 'script', ['appliance', 'configure']],
  ['getNetworkAppliancePorts', '/networks/{networkId}/appliance/ports', 'script', ['appliance', 'configure']],
  ['getNetworkApplianceSingleLan', '/networks/{networkId}/appliance/singleLan', 'script', ['appliance', 'configure']],
  ['getNetworkSwitchStp', '/networks/{networkId}/switch/stp', '', ['switch', 'configure', 'stp']],
  ['getNetworkWirelessSsids', '/networks/{networkId}/wireless/ssids', '', ['wireless', 'configure', 'ssids']],
  ['getNetworkWirelessBluetoothSettings', '/networks/{networkId}/wireless/bluetooth/settings', '', ['wireless', 'configure']],
  ['getNetworkWirelessRfProfiles', '/networks/{networkId}/wireless/rfProfiles', 'script', ['wireless', 'configure']],
  ['getNetworkWirelessSsid', '/networks/{networkId}/wireless/ssids/{number}', 'ssids', ['wireless', 'configure', 'ssids']],
  [
    'getNetworkWirelessSsidSplashSettings',
    '/networks/{networkId}/wireless/ssids/{number}/splash/settings',
    'ssids',
    ['wireless', 'configure', 'ssids'],
  ],
];

const PAGINATED = new Set(['getOrganizationNetworks', 'getOrganizationDevices']);

export const CATALOG_CSV = catalogCsv(OPERATIONS.map(([op, , logic, tags]) => [op, tags, logic]));

/** Every catalog operation plus one the catalog does not know. */
export function openApiDoc(): OpenApiDocument {
  const paths: Record<string, Record<string, unknown>> = {};
  for (const [operationId, path, , tags] of OPERATIONS) {
    const parameters: Array<{ name: string; in: string }> = [];
    for (const m of path.matchAll(/\{([^}]+)\}/g)) parameters.push({ name: m[1] ?? '', in: 'path' });
    if (PAGINATED.has(operationId)) parameters.push({ name: 'perPage', in: 'query' });
    paths[path] = { get: { operationId, tags, parameters } };
  }
  paths['/organizations/{organizationId}/saml'] = {
    get: { operationId: 'getOrganizationSaml', tags: ['organizations', 'configure', 'saml'], parameters: [] },
  };
  return { paths };
}

export const NETWORKS: Network[] = [
  { id: 'N_1', name: 'Branch / East', productTypes: ['appliance', 'switch', 'wireless'], tags: ['east'] },
  { id: 'N_2', name: 'Kiosk', productTypes: ['wireless'], tags: [], configTemplateId: 'T_1' },
  { id: 'N_3', name: 'Lobby Cam', productTypes: ['camera'], tags: ['east'] },
];

export const TEMPLATES: ConfigTemplate[] = [
  { id: 'T_1', name: 'Retail Template', productTypes: ['appliance', 'switch', 'wireless'] },
];

export const DEVICES: Device[] = [
  { serial: 'Q2AA-0001', model: 'MR46', networkId: 'N_1' },
  { serial: 'Q2AA-0002', model: 'MS120-8', networkId: 'N_1' },
  { serial: 'Q2AA-0003', model: 'MX68', networkId: 'N_1' },
  { serial: 'Q2AA-0004', model: 'MV12', networkId: 'N_3' },
  { serial: 'Q2AA-0005', model: 'MR36', networkId: 'N_2' },
];

export function memoryReader(files: Record<string, unknown> = {}): SettingsReader {
  return {
    read: (directory, fileName) => files[`${directory}/${fileName}`],
  };
}

export interface RecordingLogger extends Logger {
  lines: Array<[LogLevel, string]>;
}

export function recordingLogger(): RecordingLogger {
  const lines: Array<[LogLevel, string]> = [];
  const logger: RecordingLogger = {
    lines,
    debug: (m) => lines.push(['debug', m]),
    info: (m) => lines.push(['info', m]),
    warn: (m) => lines.push(['warn', m]),
    error: (m) => lines.push(['error', m]),
    child: () => logger,
  };
  return logger;
}

/** Answers GETs by API path (query ignored); unknown paths get a 404. */
export function routeFetch(routes: Record<string, unknown>, requested: string[] = []): FetchLike {
  return async (url) => {
    const path = new URL(url).pathname.replace(/^\/api\/v1/, '');
    requested.push(path);
    if (!Object.hasOwn(routes, path)) {
      return new Response(JSON.stringify({ errors: ['Not found'] }), { status: 404 });
    }
    return new Response(JSON.stringify(routes[path]), { status: 200, headers: { 'content-type': 'application/json' } });
  };
}

export const HEAD_HASH = '0123456789abcdef0123456789abcdef01234567';
export const INITIAL_HASH = 'fedcba9876543210fedcba9876543210fedcba98';

export interface FakeGit {
  runner: GitRunner;
  calls: string[][];
}

/**
 * Answers the git commands the archiver issues. `git init` creates `.git`
 * so the repository description can be written; `commitFails` makes
 * `git commit` exit 1 the way it does with nothing staged.
 */
export function fakeGit(opts: { repository?: boolean; commitFails?: boolean; log?: string } = {}): FakeGit {
  const calls: string[][] = [];
  let repository = opts.repository ?? true;

  const runner: GitRunner = async (args, cwd) => {
    calls.push(args);
    const key = args.join(' ');
    const ok = (stdout: string) => ({ stdout, stderr: '' });

    if (key === 'rev-parse --show-prefix') {
      if (!repository) throw new GitCommandError(args, 128, '', 'fatal: not a git repository');
      return ok('\n');
    }
    if (key === 'init') {
      mkdirSync(join(cwd, '.git'), { recursive: true });
      repository = true;
      return ok(`Initialized empty Git repository in ${cwd}/.git/\n`);
    }
    if (args[0] === 'add') return ok('');
    if (args.includes('commit')) {
      if (opts.commitFails) throw new GitCommandError(args, 1, 'nothing to commit, working tree clean\n', '');
      return ok('');
    }
    if (key === 'rev-parse --verify HEAD^{commit}') return ok(`${HEAD_HASH}\n`);
    if (key === 'rev-parse --abbrev-ref HEAD') return ok('main\n');
    if (args[0] === 'log') {
      return ok(opts.log ?? `${HEAD_HASH} Commit from dashboard scan\n${INITIAL_HASH} Initial commit\n`);
    }
    throw new GitCommandError(args, 128, '', `fatal: unexpected ${key}`);
  };
  return { runner, calls };
}

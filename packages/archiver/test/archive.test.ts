import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, relative } from 'node:path';
import { describe, expect, it } from 'vitest';

import { scanStamp, verboseDate, type ResolvedConfig } from '@dashboard-git/core';
import { DashboardApiError, DashboardClient, type Device, type Network } from '@dashboard-git/dashboard-client';

import { archiveOrganization, estimateOrganization, formatOrganizations } from '../src/archive.js';
import { commitMessage } from '../src/committer.js';
import { CATALOG_CSV, HEAD_HASH, ORG_ID, fakeGit, openApiDoc, recordingLogger, routeFetch } from './fixtures.js';

const NOW = new Date(2026, 9, 19, 5, 20, 7);
const N1_DIR = 'networks/N_1 - Branch _ East';

const BRANCH: Network = { id: 'N_1', name: 'Branch / East', productTypes: ['appliance', 'wireless'], tags: ['east'] };
const WAREHOUSE: Network = { id: 'N_9', name: 'Warehouse', productTypes: ['switch'], tags: [] };
const AP: Device = { serial: 'Q2AA-0001', model: 'MR46', networkId: 'N_1', name: 'AP1' };
const SWITCH: Device = { serial: 'Q2AA-0009', model: 'MS120-8', networkId: 'N_9' };

function routes(networks: Network[], devices: Device[]): Record<string, unknown> {
  return {
    '/organizations/123': { id: ORG_ID, name: 'Acme' },
    '/organizations/123/openapiSpec': openApiDoc(),
    '/organizations/123/admins': [{ id: 'a1', name: 'Ops', email: 'ops@example.com' }],
    '/organizations/123/networks': networks,
    '/organizations/123/configTemplates': [],
    '/organizations/123/devices': devices,
    '/devices/Q2AA-0001': { serial: 'Q2AA-0001', model: 'MR46', name: 'AP1' },
    '/devices/Q2AA-0001/wireless/radio/settings': { serial: 'Q2AA-0001', rfProfileId: null },
    '/networks/N_1': { id: 'N_1', name: 'Branch / East' },
    '/networks/N_1/floorPlans': [],
    '/networks/N_1/firmwareUpgrades': { upgradeWindow: { dayOfWeek: 'sun', hourOfDay: '4:00' } },
    '/networks/N_1/netflow': { reportingEnabled: false },
    '/networks/N_1/appliance/vlans/settings': { vlansEnabled: false },
    '/networks/N_1/wireless/ssids': [
      { number: 0, name: 'Corp', enabled: true },
      { number: 1, name: 'Unconfigured SSID 2', enabled: false },
    ],
    '/networks/N_1/wireless/bluetooth/settings': { scanningEnabled: false, advertisingEnabled: false },
    '/networks/N_1/wireless/rfProfiles': [],
    '/networks/N_1/appliance/singleLan': { subnet: '192.168.128.0/24', applianceIp: '192.168.128.1' },
    '/networks/N_1/wireless/ssids/0': { number: 0, name: 'Corp', enabled: true },
    '/networks/N_1/wireless/ssids/0/splash/settings': { splashPage: 'None' },
  };
}

function setup(networks: Network[], devices: Device[]) {
  const root = mkdtempSync(join(tmpdir(), 'archive-'));
  const config: ResolvedConfig = {
    apiKey: 'test-secret',
    apiBaseUrl: 'https://api.test/api/v1',
    basePath: join(root, 'orgs'),
    operationsFile: 'API_GET_operations.csv',
    git: { userName: 'Archiver', userEmail: 'archiver@example.test' },
    web: { publishDir: join(root, 'www') },
    maxConcurrentRequests: 2,
    maxRetries: 0,
    backupFormat: 'json',
    logLevel: 'info',
  };
  const scaninfo = join(config.basePath, ORG_ID, 'scaninfo');
  mkdirSync(scaninfo, { recursive: true });
  writeFileSync(join(scaninfo, config.operationsFile), CATALOG_CSV);

  const requested: string[] = [];
  const newClient = () =>
    new DashboardClient({
      apiKey: 'test-secret',
      baseUrl: config.apiBaseUrl,
      maxRetries: 0,
      fetch: routeFetch(routes(networks, devices), requested),
    });
  return { root, config, scaninfo, requested, newClient, settingsDir: join(config.basePath, ORG_ID, 'settings') };
}

/** Every file under `dir` except `.git`, keyed by relative path. */
function snapshot(dir: string): Record<string, string> {
  const files: Record<string, string> = {};
  const walk = (current: string) => {
    for (const entry of readdirSync(current)) {
      if (entry === '.git') continue;
      const path = join(current, entry);
      if (statSync(path).isDirectory()) walk(path);
      else files[relative(dir, path)] = readFileSync(path, 'utf8');
    }
  };
  walk(dir);
  return files;
}

describe('archiveOrganization', () => {
  it('archives an organization into a new repository', async () => {
    const env = setup([BRANCH], [AP]);
    const git = fakeGit({ repository: false });

    const result = await archiveOrganization({
      config: env.config,
      orgId: ORG_ID,
      client: env.newClient(),
      git: git.runner,
      logger: recordingLogger(),
      now: () => NOW,
    });

    expect(result.organization).toEqual({ id: ORG_ID, name: 'Acme' });
    expect(result.commit).toBe(HEAD_HASH);
    expect(result.stats).toEqual({
      planned: 18,
      succeeded: 18,
      failed: 0,
      outcomes: { written: 11, empty: 3, default: 3, unassigned: 1 },
    });
    expect(result.metrics).toEqual({
      orgSettings: 4,
      devices: 1,
      deviceSettings: 1,
      networks: 1,
      networkSettings: 6,
      totalSettings: 11,
    });

    expect(readdirSync(env.settingsDir).sort()).toEqual([
      '.git',
      'devices',
      'networks',
      'org_Admins.json',
      'org_Devices.json',
      'org_Networks.json',
      'org_Organization.json',
      'repo_init',
    ]);
    expect(readdirSync(join(env.settingsDir, N1_DIR)).sort()).toEqual([
      'network_.json',
      'network_ApplianceSingleLan.json',
      'network_FirmwareUpgrades.json',
      'network_WirelessSsidSplashSettings_ssid_0.json',
      'network_WirelessSsid_ssid_0.json',
      'network_WirelessSsids.json',
    ]);
    expect(readdirSync(join(env.settingsDir, 'devices', 'Q2AA-0001 - MR46'))).toEqual(['device_.json']);

    expect(git.calls).toContainEqual([
      '-c',
      'user.name=Archiver',
      '-c',
      'user.email=archiver@example.test',
      'commit',
      '-m',
      commitMessage(NOW),
    ]);
    expect(existsSync(join(env.scaninfo, 'latest-openapi_GET_operations.csv'))).toBe(true);
  });

  it('records the run in a scan log', async () => {
    const env = setup([BRANCH], [AP]);
    const result = await archiveOrganization({
      config: env.config,
      orgId: ORG_ID,
      client: env.newClient(),
      git: fakeGit().runner,
      now: () => NOW,
    });

    expect(result.scanLog).toBe(join(env.scaninfo, `scanlog-${scanStamp(NOW)}.json`));
    const log: unknown = JSON.parse(readFileSync(result.scanLog, 'utf8'));
    expect(log).toEqual({
      scanEnd: scanStamp(NOW),
      orgId: ORG_ID,
      orgName: 'Acme',
      startedAt: NOW.toISOString(),
      finishedAt: NOW.toISOString(),
      durationMs: 0,
      tag: null,
      requests: 20,
      calls: {
        planned: 18,
        succeeded: 18,
        failed: 0,
        written: 11,
        skippedEmpty: 3,
        skippedDefault: 3,
        skippedUnassigned: 1,
      },
      commit: HEAD_HASH,
      unusedOperations: [
        'getOrganizationConfigTemplateSwitchProfiles',
        'getOrganizationConfigTemplateSwitchProfilePorts',
        'getDeviceSwitchPorts',
        'getDeviceCameraSense',
        'getDeviceWirelessBluetoothSettings',
        'getNetworkApplianceVlans',
        'getNetworkAppliancePorts',
        'getNetworkSwitchStp',
        'getOrganizationSaml',
      ],
    });
  });

  it('publishes the organization summary page', async () => {
    const env = setup([BRANCH], [AP]);
    const result = await archiveOrganization({
      config: env.config,
      orgId: ORG_ID,
      client: env.newClient(),
      git: fakeGit().runner,
      now: () => NOW,
    });

    const orgDir = join(env.config.web.publishDir, 'orgs', ORG_ID);
    expect(result.indexPage).toBe(join(orgDir, 'index.html'));
    expect(existsSync(join(env.config.web.publishDir, 'templates', 'org-index.html'))).toBe(true);

    const summary: unknown = JSON.parse(readFileSync(join(orgDir, 'summary.json'), 'utf8'));
    expect(summary).toMatchObject({
      orgId: ORG_ID,
      orgName: 'Acme',
      lastScan: { completedAt: verboseDate(NOW), networks: 1, devices: 1, settings: 11 },
      scans: [{ hash: HEAD_HASH, message: 'Commit from dashboard scan' }],
    });
    expect(readFileSync(result.indexPage, 'utf8')).toContain('<h1>Acme</h1>');
  });

  it('writes identical files when nothing changed between runs', async () => {
    const env = setup([BRANCH], [AP]);
    const git = fakeGit({ repository: false });
    const run = () =>
      archiveOrganization({ config: env.config, orgId: ORG_ID, client: env.newClient(), git: git.runner, now: () => NOW });

    await run();
    const first = snapshot(env.settingsDir);
    await run();
    expect(snapshot(env.settingsDir)).toEqual(first);
    expect(Object.keys(first)).toContain(`${N1_DIR}/network_ApplianceSingleLan.json`);
    expect(git.calls.filter((args) => args[0] === 'init')).toHaveLength(1);
  });

  it('limits a tagged run to the tagged networks and their devices', async () => {
    const env = setup([BRANCH, WAREHOUSE], [AP, SWITCH]);
    const result = await archiveOrganization({
      config: env.config,
      orgId: ORG_ID,
      tag: 'east',
      client: env.newClient(),
      git: fakeGit().runner,
      now: () => NOW,
    });

    expect(result.stats.failed).toBe(0);
    expect(result.metrics.networks).toBe(1);
    expect(result.metrics.devices).toBe(1);
    expect(env.requested.filter((p) => p.includes('N_9') || p.includes('Q2AA-0009'))).toEqual([]);
  });

  it('stops when the organization cannot be read', async () => {
    const env = setup([BRANCH], [AP]);
    const client = new DashboardClient({
      apiKey: 'test-secret',
      baseUrl: env.config.apiBaseUrl,
      maxRetries: 0,
      fetch: routeFetch({}),
    });

    await expect(
      archiveOrganization({ config: env.config, orgId: ORG_ID, client, git: fakeGit().runner, now: () => NOW })
    ).rejects.toBeInstanceOf(DashboardApiError);
  });
});

describe('estimateOrganization', () => {
  it('counts the tagged part of the organization', async () => {
    const env = setup([BRANCH, WAREHOUSE], [AP, SWITCH]);
    const estimate = await estimateOrganization(env.newClient(), ORG_ID, 'east');
    expect(estimate.totalDevices).toBe(1);
    expect(estimate.families.MR).toEqual({ devices: 1, networks: 1 });
    expect(estimate.families.MS).toEqual({ devices: 0, networks: 0 });
    expect(estimate.families.MX).toEqual({ devices: 0, networks: 1 });
  });
});

describe('formatOrganizations', () => {
  it('pads ids into a column', () => {
    expect(
      formatOrganizations([
        { id: '123', name: 'Acme' },
        { id: '4567', name: 'Globex' },
      ])
    ).toBe(`OrgId: 123${' '.repeat(21)} - Acme\nOrgId: 4567${' '.repeat(20)} - Globex`);
  });
});

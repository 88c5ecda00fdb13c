import { describe, expect, it } from 'vitest';

import { buildOperationTable } from '@dashboard-git/dashboard-client';

import { parseEndpointCatalog } from '../src/catalog.js';
import {
  PHASES,
  configuredSsids,
  planApplianceAddressing,
  planBluetooth,
  planDevices,
  planNetworks,
  planOrganization,
  planSsids,
  planSwitchProfilePorts,
  planTemplateSwitchProfiles,
  type PlanInput,
  type PlannedCall,
} from '../src/planner.js';
import {
  CATALOG_CSV,
  DEVICES,
  NETWORKS,
  ORG_ID,
  TEMPLATES,
  catalogCsv,
  memoryReader,
  openApiDoc,
  recordingLogger,
} from './fixtures.js';

const N1_DIR = 'networks/N_1 - Branch _ East';
const N2_DIR = 'networks/N_2 - Kiosk';
const T1_DIR = 'networks/T_1 - Retail Template';

function input(overrides: Partial<PlanInput> = {}): PlanInput {
  return {
    catalog: { rules: parseEndpointCatalog('ops.csv', CATALOG_CSV) },
    operations: buildOperationTable(openApiDoc()),
    organizationId: ORG_ID,
    entities: { networks: NETWORKS, templates: TEMPLATES, devices: DEVICES },
    archived: memoryReader(),
    ...overrides,
  };
}

const summarize = (calls: PlannedCall[]) => calls.map((c) => `${c.identifier} ${c.operationId}`);

/** Everything the two-step phases look for, so every phase plans something. */
const FULL_ARCHIVE = {
  [`${N1_DIR}/network_ApplianceVlansSettings`]: { vlansEnabled: true },
  [`${N1_DIR}/network_WirelessSsids`]: [
    { number: 0, name: 'Corp' },
    { number: 1, name: 'Unconfigured SSID 2' },
    { number: 2, name: 'Guest' },
  ],
  [`${N1_DIR}/network_WirelessBluetoothSettings`]: { advertisingEnabled: true, majorMinorAssignmentMode: 'Unique' },
  [`${N2_DIR}/network_WirelessBluetoothSettings`]: { advertisingEnabled: true, majorMinorAssignmentMode: 'Non-unique' },
  [`${T1_DIR}/org_ConfigTemplateSwitchProfiles`]: [{ switchProfileId: 'P1', name: 'MS120' }, { switchProfileId: 'P2' }],
};

describe('planOrganization', () => {
  it('plans every organization rule that is neither skipped nor scripted, in table order', () => {
    const calls = planOrganization(input());
    expect(calls.map((c) => c.fileName)).toEqual([
      'org_Organization',
      'org_Admins',
      'org_Networks',
      'org_ConfigTemplates',
      'org_Devices',
    ]);
    expect(calls[0]).toEqual({
      operationId: 'getOrganization',
      target: { kind: 'organization', organizationId: ORG_ID },
      fileName: 'org_Organization',
      directory: '',
      identifier: ORG_ID,
    });
  });

  it('warns once about a rule the live API does not have', () => {
    const logger = recordingLogger();
    const rules = parseEndpointCatalog(
      'ops.csv',
      catalogCsv([
        ['getOrganization', ['organizations'], ''],
        ['getOrganizationSnmp', ['organizations'], ''],
      ])
    );
    const calls = planOrganization(input({ catalog: { rules }, logger }));
    expect(summarize(calls)).toEqual(['123 getOrganization']);
    expect(logger.lines).toEqual([['warn', 'getOrganizationSnmp is not in the live API; skipping']]);
  });
});

describe('planDevices', () => {
  it('matches rules to devices by product family', () => {
    expect(summarize(planDevices(input()))).toEqual([
      'Q2AA-0001 getDevice',
      'Q2AA-0001 getDeviceWirelessRadioSettings',
      'Q2AA-0002 getDevice',
      'Q2AA-0002 getDeviceSwitchPorts',
      'Q2AA-0003 getDevice',
      'Q2AA-0004 getDeviceCameraSense',
      'Q2AA-0005 getDevice',
      'Q2AA-0005 getDeviceWirelessRadioSettings',
    ]);
  });

  it('archives under the device directory', () => {
    const [first] = planDevices(input());
    expect(first).toMatchObject({ directory: 'devices/Q2AA-0001 - MR46', fileName: 'device_' });
  });

  it('plans nothing for hardware of an unknown family', () => {
    const entities = { networks: [], templates: [], devices: [{ serial: 'Q2ZZ-0001', model: 'XY9' }] };
    expect(planDevices(input({ entities }))).toEqual([]);
  });
});

describe('planNetworks', () => {
  it('applies product, template and binding rules', () => {
    expect(summarize(planNetworks(input()))).toEqual([
      'N_1 getNetwork',
      'N_1 getNetworkFloorPlans',
      'N_1 getNetworkFirmwareUpgrades',
      'N_1 getNetworkNetflow',
      'N_1 getNetworkApplianceVlansSettings',
      'N_1 getNetworkSwitchStp',
      'N_1 getNetworkWirelessSsids',
      'N_1 getNetworkWirelessBluetoothSettings',
      'N_1 getNetworkWirelessRfProfiles',
      'N_2 getNetwork',
      'N_2 getNetworkFloorPlans',
      'N_2 getNetworkWirelessSsids',
      'N_2 getNetworkWirelessBluetoothSettings',
      'N_2 getNetworkWirelessRfProfiles',
      'N_3 getNetwork',
      'N_3 getNetworkFloorPlans',
      'N_3 getNetworkFirmwareUpgrades',
      'T_1 getNetwork',
      'T_1 getNetworkFirmwareUpgrades',
      'T_1 getNetworkNetflow',
      'T_1 getNetworkApplianceVlansSettings',
      'T_1 getNetworkSwitchStp',
      'T_1 getNetworkWirelessSsids',
      'T_1 getNetworkWirelessBluetoothSettings',
      'T_1 getNetworkWirelessRfProfiles',
    ]);
  });

  it('asks bound networks for template RF profiles too', () => {
    const rf = planNetworks(input()).filter((c) => c.operationId === 'getNetworkWirelessRfProfiles');
    expect(rf.map((c) => [c.identifier, c.query])).toEqual([
      ['N_1', undefined],
      ['N_2', { includeTemplateProfiles: true }],
      ['T_1', undefined],
    ]);
  });
});

describe('planApplianceAddressing', () => {
  it('falls back to the single-LAN call when no VLAN settings were archived', () => {
    const entities = { networks: NETWORKS.slice(0, 1), templates: [], devices: [] };
    const calls = planApplianceAddressing(input({ entities }));
    expect(calls).toEqual([
      {
        operationId: 'getNetworkApplianceSingleLan',
        target: { kind: 'network', networkId: 'N_1' },
        fileName: 'network_ApplianceSingleLan',
        directory: N1_DIR,
        identifier: 'N_1',
      },
    ]);
  });

  it('archives VLANs and ports when VLAN settings exist', () => {
    const calls = planApplianceAddressing(input({ archived: memoryReader(FULL_ARCHIVE) }));
    expect(summarize(calls)).toEqual([
      'N_1 getNetworkApplianceVlans',
      'N_1 getNetworkAppliancePorts',
      'T_1 getNetworkApplianceSingleLan',
    ]);
  });
});

describe('switch profiles', () => {
  it('lists profiles of switch templates only', () => {
    expect(planTemplateSwitchProfiles(input())).toEqual([
      {
        operationId: 'getOrganizationConfigTemplateSwitchProfiles',
        target: { kind: 'switchProfile', organizationId: ORG_ID, configTemplateId: 'T_1' },
        fileName: 'org_ConfigTemplateSwitchProfiles',
        directory: T1_DIR,
        identifier: 'T_1',
      },
    ]);
  });

  it('archives the ports of each archived profile', () => {
    const calls = planSwitchProfilePorts(input({ archived: memoryReader(FULL_ARCHIVE) }));
    expect(calls.map((c) => [c.fileName, c.target])).toEqual([
      [
        'org_ConfigTemplateSwitchProfilePorts_P1',
        { kind: 'switchProfile', organizationId: ORG_ID, configTemplateId: 'T_1', profileId: 'P1' },
      ],
      [
        'org_ConfigTemplateSwitchProfilePorts_P2',
        { kind: 'switchProfile', organizationId: ORG_ID, configTemplateId: 'T_1', profileId: 'P2' },
      ],
    ]);
  });

  it('plans no ports when the profile list was not archived', () => {
    expect(planSwitchProfilePorts(input())).toEqual([]);
  });
});

describe('planSsids', () => {
  it('skips unconfigured slots', () => {
    const calls = planSsids(input({ archived: memoryReader(FULL_ARCHIVE) }));
    expect(calls.map((c) => c.fileName)).toEqual([
      'network_WirelessSsid_ssid_0',
      'network_WirelessSsidSplashSettings_ssid_0',
      'network_WirelessSsid_ssid_2',
      'network_WirelessSsidSplashSettings_ssid_2',
    ]);
    expect(calls[2]?.target).toEqual({ kind: 'ssid', networkId: 'N_1', number: 2 });
  });

  it('numbers SSIDs by position when the list carries no numbers', () => {
    expect(configuredSsids([{ name: 'Corp' }, { name: 'Unconfigured SSID 2' }, { name: 'Guest' }])).toEqual([0, 2]);
  });

  it('warns when the archived list has the wrong shape', () => {
    const logger = recordingLogger();
    const archived = memoryReader({ [`${N1_DIR}/network_WirelessSsids`]: { ssids: [] } });
    expect(planSsids(input({ archived, logger }))).toEqual([]);
    expect(logger.lines).toContainEqual([
      'warn',
      `${N1_DIR}: SSID list has an unexpected shape; SSID settings not archived`,
    ]);
  });
});

describe('planBluetooth', () => {
  it('plans wireless devices of networks with unique major/minor assignment', () => {
    expect(planBluetooth(input({ archived: memoryReader(FULL_ARCHIVE) }))).toEqual([
      {
        operationId: 'getDeviceWirelessBluetoothSettings',
        target: { kind: 'device', serial: 'Q2AA-0001' },
        fileName: 'device_WirelessBluetoothSettings_Q2AA-0001',
        directory: N1_DIR,
        identifier: 'Q2AA-0001',
      },
    ]);
  });
});

describe('skipped rules', () => {
  it('are never planned by any phase, special-cased ones included', () => {
    const skipped = [
      'getOrganizationLicenses',
      'getDeviceLldpCdp',
      'getNetworkClients',
      'getNetworkApplianceVlans',
      'getOrganizationConfigTemplateSwitchProfiles',
      'getOrganizationConfigTemplateSwitchProfilePorts',
      'getNetworkWirelessRfProfiles',
      'getDeviceWirelessBluetoothSettings',
    ];
    const rules = parseEndpointCatalog('ops.csv', CATALOG_CSV).map((r) =>
      skipped.includes(r.operationId) ? { ...r, logic: { kind: 'skipped' as const } } : r
    );
    const planInput = input({ catalog: { rules }, archived: memoryReader(FULL_ARCHIVE) });

    const planned = PHASES.flatMap((phase) => phase.plan(planInput)).map((c) => c.operationId);
    expect(planned.length).toBeGreaterThan(0);
    expect(planned.filter((op) => skipped.includes(op))).toEqual([]);
    expect(planned).toContain('getNetworkAppliancePorts');
  });
});

describe('PHASES', () => {
  it('produce the same calls for the same inputs', () => {
    const planAll = () => PHASES.flatMap((phase) => phase.plan(input({ archived: memoryReader(FULL_ARCHIVE) })));
    expect(planAll()).toEqual(planAll());
  });

  it('run in dependency order', () => {
    expect(PHASES.map((p) => p.name)).toEqual([
      'organization',
      'devices',
      'networks',
      'appliance',
      'switchProfiles',
      'switchProfilePorts',
      'ssids',
      'bluetooth',
    ]);
  });
});

/**
 * Call planner.
 *
 * Each phase turns the rule table, the entity lists and whatever earlier
 * phases archived into PlannedCalls. Phases are pure apart from reading
 * archived files, and run strictly in PHASES order because the two-phase
 * ones read what the phase before them wrote.
 */

import { z } from 'zod';

import { silentLogger, type Logger } from '@dashboard-git/core';
import {
  canTarget,
  pathParams,
  targetParams,
  type CallTarget,
  type OperationInvoker,
  type OperationTable,
  type Query,
} from '@dashboard-git/dashboard-client';

import { isSkipped, type EndpointCatalog, type EndpointRule } from './catalog.js';
import { networkEntities, type EntityLists, type NetworkEntity } from './context.js';
import { deviceFamily, type DeviceFamily } from './device-family.js';
import { deviceDirectory, networkDirectory, settingFileName } from './file-names.js';
import type { SettingsReader } from './persistence.js';

export interface PlannedCall {
  operationId: string;
  target: CallTarget;
  query?: Query;
  /** Base name without extension. */
  fileName: string;
  /** Relative to the settings repository; '' for the root. */
  directory: string;
  /** Shown when the call fails: org id, serial, network id or profile id. */
  identifier: string;
}

export interface PlanInput {
  catalog: Pick<EndpointCatalog, 'rules'>;
  operations: OperationTable;
  organizationId: string;
  entities: EntityLists;
  archived: SettingsReader;
  logger?: Logger;
}

export type PhaseName =
  | 'organization'
  | 'devices'
  | 'networks'
  | 'appliance'
  | 'switchProfiles'
  | 'switchProfilePorts'
  | 'ssids'
  | 'bluetooth';

export interface Phase {
  name: PhaseName;
  title: string;
  plan(input: PlanInput): PlannedCall[];
}

export const RF_PROFILES_OPERATION = 'getNetworkWirelessRfProfiles';
export const APPLIANCE_VLAN_SETTINGS_FILE = 'network_ApplianceVlansSettings';
export const APPLIANCE_VLAN_OPERATIONS = ['getNetworkApplianceVlans', 'getNetworkAppliancePorts'] as const;
export const APPLIANCE_SINGLE_LAN_OPERATION = 'getNetworkApplianceSingleLan';
export const SWITCH_PROFILES_OPERATION = 'getOrganizationConfigTemplateSwitchProfiles';
export const SWITCH_PROFILE_PORTS_OPERATION = 'getOrganizationConfigTemplateSwitchProfilePorts';
export const SSIDS_FILE = 'network_WirelessSsids';
export const BLUETOOTH_SETTINGS_FILE = 'network_WirelessBluetoothSettings';
export const DEVICE_BLUETOOTH_OPERATION = 'getDeviceWirelessBluetoothSettings';

/** SSID slots a wireless network has. */
export const SSID_SLOTS = 15;

const DEVICE_SCOPED_FAMILIES: readonly DeviceFamily[] = ['wireless', 'switch', 'appliance'];

/**
 * Resolves operation ids against the live API for one phase, logging each
 * operation it has to drop once.
 */
class PhaseContext {
  readonly logger: Logger;
  private readonly reported = new Set<string>();

  constructor(readonly input: PlanInput) {
    this.logger = input.logger ?? silentLogger;
  }

  invoker(operationId: string, target: CallTarget): OperationInvoker | undefined {
    const invoker = this.input.operations.get(operationId);
    if (!invoker) {
      this.reportOnce(operationId, `${operationId} is not in the live API; skipping`);
      return undefined;
    }
    if (!canTarget(invoker, target)) {
      const have = targetParams(target);
      const missing = pathParams(invoker.path).filter((p) => !Object.hasOwn(have, p));
      this.reportOnce(
        operationId,
        `${operationId} needs ${missing.map((m) => `{${m}}`).join(', ')}, which a ${target.kind} target cannot supply; skipping`
      );
      return undefined;
    }
    return invoker;
  }

  /** Special-cased operations still honour a `skipped` rule. */
  allowed(operationId: string): boolean {
    return !isSkipped(this.input.catalog, operationId);
  }

  read(directory: string, fileName: string): unknown {
    const value = this.input.archived.read(directory, fileName);
    if (value === undefined) {
      this.logger.debug(`${directory}/${fileName} was not archived; dependent calls skipped`);
    }
    return value;
  }

  private reportOnce(operationId: string, message: string): void {
    if (this.reported.has(operationId)) return;
    this.reported.add(operationId);
    this.logger.warn(message);
  }
}

function isSkippedOrScript(rule: EndpointRule): boolean {
  return rule.logic.kind === 'skipped' || rule.logic.kind === 'script';
}

export function planOrganization(input: PlanInput): PlannedCall[] {
  const ctx = new PhaseContext(input);
  const target: CallTarget = { kind: 'organization', organizationId: input.organizationId };
  const calls: PlannedCall[] = [];

  for (const rule of input.catalog.rules) {
    if (!rule.operationId.startsWith('getOrganization') || isSkippedOrScript(rule)) continue;
    if (!ctx.invoker(rule.operationId, target)) continue;
    calls.push({
      operationId: rule.operationId,
      target,
      fileName: settingFileName(rule.operationId),
      directory: '',
      identifier: input.organizationId,
    });
  }
  return calls;
}

export function appliesToDevice(rule: EndpointRule, family: DeviceFamily | undefined): boolean {
  if (!family) return false;
  if (rule.scope === 'devices') return DEVICE_SCOPED_FAMILIES.includes(family);
  return rule.scope === family;
}

export function planDevices(input: PlanInput): PlannedCall[] {
  const ctx = new PhaseContext(input);
  const calls: PlannedCall[] = [];

  for (const device of input.entities.devices) {
    const family = deviceFamily(device.model);
    const target: CallTarget = { kind: 'device', serial: device.serial };
    const directory = deviceDirectory(device);

    for (const rule of input.catalog.rules) {
      if (!rule.operationId.startsWith('getDevice') || isSkippedOrScript(rule)) continue;
      if (!appliesToDevice(rule, family)) continue;
      if (!ctx.invoker(rule.operationId, target)) continue;
      calls.push({
        operationId: rule.operationId,
        target,
        fileName: settingFileName(rule.operationId),
        directory,
        identifier: device.serial,
      });
    }
  }
  return calls;
}

/**
 * Product-type match first, then the template rules: bound networks skip
 * `non-bound` rules and templates skip `non-template` ones.
 */
export function appliesToNetwork(rule: EndpointRule, entity: NetworkEntity): boolean {
  let matches: boolean;
  if (rule.scope === 'networks') {
    matches = rule.logic.kind === 'products' ? rule.logic.products.some((p) => entity.productTypes.includes(p)) : true;
  } else {
    matches = entity.productTypes.includes(rule.scope);
  }
  if (!matches) return false;
  if (entity.bound && rule.logic.kind === 'non-bound') return false;
  if (entity.kind === 'template' && rule.logic.kind === 'non-template') return false;
  return true;
}

export function planNetworks(input: PlanInput): PlannedCall[] {
  const ctx = new PhaseContext(input);
  const calls: PlannedCall[] = [];

  for (const entity of networkEntities(input.entities)) {
    const target: CallTarget = { kind: 'network', networkId: entity.id };
    const directory = networkDirectory(entity);

    for (const rule of input.catalog.rules) {
      if (!rule.operationId.startsWith('getNetwork')) continue;
      const { kind } = rule.logic;
      if (kind === 'skipped' || kind === 'ssids') continue;

      let query: Query | undefined;
      if (kind === 'script') {
        if (rule.operationId !== RF_PROFILES_OPERATION || !entity.productTypes.includes('wireless')) continue;
        if (entity.bound) query = { includeTemplateProfiles: true };
      } else if (!appliesToNetwork(rule, entity)) {
        continue;
      }

      if (!ctx.invoker(rule.operationId, target)) continue;
      calls.push({
        operationId: rule.operationId,
        target,
        ...(query ? { query } : {}),
        fileName: settingFileName(rule.operationId),
        directory,
        identifier: entity.id,
      });
    }
  }
  return calls;
}

/** VLANs and per-port settings when VLAN settings were archived, otherwise the single-LAN addressing. */
export function planApplianceAddressing(input: PlanInput): PlannedCall[] {
  const ctx = new PhaseContext(input);
  const calls: PlannedCall[] = [];

  for (const entity of networkEntities(input.entities)) {
    if (!entity.productTypes.includes('appliance')) continue;
    const directory = networkDirectory(entity);
    const target: CallTarget = { kind: 'network', networkId: entity.id };
    const vlansEnabled = input.archived.read(directory, APPLIANCE_VLAN_SETTINGS_FILE) !== undefined;
    const operations: readonly string[] = vlansEnabled ? APPLIANCE_VLAN_OPERATIONS : [APPLIANCE_SINGLE_LAN_OPERATION];

    for (const operationId of operations) {
      if (!ctx.allowed(operationId) || !ctx.invoker(operationId, target)) continue;
      calls.push({ operationId, target, fileName: settingFileName(operationId), directory, identifier: entity.id });
    }
  }
  return calls;
}

function switchTemplates(input: PlanInput): NetworkEntity[] {
  return networkEntities(input.entities).filter((e) => e.kind === 'template' && e.productTypes.includes('switch'));
}

export function planTemplateSwitchProfiles(input: PlanInput): PlannedCall[] {
  const ctx = new PhaseContext(input);
  const calls: PlannedCall[] = [];
  const operationId = SWITCH_PROFILES_OPERATION;
  if (!ctx.allowed(operationId)) return calls;

  for (const template of switchTemplates(input)) {
    const target: CallTarget = {
      kind: 'switchProfile',
      organizationId: input.organizationId,
      configTemplateId: template.id,
    };
    if (!ctx.invoker(operationId, target)) continue;
    calls.push({
      operationId,
      target,
      fileName: settingFileName(operationId),
      directory: networkDirectory(template),
      identifier: template.id,
    });
  }
  return calls;
}

const SwitchProfilesSchema = z.array(z.object({ switchProfileId: z.string() }).passthrough());

export function planSwitchProfilePorts(input: PlanInput): PlannedCall[] {
  const ctx = new PhaseContext(input);
  const calls: PlannedCall[] = [];
  const operationId = SWITCH_PROFILE_PORTS_OPERATION;
  if (!ctx.allowed(operationId)) return calls;

  for (const template of switchTemplates(input)) {
    const directory = networkDirectory(template);
    const archived = ctx.read(directory, settingFileName(SWITCH_PROFILES_OPERATION));
    if (archived === undefined) continue;

    const profiles = SwitchProfilesSchema.safeParse(archived);
    if (!profiles.success) {
      ctx.logger.warn(`${directory}: switch profile list has an unexpected shape; ports not archived`);
      continue;
    }

    for (const profile of profiles.data) {
      const target: CallTarget = {
        kind: 'switchProfile',
        organizationId: input.organizationId,
        configTemplateId: template.id,
        profileId: profile.switchProfileId,
      };
      if (!ctx.invoker(operationId, target)) continue;
      calls.push({
        operationId,
        target,
        fileName: `${settingFileName(operationId)}_${profile.switchProfileId}`,
        directory,
        identifier: profile.switchProfileId,
      });
    }
  }
  return calls;
}

const SsidListSchema = z.array(z.object({ number: z.number().int().optional(), name: z.string() }).passthrough());

/** SSID numbers whose name does not mark them as unconfigured. */
export function configuredSsids(ssids: z.infer<typeof SsidListSchema>): number[] {
  const numbers: number[] = [];
  ssids.slice(0, SSID_SLOTS).forEach((ssid, idx) => {
    const number = ssid.number ?? idx;
    if (number < 0 || number >= SSID_SLOTS) return;
    if (ssid.name.includes('Unconfigured')) return;
    numbers.push(number);
  });
  return numbers;
}

export function planSsids(input: PlanInput): PlannedCall[] {
  const ctx = new PhaseContext(input);
  const calls: PlannedCall[] = [];
  const ssidRules = input.catalog.rules.filter((r) => r.logic.kind === 'ssids');
  if (ssidRules.length === 0) return calls;

  for (const entity of networkEntities(input.entities)) {
    if (!entity.productTypes.includes('wireless')) continue;
    const directory = networkDirectory(entity);
    const archived = ctx.read(directory, SSIDS_FILE);
    if (archived === undefined) continue;

    const ssids = SsidListSchema.safeParse(archived);
    if (!ssids.success) {
      ctx.logger.warn(`${directory}: SSID list has an unexpected shape; SSID settings not archived`);
      continue;
    }

    for (const number of configuredSsids(ssids.data)) {
      const target: CallTarget = { kind: 'ssid', networkId: entity.id, number };
      for (const rule of ssidRules) {
        if (!ctx.invoker(rule.operationId, target)) continue;
        calls.push({
          operationId: rule.operationId,
          target,
          fileName: `${settingFileName(rule.operationId)}_ssid_${number}`,
          directory,
          identifier: entity.id,
        });
      }
    }
  }
  return calls;
}

const BluetoothSettingsSchema = z
  .object({
    advertisingEnabled: z.boolean().optional(),
    majorMinorAssignmentMode: z.string().optional(),
  })
  .passthrough();

/** Per-device Bluetooth settings for networks that give each access point its own major/minor values. */
export function planBluetooth(input: PlanInput): PlannedCall[] {
  const ctx = new PhaseContext(input);
  const calls: PlannedCall[] = [];
  const operationId = DEVICE_BLUETOOTH_OPERATION;
  if (!ctx.allowed(operationId)) return calls;

  for (const entity of networkEntities(input.entities)) {
    if (entity.kind !== 'network' || !entity.productTypes.includes('wireless')) continue;
    const directory = networkDirectory(entity);
    const archived = ctx.read(directory, BLUETOOTH_SETTINGS_FILE);
    if (archived === undefined) continue;

    const settings = BluetoothSettingsSchema.safeParse(archived);
    if (!settings.success) continue;
    if (settings.data.advertisingEnabled !== true || settings.data.majorMinorAssignmentMode !== 'Unique') continue;

    for (const device of input.entities.devices) {
      if (device.networkId !== entity.id || deviceFamily(device.model) !== 'wireless') continue;
      const target: CallTarget = { kind: 'device', serial: device.serial };
      if (!ctx.invoker(operationId, target)) continue;
      calls.push({
        operationId,
        target,
        fileName: `${settingFileName(operationId)}_${device.serial}`,
        directory,
        identifier: device.serial,
      });
    }
  }
  return calls;
}

export const PHASES: readonly Phase[] = [
  { name: 'organization', title: 'organization settings', plan: planOrganization },
  { name: 'devices', title: 'device settings', plan: planDevices },
  { name: 'networks', title: 'network and template settings', plan: planNetworks },
  { name: 'appliance', title: 'appliance addressing', plan: planApplianceAddressing },
  { name: 'switchProfiles', title: 'template switch profiles', plan: planTemplateSwitchProfiles },
  { name: 'switchProfilePorts', title: 'switch profile ports', plan: planSwitchProfilePorts },
  { name: 'ssids', title: 'SSID settings', plan: planSsids },
  { name: 'bluetooth', title: 'device Bluetooth settings', plan: planBluetooth },
];

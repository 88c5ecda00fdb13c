/**
 * Scan estimate: a rough call count and duration for an organization,
 * weighted per product family from observed runs.
 */

import type { EntityLists } from './context.js';

/** Calls the organization phase makes regardless of size. */
export const ORG_CALLS = 19;

/** Sustained request rate the estimate assumes, per second. */
export const CALLS_PER_SECOND = 4;

export interface FamilyCounts {
  devices: number;
  networks: number;
}

export interface ScanEstimate {
  families: Record<'MR' | 'MS' | 'MX' | 'MG' | 'MV', FamilyCounts>;
  totalDevices: number;
  totalNetworks: number;
  orgCalls: number;
  deviceCalls: number;
  networkCalls: number;
  totalCalls: number;
  minutes: number;
}

function withProduct(items: ReadonlyArray<{ productTypes: string[] }>, product: string): number {
  return items.filter((i) => i.productTypes.includes(product)).length;
}

export function estimateScan(lists: EntityLists): ScanEstimate {
  const prefixCount = (prefix: string) => lists.devices.filter((d) => d.model.startsWith(prefix)).length;

  const mr = prefixCount('MR');
  const ms = prefixCount('MS');
  const mv = prefixCount('MV');
  const mg = prefixCount('MG');
  const mt = prefixCount('MT');
  const mx = lists.devices.length - mr - ms - mv - mg - mt;

  const both = (product: string) => withProduct(lists.networks, product) + withProduct(lists.templates, product);
  const mrNetworks = both('wireless');
  const msNetworks = both('switch');
  const mxNetworks = both('appliance');
  const mgNetworks = both('cellularGateway');
  // Templates carry no camera settings.
  const mvNetworks = withProduct(lists.networks, 'camera');

  const deviceCalls = mr + ms + mx + mr + 2 * ms + 3 * mv + 2 * mg;
  const networkCalls = 19 * mrNetworks + 22 * msNetworks + 32 * mxNetworks + 6 * mgNetworks + 4 * mvNetworks;
  const totalCalls = ORG_CALLS + deviceCalls + networkCalls;

  return {
    families: {
      MR: { devices: mr, networks: mrNetworks },
      MS: { devices: ms, networks: msNetworks },
      MX: { devices: mx, networks: mxNetworks },
      MG: { devices: mg, networks: mgNetworks },
      MV: { devices: mv, networks: mvNetworks },
    },
    totalDevices: lists.devices.length,
    // Gateway networks are left out of the headline figure.
    totalNetworks: mrNetworks + msNetworks + mxNetworks + mvNetworks,
    orgCalls: ORG_CALLS,
    deviceCalls,
    networkCalls,
    totalCalls,
    minutes: Math.ceil(totalCalls / CALLS_PER_SECOND / 60),
  };
}

export function formatEstimate(orgId: string, estimate: ScanEstimate): string {
  const lines = [
    `Org ${orgId} has ${estimate.totalDevices} total devices and ${estimate.totalNetworks} total networks`,
  ];
  for (const [family, counts] of Object.entries(estimate.families)) {
    lines.push(`  ${family}: ${String(counts.devices).padStart(7)} devices : ${String(counts.networks).padStart(8)} networks`);
  }
  lines.push('');

  const calls = estimate.totalCalls.toLocaleString('en-US');
  if (estimate.minutes > 60) {
    const hours = Math.floor(estimate.minutes / 60);
    const rest = estimate.minutes % 60;
    lines.push(
      `Approximately ${calls} API calls will be made, taking about ${estimate.minutes} minutes or ${hours}h ${rest}m.`
    );
  } else {
    lines.push(`Approximately ${calls} API calls will be made, taking about ${estimate.minutes} minutes.`);
  }
  return lines.join('\n');
}

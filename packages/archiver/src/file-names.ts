import type { ConfigTemplate, Device, Network } from '@dashboard-git/dashboard-client';

/**
 * Base name (no extension) of the file an operation's response is archived under.
 *
 *   getOrganization            -> org_Organization
 *   getOrganizationAdmins      -> org_Admins
 *   getDeviceManagementInterface -> device_ManagementInterface
 *   getNetworkWirelessSsids    -> network_WirelessSsids
 */
export function settingFileName(operationId: string): string {
  if (operationId === 'getOrganization') return 'org_Organization';
  return operationId
    .replace('getOrganization', 'org_')
    .replace('getDevice', 'device_')
    .replace('getNetwork', 'network_');
}

/** Entity names become path segments; separators must not create extra directories. */
export function safeSegment(name: string): string {
  return name.replace(/[/\\]/g, '_');
}

export function deviceDirectory(device: Pick<Device, 'serial' | 'model'>): string {
  return `devices/${safeSegment(device.serial)} - ${safeSegment(device.model)}`;
}

export function networkDirectory(network: Pick<Network | ConfigTemplate, 'id' | 'name'>): string {
  return `networks/${safeSegment(network.id)} - ${safeSegment(network.name)}`;
}

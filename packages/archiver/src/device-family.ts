export type DeviceFamily = 'wireless' | 'switch' | 'camera' | 'cellularGateway' | 'sensor' | 'appliance';

const FAMILY_BY_PREFIX: Record<string, DeviceFamily> = {
  MR: 'wireless',
  MS: 'switch',
  MV: 'camera',
  MG: 'cellularGateway',
  MT: 'sensor',
  MX: 'appliance',
  vM: 'appliance',
  Z1: 'appliance',
  Z3: 'appliance',
};

/** Product family from the first two characters of the model; undefined for unknown hardware. */
export function deviceFamily(model: string): DeviceFamily | undefined {
  return FAMILY_BY_PREFIX[model.slice(0, 2)];
}

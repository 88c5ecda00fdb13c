import { z } from 'zod';

import {
  ConfigTemplateSchema,
  DeviceSchema,
  NetworkSchema,
  type ConfigTemplate,
  type Device,
  type Network,
} from '@dashboard-git/dashboard-client';

export interface EntityLists {
  networks: Network[];
  templates: ConfigTemplate[];
  devices: Device[];
}

/** A network or configuration template, as the network-level phases see it. */
export interface NetworkEntity {
  kind: 'network' | 'template';
  id: string;
  name: string;
  productTypes: string[];
  /** A network bound to a configuration template. */
  bound: boolean;
}

/**
 * Keeps networks carrying `tag`, drops every template, and keeps the devices
 * of the kept networks.
 */
export function filterByTag(lists: EntityLists, tag: string): EntityLists {
  const networks = lists.networks.filter((n) => n.tags?.includes(tag) === true);
  const ids = new Set(networks.map((n) => n.id));
  return {
    networks,
    templates: [],
    devices: lists.devices.filter((d) => typeof d.networkId === 'string' && ids.has(d.networkId)),
  };
}

export function networkEntities(lists: Pick<EntityLists, 'networks' | 'templates'>): NetworkEntity[] {
  return [
    ...lists.networks.map(
      (n): NetworkEntity => ({
        kind: 'network',
        id: n.id,
        name: n.name,
        productTypes: n.productTypes,
        bound: typeof n.configTemplateId === 'string' && n.configTemplateId.length > 0,
      })
    ),
    ...lists.templates.map(
      (t): NetworkEntity => ({ kind: 'template', id: t.id, name: t.name, productTypes: t.productTypes, bound: false })
    ),
  ];
}

function parseList<T extends z.ZodTypeAny>(schema: T, payload: unknown, operationId: string): Array<z.infer<T>> {
  const result = z.array(schema).safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`${operationId} returned an unexpected list: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim());
  }
  return result.data;
}

/** State shared by the phases of one archival run. */
export class ArchiveContext implements EntityLists {
  readonly organizationId: string;
  networks: Network[] = [];
  templates: ConfigTemplate[] = [];
  devices: Device[] = [];
  /** Operation ids with at least one successful call. */
  readonly completedOperations = new Set<string>();

  constructor(organizationId: string) {
    this.organizationId = organizationId;
  }

  /** Keeps the entity list when `operationId` is one of the three list operations. */
  capture(operationId: string, payload: unknown): void {
    switch (operationId) {
      case 'getOrganizationNetworks':
        this.networks = parseList(NetworkSchema, payload, operationId);
        break;
      case 'getOrganizationConfigTemplates':
        this.templates = parseList(ConfigTemplateSchema, payload, operationId);
        break;
      case 'getOrganizationDevices':
        this.devices = parseList(DeviceSchema, payload, operationId);
        break;
      default:
        break;
    }
  }

  applyTagFilter(tag: string): void {
    const filtered = filterByTag(this, tag);
    this.networks = filtered.networks;
    this.templates = filtered.templates;
    this.devices = filtered.devices;
  }

  networkEntities(): NetworkEntity[] {
    return networkEntities(this);
  }
}

/**
 * Minimal Dashboard API v1 client.
 *
 * GET only. Handles the three things every archival call needs: bearer auth,
 * `Link: rel=next` pagination and retrying rate-limited or failed requests.
 */

import { silentLogger, type Logger } from '@dashboard-git/core';
import { z } from 'zod';

import { DashboardApiError } from './errors.js';
import {
  ConfigTemplateSchema,
  DeviceSchema,
  NetworkSchema,
  OpenApiDocumentSchema,
  OrganizationSchema,
  type ConfigTemplate,
  type Device,
  type Network,
  type OpenApiDocument,
  type Organization,
} from './types.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type QueryValue = string | number | boolean;
export type Query = Record<string, QueryValue | undefined>;

export interface DashboardClientOptions {
  apiKey: string;
  baseUrl?: string;
  /** Retries after the first attempt for 429, 5xx and network failures. */
  maxRetries?: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const DEFAULT_BASE_URL = 'https://api.meraki.com/api/v1';

const MAX_REDIRECTS = 5;
const MAX_BACKOFF_MS = 30_000;

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/** Exponential backoff: 2s, 4s, 8s, ... capped at 30s. */
export function backoffMs(attempt: number): number {
  return Math.min(MAX_BACKOFF_MS, 2_000 * Math.pow(2, attempt - 1));
}

export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value.trim());
  if (Number.isFinite(seconds) && seconds >= 0) return Math.min(MAX_BACKOFF_MS, seconds * 1000);
  return undefined;
}

export function parseNextLink(header: string | null): string | undefined {
  if (!header) return undefined;
  for (const part of header.split(',')) {
    const m = part.match(/<([^>]+)>\s*;\s*rel="?next"?/i);
    if (m?.[1]) return m[1];
  }
  return undefined;
}

function isRetryable(status: number): boolean {
  return status === 429 || status >= 500;
}

export class DashboardClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  /** Requests sent, retries and redirects included. */
  requestCount = 0;

  constructor(opts: DashboardClientOptions) {
    this.apiKey = opts.apiKey;
    this.baseUrl = (opts.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.maxRetries = opts.maxRetries ?? 4;
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = opts.sleep ?? sleep;
    this.logger = opts.logger ?? silentLogger;
  }

  url(path: string, query: Query = {}): string {
    const u = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    for (const [k, v] of Object.entries(query)) {
      if (v === undefined) continue;
      u.searchParams.set(k, String(v));
    }
    return u.toString();
  }

  private headers(): Record<string, string> {
    return {
      accept: 'application/json',
      authorization: `Bearer ${this.apiKey}`,
    };
  }

  /** One logical request: retries, then follows redirects keeping the auth header. */
  private async send(url: string, label: string): Promise<Response> {
    let target = url;
    let redirects = 0;

    for (let attempt = 1; ; attempt += 1) {
      let res: Response;
      try {
        this.requestCount += 1;
        res = await this.fetchImpl(target, { method: 'GET', headers: this.headers(), redirect: 'manual' });
      } catch (err) {
        if (attempt > this.maxRetries) {
          throw new DashboardApiError(label, null, err instanceof Error ? err.message : String(err), { cause: err });
        }
        const wait = backoffMs(attempt);
        this.logger.warn(`GET ${label} failed (${err instanceof Error ? err.message : String(err)}), retrying in ${wait}ms`);
        await this.sleep(wait);
        continue;
      }

      if (res.status >= 300 && res.status < 400) {
        const location = res.headers.get('location');
        if (location && redirects < MAX_REDIRECTS) {
          redirects += 1;
          target = new URL(location, target).toString();
          attempt -= 1;
          continue;
        }
      }

      if (res.ok) return res;

      const body = await res.text();
      if (isRetryable(res.status) && attempt <= this.maxRetries) {
        const wait = parseRetryAfter(res.headers.get('retry-after')) ?? backoffMs(attempt);
        this.logger.warn(`GET ${label} returned ${res.status}, retry ${attempt}/${this.maxRetries} in ${wait}ms`);
        await this.sleep(wait);
        continue;
      }
      throw new DashboardApiError(label, res.status, body);
    }
  }

  private static async readJson(res: Response): Promise<unknown> {
    const text = await res.text();
    if (!text.trim()) return null;
    const parsed: unknown = JSON.parse(text);
    return parsed;
  }

  async get(path: string, query: Query = {}): Promise<unknown> {
    const res = await this.send(this.url(path, query), path);
    return DashboardClient.readJson(res);
  }

  /**
   * Follows `Link: rel=next` until the last page. Array pages are
   * concatenated; a non-array body is returned as is.
   */
  async getAllPages(path: string, query: Query = {}): Promise<unknown> {
    let next: string | undefined = this.url(path, query);
    const items: unknown[] = [];

    while (next) {
      const res = await this.send(next, path);
      const page = await DashboardClient.readJson(res);
      if (!Array.isArray(page)) return page;
      items.push(...page);
      next = parseNextLink(res.headers.get('link'));
    }
    return items;
  }

  private async getParsed<T extends z.ZodTypeAny>(schema: T, path: string, allPages: boolean): Promise<z.infer<T>> {
    const raw = allPages ? await this.getAllPages(path) : await this.get(path);
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new DashboardApiError(path, 200, `unexpected response shape: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }

  getOrganizations(): Promise<Organization[]> {
    return this.getParsed(z.array(OrganizationSchema), '/organizations', true);
  }

  getOrganization(organizationId: string): Promise<Organization> {
    return this.getParsed(OrganizationSchema, `/organizations/${encodeURIComponent(organizationId)}`, false);
  }

  getOrganizationNetworks(organizationId: string): Promise<Network[]> {
    return this.getParsed(z.array(NetworkSchema), `/organizations/${encodeURIComponent(organizationId)}/networks`, true);
  }

  getOrganizationConfigTemplates(organizationId: string): Promise<ConfigTemplate[]> {
    return this.getParsed(
      z.array(ConfigTemplateSchema),
      `/organizations/${encodeURIComponent(organizationId)}/configTemplates`,
      false
    );
  }

  getOrganizationDevices(organizationId: string): Promise<Device[]> {
    return this.getParsed(z.array(DeviceSchema), `/organizations/${encodeURIComponent(organizationId)}/devices`, true);
  }

  getOrganizationOpenApiSpec(organizationId: string): Promise<OpenApiDocument> {
    return this.getParsed(
      OpenApiDocumentSchema,
      `/organizations/${encodeURIComponent(organizationId)}/openapiSpec`,
      false
    );
  }
}

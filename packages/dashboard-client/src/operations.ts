/**
 * Operation dispatch table built from the organization's live OpenAPI document.
 *
 * Each GET operationId maps to an invoker that knows its path template and
 * fills the path parameters from a CallTarget.
 */

import type { DashboardClient, Query } from './client.js';
import { OperationTargetError } from './errors.js';
import { OpenApiOperationSchema, type OpenApiDocument, type OpenApiOperation } from './types.js';

export type CallTarget =
  | { kind: 'organization'; organizationId: string }
  | { kind: 'network'; networkId: string }
  | { kind: 'device'; serial: string }
  | { kind: 'ssid'; networkId: string; number: number }
  | { kind: 'switchProfile'; organizationId: string; configTemplateId: string; profileId?: string };

export interface GetOperation {
  path: string;
  operation: OpenApiOperation;
}

export interface OperationInvoker {
  operationId: string;
  path: string;
  /** Placeholders of `path`, in order. */
  pathParams: string[];
  /** Declares a `perPage` parameter. */
  paginated: boolean;
  tags: string[];
  invoke(client: DashboardClient, target: CallTarget, query?: Query): Promise<unknown>;
}

export type OperationTable = ReadonlyMap<string, OperationInvoker>;

const PATH_PARAM = /\{([^}]+)\}/g;

/** GET operations of the document, in document order. Entries without an operationId are dropped. */
export function extractGetOperations(doc: OpenApiDocument): GetOperation[] {
  const ops: GetOperation[] = [];
  for (const [path, methods] of Object.entries(doc.paths)) {
    const parsed = OpenApiOperationSchema.safeParse(methods['get']);
    if (parsed.success) ops.push({ path, operation: parsed.data });
  }
  return ops;
}

export function pathParams(path: string): string[] {
  return [...path.matchAll(PATH_PARAM)].map((m) => m[1] ?? '');
}

/** The path parameters a target can supply. */
export function targetParams(target: CallTarget): Record<string, string> {
  switch (target.kind) {
    case 'organization':
      return { organizationId: target.organizationId };
    case 'network':
      return { networkId: target.networkId };
    case 'device':
      return { serial: target.serial };
    case 'ssid':
      return { networkId: target.networkId, number: String(target.number) };
    case 'switchProfile': {
      const params: Record<string, string> = {
        organizationId: target.organizationId,
        configTemplateId: target.configTemplateId,
      };
      if (target.profileId !== undefined) params['profileId'] = target.profileId;
      return params;
    }
  }
}

export function canTarget(invoker: Pick<OperationInvoker, 'pathParams'>, target: CallTarget): boolean {
  const params = targetParams(target);
  return invoker.pathParams.every((p) => Object.hasOwn(params, p));
}

export function resolvePath(operationId: string, path: string, target: CallTarget): string {
  const params = targetParams(target);
  return path.replace(PATH_PARAM, (_whole, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new OperationTargetError(operationId, `a ${target.kind} target cannot fill {${name}} in ${path}`);
    }
    return encodeURIComponent(value);
  });
}

export function buildOperationTable(doc: OpenApiDocument): OperationTable {
  const table = new Map<string, OperationInvoker>();

  for (const { path, operation } of extractGetOperations(doc)) {
    const { operationId } = operation;
    const paginated = operation.parameters.some((p) => p.name === 'perPage');

    table.set(operationId, {
      operationId,
      path,
      pathParams: pathParams(path),
      paginated,
      tags: operation.tags,
      invoke(client, target, query = {}) {
        const resolved = resolvePath(operationId, path, target);
        return paginated ? client.getAllPages(resolved, query) : client.get(resolved, query);
      },
    });
  }

  return table;
}

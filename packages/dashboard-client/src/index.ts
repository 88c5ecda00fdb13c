export {
  DashboardClient,
  DEFAULT_BASE_URL,
  backoffMs,
  parseNextLink,
  parseRetryAfter,
} from './client.js';
export type { DashboardClientOptions, FetchLike, Query, QueryValue } from './client.js';
export { DashboardApiError, OperationTargetError } from './errors.js';
export {
  buildOperationTable,
  canTarget,
  extractGetOperations,
  pathParams,
  resolvePath,
  targetParams,
} from './operations.js';
export type { CallTarget, GetOperation, OperationInvoker, OperationTable } from './operations.js';
export {
  ConfigTemplateSchema,
  DeviceSchema,
  NetworkSchema,
  OpenApiDocumentSchema,
  OpenApiOperationSchema,
  OpenApiParameterSchema,
  OrganizationSchema,
} from './types.js';
export type {
  ConfigTemplate,
  Device,
  Network,
  OpenApiDocument,
  OpenApiOperation,
  OpenApiParameter,
  Organization,
} from './types.js';

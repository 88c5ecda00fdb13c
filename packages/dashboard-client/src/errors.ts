import { DashboardGitError } from '@dashboard-git/core';

export class DashboardApiError extends DashboardGitError {
  /** HTTP status, or null when no response arrived. */
  readonly status: number | null;
  readonly path: string;
  readonly body: string;

  constructor(path: string, status: number | null, body: string, options?: { cause?: unknown }) {
    const what = status === null ? 'request failed' : `HTTP ${status}`;
    super('DASHBOARD_API_ERROR', `GET ${path}: ${what}${body ? `: ${body.slice(0, 200)}` : ''}`, options);
    this.status = status;
    this.path = path;
    this.body = body;
  }
}

/** The target of a planned call cannot fill the operation's path. */
export class OperationTargetError extends DashboardGitError {
  readonly operationId: string;

  constructor(operationId: string, message: string) {
    super('OPERATION_TARGET_ERROR', `${operationId}: ${message}`);
    this.operationId = operationId;
  }
}

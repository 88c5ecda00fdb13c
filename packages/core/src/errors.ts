export type DashboardGitErrorCode =
  | 'USAGE_ERROR'
  | 'CONFIG_ERROR'
  | 'SETUP_ERROR'
  | 'GIT_ERROR'
  | 'TEMPLATE_ERROR'
  | 'CATALOG_ERROR'
  | 'DASHBOARD_API_ERROR'
  | 'OPERATION_TARGET_ERROR';

export class DashboardGitError extends Error {
  readonly code: DashboardGitErrorCode;

  constructor(code: DashboardGitErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UsageError extends DashboardGitError {
  constructor(message: string) {
    super('USAGE_ERROR', message);
  }
}

export class ConfigError extends DashboardGitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
  }
}

/** Directory or permission problems while preparing an organization's tree. */
export class SetupError extends DashboardGitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SETUP_ERROR', message, options);
  }
}

export class TemplateError extends DashboardGitError {
  readonly template: string;

  constructor(template: string, message: string) {
    super('TEMPLATE_ERROR', `${template}: ${message}`);
    this.template = template;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** CLI exit status: 2 for usage and configuration problems, 1 for everything else. */
export function exitCodeForError(err: unknown): number {
  if (err instanceof DashboardGitError && (err.code === 'USAGE_ERROR' || err.code === 'CONFIG_ERROR')) {
    return 2;
  }
  return 1;
}

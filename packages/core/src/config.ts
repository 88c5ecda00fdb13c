import { existsSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import { ConfigError, errorMessage } from './errors.js';
import { isLogLevel, type LogLevel } from './log.js';

export const DEFAULT_CONFIG_FILE = 'dashboard-git.config.json';

export const BACKUP_FORMATS = ['json', 'yaml', 'both'] as const;
export type BackupFormat = (typeof BACKUP_FORMATS)[number];

const ConfigFileSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    apiBaseUrl: z.string().url().optional(),
    basePath: z.string().min(1).optional(),
    operationsFile: z.string().min(1).optional(),
    defaultConfigsDir: z.string().min(1).optional(),
    git: z
      .object({
        userName: z.string().min(1).optional(),
        userEmail: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    web: z
      .object({
        publishDir: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    maxConcurrentRequests: z.number().int().min(1).max(10).optional(),
    maxRetries: z.number().int().min(0).max(10).optional(),
    backupFormat: z.enum(BACKUP_FORMATS).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ResolvedConfig {
  /** Undefined until a command that talks to the API asks for it. */
  apiKey?: string;
  apiBaseUrl: string;
  basePath: string;
  operationsFile: string;
  defaultConfigsDir?: string;
  git: { userName: string; userEmail: string };
  web: { publishDir: string };
  maxConcurrentRequests: number;
  maxRetries: number;
  backupFormat: BackupFormat;
  logLevel: LogLevel;
}

export const CONFIG_DEFAULTS: Omit<ResolvedConfig, 'apiKey' | 'defaultConfigsDir'> = {
  apiBaseUrl: 'https://api.meraki.com/api/v1',
  basePath: '/var/lib/dashboard-git/orgs',
  operationsFile: 'API_GET_operations.csv',
  git: { userName: 'dashboard-git', userEmail: 'dashboard-git@localhost' },
  web: { publishDir: '/var/www/html/dashboard-git' },
  maxConcurrentRequests: 3,
  maxRetries: 4,
  backupFormat: 'json',
  logLevel: 'info',
};

export async function loadConfigFile(path: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Could not read config file at ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigError(`Invalid config at ${where}: ${issue?.message ?? 'unknown problem'}`);
  }
  return result.data;
}

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = envString(env, name);
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return n;
}

export interface ResolveConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * File values first, then environment overrides. The API key is read from
 * MERAKI_DASHBOARD_API_KEY in preference to the file.
 */
export async function resolveConfig(opts: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();

  let configPath = opts.configPath ?? envString(env, 'DASHBOARD_GIT_CONFIG');
  if (!configPath && existsSync(join(cwd, DEFAULT_CONFIG_FILE))) {
    configPath = join(cwd, DEFAULT_CONFIG_FILE);
  }
  const file: ConfigFile = configPath ? await loadConfigFile(configPath) : {};

  const logLevel = envString(env, 'DASHBOARD_GIT_LOG_LEVEL') ?? file.logLevel ?? CONFIG_DEFAULTS.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`DASHBOARD_GIT_LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  return {
    apiKey: envString(env, 'MERAKI_DASHBOARD_API_KEY') ?? file.apiKey,
    apiBaseUrl: (envString(env, 'DASHBOARD_GIT_API_BASE_URL') ?? file.apiBaseUrl ?? CONFIG_DEFAULTS.apiBaseUrl).replace(
      /\/+$/,
      ''
    ),
    basePath: envString(env, 'DASHBOARD_GIT_BASE_PATH') ?? file.basePath ?? CONFIG_DEFAULTS.basePath,
    operationsFile: file.operationsFile ?? CONFIG_DEFAULTS.operationsFile,
    defaultConfigsDir: file.defaultConfigsDir,
    git: {
      userName: file.git?.userName ?? CONFIG_DEFAULTS.git.userName,
      userEmail: file.git?.userEmail ?? CONFIG_DEFAULTS.git.userEmail,
    },
    web: {
      publishDir: envString(env, 'DASHBOARD_GIT_PUBLISH_DIR') ?? file.web?.publishDir ?? CONFIG_DEFAULTS.web.publishDir,
    },
    maxConcurrentRequests:
      envInt(env, 'DASHBOARD_GIT_MAX_CONCURRENCY') ?? file.maxConcurrentRequests ?? CONFIG_DEFAULTS.maxConcurrentRequests,
    maxRetries: file.maxRetries ?? CONFIG_DEFAULTS.maxRetries,
    backupFormat: file.backupFormat ?? CONFIG_DEFAULTS.backupFormat,
    logLevel,
  };
}

export function requireApiKey(config: ResolvedConfig): string {
  if (!config.apiKey) {
    throw new ConfigError('No API key: set MERAKI_DASHBOARD_API_KEY (preferred) or apiKey in the config file');
  }
  return config.apiKey;
}

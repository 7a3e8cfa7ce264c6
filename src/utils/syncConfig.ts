import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { ConfigError } from './errors.ts';
import { DEFAULT_BASE_URL } from './bitableClient.ts';

export interface TableIds {
  /** Sheet receiving the ledger rows */
  ledger?: string;
  /** Sheet receiving one marker row per import run */
  batches?: string;
}

export interface SyncConfig {
  baseUrl: string;
  appId?: string;
  appSecret?: string;
  appToken?: string;
  tables: TableIds;
  /** Directory of the run logs, relative to the working directory */
  logDir: string;
}

/**
 * Credentials checked to be present
 */
export interface Credentials {
  baseUrl: string;
  appId: string;
  appSecret: string;
  appToken: string;
}

export type Env = Record<string, string | undefined>;

export const CONFIG_FILE = 'config/ledger-sync.yaml';
export const DEFAULT_LOG_DIR = '.memory';

/** Environment variables and the setting each one overrides */
export const ENV_VARS = {
  baseUrl: 'FEISHU_BASE_URL',
  appId: 'FEISHU_APP_ID',
  appSecret: 'FEISHU_APP_SECRET',
  appToken: 'FEISHU_APP_TOKEN',
  ledgerTable: 'FEISHU_TABLE_ID_BILLING',
  batchTable: 'FEISHU_TABLE_ID_BATCH_NUMBER',
} as const;

const FILE_KEYS = ['baseUrl', 'appToken', 'tables', 'logDir'];
const SECRET_KEYS = ['appId', 'appSecret'];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(obj: Record<string, unknown>, key: string, label = key): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`Invalid config: '${label}' must be a non-empty string`);
  }
  return value.trim();
}

function validateBaseUrl(value: string): string {
  try {
    const url = new URL(value);
    if (url.protocol !== 'https:' && url.protocol !== 'http:') {
      throw new Error(`unsupported protocol ${url.protocol}`);
    }
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid config: 'baseUrl' is not a valid http(s) URL (${reason})`);
  }
  return value.replace(/\/+$/, '');
}

/**
 * Validates the tables section
 * @throws ConfigError if it is not a mapping of strings
 */
function validateTables(tables: unknown): TableIds {
  if (tables === undefined || tables === null) {
    return {};
  }
  if (!isObject(tables)) {
    throw new ConfigError("Invalid config: 'tables' must be an object");
  }

  for (const key of Object.keys(tables)) {
    if (key !== 'ledger' && key !== 'batches') {
      throw new ConfigError(`Invalid config: unknown table '${key}' (expected 'ledger' or 'batches')`);
    }
  }

  return {
    ledger: optionalString(tables, 'ledger', 'tables.ledger'),
    batches: optionalString(tables, 'batches', 'tables.batches'),
  };
}

/**
 * Reads and validates the optional configuration file
 * @returns The file's settings, or an empty object if there is no file
 * @throws ConfigError if the file is not valid YAML or has invalid fields
 */
function loadConfigFile(directory: string): Partial<SyncConfig> {
  const configPath = path.join(directory, CONFIG_FILE);

  if (!fs.existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    parsed = yaml.load(content);
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      throw new ConfigError(`Failed to parse ${CONFIG_FILE}: ${err.message}`);
    }
    throw err;
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isObject(parsed)) {
    throw new ConfigError(`Invalid config: ${CONFIG_FILE} must contain a YAML object`);
  }

  for (const key of Object.keys(parsed)) {
    if (SECRET_KEYS.includes(key)) {
      throw new ConfigError(`Invalid config: '${key}' must not be stored in ${CONFIG_FILE}`, {
        hint: `Set ${key === 'appId' ? ENV_VARS.appId : ENV_VARS.appSecret} in the environment or .env instead`,
      });
    }
    if (!FILE_KEYS.includes(key)) {
      throw new ConfigError(`Invalid config: unknown key '${key}' in ${CONFIG_FILE}`);
    }
  }

  const baseUrl = optionalString(parsed, 'baseUrl');

  return {
    baseUrl: baseUrl ? validateBaseUrl(baseUrl) : undefined,
    appToken: optionalString(parsed, 'appToken'),
    tables: validateTables(parsed.tables),
    logDir: optionalString(parsed, 'logDir'),
  };
}

function fromEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Loads the sync configuration: config/ledger-sync.yaml (optional), overridden by
 * the environment. App id and secret come from the environment only.
 *
 * @param directory The base directory holding config/
 * @param env Environment variables (default: process.env)
 * @throws ConfigError if the file or an environment value is invalid
 */
export function loadSyncConfig(directory: string, env: Env = process.env): SyncConfig {
  const file = loadConfigFile(directory);
  const envBaseUrl = fromEnv(env, ENV_VARS.baseUrl);

  return {
    baseUrl: envBaseUrl ? validateBaseUrl(envBaseUrl) : (file.baseUrl ?? DEFAULT_BASE_URL),
    appId: fromEnv(env, ENV_VARS.appId),
    appSecret: fromEnv(env, ENV_VARS.appSecret),
    appToken: fromEnv(env, ENV_VARS.appToken) ?? file.appToken,
    tables: {
      ledger: fromEnv(env, ENV_VARS.ledgerTable) ?? file.tables?.ledger,
      batches: fromEnv(env, ENV_VARS.batchTable) ?? file.tables?.batches,
    },
    logDir: file.logDir ?? DEFAULT_LOG_DIR,
  };
}

/**
 * Checks that app id, app secret and app token are configured
 * @throws ConfigError naming every missing setting
 */
export function requireCredentials(config: SyncConfig): Credentials {
  const { appId, appSecret, appToken } = config;
  if (appId && appSecret && appToken) {
    return { baseUrl: config.baseUrl, appId, appSecret, appToken };
  }

  const missing: string[] = [];
  if (!appId) missing.push(ENV_VARS.appId);
  if (!appSecret) missing.push(ENV_VARS.appSecret);
  if (!appToken) missing.push(ENV_VARS.appToken);

  throw new ConfigError(`Incomplete Feishu configuration: missing ${missing.join(', ')}`, {
    hint: `Set them in the environment or .env (app token may also go in ${CONFIG_FILE})`,
  });
}

/**
 * Checks that both destination tables are configured
 * @throws ConfigError naming every missing table
 */
export function requireTables(config: SyncConfig): Required<TableIds> {
  const { ledger, batches } = config.tables;
  if (ledger && batches) {
    return { ledger, batches };
  }

  const missing: string[] = [];
  if (!ledger) missing.push(`${ENV_VARS.ledgerTable} (tables.ledger)`);
  if (!batches) missing.push(`${ENV_VARS.batchTable} (tables.batches)`);

  throw new ConfigError(`Incomplete table configuration: missing ${missing.join(', ')}`, {
    hint: `Set the table ids in the environment or in ${CONFIG_FILE}`,
  });
}

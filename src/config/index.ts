import dotenv from 'dotenv';
import { parseArgs } from 'util';
import { ConfigError } from '../lib/errors';

// Loaded on import so LOG_* settings from .env reach the logger. Variables
// already set by PRTG win.
dotenv.config();

export const SCOPES = [
  'capacity',
  'performance',
  'hardware',
  'drive',
  'volume',
  'volume-management',
] as const;

export type Scope = (typeof SCOPES)[number];

export type Credential =
  | { kind: 'token'; apiToken: string }
  | { kind: 'password'; username: string; password: string };

export type PrtgCredential =
  | { kind: 'token'; apiToken: string }
  | { kind: 'passhash'; username: string; passhash: string };

export type Config = {
  scope: Scope;
  volume?: string;
  array: {
    url: string;
    apiVersion: string;
    credential: Credential;
    insecureTls: boolean;
    timeoutMs: number;
  };
  thresholds: {
    capacityWarnPercent: number;
    capacityErrorPercent: number;
  };
  stateDir: string;
  prtg?: {
    url: string;
    credential: PrtgCredential;
    templateId: string;
    parentId: string;
    sensorName: string;
    sensorParams: string;
    insecureTls: boolean;
  };
};

type Env = Record<string, string | undefined>;

const FLAGS = {
  scope: { type: 'string', short: 's' },
  volume: { type: 'string', short: 'v' },
  host: { type: 'string' },
  'api-token': { type: 'string' },
  username: { type: 'string' },
  password: { type: 'string' },
  'state-dir': { type: 'string' },
  'prtg-url': { type: 'string' },
  'template-id': { type: 'string' },
  'parent-id': { type: 'string' },
} as const;

// Flag name -> env var it overrides.
const FLAG_ENV: Record<keyof typeof FLAGS, string> = {
  scope: 'SCOPE',
  volume: 'VOLUME',
  host: 'ARRAY_URL',
  'api-token': 'ARRAY_API_TOKEN',
  username: 'ARRAY_USERNAME',
  password: 'ARRAY_PASSWORD',
  'state-dir': 'STATE_DIR',
  'prtg-url': 'PRTG_URL',
  'template-id': 'PRTG_TEMPLATE_ID',
  'parent-id': 'PRTG_PARENT_ID',
};

const isScope = (value: string): value is Scope =>
  SCOPES.some((scope) => scope === value);

const isFlagName = (value: string): value is keyof typeof FLAGS =>
  Object.prototype.hasOwnProperty.call(FLAGS, value);

const toNumber = (value: string, key: string): number => {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`${key} must be a number`);
  }
  return parsed;
};

const toBoolean = (value: string, key: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y'].includes(normalized)) return true;
  if (['false', '0', 'no', 'n'].includes(normalized)) return false;
  throw new ConfigError(`${key} must be boolean-like (true/false)`);
};

const withScheme = (url: string): string =>
  /^https?:\/\//i.test(url) ? url : `https://${url}`;

/**
 * Merge `--flag value` overrides on top of the environment.
 */
export function applyFlags(argv: string[], env: Env): Env {
  const { values } = parseArgs({ args: argv, options: FLAGS, strict: true, allowPositionals: false });
  const merged: Env = { ...env };
  for (const [flag, value] of Object.entries(values)) {
    if (typeof value === 'string' && isFlagName(flag)) {
      merged[FLAG_ENV[flag]] = value;
    }
  }
  return merged;
}

function readers(env: Env) {
  const optional = (key: string): string | undefined => {
    const value = env[key];
    if (!value) return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  };

  const required = (key: string, fallback?: string): string => {
    const value = optional(key) ?? fallback;
    if (!value) {
      throw new ConfigError(`Missing required parameter ${key}`);
    }
    return value;
  };

  return { optional, required };
}

function resolveArrayCredential(env: Env): Credential {
  const { optional } = readers(env);
  const apiToken = optional('ARRAY_API_TOKEN');
  if (apiToken) return { kind: 'token', apiToken };

  const username = optional('ARRAY_USERNAME');
  const password = optional('ARRAY_PASSWORD');
  if ((username && !password) || (!username && password)) {
    throw new ConfigError('ARRAY_USERNAME and ARRAY_PASSWORD must be set together');
  }
  if (!username || !password) {
    throw new ConfigError('Either ARRAY_API_TOKEN or ARRAY_USERNAME/ARRAY_PASSWORD is required');
  }
  return { kind: 'password', username, password };
}

function resolvePrtgCredential(env: Env): PrtgCredential {
  const { optional } = readers(env);
  const apiToken = optional('PRTG_API_TOKEN');
  if (apiToken) return { kind: 'token', apiToken };

  const username = optional('PRTG_USERNAME');
  const passhash = optional('PRTG_PASSHASH');
  if ((username && !passhash) || (!username && passhash)) {
    throw new ConfigError('PRTG_USERNAME and PRTG_PASSHASH must be set together');
  }
  if (!username || !passhash) {
    throw new ConfigError('Either PRTG_API_TOKEN or PRTG_USERNAME/PRTG_PASSHASH is required');
  }
  return { kind: 'passhash', username, passhash };
}

/**
 * Build the run configuration from environment (plus `.env`) and command-line flags.
 */
export function loadConfig(argv: string[] = process.argv.slice(2), env: Env = process.env): Config {
  let merged: Env;
  try {
    merged = applyFlags(argv, env);
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err), { cause: err });
  }
  const { optional, required } = readers(merged);

  const scope = required('SCOPE').toLowerCase();
  if (!isScope(scope)) {
    throw new ConfigError(`Unknown scope '${scope}', expected one of ${SCOPES.join(', ')}`);
  }

  const volume = optional('VOLUME');
  if (scope === 'volume' && !volume) {
    throw new ConfigError('Scope volume requires VOLUME (--volume)');
  }

  const insecureTls = toBoolean(required('ARRAY_INSECURE_TLS', 'false'), 'ARRAY_INSECURE_TLS');
  const config: Config = {
    scope,
    volume,
    array: {
      url: withScheme(required('ARRAY_URL')).replace(/\/$/, ''),
      apiVersion: required('ARRAY_API_VERSION', '1.19'),
      credential: resolveArrayCredential(merged),
      insecureTls,
      timeoutMs: toNumber(required('HTTP_TIMEOUT_MS', '15000'), 'HTTP_TIMEOUT_MS'),
    },
    thresholds: {
      capacityWarnPercent: toNumber(required('CAPACITY_WARN_PERCENT', '80'), 'CAPACITY_WARN_PERCENT'),
      capacityErrorPercent: toNumber(required('CAPACITY_ERROR_PERCENT', '90'), 'CAPACITY_ERROR_PERCENT'),
    },
    stateDir: required('STATE_DIR', './state'),
  };

  if (scope === 'volume-management') {
    config.prtg = {
      url: withScheme(required('PRTG_URL')).replace(/\/$/, ''),
      credential: resolvePrtgCredential(merged),
      templateId: required('PRTG_TEMPLATE_ID'),
      parentId: required('PRTG_PARENT_ID'),
      sensorName: required('PRTG_SENSOR_NAME', 'Volume {volume}'),
      sensorParams: required('PRTG_SENSOR_PARAMS', '--scope=volume --volume={volume}'),
      insecureTls: toBoolean(required('PRTG_INSECURE_TLS', String(insecureTls)), 'PRTG_INSECURE_TLS'),
    };
  }

  return config;
}


/**
 * Verifier configuration
 *
 * Resolved once at process start and treated as read-only afterwards.
 * Precedence: explicit overrides > environment > config file > defaults.
 */

import { readFile } from 'node:fs/promises';
import { hostname } from 'node:os';
import path from 'node:path';
import { parseDocument } from 'yaml';

import { isPlainObject } from '@batchguard/types';

import type { DefinitionPaths } from '../definitions/loader.js';
import { ConfigError } from '../errors.js';

export interface VerifierConfig {
  /** Upper bound for pbs_license_min / pbs_license_max */
  maxLicenses: number;
  /** Resolve ACL host names; disabled where hosts cannot be checked (Kerberos) */
  aclHostCheck: boolean;
  /** Server appended to dependency job ids that name none */
  defaultServer?: string;
  /** Host used for output/error paths that name none */
  submitHost: string;
  /** Base for relative output/error paths */
  workingDirectory: string;
  /** Definition tables to load instead of the shipped ones */
  definitions: DefinitionPaths;
}

export const DEFAULT_MAX_LICENSES = 2147483647;

export const CONFIG_FILE_NAME = '.batchguardrc.yaml';

export const ENV_KEYS = {
  config: 'BATCHGUARD_CONFIG',
  maxLicenses: 'BATCHGUARD_MAX_LICENSES',
  aclHostCheck: 'BATCHGUARD_ACL_HOST_CHECK',
  defaultServer: 'BATCHGUARD_DEFAULT_SERVER',
  submitHost: 'BATCHGUARD_SUBMIT_HOST',
} as const;

export interface ResolveVerifierConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Config file; defaults to $BATCHGUARD_CONFIG, then ./.batchguardrc.yaml */
  configPath?: string;
  cwd?: string;
  overrides?: Partial<VerifierConfig>;
}

export function defaultVerifierConfig(cwd: string = process.cwd()): VerifierConfig {
  return {
    maxLicenses: DEFAULT_MAX_LICENSES,
    aclHostCheck: true,
    submitHost: hostname(),
    workingDirectory: cwd,
    definitions: {},
  };
}

export async function resolveVerifierConfig(
  options: ResolveVerifierConfigOptions = {}
): Promise<VerifierConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configPath =
    options.configPath ?? firstNonEmptyString([env[ENV_KEYS.config]]) ?? path.join(cwd, CONFIG_FILE_NAME);

  const defaults = defaultVerifierConfig(cwd);
  const fromFile = await loadConfigFile(configPath);
  const fromEnv = readEnvConfig(env);
  const overrides = options.overrides ?? {};

  return {
    ...defaults,
    ...fromFile,
    ...fromEnv,
    ...overrides,
    definitions: {
      ...defaults.definitions,
      ...fromFile.definitions,
      ...overrides.definitions,
    },
  };
}

async function loadConfigFile(configPath: string): Promise<Partial<VerifierConfig>> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw new ConfigError(`Cannot read config file ${configPath}`, { source: configPath, cause: error });
  }

  return parseConfigFile(raw, configPath);
}

function isMissingFile(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Parses the YAML config file. Unknown keys are ignored.
 * @throws ConfigError when the file is not valid YAML or a key has the wrong type
 */
export function parseConfigFile(content: string, source?: string): Partial<VerifierConfig> {
  const doc = parseDocument(content);
  const firstError = doc.errors[0];
  if (firstError) {
    throw new ConfigError(firstError.message, { source, cause: firstError });
  }

  const parsed: unknown = doc.toJS();
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError('Config file must be a mapping', { source });
  }

  const config: Partial<VerifierConfig> = {};

  if ('maxLicenses' in parsed) {
    const maxLicenses = parsed.maxLicenses;
    if (typeof maxLicenses !== 'number' || !Number.isInteger(maxLicenses) || maxLicenses < 0) {
      throw new ConfigError('maxLicenses must be a non-negative integer', { source, key: 'maxLicenses' });
    }
    config.maxLicenses = maxLicenses;
  }

  if ('aclHostCheck' in parsed) {
    if (typeof parsed.aclHostCheck !== 'boolean') {
      throw new ConfigError('aclHostCheck must be true or false', { source, key: 'aclHostCheck' });
    }
    config.aclHostCheck = parsed.aclHostCheck;
  }

  for (const key of ['defaultServer', 'submitHost', 'workingDirectory'] as const) {
    if (!(key in parsed)) {
      continue;
    }
    const value = parsed[key];
    if (typeof value !== 'string' || value.length === 0) {
      throw new ConfigError(`${key} must be a non-empty string`, { source, key });
    }
    config[key] = value;
  }

  if ('definitions' in parsed) {
    config.definitions = parseDefinitionPaths(parsed.definitions, source);
  }

  return config;
}

function parseDefinitionPaths(value: unknown, source: string | undefined): DefinitionPaths {
  if (!isPlainObject(value)) {
    throw new ConfigError('definitions must be a mapping', { source, key: 'definitions' });
  }

  const paths: DefinitionPaths = {};
  const baseDir = source === undefined ? undefined : path.dirname(source);

  for (const key of ['resources', 'attributes'] as const) {
    const entry = value[key];
    if (entry === undefined) {
      continue;
    }
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new ConfigError(`definitions.${key} must be a file path`, { source, key: `definitions.${key}` });
    }
    paths[key] = baseDir === undefined ? entry : path.resolve(baseDir, entry);
  }

  return paths;
}

function readEnvConfig(env: NodeJS.ProcessEnv): Partial<VerifierConfig> {
  const config: Partial<VerifierConfig> = {};

  const maxLicenses = firstNonEmptyString([env[ENV_KEYS.maxLicenses]]);
  if (maxLicenses !== undefined) {
    const parsed = Number(maxLicenses);
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new ConfigError(`${ENV_KEYS.maxLicenses} must be a non-negative integer`, {
        key: ENV_KEYS.maxLicenses,
      });
    }
    config.maxLicenses = parsed;
  }

  const aclHostCheck = firstNonEmptyString([env[ENV_KEYS.aclHostCheck]]);
  if (aclHostCheck !== undefined) {
    const normalized = aclHostCheck.toLowerCase();
    config.aclHostCheck = normalized === 'true' || normalized === '1';
  }

  const defaultServer = firstNonEmptyString([env[ENV_KEYS.defaultServer]]);
  if (defaultServer !== undefined) {
    config.defaultServer = defaultServer;
  }

  const submitHost = firstNonEmptyString([env[ENV_KEYS.submitHost]]);
  if (submitHost !== undefined) {
    config.submitHost = submitHost;
  }

  return config;
}

function firstNonEmptyString(values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }

  return undefined;
}

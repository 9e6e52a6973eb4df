import { readFileSync, existsSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { parse, stringify } from 'yaml';
import { ConfigSchema, cloneDefaults, type Config, type InputsConfig } from './schema.js';

const DEFAULT_CONFIG_PATH = '.claimtrace/config.yaml';

/** Environment fallbacks for input and output paths the config leaves unset. */
export const PATH_ENV_KEYS = {
  docs: 'CLAIMTRACE_DOCS',
  questions: 'CLAIMTRACE_QUESTIONS',
  claims: 'CLAIMTRACE_CLAIMS',
  out: 'CLAIMTRACE_OUT',
} as const;

function getDefaultConfigPath(): string {
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

export function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolveEnvVar(value: string): string {
  if (value.startsWith('env:')) {
    const envKey = value.slice(4);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('${') && value.endsWith('}')) {
    const envKey = value.slice(2, -1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('$')) {
    const envKey = value.slice(1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  return value;
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (isRecord(obj)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isUnresolvedEnvRef(value: string | undefined): boolean {
  if (!value) return false;
  return value.startsWith('env:') || value.startsWith('$');
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
}

/** Read and parse the YAML document at `configPath`; an empty file yields `{}`. */
function readConfigDocument(configPath: string): Record<string, unknown> {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  let doc: unknown;
  try {
    doc = parse(fileContent);
  } catch {
    throw new ConfigError(`Failed to parse config file: ${configPath}`);
  }

  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) {
    throw new ConfigError(`Invalid config: expected a mapping at the top level of ${configPath}`);
  }
  return doc;
}

/**
 * Clear unresolved env references and fill unset paths from the environment.
 * Returns the environment keys that supplied a value.
 */
function applyEnvVarFallbacks(config: Config, outputDirSet: boolean): string[] {
  const envKeysUsed: string[] = [];
  const inputKeys: Array<keyof InputsConfig> = ['docs', 'questions', 'claims'];

  for (const key of inputKeys) {
    if (isUnresolvedEnvRef(config.inputs[key])) {
      config.inputs[key] = undefined;
    }
    if (!config.inputs[key]) {
      const envKey = PATH_ENV_KEYS[key];
      const envVal = process.env[envKey];
      if (envVal) {
        config.inputs[key] = envVal;
        envKeysUsed.push(envKey);
      }
    }
  }

  let hasOutputDir = outputDirSet;
  if (isUnresolvedEnvRef(config.output.dir)) {
    config.output.dir = cloneDefaults().output.dir;
    hasOutputDir = false;
  }
  if (!hasOutputDir) {
    const envVal = process.env[PATH_ENV_KEYS.out];
    if (envVal) {
      config.output.dir = envVal;
      envKeysUsed.push(PATH_ENV_KEYS.out);
    }
  }

  return envKeysUsed;
}

export interface LoadConfigResult {
  config: Config;
  configFileExists: boolean;
  envKeysUsed: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);
  const result = cloneDefaults();
  let outputDirSet = false;

  if (configFileExists) {
    const resolvedConfig = resolveEnvVarsInObject(stripNullValues(readConfigDocument(configPath)));
    const validated = ConfigSchema.safeParse(resolvedConfig);

    if (!validated.success) {
      throw new ConfigError(`Invalid config: ${formatIssues(validated.error.issues)}`);
    }

    const { retrieval, verification, inputs, output } = validated.data;
    if (retrieval) {
      result.retrieval = { ...result.retrieval, ...retrieval };
    }
    if (verification) {
      result.verification = { ...result.verification, ...verification };
    }
    if (inputs) {
      result.inputs = { ...result.inputs, ...inputs };
    }
    if (output) {
      result.output = { ...result.output, ...output };
      outputDirSet = output.dir !== undefined;
    }
  }

  const envKeysUsed = applyEnvVarFallbacks(result, outputDirSet);

  return { config: result, configFileExists, envKeysUsed };
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return getDefaultConfigPath();
}

export function setConfigValue(key: string, value: string, options: LoadConfigOptions = {}): void {
  const configPath = getConfigPath(options.configPath);

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}. Run 'claimtrace config init' first.`);
  }

  const doc = readConfigDocument(configPath);

  // Navigate dot-notation key
  const keys = key.split('.');
  let current = doc;
  for (let i = 0; i < keys.length - 1; i++) {
    const next = current[keys[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[keys[i]] = created;
      current = created;
    }
  }

  const lastKey = keys[keys.length - 1];

  // Type coercion
  const numValue = Number(value);
  if (!isNaN(numValue) && value.trim() !== '') {
    current[lastKey] = numValue;
  } else if (value === 'true') {
    current[lastKey] = true;
  } else if (value === 'false') {
    current[lastKey] = false;
  } else if (value.includes(',')) {
    current[lastKey] = value.split(',').map(item => item.trim()).filter(item => item !== '');
  } else {
    current[lastKey] = value;
  }

  // Validate modified config (strip nulls from YAML comments)
  const validated = ConfigSchema.safeParse(stripNullValues(doc));
  if (!validated.success) {
    throw new ConfigError(`Invalid config after setting ${key}: ${formatIssues(validated.error.issues)}`);
  }

  writeFileSync(configPath, stringify(doc), 'utf-8');
}

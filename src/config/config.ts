import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import JSON5 from 'json5';
import type { PullcraftConfig, PullcraftConfigFile } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { logger, isLogLevel } from '../utils/logger.js';
import { errorMessage } from '../utils/text.js';

const GLOBAL_CONFIG_DIR = join(homedir(), '.pullcraft');
const CONFIG_FILE_NAME = 'config.json';
const LOCAL_CONFIG_FILE = join('.pullcraft', CONFIG_FILE_NAME);

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function optionalString(section: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || !value) {
    throw new ConfigurationError(`${where}: "${key}" must be a non-empty string`);
  }
  return value;
}

/** Validate parsed config file contents */
export function validateConfigFile(data: unknown, source = 'config'): PullcraftConfigFile {
  if (!isRecord(data)) {
    throw new ConfigurationError(`${source}: config must be a JSON object`);
  }

  const result: PullcraftConfigFile = {};

  if (data.github !== undefined) {
    if (!isRecord(data.github)) {
      throw new ConfigurationError(`${source}: "github" must be an object`);
    }
    const where = `${source}: github`;
    result.github = {
      host: optionalString(data.github, 'host', where),
      apiUrl: optionalString(data.github, 'apiUrl', where),
      token: optionalString(data.github, 'token', where),
    };
  }

  if (data.remotes !== undefined) {
    if (!isRecord(data.remotes)) {
      throw new ConfigurationError(`${source}: "remotes" must be an object`);
    }
    const priority = data.remotes.priority;
    if (priority !== undefined && !isStringArray(priority)) {
      throw new ConfigurationError(`${source}: remotes: "priority" must be an array of remote names`);
    }
    result.remotes = {
      default: optionalString(data.remotes, 'default', `${source}: remotes`),
      priority,
    };
  }

  const browser = optionalString(data, 'browser', source);
  if (browser !== undefined) result.browser = browser;

  if (data.logLevel !== undefined) {
    if (!isLogLevel(data.logLevel)) {
      throw new ConfigurationError(`${source}: "logLevel" must be one of debug, info, warn, error, silent`);
    }
    result.logLevel = data.logLevel;
  }

  return result;
}

async function loadConfigFile(path: string): Promise<PullcraftConfigFile | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw new ConfigurationError(`Cannot read ${path}: ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = JSON5.parse(content);
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON5 in ${path}: ${errorMessage(err)}`);
  }
  return validateConfigFile(data, path);
}

/** Later files win; fields a file leaves out keep their earlier value. */
export function mergeConfig(base: PullcraftConfig, override: PullcraftConfigFile): PullcraftConfig {
  return {
    github: {
      host: override.github?.host ?? base.github.host,
      apiUrl: override.github?.apiUrl ?? base.github.apiUrl,
      token: override.github?.token ?? base.github.token,
    },
    remotes: {
      default: override.remotes?.default ?? base.remotes.default,
      priority: override.remotes?.priority ?? base.remotes.priority,
    },
    browser: override.browser ?? base.browser,
    logLevel: override.logLevel ?? base.logLevel,
  };
}

export interface LoadConfigOptions {
  /** Directory holding the local `.pullcraft/config.json` */
  repoRoot?: string;
  /** Directory holding the global `config.json` */
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

let cachedConfig: PullcraftConfig | null = null;

export async function loadConfig(options: LoadConfigOptions = {}): Promise<PullcraftConfig> {
  if (cachedConfig) return cachedConfig;

  let config: PullcraftConfig = mergeConfig(DEFAULT_CONFIG, {});

  const globalPath = join(options.globalDir ?? GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME);
  const globalConfig = await loadConfigFile(globalPath);
  if (globalConfig) {
    logger.debug('Loaded global config from ' + globalPath);
    config = mergeConfig(config, globalConfig);
  }

  const localPath = options.repoRoot ? join(options.repoRoot, LOCAL_CONFIG_FILE) : LOCAL_CONFIG_FILE;
  const localConfig = await loadConfigFile(localPath);
  if (localConfig) {
    logger.debug('Loaded local config from ' + localPath);
    config = mergeConfig(config, localConfig);
  }

  const env = options.env ?? process.env;
  const envToken = env.GITHUB_TOKEN || env.GH_TOKEN;
  if (envToken) {
    config.github.token = envToken;
  }

  cachedConfig = config;
  return config;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}

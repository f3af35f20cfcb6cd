import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  ConfigurationError,
  loadConfig,
  mergeConfig,
  resetConfigCache,
  validateConfigFile,
} from '../../src/config/config.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';

describe('validateConfigFile', () => {
  it('accepts a complete file', () => {
    expect(validateConfigFile({
      github: { host: 'git.example.com', apiUrl: 'https://git.example.com/api', token: 'test-token' },
      remotes: { default: 'fork', priority: ['fork', 'origin'] },
      browser: 'firefox --new-tab',
      logLevel: 'info',
    })).toEqual({
      github: { host: 'git.example.com', apiUrl: 'https://git.example.com/api', token: 'test-token' },
      remotes: { default: 'fork', priority: ['fork', 'origin'] },
      browser: 'firefox --new-tab',
      logLevel: 'info',
    });
  });

  it('rejects a non-object file', () => {
    expect(() => validateConfigFile([], 'cfg.json')).toThrow(
      new ConfigurationError('cfg.json: config must be a JSON object'),
    );
  });

  it('rejects an empty token', () => {
    expect(() => validateConfigFile({ github: { token: '' } })).toThrow(
      'config: github: "token" must be a non-empty string',
    );
  });

  it('rejects a priority that is not a list of names', () => {
    expect(() => validateConfigFile({ remotes: { priority: 'origin' } })).toThrow(
      'config: remotes: "priority" must be an array of remote names',
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => validateConfigFile({ logLevel: 'loud' })).toThrow(
      'config: "logLevel" must be one of debug, info, warn, error, silent',
    );
  });
});

describe('mergeConfig', () => {
  it('overrides only the fields a file sets', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { remotes: { default: 'fork' }, logLevel: 'debug' });

    expect(merged).toEqual({
      ...DEFAULT_CONFIG,
      remotes: { default: 'fork', priority: ['upstream', 'github', 'origin'] },
      logLevel: 'debug',
    });
  });
});

describe('loadConfig', () => {
  let root: string;
  let globalDir: string;
  let repoRoot: string;

  beforeEach(async () => {
    resetConfigCache();
    root = await mkdtemp(join(tmpdir(), 'pullcraft-config-'));
    globalDir = join(root, 'home');
    repoRoot = join(root, 'repo');
    await mkdir(globalDir, { recursive: true });
    await mkdir(join(repoRoot, '.pullcraft'), { recursive: true });
  });

  afterEach(async () => {
    resetConfigCache();
    await rm(root, { recursive: true, force: true });
  });

  it('falls back to defaults without config files', async () => {
    const config = await loadConfig({ globalDir, repoRoot, env: {} });

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('layers the repository file over the global one', async () => {
    await writeFile(join(globalDir, 'config.json'), `{
      // personal defaults
      github: { token: 'test-token' },
      remotes: { default: 'origin' },
      browser: 'firefox',
    }`);
    await writeFile(join(repoRoot, '.pullcraft', 'config.json'), '{ remotes: { default: "fork" } }');

    const config = await loadConfig({ globalDir, repoRoot, env: {} });

    expect(config.github.token).toBe('test-token');
    expect(config.remotes.default).toBe('fork');
    expect(config.browser).toBe('firefox');
  });

  it('prefers GITHUB_TOKEN over the file and GH_TOKEN', async () => {
    await writeFile(join(globalDir, 'config.json'), '{ github: { token: "file-token" } }');

    const config = await loadConfig({
      globalDir,
      repoRoot,
      env: { GITHUB_TOKEN: 'env-token', GH_TOKEN: 'gh-token' },
    });

    expect(config.github.token).toBe('env-token');
  });

  it('falls back to GH_TOKEN', async () => {
    const config = await loadConfig({ globalDir, repoRoot, env: { GH_TOKEN: 'gh-token' } });

    expect(config.github.token).toBe('gh-token');
  });

  it('caches the loaded config until reset', async () => {
    const first = await loadConfig({ globalDir, repoRoot, env: {} });
    await writeFile(join(globalDir, 'config.json'), '{ logLevel: "debug" }');

    expect(await loadConfig({ globalDir, repoRoot, env: {} })).toBe(first);

    resetConfigCache();
    const reloaded = await loadConfig({ globalDir, repoRoot, env: {} });
    expect(reloaded.logLevel).toBe('debug');
  });

  it('reports invalid JSON5 with the file path', async () => {
    const path = join(globalDir, 'config.json');
    await writeFile(path, '{ github: ');

    await expect(loadConfig({ globalDir, repoRoot, env: {} })).rejects.toThrow(`Invalid JSON5 in ${path}`);
  });
});

import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import {
  findRepoRoot,
  loadArchiveConfig,
  loadEnvFile,
  parseArchiveConfig,
  parseEnvironment,
} from '../../src/lib/config.js';
import { ConfigError } from '../../src/lib/errors.js';

const VALID = {
  api_token: 'test-token',
  api_url: 'https://api.example.com',
  safe_name: 'backups',
  platform_id: 'P1',
};

describe('parseArchiveConfig', () => {
  it('maps keys and applies defaults', () => {
    expect(parseArchiveConfig(VALID)).toEqual({
      apiToken: 'test-token',
      apiUrl: 'https://api.example.com',
      safeName: 'backups',
      platformId: 'P1',
      retentionDays: 2,
      pollTimeoutSeconds: 300,
    });
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(parseArchiveConfig(VALID))).toBe(true);
  });

  it('names the missing key', () => {
    const { api_token: _omitted, ...rest } = VALID;

    expect(() => parseArchiveConfig(rest)).toThrow('Invalid configuration: api_token: Required');
  });

  it('rejects an api_url that is not a URL', () => {
    expect(() => parseArchiveConfig({ ...VALID, api_url: 'not a url' })).toThrow(ConfigError);
  });

  it('rejects an empty platform_id', () => {
    expect(() => parseArchiveConfig({ ...VALID, platform_id: '  ' })).toThrow(ConfigError);
  });
});

describe('loadArchiveConfig', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'coldpipe-config-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a YAML file', async () => {
    const path = join(dir, 'valid.yaml');
    await writeFile(
      path,
      [
        'api_token: test-token',
        'api_url: https://api.example.com',
        'safe_name: backups',
        'platform_id: 12',
        'retention_days: 7',
      ].join('\n')
    );

    await expect(loadArchiveConfig(path)).resolves.toEqual({
      apiToken: 'test-token',
      apiUrl: 'https://api.example.com',
      safeName: 'backups',
      platformId: '12',
      retentionDays: 7,
      pollTimeoutSeconds: 300,
    });
  });

  it('reads a JSON file', async () => {
    const path = join(dir, 'valid.json');
    await writeFile(path, JSON.stringify(VALID));

    await expect(loadArchiveConfig(path)).resolves.toMatchObject({ safeName: 'backups', platformId: 'P1' });
  });

  it('fails with ConfigError for a missing file', async () => {
    const path = join(dir, 'missing.yaml');

    const error = await loadArchiveConfig(path).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: 'CONFIG_ERROR' });
  });

  it('fails with ConfigError when the file is not a mapping', async () => {
    const path = join(dir, 'list.yaml');
    await writeFile(path, '- backups\n- photos\n');

    await expect(loadArchiveConfig(path)).rejects.toThrow(
      `Invalid configuration file ${path}: (root): Expected object, received array`
    );
  });
});

describe('.env loading', () => {
  let root: string;
  let buildDir: string;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), 'coldpipe-root-'));
    buildDir = join(root, 'dist', 'services', 'uploader', 'src', 'lib');
    await mkdir(buildDir, { recursive: true });
    await writeFile(join(root, 'package.json'), JSON.stringify({ name: 'root', workspaces: ['services/*'] }));
    await writeFile(join(root, 'dist', 'services', 'uploader', 'package.json'), JSON.stringify({ name: 'uploader' }));
    await writeFile(join(root, '.env'), 'LOG_LEVEL=debug\nNODE_ENV=development\n');
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('finds the workspace root from a compiled module directory', () => {
    expect(findRepoRoot(buildDir)).toBe(root);
  });

  it('treats a manifest that is not JSON as a plain package', async () => {
    const nested = join(root, 'broken');
    await mkdir(nested, { recursive: true });
    await writeFile(join(nested, 'package.json'), '{ workspaces');

    expect(findRepoRoot(nested)).toBe(root);
  });

  it('loads .env values without overriding variables already set', () => {
    const env: NodeJS.ProcessEnv = { NODE_ENV: 'test' };

    loadEnvFile(findRepoRoot(buildDir) ?? buildDir, env);

    expect(env).toEqual({ NODE_ENV: 'test', LOG_LEVEL: 'debug' });
    expect(parseEnvironment(env)).toEqual({ nodeEnv: 'test', logLevel: 'debug' });
  });

  it('leaves the environment alone when there is no .env file', () => {
    const env: NodeJS.ProcessEnv = {};

    loadEnvFile(buildDir, env);

    expect(env).toEqual({});
  });
});

describe('parseEnvironment', () => {
  it('applies defaults', () => {
    expect(parseEnvironment({})).toEqual({ nodeEnv: 'production', logLevel: 'info' });
  });

  it('rejects an unknown log level', () => {
    expect(() => parseEnvironment({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });
});

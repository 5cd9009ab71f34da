import { parse as parseDotenv } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve, dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';

/**
 * Walk up from `startDir` to the workspace root: the first directory whose
 * package.json declares `workspaces`. Works from src/ and from dist/ alike.
 */
export function findRepoRoot(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    const manifest = join(dir, 'package.json');
    if (existsSync(manifest) && declaresWorkspaces(readFileSync(manifest, 'utf-8'))) {
      return dir;
    }

    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

function declaresWorkspaces(manifest: string): boolean {
  try {
    const parsed: unknown = JSON.parse(manifest);
    return typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed;
  } catch {
    return false;
  }
}

/**
 * Load `<rootDir>/.env` into `target` without overriding values already set.
 */
export function loadEnvFile(rootDir: string, target: NodeJS.ProcessEnv = process.env): void {
  const path = join(rootDir, '.env');
  if (!existsSync(path)) {
    return;
  }

  for (const [key, value] of Object.entries(parseDotenv(readFileSync(path)))) {
    if (target[key] === undefined) {
      target[key] = value;
    }
  }
}

// Load environment variables from .env file in the repo root, falling back
// to the working directory when running outside the repo
const currentDir = dirname(fileURLToPath(import.meta.url));
loadEnvFile(findRepoRoot(currentDir) ?? process.cwd());

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

const ConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('production'),
  logLevel: LogLevelSchema.default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

let config: Config | null = null;

export function parseEnvironment(env: NodeJS.ProcessEnv): Config {
  const raw = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
  };

  const result = ConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${result.error.message}`);
  }

  return result.data;
}

export function loadConfig(): Config {
  if (config) {
    return config;
  }

  config = parseEnvironment(process.env);
  return config;
}

// YAML may hand back a number for ids such as `platform_id: 12`
const IdentifierSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1));

const ArchiveConfigSchema = z
  .object({
    api_token: z.string().min(1),
    api_url: z.string().url(),
    safe_name: z.string().min(1),
    platform_id: IdentifierSchema,
    retention_days: z.number().int().positive().default(2),
    poll_timeout_seconds: z.number().positive().default(300),
  })
  .transform((raw) => ({
    apiToken: raw.api_token,
    apiUrl: raw.api_url,
    safeName: raw.safe_name,
    platformId: raw.platform_id,
    retentionDays: raw.retention_days,
    pollTimeoutSeconds: raw.poll_timeout_seconds,
  }));

export type ArchiveConfig = z.output<typeof ArchiveConfigSchema>;

export function parseArchiveConfig(raw: unknown, source = 'configuration'): ArchiveConfig {
  const result = ArchiveConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${source}: ${issues}`);
  }

  return Object.freeze(result.data);
}

/**
 * Read the archive settings from a YAML (or JSON) file.
 */
export async function loadArchiveConfig(path: string): Promise<ArchiveConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${path}: ${describeError(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ConfigError(`Cannot parse configuration file ${path}: ${describeError(error)}`, { cause: error });
  }

  return parseArchiveConfig(raw, `configuration file ${path}`);
}

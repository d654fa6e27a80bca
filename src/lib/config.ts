import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import path from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';

export const DEFAULT_GITLAB_URL = 'https://gitlab.com';

const DEFAULT_CONFIG_FILENAME = 'config.json';
const URL_ENV_KEYS = ['GITLAB_URL'];
const TOKEN_ENV_KEYS = ['GITLAB_TOKEN', 'GITLAB_PRIVATE_TOKEN'];

export const configFileSchema = z
  .object({
    url: z.string().url().optional(),
    token: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export type GitLabConfigFile = z.infer<typeof configFileSchema>;

export interface GitLabCredentials {
  url: string;
  token: string;
  timeoutMs?: number;
  /** Where each value came from, e.g. `env GITLAB_TOKEN`. Never the value itself. */
  sources: { url: string; token: string };
}

function normalizeValue(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return null;
}

function readFromEnv(env: NodeJS.ProcessEnv, keys: readonly string[]): { value: string; source: string } | null {
  for (const key of keys) {
    const value = normalizeValue(env[key]);
    if (value) {
      return { value, source: `env ${key}` };
    }
  }
  return null;
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = normalizeValue(env.GITLAB_CONFIG);
  if (override) {
    return path.resolve(override);
  }
  return path.join(homedir(), '.config', 'gitlab-gateway', DEFAULT_CONFIG_FILENAME);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Returns null when the file does not exist; a file that exists but cannot be
 * parsed or validated is a ConfigError.
 */
export async function readConfigFile(configPath: string): Promise<GitLabConfigFile | null> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configPath, 'utf8'));
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw new ConfigError(`Cannot read config file ${configPath}: ${describeError(error)}`);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid config file ${configPath}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export async function writeConfigFile(configPath: string, config: GitLabConfigFile): Promise<void> {
  const payload = configFileSchema.parse(config);
  await mkdir(path.dirname(configPath), { recursive: true });
  await writeFile(configPath, `${JSON.stringify(payload, null, 2)}\n`, { encoding: 'utf8', mode: 0o600 });
}

function parseTimeout(raw: string | undefined): number | undefined {
  const value = normalizeValue(raw);
  if (!value) {
    return undefined;
  }
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigError(`Invalid GITLAB_TIMEOUT_MS: ${value} (expected a positive integer)`);
  }
  return timeout;
}

// Only consulted for optional settings; a broken file is reported, not fatal.
async function readOptionalConfig(configPath: string, logger?: Logger): Promise<GitLabConfigFile | null> {
  try {
    return await readConfigFile(configPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger?.warn({ path: configPath }, `${error.message}; ignoring it`);
      return null;
    }
    throw error;
  }
}

/**
 * Resolve the instance URL and token
 * Priority: environment variables > config file
 */
export async function resolveCredentials(
  options: { env?: NodeJS.ProcessEnv; configPath?: string; logger?: Logger } = {},
): Promise<GitLabCredentials> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? resolveConfigPath(env);

  const urlFromEnv = readFromEnv(env, URL_ENV_KEYS);
  const tokenFromEnv = readFromEnv(env, TOKEN_ENV_KEYS);
  const timeoutFromEnv = parseTimeout(env.GITLAB_TIMEOUT_MS);

  let file: GitLabConfigFile | null = null;
  if (!urlFromEnv || !tokenFromEnv) {
    file = await readConfigFile(configPath);
  } else if (timeoutFromEnv === undefined) {
    file = await readOptionalConfig(configPath, options.logger);
  }
  const fileSource = `config ${configPath}`;

  const url = urlFromEnv ?? (file?.url ? { value: file.url, source: fileSource } : null);
  const token = tokenFromEnv ?? (file?.token ? { value: file.token, source: fileSource } : null);

  if (!url || !token) {
    const missing = [!url ? 'url (GITLAB_URL)' : null, !token ? 'token (GITLAB_TOKEN)' : null].filter(
      (entry): entry is string => entry !== null,
    );
    throw new ConfigError(`Missing GitLab ${missing.join(' and ')}. Run "gitlab configure" or set the environment.`);
  }

  return {
    url: url.value,
    token: token.value,
    timeoutMs: timeoutFromEnv ?? file?.timeoutMs,
    sources: { url: url.source, token: token.source },
  };
}

import * as readline from 'node:readline';
import type { Logger } from 'pino';
import {
  DEFAULT_GITLAB_URL,
  type GitLabConfigFile,
  configFileSchema,
  readConfigFile,
  writeConfigFile,
} from '../lib/config.js';
import { ConfigError, describeError } from '../lib/errors.js';

export type Prompter = (question: string) => Promise<string>;

export interface ConfigureOptions {
  configPath: string;
  prompt: Prompter;
  logger: Logger;
}

// Prompts go to stderr; stdout only ever carries JSON.
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr,
): Prompter {
  return (question) =>
    new Promise((resolve, reject) => {
      const rl = readline.createInterface({ input, output });
      let answered = false;
      // readline drops the question callback when input ends first
      rl.once('close', () => {
        if (!answered) {
          reject(new ConfigError('Input closed before an answer was given'));
        }
      });
      rl.question(question, (answer) => {
        answered = true;
        rl.close();
        resolve(answer.trim());
      });
    });
}

async function readCurrentConfig(configPath: string, logger: Logger): Promise<GitLabConfigFile | null> {
  try {
    return await readConfigFile(configPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.warn({ path: configPath }, `${describeError(error)}; starting from defaults`);
      return null;
    }
    throw error;
  }
}

/**
 * Interactive setup for the `configure` method: asks for the instance URL and
 * a private token, then writes them to the config file.
 */
export async function runConfigure(options: ConfigureOptions): Promise<GitLabConfigFile> {
  const { configPath, prompt, logger } = options;
  const current = await readCurrentConfig(configPath, logger);

  const defaultUrl = current?.url ?? DEFAULT_GITLAB_URL;
  const url = (await prompt(`GitLab URL [${defaultUrl}]: `)).trim() || defaultUrl;

  const tokenAnswer = (await prompt(current?.token ? 'Private token [keep current]: ' : 'Private token: ')).trim();
  const token = tokenAnswer || current?.token;
  if (!token) {
    throw new ConfigError('A private token is required');
  }

  const parsed = configFileSchema.safeParse({ ...current, url, token });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  await writeConfigFile(configPath, parsed.data);
  logger.info({ path: configPath }, 'configuration saved');
  return parsed.data;
}

import type { Logger } from 'pino';
import { createReadlinePrompter, type Prompter, runConfigure } from '../commands/configure.js';
import { type CommandRegistry, createCommandRegistry } from '../lib/commands.js';
import { type GitLabCredentials, resolveConfigPath, resolveCredentials } from '../lib/config.js';
import { GitLabClient } from '../lib/gitlab-client.js';
import { createLogger, resolveLogLevel } from '../lib/logger.js';
import { getCliVersion } from '../lib/version.js';

/**
 * Everything a run needs from the outside world. Built once in the entry point
 * and passed down; tests swap single members.
 */
export interface CliContext {
  logger: Logger;
  env: NodeJS.ProcessEnv;
  registry: CommandRegistry;
  writeOut: (text: string) => void;
  setExitCode: (code: number) => void;
  resolveCredentials: () => Promise<GitLabCredentials>;
  createClient: (credentials: GitLabCredentials) => GitLabClient;
  configure: () => Promise<void>;
}

export interface CliContextOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  registry?: CommandRegistry;
  prompt?: Prompter;
  fetchImpl?: typeof fetch;
  writeOut?: (text: string) => void;
  setExitCode?: (code: number) => void;
}

export function createCliContext(options: CliContextOptions = {}): CliContext {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger({ level: resolveLogLevel({}, env) });
  const configPath = resolveConfigPath(env);
  const userAgent = `gitlab-gateway/${getCliVersion()}`;

  return {
    logger,
    env,
    registry: options.registry ?? createCommandRegistry(),
    writeOut:
      options.writeOut ??
      ((text) => {
        process.stdout.write(text);
      }),
    setExitCode:
      options.setExitCode ??
      ((code) => {
        process.exitCode = code;
      }),
    resolveCredentials: () => resolveCredentials({ env, configPath, logger }),
    createClient: (credentials) =>
      new GitLabClient({
        url: credentials.url,
        token: credentials.token,
        timeoutMs: credentials.timeoutMs,
        userAgent,
        logger,
        fetchImpl: options.fetchImpl,
      }),
    configure: async () => {
      await runConfigure({ configPath, prompt: options.prompt ?? createReadlinePrompter(), logger });
    },
  };
}

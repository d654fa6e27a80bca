import pino, { type DestinationStream, type Level, type Logger } from 'pino';

export const LOGGER_NAME = 'gitlab-gateway';

const LEVELS: readonly Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export interface LoggerOptions {
  level?: Level;
  /** Defaults to a synchronous stderr stream so fatal entries are flushed before exit. */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    { name: LOGGER_NAME, level: options.level ?? 'info' },
    options.destination ?? pino.destination({ fd: 2, sync: true }),
  );
}

function parseLevel(value: string | undefined): Level | undefined {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized);
}

/**
 * `--verbose` wins over `--quiet`; without either, `GITLAB_LOG_LEVEL` or `info`.
 */
export function resolveLogLevel(
  flags: { verbose?: boolean; quiet?: boolean },
  env: NodeJS.ProcessEnv = process.env,
): Level {
  if (flags.verbose) {
    return 'debug';
  }
  if (flags.quiet) {
    return 'error';
  }
  return parseLevel(env.GITLAB_LOG_LEVEL) ?? 'info';
}

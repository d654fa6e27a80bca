export type GatewayErrorCode = 'usage' | 'unknown_command' | 'api' | 'config';

/**
 * Base class for every failure the CLI reports before exiting with status 1.
 */
export abstract class GatewayError extends Error {
  abstract readonly code: GatewayErrorCode;
}

export class UsageError extends GatewayError {
  readonly code = 'usage';

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class UnknownCommandError extends GatewayError {
  readonly code = 'unknown_command';

  constructor(
    readonly method: string,
    readonly suggestion?: string,
  ) {
    super(suggestion ? `Unknown method "${method}" (did you mean "${suggestion}"?)` : `Unknown method "${method}"`);
    this.name = 'UnknownCommandError';
  }
}

export class GitLabApiError extends GatewayError {
  readonly code = 'api';

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'GitLabApiError';
  }
}

export class ConfigError extends GatewayError {
  readonly code = 'config';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

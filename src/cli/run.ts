import { translateArgs } from '../lib/cli-args.js';
import { describeError, GatewayError, GitLabApiError } from '../lib/errors.js';
import type { GitLabClient } from '../lib/gitlab-client.js';
import { resolveLogLevel } from '../lib/logger.js';
import { formatJson, resolvePrettyMode } from '../lib/output.js';
import { Paginator } from '../lib/paginator.js';
import type { CliContext } from './shared.js';

export interface GlobalOptions {
  all?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  pretty?: boolean;
}

function logFatal(ctx: CliContext, error: unknown): void {
  if (error instanceof GitLabApiError) {
    ctx.logger.fatal({ code: error.code, status: error.status }, error.message);
  } else if (error instanceof GatewayError) {
    ctx.logger.fatal({ code: error.code }, error.message);
  } else {
    ctx.logger.fatal({ err: error }, describeError(error));
  }
}

/**
 * One process invocation: translate the tokens, dispatch a single call, print
 * its JSON. Returns the exit code; every failure is logged once at fatal.
 */
export async function runInvocation(ctx: CliContext, tokens: readonly string[], globals: GlobalOptions): Promise<number> {
  ctx.logger.level = resolveLogLevel(globals, ctx.env);

  try {
    const invocation = translateArgs(tokens, { all: globals.all });
    if (invocation.kind === 'configure') {
      await ctx.configure();
      return 0;
    }

    const { descriptor } = invocation;
    ctx.logger.debug({ descriptor }, 'dispatching');
    const handler = ctx.registry.resolve(descriptor.method);

    let client: Promise<GitLabClient> | undefined;
    const getClient = (): Promise<GitLabClient> => {
      client ??= ctx.resolveCredentials().then((credentials) => {
        ctx.logger.debug({ sources: credentials.sources }, 'using credentials');
        return ctx.createClient(credentials);
      });
      return client;
    };

    const result = await handler({ args: descriptor.positionalArgs, params: descriptor.params, client: getClient });
    const output = result instanceof Paginator ? await result.collect() : result;

    ctx.writeOut(`${formatJson(output, resolvePrettyMode(globals.pretty, ctx.env))}\n`);
    return 0;
  } catch (error) {
    logFatal(ctx, error);
    return 1;
  }
}

import { PAGINATOR_METHOD, type Params, normalizeName } from './cli-args.js';
import { type Endpoint, describeUsage, loadEndpoints, resolveRoute } from './endpoints.js';
import { GitLabApiError, UnknownCommandError, UsageError } from './errors.js';
import type { GitLabClient } from './gitlab-client.js';
import { Paginator } from './paginator.js';

export interface CommandInvocation {
  args: string[];
  params: Params;
  /** Resolves credentials and builds the client on first use. */
  client: () => Promise<GitLabClient>;
}

export type CommandHandler = (invocation: CommandInvocation) => Promise<unknown>;

export interface CommandSummary {
  name: string;
  usage: string;
  description: string;
  route?: string;
}

interface RegisteredCommand extends CommandSummary {
  handler: CommandHandler;
}

export const METHODS_METHOD = 'methods';

const MAX_SUGGESTION_DISTANCE = 3;

function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Lookup table from normalized method names to handlers. Names are fixed at
 * startup; anything else is rejected with UnknownCommandError.
 */
export class CommandRegistry {
  private readonly commands = new Map<string, RegisteredCommand>();

  register(command: CommandSummary, handler: CommandHandler): this {
    const name = normalizeName(command.name);
    if (this.commands.has(name)) {
      throw new Error(`Method already registered: ${name}`);
    }
    this.commands.set(name, { ...command, name, handler });
    return this;
  }

  has(name: string): boolean {
    return this.commands.has(normalizeName(name));
  }

  resolve(name: string): CommandHandler {
    const command = this.commands.get(normalizeName(name));
    if (!command) {
      throw new UnknownCommandError(name, this.suggest(normalizeName(name)));
    }
    return command.handler;
  }

  list(): CommandSummary[] {
    return [...this.commands.values()]
      .map(({ handler: _handler, ...summary }) => summary)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  private suggest(name: string): string | undefined {
    let best: { name: string; distance: number } | undefined;
    for (const candidate of this.commands.keys()) {
      const distance = editDistance(name, candidate);
      if (distance <= MAX_SUGGESTION_DISTANCE && (!best || distance < best.distance)) {
        best = { name: candidate, distance };
      }
    }
    return best?.name;
  }
}

export function endpointHandler(endpoint: Endpoint): CommandHandler {
  return async ({ args, params, client }) => {
    const route = resolveRoute(endpoint, args);
    const api = await client();
    const result = await api.request(endpoint.verb, route.path, { ...params, ...route.params });
    if (!result.success) {
      throw new GitLabApiError(result.error, result.status);
    }
    return result.data;
  };
}

/**
 * `paginator <method> [<arg> ...]`: wraps a paged GET listing in a lazy
 * Paginator instead of fetching a single page.
 */
export function paginatorHandler(endpoints: readonly Endpoint[]): CommandHandler {
  const byName = new Map(endpoints.map((endpoint) => [endpoint.name, endpoint]));

  return async ({ args, params, client }) => {
    const [target, ...rest] = args;
    if (target === undefined) {
      throw new UsageError(`${PAGINATOR_METHOD} needs a listing method, e.g. "${PAGINATOR_METHOD} groups"`);
    }
    const endpoint = byName.get(normalizeName(target));
    if (!endpoint) {
      throw new UsageError(`${PAGINATOR_METHOD}: unknown listing method "${target}"`);
    }
    if (endpoint.verb !== 'GET' || !endpoint.pageable) {
      throw new UsageError(`${PAGINATOR_METHOD}: "${endpoint.name}" does not return a paged list`);
    }
    const route = resolveRoute(endpoint, rest);
    return new Paginator(await client(), route.path, { ...params, ...route.params });
  };
}

export function createCommandRegistry(endpoints: readonly Endpoint[] = loadEndpoints()): CommandRegistry {
  const registry = new CommandRegistry();

  for (const endpoint of endpoints) {
    registry.register(
      {
        name: endpoint.name,
        usage: describeUsage(endpoint),
        description: endpoint.description,
        route: `${endpoint.verb} ${endpoint.path}`,
      },
      endpointHandler(endpoint),
    );
  }

  registry.register(
    {
      name: PAGINATOR_METHOD,
      usage: `${PAGINATOR_METHOD} <method> [<arg> ...]`,
      description: 'Fetch every page of a listing method (same as --all)',
    },
    paginatorHandler(endpoints),
  );

  registry.register(
    {
      name: METHODS_METHOD,
      usage: METHODS_METHOD,
      description: 'List the available methods',
    },
    async ({ args }) => {
      if (args.length > 0) {
        throw new UsageError(`Too many arguments for ${METHODS_METHOD}: ${args.join(' ')}`);
      }
      return registry.list();
    },
  );

  return registry;
}

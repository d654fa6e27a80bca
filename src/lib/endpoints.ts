import { z } from 'zod';
import type { Params } from './cli-args.js';
import { UsageError } from './errors.js';
import endpointTable from './endpoints.json' with { type: 'json' };

const PLACEHOLDER_REGEX = /:([a-z_]+)/g;

export const endpointSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/),
  verb: z.enum(['GET', 'POST', 'PUT', 'DELETE']),
  /** Path below `/api/v4`; `:name` placeholders are filled from positional arguments. */
  path: z.string().startsWith('/'),
  pageable: z.boolean().default(false),
  description: z.string(),
});

export type Endpoint = z.infer<typeof endpointSchema>;

export interface ResolvedRoute {
  path: string;
  /** Parameters fixed by the route (its query part), merged over the caller's. */
  params: Params;
}

export function loadEndpoints(raw: unknown = endpointTable): Endpoint[] {
  const endpoints = z.array(endpointSchema).parse(raw);
  const seen = new Set<string>();
  for (const endpoint of endpoints) {
    if (seen.has(endpoint.name)) {
      throw new Error(`Duplicate endpoint name: ${endpoint.name}`);
    }
    seen.add(endpoint.name);
  }
  return endpoints;
}

export function placeholdersOf(endpoint: Endpoint): string[] {
  return Array.from(endpoint.path.matchAll(PLACEHOLDER_REGEX), (match) => match[1]);
}

/**
 * Fills the route's placeholders from `args` in order. Path segments are
 * URL-encoded so `group/project` works wherever a project id is expected.
 */
export function resolveRoute(endpoint: Endpoint, args: readonly string[]): ResolvedRoute {
  const remaining = [...args];
  const take = (name: string): string => {
    const value = remaining.shift();
    if (value === undefined) {
      throw new UsageError(`Missing <${name}> for ${endpoint.name} (${endpoint.verb} ${endpoint.path})`);
    }
    return value;
  };

  const [template, query = ''] = endpoint.path.split('?', 2);
  const path = template.replace(PLACEHOLDER_REGEX, (_, name: string) => encodeURIComponent(take(name)));

  const params: Params = {};
  for (const [key, value] of new URLSearchParams(query)) {
    const placeholder = /^:([a-z_]+)$/.exec(value);
    params[key] = placeholder ? take(placeholder[1]) : value;
  }

  if (remaining.length > 0) {
    throw new UsageError(`Too many arguments for ${endpoint.name}: ${remaining.join(' ')}`);
  }

  return { path, params };
}

export function describeUsage(endpoint: Endpoint): string {
  const args = placeholdersOf(endpoint).map((name) => `<${name}>`);
  return [endpoint.name, ...args].join(' ');
}

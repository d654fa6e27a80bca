import { describe, expect, it, vi } from 'vitest';
import { CommandRegistry, createCommandRegistry } from '../src/lib/commands.js';
import type { Endpoint } from '../src/lib/endpoints.js';
import { GitLabApiError, UnknownCommandError, UsageError } from '../src/lib/errors.js';
import { GitLabClient } from '../src/lib/gitlab-client.js';
import { Paginator } from '../src/lib/paginator.js';

const endpoints: Endpoint[] = [
  { name: 'groups', verb: 'GET', path: '/groups', pageable: true, description: 'List groups' },
  { name: 'group', verb: 'GET', path: '/groups/:id', pageable: false, description: 'Show a group' },
  {
    name: 'add_group_member',
    verb: 'POST',
    path: '/groups/:id/members?user_id=:user_id',
    pageable: false,
    description: 'Add a member to a group',
  },
  { name: 'project_members', verb: 'GET', path: '/projects/:id/members', pageable: true, description: 'List' },
];

function createClient(fetchImpl: typeof fetch) {
  const client = new GitLabClient({ url: 'https://gitlab.example.com', token: 'test-token', fetchImpl });
  return async () => client;
}

describe('CommandRegistry', () => {
  it('resolves hyphenated and underscored names alike', () => {
    const registry = createCommandRegistry(endpoints);
    expect(registry.resolve('add-group-member')).toBe(registry.resolve('add_group_member'));
  });

  it('rejects unknown methods with a suggestion', () => {
    const registry = createCommandRegistry(endpoints);
    expect(() => registry.resolve('gruops')).toThrow(UnknownCommandError);
    expect(() => registry.resolve('gruops')).toThrow('Unknown method "gruops" (did you mean "groups"?)');
  });

  it('rejects unknown methods without a close match', () => {
    const registry = createCommandRegistry(endpoints);
    expect(() => registry.resolve('deploy_everything')).toThrow(/^Unknown method "deploy_everything"$/);
  });

  it('refuses to register a name twice', () => {
    const registry = new CommandRegistry();
    const summary = { name: 'x', usage: 'x', description: 'x' };
    registry.register(summary, async () => null);
    expect(() => registry.register(summary, async () => null)).toThrow('Method already registered: x');
  });

  it('lists methods sorted by name', () => {
    const registry = createCommandRegistry(endpoints);
    expect(registry.list().map((command) => command.name)).toEqual([
      'add_group_member',
      'group',
      'groups',
      'methods',
      'paginator',
      'project_members',
    ]);
  });
});

describe('endpoint handlers', () => {
  it('calls the route with positional args and params', async () => {
    const fetchImpl = vi.fn(async () => new Response(JSON.stringify({ id: 7 }), { status: 201 }));
    const registry = createCommandRegistry(endpoints);

    const result = await registry.resolve('add_group_member')({
      args: ['5', '7'],
      params: { access_level: 30 },
      client: createClient(fetchImpl),
    });

    expect(result).toEqual({ id: 7 });
    const [url, init] = fetchImpl.mock.calls[0] as unknown as [string, RequestInit];
    expect(url).toBe('https://gitlab.example.com/api/v4/groups/5/members');
    expect(String(init.body)).toBe('access_level=30&user_id=7');
  });

  it('throws GitLabApiError for a failed call', async () => {
    const fetchImpl = vi.fn(async () => new Response(JSON.stringify({ message: '404 Group Not Found' }), { status: 404 }));
    const registry = createCommandRegistry(endpoints);

    const pending = registry.resolve('group')({ args: ['9'], params: {}, client: createClient(fetchImpl) });

    await expect(pending).rejects.toBeInstanceOf(GitLabApiError);
    await expect(pending).rejects.toMatchObject({ status: 404, message: 'HTTP 404: 404 Group Not Found' });
  });

  it('validates arguments before building the client', async () => {
    const client = vi.fn();
    const registry = createCommandRegistry(endpoints);

    await expect(registry.resolve('group')({ args: [], params: {}, client })).rejects.toThrow(UsageError);
    expect(client).not.toHaveBeenCalled();
  });
});

describe('paginator handler', () => {
  it('returns a lazy Paginator over the listing route', async () => {
    const fetchImpl = vi.fn(async () => new Response('[]', { status: 200 }));
    const registry = createCommandRegistry(endpoints);

    const result = await registry.resolve('paginator')({
      args: ['project-members', '42'],
      params: { query: 'al' },
      client: createClient(fetchImpl),
    });

    expect(result).toBeInstanceOf(Paginator);
    expect(result instanceof Paginator && result.path).toBe('/projects/42/members');
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('requires a listing method', async () => {
    const registry = createCommandRegistry(endpoints);
    const client = vi.fn();

    await expect(registry.resolve('paginator')({ args: [], params: {}, client })).rejects.toThrow(
      'paginator needs a listing method',
    );
    await expect(registry.resolve('paginator')({ args: ['group', '1'], params: {}, client })).rejects.toThrow(
      'paginator: "group" does not return a paged list',
    );
    await expect(registry.resolve('paginator')({ args: ['nope'], params: {}, client })).rejects.toThrow(
      'paginator: unknown listing method "nope"',
    );
  });
});

describe('methods handler', () => {
  it('returns the command summaries', async () => {
    const registry = createCommandRegistry(endpoints);
    const client = vi.fn();

    const result = await registry.resolve('methods')({ args: [], params: {}, client });

    expect(result).toContainEqual({
      name: 'add_group_member',
      usage: 'add_group_member <id> <user_id>',
      description: 'Add a member to a group',
      route: 'POST /groups/:id/members?user_id=:user_id',
    });
    expect(client).not.toHaveBeenCalled();
  });
});

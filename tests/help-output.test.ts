import { pino } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { createProgram } from '../src/cli/program.js';
import { createCliContext } from '../src/cli/shared.js';
import { createCommandRegistry } from '../src/lib/commands.js';

function createContext(fetchImpl?: typeof fetch) {
  const output: string[] = [];
  const setExitCode = vi.fn();
  const ctx = createCliContext({
    env: { GITLAB_URL: 'https://gitlab.example.com', GITLAB_TOKEN: 'test-token' },
    logger: pino({ level: 'silent' }),
    registry: createCommandRegistry([
      { name: 'project', verb: 'GET', path: '/projects/:id', pageable: false, description: 'Show a project' },
      { name: 'groups', verb: 'GET', path: '/groups', pageable: true, description: 'List groups' },
    ]),
    writeOut: (text) => output.push(text),
    setExitCode,
    fetchImpl,
  });
  return { ctx, output, setExitCode };
}

describe('root help output', () => {
  it('lists the global options and parameter syntax', () => {
    const { ctx } = createContext();
    const program = createProgram(ctx);
    let help = '';
    program.configureOutput({
      writeOut: (s) => {
        help += s;
      },
      writeErr: () => {},
    });
    program.outputHelp();

    expect(help).toContain('Usage: gitlab [options] <method> [<arg> ...] [--<param>=<value> ...]');
    expect(help).toContain('-a, --all');
    expect(help).toContain('-v, --verbose');
    expect(help).toContain('-q, --quiet');
    expect(help).toContain('-p, --pretty');
    expect(help).toContain('-h, --help');
    expect(help).toContain('GITLAB_PRETTY_JSON=1');
    expect(help).toContain('--guest | --reporter | --developer | --master | --owner');
  });
});

describe('program parsing', () => {
  it('passes method tokens through and picks up global options anywhere', async () => {
    const fetchImpl = vi.fn(async () => new Response('[{"id":1}]', { status: 200 }));
    const { ctx, output, setExitCode } = createContext(fetchImpl);
    const program = createProgram(ctx);

    await program.parseAsync(['node', 'gitlab', 'groups', '--per-page=5', '--no-archived', '-p', '--all']);

    expect(setExitCode).toHaveBeenCalledWith(0);
    expect(output).toEqual(['[\n  {\n    "id": 1\n  }\n]\n']);
    const [url] = fetchImpl.mock.calls[0] as unknown as [string];
    expect(url).toBe('https://gitlab.example.com/api/v4/groups?per_page=5&archived=0&page=1');
  });

  it('reports a missing method through the exit code', async () => {
    const { ctx, output, setExitCode } = createContext();
    const program = createProgram(ctx);

    await program.parseAsync(['node', 'gitlab', '-v']);

    expect(setExitCode).toHaveBeenCalledWith(1);
    expect(output).toEqual([]);
  });
});

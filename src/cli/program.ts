import { Command } from 'commander';
import { getCliVersion } from '../lib/version.js';
import { type GlobalOptions, runInvocation } from './run.js';
import type { CliContext } from './shared.js';

const HELP_EXAMPLES = `
Examples:
  gitlab project 42
  gitlab project my-group/my-project --pretty
  gitlab projects --per-page=10 --no-archived
  gitlab add-project-member 42 7 --developer
  gitlab --all groups
  gitlab methods
  gitlab configure

Parameters:
  --<key>=<value>   send key=value (hyphens in key become underscores)
  --<key>           send key=1
  --no-<key>        send key=0
  --guest | --reporter | --developer | --master | --owner
                    send access_level=10 | 20 | 30 | 40 | 50

Environment:
  GITLAB_URL, GITLAB_TOKEN      override the configured instance and token
  GITLAB_CONFIG                 config file path
  GITLAB_PRETTY_JSON=1          always pretty-print
`;

export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('gitlab')
    .description('Call any GitLab REST API method and print the JSON result')
    .version(getCliVersion(), '-V, --version')
    .usage('[options] <method> [<arg> ...] [--<param>=<value> ...]')
    .option('-a, --all', 'fetch every page of a listing method')
    .option('-v, --verbose', 'log requests and debug details to stderr')
    .option('-q, --quiet', 'only log errors')
    .option('-p, --pretty', 'pretty-print the JSON output')
    .argument('[tokens...]')
    .allowUnknownOption()
    .allowExcessArguments()
    .addHelpText('after', HELP_EXAMPLES)
    .action(async (tokens: string[], opts: GlobalOptions) => {
      ctx.setExitCode(await runInvocation(ctx, tokens, opts));
    });

  return program;
}

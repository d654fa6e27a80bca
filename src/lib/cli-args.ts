import { accessLevelForFlag } from './access-levels.js';
import { UsageError } from './errors.js';

export type ParamValue = string | boolean | number;

export type Params = Record<string, ParamValue>;

/** One API call, built from the command line and dispatched exactly once. */
export interface CallDescriptor {
  method: string;
  positionalArgs: string[];
  params: Params;
}

export type Invocation = { kind: 'configure' } | { kind: 'call'; descriptor: CallDescriptor };

export interface TranslateOptions {
  /** Global `--all`: page through the whole listing instead of fetching one page. */
  all?: boolean;
}

export const CONFIGURE_METHOD = 'configure';
export const PAGINATOR_METHOD = 'paginator';

const FLAG_REGEX = /^--(no-)?([^=]+)(?:=(.*))?$/s;

export function normalizeName(name: string): string {
  return name.replace(/-/g, '_');
}

/**
 * Splits raw tokens into positional arguments and `--key[=value]` parameters.
 * Access-level flags are matched before the generic flag pattern.
 */
export function parseTokens(tokens: readonly string[]): { positional: string[]; params: Params } {
  const positional: string[] = [];
  const params: Params = {};

  for (const token of tokens) {
    const level = accessLevelForFlag(token);
    if (level !== undefined) {
      params.access_level = level;
      continue;
    }

    const match = FLAG_REGEX.exec(token);
    if (!match) {
      positional.push(token);
      continue;
    }

    const [, negated, key, value] = match;
    params[normalizeName(key)] = value !== undefined ? value : negated === undefined;
  }

  return { positional, params };
}

export function translateArgs(tokens: readonly string[], options: TranslateOptions = {}): Invocation {
  const { positional, params } = parseTokens(tokens);
  const first = positional.shift();
  if (first === undefined || first.length === 0) {
    throw new UsageError('No method given. Usage: gitlab [options] <method> [<arg> ...] [--<param>=<value> ...]');
  }

  const method = normalizeName(first);
  if (method === CONFIGURE_METHOD) {
    return { kind: 'configure' };
  }

  if (options.all) {
    return {
      kind: 'call',
      descriptor: { method: PAGINATOR_METHOD, positionalArgs: [method, ...positional], params },
    };
  }

  return { kind: 'call', descriptor: { method, positionalArgs: positional, params } };
}

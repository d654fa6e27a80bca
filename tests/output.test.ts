import { describe, expect, it } from 'vitest';
import { createLogger, resolveLogLevel } from '../src/lib/logger.js';
import { formatJson, isTruthyEnv, resolvePrettyMode } from '../src/lib/output.js';

describe('output', () => {
  it('formats compact and pretty JSON', () => {
    const value = { id: 1, tags: ['a'], nested: { ok: true } };
    expect(formatJson(value, false)).toBe('{"id":1,"tags":["a"],"nested":{"ok":true}}');
    expect(formatJson(value, true)).toBe('{\n  "id": 1,\n  "tags": [\n    "a"\n  ],\n  "nested": {\n    "ok": true\n  }\n}');
    expect(JSON.parse(formatJson(value, true))).toEqual(JSON.parse(formatJson(value, false)));
  });

  it('prints null for an empty result', () => {
    expect(formatJson(null, false)).toBe('null');
    expect(formatJson(undefined, true)).toBe('null');
  });

  it.each([
    ['1', true],
    ['TRUE', true],
    [' yes ', true],
    ['on', true],
    ['0', false],
    ['', false],
    [undefined, false],
  ])('treats GITLAB_PRETTY_JSON=%s as %s', (value, expected) => {
    expect(isTruthyEnv(value)).toBe(expected);
  });

  it('lets the environment force pretty output', () => {
    expect(resolvePrettyMode(undefined, { GITLAB_PRETTY_JSON: 'true' })).toBe(true);
    expect(resolvePrettyMode(true, {})).toBe(true);
    expect(resolvePrettyMode(false, {})).toBe(false);
  });
});

describe('logger', () => {
  it('resolves the level from flags and environment', () => {
    expect(resolveLogLevel({ verbose: true, quiet: true }, {})).toBe('debug');
    expect(resolveLogLevel({ quiet: true }, {})).toBe('error');
    expect(resolveLogLevel({}, { GITLAB_LOG_LEVEL: 'WARN' })).toBe('warn');
    expect(resolveLogLevel({}, { GITLAB_LOG_LEVEL: 'chatty' })).toBe('info');
  });

  it('writes named JSON entries to the given destination', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'fatal', destination: { write: (line: string) => lines.push(line) } });

    logger.error('hidden');
    logger.fatal({ code: 'usage' }, 'No method given');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: 60, name: 'gitlab-gateway', code: 'usage', msg: 'No method given' });
  });
});

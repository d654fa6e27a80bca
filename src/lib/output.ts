const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);

export function isTruthyEnv(value: string | undefined): boolean {
  return value !== undefined && TRUTHY_VALUES.has(value.trim().toLowerCase());
}

// GITLAB_PRETTY_JSON forces indentation regardless of -p.
export function resolvePrettyMode(prettyFlag: boolean | undefined, env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(prettyFlag) || isTruthyEnv(env.GITLAB_PRETTY_JSON);
}

export function formatJson(value: unknown, pretty: boolean): string {
  const json = pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
  // JSON.stringify(undefined) has no text form
  return json ?? 'null';
}

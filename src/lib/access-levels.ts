// GitLab membership permission tiers, as sent in `access_level`.
export const ACCESS_LEVELS = {
  guest: 10,
  reporter: 20,
  developer: 30,
  master: 40,
  owner: 50,
} as const;

export type AccessLevelName = keyof typeof ACCESS_LEVELS;

const ACCESS_LEVEL_FLAGS: ReadonlyMap<string, number> = new Map(
  Object.entries(ACCESS_LEVELS).map(([name, level]) => [`--${name}`, level]),
);

/**
 * Returns the numeric level for one of the literal flags (`--guest` … `--owner`),
 * or `undefined` for any other token.
 */
export function accessLevelForFlag(token: string): number | undefined {
  return ACCESS_LEVEL_FLAGS.get(token);
}

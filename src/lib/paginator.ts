import type { Params } from './cli-args.js';
import { GitLabApiError } from './errors.js';
import type { GitLabClient } from './gitlab-client.js';

export const DEFAULT_PER_PAGE = 100;

const NEXT_LINK_REGEX = /<([^>]+)>\s*;\s*rel="next"/;

function parsePage(value: string | null | undefined): number | null {
  if (!value) {
    return null;
  }
  const page = Number.parseInt(value, 10);
  return Number.isFinite(page) && page > 0 ? page : null;
}

/**
 * Reads the next page number from `x-next-page`, falling back to the
 * `Link: <…>; rel="next"` header. Returns null on the last page.
 */
export function resolveNextPage(headers: Headers): number | null {
  const nextPage = headers.get('x-next-page');
  if (nextPage !== null) {
    return parsePage(nextPage.trim());
  }

  const link = headers.get('link');
  const match = link ? NEXT_LINK_REGEX.exec(link) : null;
  if (!match) {
    return null;
  }
  try {
    return parsePage(new URL(match[1]).searchParams.get('page'));
  } catch {
    return null;
  }
}

/**
 * Lazy sequence over every item of a paged GET listing. Nothing is requested
 * until iteration starts.
 */
export class Paginator implements AsyncIterable<unknown> {
  constructor(
    private readonly client: GitLabClient,
    readonly path: string,
    private readonly params: Params = {},
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<unknown, void, undefined> {
    const perPage = this.params.per_page ?? DEFAULT_PER_PAGE;
    let page: number | null = typeof this.params.page === 'string' ? parsePage(this.params.page) ?? 1 : 1;

    while (page !== null) {
      const result = await this.client.request('GET', this.path, { ...this.params, page, per_page: perPage });
      if (!result.success) {
        throw new GitLabApiError(result.error, result.status);
      }
      if (!Array.isArray(result.data)) {
        throw new GitLabApiError(`Expected a list from ${this.path}`, result.status);
      }
      if (result.data.length === 0) {
        return;
      }
      yield* result.data;
      const next = resolveNextPage(result.headers);
      page = next !== null && next > page ? next : null;
    }
  }

  async collect(): Promise<unknown[]> {
    const items: unknown[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }
}

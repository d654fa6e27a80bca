/**
 * GitLab REST API (v4) client used by every registered method
 */

import type { Logger } from 'pino';
import type { ParamValue, Params } from './cli-args.js';
import { describeError } from './errors.js';

export type HttpVerb = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type ApiResult =
  | {
      success: true;
      status: number;
      data: unknown;
      headers: Headers;
    }
  | {
      success: false;
      status?: number;
      error: string;
    };

export interface GitLabClientOptions {
  /** Instance root, e.g. `https://gitlab.example.com`; `/api/v4` is appended. */
  url: string;
  token: string;
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
  fetchImpl?: typeof fetch;
}

const API_PREFIX = '/api/v4';
const ERROR_BODY_LIMIT = 200;

export function encodeParamValue(value: ParamValue): string {
  if (typeof value === 'boolean') {
    return value ? '1' : '0';
  }
  return String(value);
}

export function encodeParams(params: Params): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.append(key, encodeParamValue(value));
  }
  return search;
}

export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, '');
  return trimmed.endsWith(API_PREFIX) ? trimmed : `${trimmed}${API_PREFIX}`;
}

function flattenMessage(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    const parts = value.map(flattenMessage).filter((part): part is string => part !== null);
    return parts.length > 0 ? parts.join(', ') : null;
  }
  if (value && typeof value === 'object') {
    const parts: string[] = [];
    for (const [field, entry] of Object.entries(value)) {
      const message = flattenMessage(entry);
      if (message !== null) {
        parts.push(`${field}: ${message}`);
      }
    }
    return parts.length > 0 ? parts.join('; ') : null;
  }
  return null;
}

/**
 * Pulls a human readable message out of a GitLab error body.
 * GitLab answers `{"message": ...}` for API errors and `{"error": ...}` for OAuth failures.
 */
export function extractErrorMessage(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      const fields = new Map<string, unknown>(Object.entries(parsed));
      const message =
        flattenMessage(fields.get('message')) ??
        flattenMessage(fields.get('error_description')) ??
        flattenMessage(fields.get('error'));
      if (message) {
        return message;
      }
    }
  } catch {
    // not JSON, fall through to the raw text
  }
  return body.slice(0, ERROR_BODY_LIMIT);
}

export class GitLabClient {
  readonly apiBase: string;
  private token: string;
  private timeoutMs?: number;
  private userAgent: string;
  private logger?: Logger;
  private fetchImpl?: typeof fetch;

  constructor(options: GitLabClientOptions) {
    if (!options.url || !options.token) {
      throw new Error('Both url and token are required');
    }
    this.apiBase = normalizeBaseUrl(options.url);
    this.token = options.token;
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent || 'gitlab-gateway';
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl;
  }

  private getHeaders(): Record<string, string> {
    return {
      accept: 'application/json',
      'private-token': this.token,
      'user-agent': this.userAgent,
    };
  }

  buildUrl(path: string, query?: URLSearchParams): string {
    const search = query?.toString() ?? '';
    const suffix = search.length > 0 ? `?${search}` : '';
    return `${this.apiBase}${path.startsWith('/') ? path : `/${path}`}${suffix}`;
  }

  /**
   * Performs one API call. GET and DELETE carry `params` in the query string,
   * POST and PUT send them form-encoded.
   */
  async request(verb: HttpVerb, path: string, params: Params = {}): Promise<ApiResult> {
    const encoded = encodeParams(params);
    const inBody = verb === 'POST' || verb === 'PUT';
    const url = this.buildUrl(path, inBody ? undefined : encoded);

    this.logger?.debug({ verb, path, params: Object.keys(params) }, 'gitlab request');

    let response: Response;
    let text: string;
    try {
      const fetchImpl = this.fetchImpl ?? fetch;
      response = await fetchImpl(url, {
        method: verb,
        headers: this.getHeaders(),
        body: inBody ? encoded : undefined,
        signal: this.timeoutMs ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });
      text = await response.text();
    } catch (error) {
      return { success: false, error: describeError(error) };
    }

    this.logger?.debug({ verb, path, status: response.status }, 'gitlab response');

    if (!response.ok) {
      return {
        success: false,
        status: response.status,
        error: `HTTP ${response.status}: ${extractErrorMessage(text)}`,
      };
    }

    if (text.trim().length === 0) {
      return { success: true, status: response.status, data: null, headers: response.headers };
    }

    try {
      return { success: true, status: response.status, data: JSON.parse(text), headers: response.headers };
    } catch {
      return {
        success: false,
        status: response.status,
        error: `Invalid JSON response: ${text.slice(0, ERROR_BODY_LIMIT)}`,
      };
    }
  }
}

import { readGithubSettings, type GithubSettings } from '../../config/github-settings.js';
import type { ToolContext } from '../../core/types.js';
import type { RepositoryRef } from '../../repo/repository-ref.js';

export type QueryValue = string | number | boolean | undefined;

export type QueryParams = Readonly<Record<string, QueryValue>>;

export type GithubResponse = Readonly<{
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly data: unknown;
}>;

export type GithubApi = Readonly<{
  readonly settings: GithubSettings;
  readonly get: (path: string, query?: QueryParams) => Promise<GithubResponse>;
  readonly download: (path: string) => Promise<Uint8Array>;
}>;

const ERROR_BODY_LIMIT = 300;

export class GithubApiError extends Error {
  public readonly status: number;
  public readonly path: string;
  public readonly hint: string | undefined;

  public constructor(status: number, path: string, body: string, hint?: string) {
    super(`GitHub API error ${status} for ${path}: ${body.slice(0, ERROR_BODY_LIMIT)}`);
    this.name = 'GithubApiError';
    this.status = status;
    this.path = path;
    this.hint = hint;
  }
}

export const isGithubApiError = (error: unknown): error is GithubApiError =>
  error instanceof GithubApiError;

const encodeSegments = (value: string): string =>
  value
    .split('/')
    .map((segment) => encodeURIComponent(segment))
    .join('/');

/** `/repos/{owner}/{name}` followed by the given path, each segment escaped. */
export const repoPath = (ref: RepositoryRef, ...rest: readonly string[]): string =>
  [
    '/repos',
    encodeURIComponent(ref.owner),
    encodeURIComponent(ref.name),
    ...rest.filter((part) => part.length > 0).map(encodeSegments),
  ].join('/');

const parseTextPayload = (text: string): unknown => {
  if (text.length === 0) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
};

const toHeadersRecord = (headers: Headers): Readonly<Record<string, string>> =>
  Object.fromEntries(headers.entries());

const buildHeaders = (settings: GithubSettings): Readonly<Record<string, string>> => ({
  Accept: 'application/vnd.github+json',
  'X-GitHub-Api-Version': settings.apiVersion,
  'User-Agent': settings.userAgent,
  ...(settings.token ? { Authorization: `Bearer ${settings.token}` } : {}),
});

const buildUrl = (settings: GithubSettings, path: string, query: QueryParams = {}): URL => {
  const url = new URL(settings.baseUrl);
  const basePath = url.pathname.replace(/\/+$/, '');
  url.pathname = `${basePath}${path.startsWith('/') ? path : `/${path}`}`;
  Object.entries(query).forEach(([key, value]) => {
    if (value === undefined || value === '') return;
    url.searchParams.set(key, String(value));
  });
  return url;
};

const rateLimitHint = (response: Response, settings: GithubSettings): string | undefined => {
  const exhausted = response.headers.get('x-ratelimit-remaining') === '0';
  if (!exhausted || (response.status !== 403 && response.status !== 429)) return undefined;
  return settings.token
    ? 'GitHub rate limit exhausted for this token; wait for the window in x-ratelimit-reset.'
    : 'Unauthenticated GitHub rate limit exhausted; set GITHUB_TOKEN to raise it.';
};

const failFrom = async (
  response: Response,
  path: string,
  settings: GithubSettings,
): Promise<never> => {
  const body = await response.text().catch(() => '<unable to read response body>');
  throw new GithubApiError(response.status, path, body, rateLimitHint(response, settings));
};

/**
 * Authenticated read-only access to the GitHub REST API. Status codes of 400
 * and above become GithubApiError; nothing is retried or cached.
 */
export const createGithubApi = (ctx: ToolContext): GithubApi => {
  const settings = readGithubSettings(ctx.env);
  const headers = buildHeaders(settings);

  const request = (url: URL): Promise<Response> =>
    ctx.fetch(url, {
      method: 'GET',
      headers,
      signal: AbortSignal.timeout(settings.timeoutMs),
    });

  const get = async (path: string, query?: QueryParams): Promise<GithubResponse> => {
    const response = await request(buildUrl(settings, path, query));
    if (response.status >= 400) return failFrom(response, path, settings);
    const text = await response.text();
    return {
      status: response.status,
      headers: toHeadersRecord(response.headers),
      data: parseTextPayload(text),
    };
  };

  const download = async (path: string): Promise<Uint8Array> => {
    const response = await request(buildUrl(settings, path));
    if (response.status >= 400) return failFrom(response, path, settings);
    return new Uint8Array(await response.arrayBuffer());
  };

  return { settings, get, download };
};

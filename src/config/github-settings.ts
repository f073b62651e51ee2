import { z } from 'zod';

import type { ToolContext } from '../core/types.js';

export const DEFAULT_BASE_URL = 'https://api.github.com';
export const DEFAULT_API_VERSION = '2022-11-28';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_USER_AGENT = 'github-intel-mcp/0.1.0';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const GithubSettingsSchema = z.object({
  GITHUB_TOKEN: optionalText,
  GITHUB_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_BASE_URL)),
  GITHUB_API_VERSION: z.preprocess(blankToUndefined, z.string().default(DEFAULT_API_VERSION)),
  GITHUB_HTTP_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().max(600_000).default(DEFAULT_TIMEOUT_MS),
  ),
  GITHUB_USER_AGENT: z.preprocess(blankToUndefined, z.string().default(DEFAULT_USER_AGENT)),
});

export type GithubSettings = Readonly<{
  token: string | undefined;
  baseUrl: string;
  apiVersion: string;
  timeoutMs: number;
  userAgent: string;
}>;

/**
 * GitHub connection settings from the environment. A missing token is
 * allowed: public data stays reachable under the unauthenticated rate limit.
 */
export const readGithubSettings = (env: ToolContext['env']): GithubSettings => {
  const parsed = GithubSettingsSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid GitHub settings in environment: ${detail}`, { cause: parsed.error });
  }
  const settings = parsed.data;
  return {
    token: settings.GITHUB_TOKEN,
    baseUrl: settings.GITHUB_BASE_URL,
    apiVersion: settings.GITHUB_API_VERSION,
    timeoutMs: settings.GITHUB_HTTP_TIMEOUT_MS,
    userAgent: settings.GITHUB_USER_AGENT,
  };
};

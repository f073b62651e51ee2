import { z } from 'zod';

import type { ToolFactory, ToolSpec } from '../../core/types.js';

import { createGithubApi } from './api.js';
import { parsePayload } from './raw.js';

const RawWindowSchema = z
  .object({
    limit: z.number(),
    remaining: z.number(),
    reset: z.number(),
    used: z.number().nullish(),
  })
  .passthrough();

const RawRateLimitSchema = z
  .object({
    resources: z.record(RawWindowSchema).nullish(),
    rate: RawWindowSchema.nullish(),
  })
  .passthrough();

type RawWindow = z.infer<typeof RawWindowSchema>;

// `reset` is epoch seconds; values Date cannot hold come back as null.
const resetTime = (reset: number): string | null => {
  const date = new Date(reset * 1000);
  return Number.isFinite(date.getTime()) ? date.toISOString() : null;
};

const mapWindow = (window: RawWindow) => ({
  limit: window.limit,
  remaining: window.remaining,
  used: window.used ?? window.limit - window.remaining,
  reset_at: resetTime(window.reset),
});

export const githubRateLimitTool: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);

  return {
    spec: {
      name: 'github_rate_limit',
      description: 'Get the GitHub REST rate limit snapshot for the configured credentials.',
      inputSchema: {},
      stability: 'stable',
      since: '0.1.0',
      notes: 'Without GITHUB_TOKEN the core limit is the unauthenticated one (60 requests/hour).',
    } satisfies ToolSpec,
    invoke: async () => {
      const { data } = await api.get('/rate_limit');
      const snapshot = parsePayload(RawRateLimitSchema, data, 'rate limit');
      const core = snapshot.resources?.core ?? snapshot.rate;
      return {
        authenticated: api.settings.token !== undefined,
        core: core ? mapWindow(core) : null,
        search: snapshot.resources?.search ? mapWindow(snapshot.resources.search) : null,
      };
    },
  };
};

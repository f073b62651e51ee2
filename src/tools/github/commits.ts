import { z } from 'zod';

import type { ToolFactory, ToolSpec } from '../../core/types.js';
import { formatRepositoryRef } from '../../repo/repository-ref.js';

import { createGithubApi, repoPath } from './api.js';
import { RawUserSchema, loginOf, parsePayload } from './raw.js';
import { clamp, optionalFilter, repositoryTargetShape, resolveTarget } from './target.js';

const RawCommitSchema = z
  .object({
    sha: z.string(),
    html_url: z.string().nullish(),
    author: RawUserSchema,
    commit: z
      .object({
        message: z.string().nullish(),
        author: z
          .object({ name: z.string().nullish(), date: z.string().nullish() })
          .passthrough()
          .nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

/** First line of a commit message. */
export const commitSubject = (message: string | null | undefined): string =>
  message ? (message.split(/\r?\n/, 1)[0] ?? '') : '';

const ListCommitsInputShape = {
  ...repositoryTargetShape,
  branch: z.string().optional().describe('Branch, tag or SHA to list from. Defaults to the default branch.'),
  limit: z.number().int().optional().describe('Maximum commits to return (1..100, default 10).'),
} as const;

const ListCommitsSchema = z.object(ListCommitsInputShape);

export const githubListCommits: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);

  const spec = {
    name: 'github_list_commits',
    description: 'List recent commits on a branch with their subject line, author and date.',
    inputSchema: ListCommitsInputShape,
    stability: 'stable',
    since: '0.1.0',
    examples: [{ args: { branch: 'main', limit: 5 } }],
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const args = ListCommitsSchema.parse(raw ?? {});
    const { ref } = await resolveTarget({ ctx, args });
    const { data } = await api.get(repoPath(ref, 'commits'), {
      per_page: clamp(args.limit ?? 10, 1, 100),
      sha: optionalFilter(args.branch),
    });
    const commits = parsePayload(z.array(RawCommitSchema), data, 'commits').map((entry) => ({
      sha: entry.sha,
      message: commitSubject(entry.commit?.message),
      author: entry.commit?.author?.name ?? null,
      author_login: loginOf(entry.author),
      date: entry.commit?.author?.date ?? null,
      html_url: entry.html_url ?? null,
    }));
    return { repo: formatRepositoryRef(ref), count: commits.length, commits };
  };

  return { spec, invoke };
};

import { z } from 'zod';

import type { ToolFactory, ToolSpec } from '../../core/types.js';
import { formatRepositoryRef } from '../../repo/repository-ref.js';

import { createGithubApi, repoPath } from './api.js';
import { RawChangedFileSchema, diffLimitsShape, mapChangedFiles, resolveDiffLimits } from './compare.js';
import { ItemStateSchema } from './issues.js';
import {
  RawAssigneesSchema,
  RawLabelsSchema,
  RawUserSchema,
  assigneeLogins,
  labelNames,
  loginOf,
  parsePayload,
} from './raw.js';
import { IdSchema, clamp, optionalFilter, repositoryTargetShape, resolveTarget, toIdString } from './target.js';

const RawBranchRefSchema = z
  .object({ ref: z.string().nullish(), sha: z.string().nullish() })
  .passthrough()
  .nullish();

// The list endpoint omits the size and merge fields; they stay nullish there.
const RawPullRequestSchema = z
  .object({
    number: z.number(),
    node_id: z.string().nullish(),
    title: z.string().nullish(),
    body: z.string().nullish(),
    state: z.string().nullish(),
    draft: z.boolean().nullish(),
    user: RawUserSchema,
    labels: RawLabelsSchema,
    assignees: RawAssigneesSchema,
    requested_reviewers: RawAssigneesSchema,
    comments: z.number().nullish(),
    review_comments: z.number().nullish(),
    commits: z.number().nullish(),
    additions: z.number().nullish(),
    deletions: z.number().nullish(),
    changed_files: z.number().nullish(),
    mergeable: z.boolean().nullish(),
    mergeable_state: z.string().nullish(),
    merged: z.boolean().nullish(),
    merged_at: z.string().nullish(),
    head: RawBranchRefSchema,
    base: RawBranchRefSchema,
    created_at: z.string().nullish(),
    updated_at: z.string().nullish(),
    html_url: z.string().nullish(),
  })
  .passthrough();

type RawPullRequest = z.infer<typeof RawPullRequestSchema>;

const mapPullRequest = (pr: RawPullRequest) => ({
  number: pr.number,
  title: pr.title ?? null,
  body: pr.body ?? '',
  state: pr.state ?? null,
  user: loginOf(pr.user),
  draft: pr.draft ?? false,
  labels: labelNames(pr.labels),
  assignees: assigneeLogins(pr.assignees),
  comments: pr.comments ?? null,
  commits: pr.commits ?? null,
  additions: pr.additions ?? null,
  deletions: pr.deletions ?? null,
  changed_files: pr.changed_files ?? null,
  mergeable: pr.mergeable ?? null,
  mergeable_state: pr.mergeable_state ?? null,
  merged: pr.merged ?? null,
  head_branch: pr.head?.ref ?? null,
  head_sha: pr.head?.sha ?? null,
  base_branch: pr.base?.ref ?? null,
  created_at: pr.created_at ?? null,
  updated_at: pr.updated_at ?? null,
  html_url: pr.html_url ?? null,
});

const ListPullsInputShape = {
  ...repositoryTargetShape,
  state: ItemStateSchema.optional().describe('open (default), closed or all.'),
  base: z.string().optional().describe('Only pull requests targeting this base branch.'),
  limit: z.number().int().optional().describe('Maximum pull requests (1..100, default 20).'),
} as const;

const ListPullsSchema = z.object(ListPullsInputShape);

export const githubListPulls: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);

  const spec = {
    name: 'github_list_pulls',
    description: 'List pull requests, most recently updated first.',
    inputSchema: ListPullsInputShape,
    stability: 'stable',
    since: '0.1.0',
    examples: [{ args: { state: 'open', base: 'main' } }],
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const args = ListPullsSchema.parse(raw ?? {});
    const { ref } = await resolveTarget({ ctx, args });
    const { data } = await api.get(repoPath(ref, 'pulls'), {
      state: args.state ?? 'open',
      per_page: clamp(args.limit ?? 20, 1, 100),
      sort: 'updated',
      direction: 'desc',
      base: optionalFilter(args.base),
    });
    const pulls = parsePayload(z.array(RawPullRequestSchema), data, 'pull requests').map(mapPullRequest);
    return { repo: formatRepositoryRef(ref), count: pulls.length, pulls };
  };

  return { spec, invoke };
};

export const pullRequestIdentityShape = {
  number: IdSchema.describe('Pull request number.'),
  ...repositoryTargetShape,
} as const;

const PullRequestIdentitySchema = z.object(pullRequestIdentityShape);

export const githubGetPull: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);

  const spec = {
    name: 'github_get_pull',
    description: 'Fetch one pull request with branches, SHAs, review and merge state.',
    inputSchema: pullRequestIdentityShape,
    stability: 'stable',
    since: '0.1.0',
    examples: [{ args: { number: 7 } }],
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const args = PullRequestIdentitySchema.parse(raw);
    const number = toIdString(args.number);
    const { ref } = await resolveTarget({ ctx, args });
    const { data } = await api.get(repoPath(ref, 'pulls', number));
    const pr = parsePayload(RawPullRequestSchema, data, `pull request #${number}`);
    return {
      repo: formatRepositoryRef(ref),
      pull: {
        ...mapPullRequest(pr),
        node_id: pr.node_id ?? null,
        base_sha: pr.base?.sha ?? null,
        review_comments: pr.review_comments ?? null,
        requested_reviewers: assigneeLogins(pr.requested_reviewers),
        merged_at: pr.merged_at ?? null,
      },
    };
  };

  return { spec, invoke };
};

const PullFilesInputShape = {
  ...pullRequestIdentityShape,
  ...diffLimitsShape,
} as const;

const PullFilesSchema = z.object(PullFilesInputShape);

export const githubListPullFiles: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);

  const spec = {
    name: 'github_list_pull_files',
    description: 'List the files changed by a pull request with (truncated) patches.',
    inputSchema: PullFilesInputShape,
    stability: 'stable',
    since: '0.1.0',
    examples: [{ args: { number: 7, max_files: 20, max_patch_chars: 1000 } }],
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const args = PullFilesSchema.parse(raw);
    const limits = resolveDiffLimits(args);
    const number = toIdString(args.number);
    const { ref } = await resolveTarget({ ctx, args });
    const { data } = await api.get(repoPath(ref, 'pulls', number, 'files'), { per_page: 100 });
    const files = parsePayload(z.array(RawChangedFileSchema), data, `files of #${number}`);
    const outFiles = mapChangedFiles(files, limits);
    return {
      repo: formatRepositoryRef(ref),
      number: Number(number),
      files_count: files.length,
      files_returned: outFiles.length,
      files: outFiles,
    };
  };

  return { spec, invoke };
};

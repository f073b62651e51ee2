import { z } from 'zod';

import type { ToolFactory, ToolSpec } from '../../core/types.js';
import { formatRepositoryRef } from '../../repo/repository-ref.js';

import { createGithubApi, repoPath } from './api.js';
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

export const ItemStateSchema = z.enum(['open', 'closed', 'all']);

const RawIssueSchema = z
  .object({
    number: z.number(),
    title: z.string().nullish(),
    body: z.string().nullish(),
    state: z.string().nullish(),
    user: RawUserSchema,
    labels: RawLabelsSchema,
    assignees: RawAssigneesSchema,
    comments: z.number().nullish(),
    created_at: z.string().nullish(),
    updated_at: z.string().nullish(),
    closed_at: z.string().nullish(),
    html_url: z.string().nullish(),
    pull_request: z.unknown().optional(),
  })
  .passthrough();

const RawCommentSchema = z
  .object({
    id: z.number(),
    user: RawUserSchema,
    body: z.string().nullish(),
    created_at: z.string().nullish(),
    updated_at: z.string().nullish(),
    html_url: z.string().nullish(),
  })
  .passthrough();

type RawIssue = z.infer<typeof RawIssueSchema>;

// The issues API lists pull requests too; they carry a `pull_request` key.
const isPullRequest = (issue: RawIssue): boolean => issue.pull_request != null;

const ListIssuesInputShape = {
  ...repositoryTargetShape,
  state: ItemStateSchema.optional().describe('open (default), closed or all.'),
  labels: z.string().optional().describe('Comma-separated label names; all must match.'),
  limit: z.number().int().optional().describe('Page size (1..100, default 20).'),
  include_prs: z
    .boolean()
    .optional()
    .describe('Keep pull requests in the listing (default false).'),
} as const;

const ListIssuesSchema = z.object(ListIssuesInputShape);

export const githubListIssues: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);

  const spec = {
    name: 'github_list_issues',
    description: 'List issues, most recently updated first. Pull requests are filtered out unless include_prs is set.',
    inputSchema: ListIssuesInputShape,
    stability: 'stable',
    since: '0.1.0',
    examples: [{ args: { state: 'open', labels: 'bug,help wanted', limit: 10 } }],
    notes: 'Filtering pull requests happens after the page is fetched, so count can be below limit.',
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const args = ListIssuesSchema.parse(raw ?? {});
    const { ref } = await resolveTarget({ ctx, args });
    const { data } = await api.get(repoPath(ref, 'issues'), {
      state: args.state ?? 'open',
      per_page: clamp(args.limit ?? 20, 1, 100),
      sort: 'updated',
      direction: 'desc',
      labels: optionalFilter(args.labels),
    });
    const issues = parsePayload(z.array(RawIssueSchema), data, 'issues');
    const items = issues
      .filter((issue) => args.include_prs === true || !isPullRequest(issue))
      .map((issue) => ({
        number: issue.number,
        title: issue.title ?? null,
        body: issue.body ?? '',
        state: issue.state ?? null,
        is_pr: isPullRequest(issue),
        user: loginOf(issue.user),
        labels: labelNames(issue.labels),
        comments: issue.comments ?? null,
        created_at: issue.created_at ?? null,
        updated_at: issue.updated_at ?? null,
        html_url: issue.html_url ?? null,
      }));
    return { repo: formatRepositoryRef(ref), count: items.length, items };
  };

  return { spec, invoke };
};

const GetIssueInputShape = {
  issue_number: IdSchema.describe('Issue (or pull request) number.'),
  ...repositoryTargetShape,
} as const;

const GetIssueSchema = z.object(GetIssueInputShape);

export const githubGetIssue: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);

  const spec = {
    name: 'github_get_issue',
    description: 'Get a single issue or pull request by number, with its first page of comments.',
    inputSchema: GetIssueInputShape,
    stability: 'stable',
    since: '0.1.0',
    examples: [{ args: { issue_number: 42 } }],
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const args = GetIssueSchema.parse(raw);
    const number = toIdString(args.issue_number);
    const { ref } = await resolveTarget({ ctx, args });
    const issueResponse = await api.get(repoPath(ref, 'issues', number));
    const issue = parsePayload(RawIssueSchema, issueResponse.data, `issue #${number}`);
    const commentsResponse = await api.get(repoPath(ref, 'issues', number, 'comments'), {
      per_page: 100,
    });
    const comments = parsePayload(z.array(RawCommentSchema), commentsResponse.data, `comments of #${number}`);

    return {
      repo: formatRepositoryRef(ref),
      issue: {
        number: issue.number,
        title: issue.title ?? null,
        state: issue.state ?? null,
        is_pr: isPullRequest(issue),
        user: loginOf(issue.user),
        labels: labelNames(issue.labels),
        assignees: assigneeLogins(issue.assignees),
        comments_count: issue.comments ?? null,
        comments: comments.map((comment) => ({
          id: comment.id,
          user: loginOf(comment.user),
          body: comment.body ?? '',
          created_at: comment.created_at ?? null,
          updated_at: comment.updated_at ?? null,
          html_url: comment.html_url ?? null,
        })),
        created_at: issue.created_at ?? null,
        updated_at: issue.updated_at ?? null,
        closed_at: issue.closed_at ?? null,
        html_url: issue.html_url ?? null,
        body: issue.body ?? '',
      },
    };
  };

  return { spec, invoke };
};

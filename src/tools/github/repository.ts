import { z } from 'zod';

import type { ToolFactory, ToolSpec } from '../../core/types.js';
import { formatRepositoryRef } from '../../repo/repository-ref.js';

import { createGithubApi, repoPath } from './api.js';
import { parsePayload } from './raw.js';
import { repositoryTargetShape, resolveTarget } from './target.js';

const RawRepositorySchema = z
  .object({
    full_name: z.string(),
    description: z.string().nullish(),
    default_branch: z.string().nullish(),
    language: z.string().nullish(),
    license: z.object({ name: z.string().nullish() }).passthrough().nullish(),
    topics: z.array(z.string()).nullish(),
    stargazers_count: z.number().nullish(),
    forks_count: z.number().nullish(),
    open_issues_count: z.number().nullish(),
    visibility: z.string().nullish(),
    archived: z.boolean().nullish(),
    fork: z.boolean().nullish(),
    html_url: z.string().nullish(),
    clone_url: z.string().nullish(),
    pushed_at: z.string().nullish(),
    updated_at: z.string().nullish(),
  })
  .passthrough();

export const githubResolveRepo: ToolFactory = (ctx) => {
  const Schema = z.object(repositoryTargetShape);

  const spec = {
    name: 'github_resolve_repo',
    description:
      'Report which GitHub repository the other tools would target for the given repo/root_path, and where it was found. Makes no network calls.',
    inputSchema: Schema.shape,
    stability: 'stable',
    since: '0.1.0',
    examples: [
      { args: {}, comment: 'Infer from the server working directory' },
      { args: { root_path: '/home/dev/projects/widgets/src' }, comment: 'Infer from a checkout' },
    ],
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const args = Schema.parse(raw ?? {});
    const resolved = await resolveTarget({ ctx, args });
    return {
      repo: formatRepositoryRef(resolved.ref),
      owner: resolved.ref.owner,
      name: resolved.ref.name,
      source: resolved.source,
      remote_name: resolved.remote?.remoteName ?? null,
      remote_url: resolved.remote?.url ?? null,
      config_path: resolved.remote?.configPath ?? null,
    };
  };

  return { spec, invoke };
};

export const githubRepoInfo: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);
  const Schema = z.object(repositoryTargetShape);

  const spec = {
    name: 'github_repo_info',
    description: 'Get basic repository metadata: description, default branch, language, license, topics and counters.',
    inputSchema: Schema.shape,
    stability: 'stable',
    since: '0.1.0',
    examples: [{ args: { repo: 'octo-org/octo-repo' } }],
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const args = Schema.parse(raw ?? {});
    const { ref } = await resolveTarget({ ctx, args });
    const { data } = await api.get(repoPath(ref));
    const repo = parsePayload(RawRepositorySchema, data, 'repository');
    return {
      full_name: repo.full_name,
      description: repo.description ?? null,
      default_branch: repo.default_branch ?? null,
      language: repo.language ?? null,
      license: repo.license?.name ?? null,
      topics: repo.topics ?? [],
      stars: repo.stargazers_count ?? null,
      forks: repo.forks_count ?? null,
      open_issues: repo.open_issues_count ?? null,
      visibility: repo.visibility ?? null,
      archived: repo.archived ?? false,
      fork: repo.fork ?? false,
      html_url: repo.html_url ?? null,
      clone_url: repo.clone_url ?? null,
      pushed_at: repo.pushed_at ?? null,
      updated_at: repo.updated_at ?? null,
    };
  };

  return { spec, invoke };
};

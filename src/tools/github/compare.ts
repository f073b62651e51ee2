import { z } from 'zod';

import type { ToolFactory, ToolSpec } from '../../core/types.js';
import { formatRepositoryRef } from '../../repo/repository-ref.js';

import { createGithubApi, repoPath } from './api.js';
import { parsePayload } from './raw.js';
import { clamp, repositoryTargetShape, resolveTarget } from './target.js';

export const PATCH_TRUNCATION_MARKER = '\n...TRUNCATED...';

export const RawChangedFileSchema = z
  .object({
    filename: z.string(),
    status: z.string().nullish(),
    additions: z.number().nullish(),
    deletions: z.number().nullish(),
    changes: z.number().nullish(),
    previous_filename: z.string().nullish(),
    patch: z.string().nullish(),
  })
  .passthrough();

type RawChangedFile = z.infer<typeof RawChangedFileSchema>;

export type ChangedFile = Readonly<{
  filename: string;
  status: string | null;
  additions: number | null;
  deletions: number | null;
  changes: number | null;
  previous_filename?: string;
  patch: string | null;
}>;

export const diffLimitsShape = {
  max_files: z.number().int().optional().describe('Maximum files to include (1..300, default 50).'),
  max_patch_chars: z
    .number()
    .int()
    .optional()
    .describe('Maximum patch characters per file (200..10000, default 2000).'),
} as const;

export type DiffLimits = Readonly<{ maxFiles: number; maxPatchChars: number }>;

export const resolveDiffLimits = (args: {
  readonly max_files?: number;
  readonly max_patch_chars?: number;
}): DiffLimits => ({
  maxFiles: clamp(args.max_files ?? 50, 1, 300),
  maxPatchChars: clamp(args.max_patch_chars ?? 2000, 200, 10_000),
});

const truncatePatch = (patch: string | null | undefined, maxChars: number): string | null => {
  if (patch == null) return null;
  return patch.length > maxChars ? patch.slice(0, maxChars) + PATCH_TRUNCATION_MARKER : patch;
};

export const mapChangedFiles = (
  files: readonly RawChangedFile[],
  limits: DiffLimits,
): readonly ChangedFile[] =>
  files.slice(0, limits.maxFiles).map((file) => ({
    filename: file.filename,
    status: file.status ?? null,
    additions: file.additions ?? null,
    deletions: file.deletions ?? null,
    changes: file.changes ?? null,
    ...(file.previous_filename ? { previous_filename: file.previous_filename } : {}),
    patch: truncatePatch(file.patch, limits.maxPatchChars),
  }));

const RawComparisonSchema = z
  .object({
    status: z.string().nullish(),
    ahead_by: z.number().nullish(),
    behind_by: z.number().nullish(),
    total_commits: z.number().nullish(),
    files: z.array(RawChangedFileSchema).nullish(),
    html_url: z.string().nullish(),
    permalink_url: z.string().nullish(),
  })
  .passthrough();

const CompareInputShape = {
  base: z.string().trim().min(1).describe('Base ref, e.g. "main".'),
  head: z.string().trim().min(1).describe('Head ref, e.g. "feature-branch" or a commit SHA.'),
  ...repositoryTargetShape,
  ...diffLimitsShape,
} as const;

const CompareSchema = z.object(CompareInputShape);

export const githubCompareCommits: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);

  const spec = {
    name: 'github_compare_commits',
    description: 'Compare two commits, branches or tags: ahead/behind counts and per-file patches.',
    inputSchema: CompareInputShape,
    stability: 'stable',
    since: '0.1.0',
    examples: [{ args: { base: 'main', head: 'feature-branch', max_files: 20 } }],
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const args = CompareSchema.parse(raw);
    const limits = resolveDiffLimits(args);
    const { ref } = await resolveTarget({ ctx, args });
    const { data } = await api.get(repoPath(ref, 'compare', `${args.base}...${args.head}`));
    const comparison = parsePayload(RawComparisonSchema, data, 'comparison');
    const files = comparison.files ?? [];
    const outFiles = mapChangedFiles(files, limits);

    return {
      repo: formatRepositoryRef(ref),
      base: args.base,
      head: args.head,
      status: comparison.status ?? null,
      ahead_by: comparison.ahead_by ?? null,
      behind_by: comparison.behind_by ?? null,
      total_commits: comparison.total_commits ?? null,
      files_count: files.length,
      files_returned: outFiles.length,
      files: outFiles,
      html_url: comparison.html_url ?? null,
      permalink_url: comparison.permalink_url ?? null,
    };
  };

  return { spec, invoke };
};

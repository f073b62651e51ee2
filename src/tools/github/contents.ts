import { z } from 'zod';

import type { ToolFactory, ToolSpec } from '../../core/types.js';
import { formatRepositoryRef } from '../../repo/repository-ref.js';

import { createGithubApi, repoPath } from './api.js';
import { decodeBase64Text, truncateText } from './base64.js';
import { parsePayload } from './raw.js';
import { optionalFilter, repositoryTargetShape, resolveTarget } from './target.js';

export const DEFAULT_MAX_CHARS = 20_000;

const RawEntrySchema = z
  .object({
    type: z.string().nullish(),
    name: z.string().nullish(),
    path: z.string().nullish(),
    sha: z.string().nullish(),
    size: z.number().nullish(),
    encoding: z.string().nullish(),
    content: z.string().nullish(),
    download_url: z.string().nullish(),
    html_url: z.string().nullish(),
  })
  .passthrough();

const RawContentsSchema = z.union([z.array(RawEntrySchema), RawEntrySchema]);

type RawEntry = z.infer<typeof RawEntrySchema>;

const GetFileInputShape = {
  path: z.string().describe('File path in the repository, e.g. "README.md" or ".github/workflows/ci.yml".'),
  ...repositoryTargetShape,
  ref: z.string().optional().describe('Branch, tag or commit SHA. Defaults to the default branch.'),
  max_chars: z
    .number()
    .int()
    .positive()
    .optional()
    .describe(`Maximum characters of decoded text to return (default ${DEFAULT_MAX_CHARS}).`),
} as const;

const GetFileSchema = z.object(GetFileInputShape);

const toDirectoryItem = (entry: RawEntry) => ({
  type: entry.type ?? null,
  name: entry.name ?? null,
  path: entry.path ?? null,
  sha: entry.sha ?? null,
  size: entry.size ?? null,
});

const cleanRepoPath = (value: string): string => value.trim().replace(/^\/+/, '');

export const githubGetFile: ToolFactory = (ctx) => {
  const api = createGithubApi(ctx);

  const spec = {
    name: 'github_get_file',
    description:
      'Read a text file from a repository through the contents API. Directories return their listing.',
    inputSchema: GetFileInputShape,
    stability: 'stable',
    since: '0.1.0',
    examples: [
      { args: { path: 'README.md' }, comment: 'Repository inferred from the working directory' },
      { args: { repo: 'octo-org/octo-repo', path: 'src/index.ts', ref: 'main', max_chars: 5000 } },
    ],
    notes: 'Files too large for inline content come back with a download_url instead of text.',
  } satisfies ToolSpec;

  const invoke = async (raw: unknown) => {
    const args = GetFileSchema.parse(raw);
    const path = cleanRepoPath(args.path);
    if (path.length === 0) {
      throw new Error('path is required');
    }
    const ref = optionalFilter(args.ref);
    const maxChars = args.max_chars ?? DEFAULT_MAX_CHARS;

    const resolved = await resolveTarget({ ctx, args });
    const repo = formatRepositoryRef(resolved.ref);
    const { data } = await api.get(repoPath(resolved.ref, 'contents', path), { ref });
    const contents = parsePayload(RawContentsSchema, data, `contents of ${path}`);

    if (Array.isArray(contents)) {
      return { repo, path, type: 'dir', items: contents.map(toDirectoryItem) };
    }

    if (contents.type !== 'file') {
      return { repo, path, raw: contents };
    }

    const encoding = (contents.encoding ?? '').toLowerCase();
    if (encoding !== 'base64' || !contents.content) {
      return {
        repo,
        path,
        sha: contents.sha ?? null,
        size: contents.size ?? null,
        note: 'No inline content returned (file may be too large). Use download_url.',
        download_url: contents.download_url ?? null,
        html_url: contents.html_url ?? null,
      };
    }

    const decoded = decodeBase64Text(contents.content);
    const { text, truncated } = truncateText(decoded.text, maxChars);
    return {
      repo,
      path,
      sha: contents.sha ?? null,
      size: contents.size ?? null,
      ref: ref ?? null,
      charset: decoded.charset,
      truncated,
      text,
      download_url: contents.download_url ?? null,
      html_url: contents.html_url ?? null,
    };
  };

  return { spec, invoke };
};

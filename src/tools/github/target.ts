import { z } from 'zod';
import type { ReadonlyDeep } from 'type-fest';

import type { ToolContext } from '../../core/types.js';
import { formatRepositoryRef } from '../../repo/repository-ref.js';
import { resolveRepository, type ResolvedRepository } from '../../repo/resolve.js';

export const repositoryTargetShape = {
  repo: z
    .string()
    .optional()
    .describe("Repository as 'owner/name' or a GitHub URL. Takes precedence over root_path."),
  root_path: z
    .string()
    .optional()
    .describe(
      'Local path inside a git checkout; the repository is inferred from its remote (origin first). Defaults to the server working directory.',
    ),
} as const;

export type RepositoryTargetArgs = Readonly<{
  repo?: string;
  root_path?: string;
}>;

export const IdSchema = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .trim()
    .regex(/^[0-9]+$/, 'must be a numeric identifier'),
]);

export type Identifier = z.infer<typeof IdSchema>;

export const toIdString = (value: Identifier): string =>
  typeof value === 'number' ? value.toString(10) : value;

export const clamp = (value: number, lo: number, hi: number): number =>
  Math.max(lo, Math.min(hi, Math.trunc(value)));

/** Optional trimmed text; blank strings count as absent. */
export const optionalFilter = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

type ResolveTargetOptions = ReadonlyDeep<{
  ctx: ToolContext;
  args: RepositoryTargetArgs;
}>;

export const resolveTarget = async ({
  ctx,
  args,
}: ResolveTargetOptions): Promise<ResolvedRepository> => {
  const resolved = await resolveRepository(
    { repo: args.repo, rootPath: args.root_path },
    ctx.cwd ? { cwd: ctx.cwd() } : {},
  );
  ctx.logger?.debug(
    `resolved ${formatRepositoryRef(resolved.ref)} from ${resolved.source}${
      resolved.remote ? ` (${resolved.remote.configPath})` : ''
    }`,
  );
  return resolved;
};

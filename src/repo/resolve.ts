import { attempt, type Either } from '../core/either.js';

import { REFERENCE_HINT, ResolutionError, isResolutionError } from './errors.js';
import { locateRemoteUrl, type LocateOptions, type RemoteLookup, type RemoteUrlRecord } from './git-config.js';
import { parseRepositoryRef, type RepositoryRef } from './repository-ref.js';

export type ResolutionInput = Readonly<{
  repo?: string;
  rootPath?: string;
}>;

export type ResolutionSource = 'explicit' | 'git-config';

export type ResolvedRepository = Readonly<{
  ref: RepositoryRef;
  source: ResolutionSource;
  remote?: RemoteUrlRecord;
}>;

export type ResolveOptions = LocateOptions &
  Readonly<{
    locate?: typeof locateRemoteUrl;
  }>;

// A step either settles the reference, or passes with a note on why it could not.
type StepOutcome =
  | Readonly<{ kind: 'resolved'; value: ResolvedRepository }>
  | Readonly<{ kind: 'skipped'; note: string }>;

type ResolutionStep = (input: ResolutionInput, options: ResolveOptions) => Promise<StepOutcome>;

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const fromExplicitReference: ResolutionStep = async (input) => {
  const repo = nonEmpty(input.repo);
  if (repo === undefined) return { kind: 'skipped', note: 'no `repo` given' };
  return { kind: 'resolved', value: { ref: parseRepositoryRef(repo), source: 'explicit' } };
};

const describeAbsence = (lookup: Extract<RemoteLookup, { kind: 'absent' }>): string => {
  switch (lookup.reason) {
    case 'path-not-found':
      return `root_path ${lookup.searchedFrom} does not exist`;
    case 'no-git-directory':
      return `no .git directory found walking up from ${lookup.searchedFrom}`;
    case 'no-config':
      return `the git directory above ${lookup.searchedFrom} has no config file`;
    case 'no-remote':
      return `the git repository at ${lookup.searchedFrom} has no remote with a url`;
  }
};

const fromGitConfig: ResolutionStep = async (input, options) => {
  const locate = options.locate ?? locateRemoteUrl;
  const lookup = await locate(nonEmpty(input.rootPath), options);
  if (lookup.kind === 'absent') return { kind: 'skipped', note: describeAbsence(lookup) };
  if (lookup.kind === 'unreadable') {
    throw new ResolutionError(
      'MetadataUnreadable',
      `Git metadata at ${lookup.path} exists but could not be read`,
      {
        hint: 'Check the permissions of the .git directory, or pass `repo` explicitly.',
        cause: lookup.cause,
      },
    );
  }

  const { record } = lookup;
  try {
    const ref = parseRepositoryRef(record.url);
    return { kind: 'resolved', value: { ref, source: 'git-config', remote: record } };
  } catch (error) {
    throw new ResolutionError(
      'UnrecognizedReferenceFormat',
      `Remote "${record.remoteName}" in ${record.configPath} has url ${JSON.stringify(
        record.url,
      )}, which does not name a GitHub owner/name`,
      { hint: 'Pass `repo` explicitly as owner/name.', cause: error },
    );
  }
};

// Order is precedence: an explicit reference always wins over auto-detection.
export const RESOLUTION_STEPS: readonly ResolutionStep[] = [fromExplicitReference, fromGitConfig];

/**
 * Resolve the repository a tool call targets. Throws ResolutionError when no
 * step produces a reference.
 */
export const resolveRepository = async (
  input: ResolutionInput,
  options: ResolveOptions = {},
): Promise<ResolvedRepository> => {
  const notes: string[] = [];
  for (const step of RESOLUTION_STEPS) {
    const outcome = await step(input, options);
    if (outcome.kind === 'resolved') return outcome.value;
    notes.push(outcome.note);
  }
  throw new ResolutionError(
    'AmbiguousOrMissingReference',
    `Cannot determine the target repository (${notes.join('; ')}). Provide \`repo\` or \`root_path\`.`,
    { hint: REFERENCE_HINT },
  );
};

export const tryResolveRepository = (
  input: ResolutionInput,
  options: ResolveOptions = {},
): Promise<Either<ResolutionError, ResolvedRepository>> =>
  attempt(() => resolveRepository(input, options), isResolutionError);

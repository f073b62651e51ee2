export type ResolutionErrorKind =
  | 'AmbiguousOrMissingReference'
  | 'UnrecognizedReferenceFormat'
  | 'MetadataUnreadable';

export type ResolutionErrorOptions = Readonly<{
  hint?: string;
  cause?: unknown;
}>;

export class ResolutionError extends Error {
  public readonly kind: ResolutionErrorKind;
  public readonly hint: string | undefined;

  public constructor(
    kind: ResolutionErrorKind,
    message: string,
    options: ResolutionErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResolutionError';
    this.kind = kind;
    this.hint = options.hint;
  }
}

export const isResolutionError = (error: unknown): error is ResolutionError =>
  error instanceof ResolutionError;

export const REFERENCE_HINT =
  "Pass `repo` as 'owner/name' or a GitHub URL, or `root_path` pointing inside a git checkout that has a remote.";

import { REFERENCE_HINT, ResolutionError } from './errors.js';

export type RepositoryRef = Readonly<{
  readonly owner: string;
  readonly name: string;
}>;

// GitHub owner and repository names are drawn from this alphabet.
const SEGMENT_PATTERN = /^[A-Za-z0-9_.-]+$/;

const URL_PROTOCOLS: ReadonlySet<string> = new Set([
  'https:',
  'http:',
  'ssh:',
  'git:',
  'git+ssh:',
  'ssh+git:',
]);

// user@host:owner/name, the short form ssh remotes use.
const SCP_LIKE_PATTERN = /^[^@/\s]+@([^:/\s]+):(?!\/\/)(.+)$/;

const isValidSegment = (segment: string): boolean =>
  SEGMENT_PATTERN.test(segment) && segment !== '.' && segment !== '..';

const unrecognized = (input: string, detail?: string): ResolutionError =>
  new ResolutionError(
    'UnrecognizedReferenceFormat',
    `Unrecognized repository reference ${JSON.stringify(input)}: ${
      detail ?? "expected 'owner/name', an https/ssh URL, or user@host:owner/name"
    }`,
    { hint: REFERENCE_HINT },
  );

export const createRepositoryRef = (owner: string, name: string): RepositoryRef =>
  Object.freeze({ owner, name });

export const formatRepositoryRef = (ref: RepositoryRef): string => `${ref.owner}/${ref.name}`;

const stripRepositorySuffix = (path: string): string => {
  const withoutSlash = path.endsWith('/') ? path.slice(0, -1) : path;
  return withoutSlash.endsWith('.git') ? withoutSlash.slice(0, -'.git'.length) : withoutSlash;
};

const refFromPath = (input: string, path: string): RepositoryRef => {
  const segments = stripRepositorySuffix(path).split('/');
  if (segments.length !== 2) {
    throw unrecognized(
      input,
      `expected exactly two path segments (owner/name) after the host, found ${segments.length}`,
    );
  }
  const [owner = '', name = ''] = segments;
  if (!isValidSegment(owner) || !isValidSegment(name)) {
    throw unrecognized(input, 'owner and name must be non-empty GitHub identifiers');
  }
  return createRepositoryRef(owner, name);
};

const safeDecode = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

const parseUrlReference = (input: string): RepositoryRef | undefined => {
  if (!input.includes('://')) return undefined;
  let url: URL;
  try {
    url = new URL(input);
  } catch (error) {
    throw new ResolutionError('UnrecognizedReferenceFormat', `Malformed repository URL ${JSON.stringify(input)}`, {
      hint: REFERENCE_HINT,
      cause: error,
    });
  }
  if (!URL_PROTOCOLS.has(url.protocol)) {
    throw unrecognized(input, `unsupported URL scheme ${url.protocol.replace(/:$/, '')}`);
  }
  if (url.hostname.length === 0 || url.search.length > 0 || url.hash.length > 0) {
    throw unrecognized(input);
  }
  return refFromPath(input, safeDecode(url.pathname.replace(/^\//, '')));
};

const parseScpLikeReference = (input: string): RepositoryRef | undefined => {
  const match = SCP_LIKE_PATTERN.exec(input);
  if (!match) return undefined;
  return refFromPath(input, match[2] ?? '');
};

const parseShorthandReference = (input: string): RepositoryRef | undefined => {
  const slash = input.indexOf('/');
  if (slash < 0 || input.includes(':')) return undefined;
  const owner = input.slice(0, slash);
  const name = input.slice(slash + 1);
  if (!isValidSegment(owner) || !isValidSegment(name)) return undefined;
  return createRepositoryRef(owner, name);
};

/**
 * Parse a shorthand `owner/name` or a remote URL (https, ssh, git, scp-like)
 * into a RepositoryRef. Any host is accepted; the path must hold exactly the
 * owner and name. Case is kept as given.
 */
export const parseRepositoryRef = (raw: string): RepositoryRef => {
  const input = raw.trim();
  if (input.length === 0) {
    throw unrecognized(raw, 'reference is empty');
  }
  const parsed =
    parseUrlReference(input) ?? parseScpLikeReference(input) ?? parseShorthandReference(input);
  if (!parsed) {
    throw unrecognized(input);
  }
  return parsed;
};

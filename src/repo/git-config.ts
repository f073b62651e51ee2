import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';

export const GIT_DIRECTORY_NAME = '.git';
export const DEFAULT_REMOTE_NAME = 'origin';

export type RemoteUrlRecord = Readonly<{
  readonly url: string;
  readonly remoteName: string;
  readonly configPath: string;
  readonly gitDir: string;
}>;

export type AbsentReason = 'path-not-found' | 'no-git-directory' | 'no-config' | 'no-remote';

export type RemoteLookup =
  | Readonly<{ kind: 'found'; record: RemoteUrlRecord }>
  | Readonly<{ kind: 'absent'; reason: AbsentReason; searchedFrom: string }>
  | Readonly<{ kind: 'unreadable'; path: string; cause: unknown }>;

export type LocateOptions = Readonly<{
  // Absolute directory above which the walk does not continue.
  ceiling?: string;
  cwd?: string;
  readText?: (file: string) => Promise<string>;
}>;

type ReadText = NonNullable<LocateOptions['readText']>;

const readUtf8: ReadText = (file) => readFile(file, 'utf8');

type GitDirLookup =
  | Readonly<{ kind: 'found'; gitDir: string }>
  | Readonly<{ kind: 'absent' }>
  | Readonly<{ kind: 'unreadable'; path: string; cause: unknown }>;

type RemoteEntry = Readonly<{ name: string; url: string }>;

const absent = (reason: AbsentReason, searchedFrom: string): RemoteLookup => ({
  kind: 'absent',
  reason,
  searchedFrom,
});

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

const statOrUndefined = async (candidate: string) => {
  try {
    return await stat(candidate);
  } catch {
    return undefined;
  }
};

const exists = async (candidate: string): Promise<boolean> =>
  (await statOrUndefined(candidate)) !== undefined;

export const cleanPathInput = (raw: string): string => {
  const trimmed = raw.trim();
  const unquoted = /^(['"])(.*)\1$/.exec(trimmed)?.[2] ?? trimmed;
  return path.normalize(unquoted.trim());
};

// ---------------------------------------------------------------------------
// git config text
// ---------------------------------------------------------------------------

const SECTION_HEADER = /^\[\s*([A-Za-z0-9.-]+)(?:\s+"((?:[^"\\]|\\.)*)")?\s*\](.*)$/;
const KEY_VALUE = /^([A-Za-z][A-Za-z0-9-]*)\s*(?:=(.*))?$/;

const ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  '\\': '\\',
  n: '\n',
  t: '\t',
  b: '\b',
};

const unescapeSubsection = (value: string): string => value.replace(/\\(.)/g, '$1');

/**
 * Reads a git config value: unquotes, resolves escapes, drops comments outside
 * quotes and trims unquoted whitespace at both ends. A value whose quote is
 * never closed yields `undefined`.
 */
export const parseConfigValue = (raw: string): string | undefined => {
  let out = '';
  let pendingSpace = '';
  let quoted = false;
  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw.charAt(i);
    if (ch === '\\') {
      const next = raw.charAt(i + 1);
      i += 1;
      out += pendingSpace + (ESCAPES[next] ?? next);
      pendingSpace = '';
      continue;
    }
    if (ch === '"') {
      quoted = !quoted;
      out += pendingSpace;
      pendingSpace = '';
      continue;
    }
    if (!quoted && (ch === '#' || ch === ';')) break;
    if (!quoted && (ch === ' ' || ch === '\t')) {
      if (out.length > 0) pendingSpace += ch;
      continue;
    }
    out += pendingSpace + ch;
    pendingSpace = '';
  }
  return quoted ? undefined : out;
};

// A line ending in an unescaped backslash continues on the next one. A
// continuation left open at the end of the text is dropped.
const logicalLines = (configText: string): readonly string[] => {
  const lines: string[] = [];
  let pending = '';
  for (const rawLine of configText.split(/\r?\n/)) {
    const backslashes = /\\*$/.exec(rawLine)?.[0].length ?? 0;
    if (backslashes % 2 === 1) {
      pending += rawLine.slice(0, -1);
      continue;
    }
    lines.push(pending + rawLine);
    pending = '';
  }
  return lines;
};

const remoteNameOf = (section: string, subsection: string | undefined): string | undefined => {
  if (subsection !== undefined) {
    return section.toLowerCase() === 'remote' ? unescapeSubsection(subsection) : undefined;
  }
  // legacy [remote.origin] form
  const dot = section.indexOf('.');
  if (dot < 0 || section.slice(0, dot).toLowerCase() !== 'remote') return undefined;
  const name = section.slice(dot + 1);
  return name.length > 0 ? name : undefined;
};

const collectRemotes = (configText: string): readonly RemoteEntry[] => {
  const remotes: RemoteEntry[] = [];
  const seen = new Set<string>();
  let current: string | undefined;

  const acceptLine = (line: string): void => {
    if (current === undefined || seen.has(current)) return;
    const match = KEY_VALUE.exec(line);
    if (!match || match[1]?.toLowerCase() !== 'url' || match[2] === undefined) return;
    const url = parseConfigValue(match[2]);
    if (url === undefined || url.length === 0) return;
    seen.add(current);
    remotes.push({ name: current, url });
  };

  for (const rawLine of logicalLines(configText)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#') || line.startsWith(';')) continue;
    if (line.startsWith('[')) {
      const header = SECTION_HEADER.exec(line);
      if (!header) {
        // stray bracket or a header cut short; whatever follows belongs to no remote
        current = undefined;
        continue;
      }
      current = remoteNameOf(header[1] ?? '', header[2]);
      const trailing = (header[3] ?? '').trim();
      if (trailing.length > 0) acceptLine(trailing);
      continue;
    }
    acceptLine(line);
  }
  return remotes;
};

/**
 * Pick the remote URL from git config text: `origin` when it has a url,
 * otherwise the first remote section in file order that has one.
 */
export const parseRemoteUrl = (
  configText: string,
  preferred: string = DEFAULT_REMOTE_NAME,
): RemoteEntry | undefined => {
  const remotes = collectRemotes(configText);
  return remotes.find((remote) => remote.name === preferred) ?? remotes[0];
};

// ---------------------------------------------------------------------------
// metadata directory discovery
// ---------------------------------------------------------------------------

// `.git` as a file: worktrees and submodules point at their git directory.
const followGitFile = async (gitFile: string, readText: ReadText): Promise<GitDirLookup> => {
  let content: string;
  try {
    content = await readText(gitFile);
  } catch (cause) {
    return { kind: 'unreadable', path: gitFile, cause };
  }
  const match = /^gitdir:\s*(.+)$/im.exec(content.trim());
  const target = match?.[1]?.trim();
  if (!target) return { kind: 'absent' };
  const gitDir = path.resolve(path.dirname(gitFile), target);
  return (await exists(gitDir)) ? { kind: 'found', gitDir } : { kind: 'absent' };
};

const findGitDir = async (
  start: string,
  ceiling: string | undefined,
  readText: ReadText,
): Promise<GitDirLookup> => {
  let dir = start;
  for (;;) {
    const candidate = path.join(dir, GIT_DIRECTORY_NAME);
    const info = await statOrUndefined(candidate);
    if (info?.isDirectory()) return { kind: 'found', gitDir: candidate };
    if (info?.isFile()) return followGitFile(candidate, readText);

    const parent = path.dirname(dir);
    if (parent === dir || dir === ceiling) return { kind: 'absent' };
    dir = parent;
  }
};

// Linked worktrees keep the shared config in the directory named by `commondir`.
const configDirOf = async (gitDir: string, readText: ReadText): Promise<string> => {
  try {
    const common = (await readText(path.join(gitDir, 'commondir'))).trim();
    return common.length > 0 ? path.resolve(gitDir, common) : gitDir;
  } catch {
    return gitDir;
  }
};

const resolveStartDirectory = async (
  startPath: string | undefined,
  cwd: string,
): Promise<string | undefined> => {
  const cleaned = startPath === undefined ? cwd : cleanPathInput(startPath);
  const absolute = path.resolve(cwd, cleaned);
  const info = await statOrUndefined(absolute);
  if (!info) return undefined;
  return info.isDirectory() ? absolute : path.dirname(absolute);
};

/**
 * Walk up from `startPath` (default: cwd) to the nearest git metadata
 * directory and read the remote URL from its config. Reports absence and
 * unreadable metadata as values, never by throwing.
 */
export const locateRemoteUrl = async (
  startPath?: string,
  options: LocateOptions = {},
): Promise<RemoteLookup> => {
  const cwd = options.cwd ?? process.cwd();
  const searchedFrom = startPath === undefined ? cwd : cleanPathInput(startPath);
  const start = await resolveStartDirectory(startPath, cwd);
  if (start === undefined) return absent('path-not-found', searchedFrom);

  const ceiling = options.ceiling === undefined ? undefined : path.resolve(options.ceiling);
  const readText = options.readText ?? readUtf8;
  const located = await findGitDir(start, ceiling, readText);
  if (located.kind === 'unreadable') return located;
  if (located.kind === 'absent') return absent('no-git-directory', start);

  const configPath = path.join(await configDirOf(located.gitDir, readText), 'config');
  let configText: string;
  try {
    configText = await readText(configPath);
  } catch (cause) {
    return errorCode(cause) === 'ENOENT'
      ? absent('no-config', start)
      : { kind: 'unreadable', path: configPath, cause };
  }

  const remote = parseRemoteUrl(configText);
  if (!remote) return absent('no-remote', start);
  return {
    kind: 'found',
    record: {
      url: remote.url,
      remoteName: remote.name,
      configPath,
      gitDir: located.gitDir,
    },
  };
};

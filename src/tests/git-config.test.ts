import { mkdir, mkdtemp, readFile, realpath, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import test, { type ExecutionContext } from 'ava';

import {
  cleanPathInput,
  locateRemoteUrl,
  parseConfigValue,
  parseRemoteUrl,
} from '../repo/git-config.js';

const ORIGIN_CONFIG = `[core]
\trepositoryformatversion = 0
\tbare = false
[remote "origin"]
\turl = https://github.com/acme/widgets.git
\tfetch = +refs/heads/*:refs/remotes/origin/*
[branch "main"]
\tremote = origin
`;

const makeRoot = async (t: ExecutionContext): Promise<string> => {
  const dir = await mkdtemp(path.join(tmpdir(), 'git-config-'));
  t.teardown(() => rm(dir, { recursive: true, force: true }));
  return realpath(dir);
};

const writeGitConfig = async (repoDir: string, config: string): Promise<string> => {
  const gitDir = path.join(repoDir, '.git');
  await mkdir(gitDir, { recursive: true });
  const configPath = path.join(gitDir, 'config');
  await writeFile(configPath, config, 'utf8');
  return configPath;
};

test('finds the origin url from three levels below the metadata directory', async (t) => {
  const root = await makeRoot(t);
  const configPath = await writeGitConfig(root, ORIGIN_CONFIG);
  const nested = path.join(root, 'packages', 'core', 'src');
  await mkdir(nested, { recursive: true });

  const lookup = await locateRemoteUrl(nested, { ceiling: root });

  t.deepEqual(lookup, {
    kind: 'found',
    record: {
      url: 'https://github.com/acme/widgets.git',
      remoteName: 'origin',
      configPath,
      gitDir: path.join(root, '.git'),
    },
  });
});

test('falls back to the first remote when there is no origin', async (t) => {
  const root = await makeRoot(t);
  await writeGitConfig(
    root,
    `[remote "upstream"]\n\turl = git@github.com:acme/upstream.git\n[remote "fork"]\n\turl = git@github.com:dev/upstream.git\n`,
  );

  const lookup = await locateRemoteUrl(root, { ceiling: root });

  t.is(lookup.kind, 'found');
  if (lookup.kind === 'found') {
    t.is(lookup.record.remoteName, 'upstream');
    t.is(lookup.record.url, 'git@github.com:acme/upstream.git');
  }
});

test('prefers origin even when another remote comes first', (t) => {
  const remote = parseRemoteUrl(
    `[remote "fork"]\n  url = https://github.com/dev/widgets\n[remote "origin"]\n  url = https://github.com/acme/widgets\n`,
  );
  t.deepEqual(remote, { name: 'origin', url: 'https://github.com/acme/widgets' });
});

test('tolerates quoting, comments, case and the legacy section form', (t) => {
  t.deepEqual(
    parseRemoteUrl(
      `# global comment\n; another\n\n[Remote "origin"]\n    URL = "https://github.com/acme/widgets.git" ; trailing\n`,
    ),
    { name: 'origin', url: 'https://github.com/acme/widgets.git' },
  );
  t.deepEqual(parseRemoteUrl('[remote.origin]\nurl=git@github.com:acme/widgets.git\n'), {
    name: 'origin',
    url: 'git@github.com:acme/widgets.git',
  });
  t.deepEqual(parseRemoteUrl('[remote "origin"]\r\n\turl = https://github.com/acme/widgets\r\n'), {
    name: 'origin',
    url: 'https://github.com/acme/widgets',
  });
});

test('keeps the first url of a remote with several', (t) => {
  t.deepEqual(
    parseRemoteUrl(
      '[remote "origin"]\n url = https://github.com/acme/first\n url = https://github.com/acme/second\n',
    ),
    { name: 'origin', url: 'https://github.com/acme/first' },
  );
});

test('ignores urls outside remote sections', (t) => {
  t.is(parseRemoteUrl('[submodule "lib"]\n\turl = https://github.com/acme/lib.git\n'), undefined);
  t.is(parseRemoteUrl(''), undefined);
});

test('parseConfigValue unquotes and strips comments and padding', (t) => {
  t.is(parseConfigValue('  "a b"  '), 'a b');
  t.is(parseConfigValue(' value # comment'), 'value');
  t.is(parseConfigValue(' "semi;colon" '), 'semi;colon');
  t.is(parseConfigValue(' "tab\\there"'), 'tab\there');
  t.is(parseConfigValue(' two  words '), 'two  words');
  t.is(parseConfigValue(' "https://github.com/acme/wid'), undefined);
});

test('a url cut off inside its quotes is not used', (t) => {
  t.is(parseRemoteUrl('[remote "origin"]\n\turl = "https://github.com/acme/wid'), undefined);
  t.deepEqual(
    parseRemoteUrl(
      '[remote "origin"]\n\turl = "https://github.com/acme/wid\n[remote "upstream"]\n\turl = https://github.com/acme/widgets\n',
    ),
    { name: 'upstream', url: 'https://github.com/acme/widgets' },
  );
});

test('joins values continued with a trailing backslash', (t) => {
  t.deepEqual(
    parseRemoteUrl('[remote "origin"]\n\turl = https://github.com/acme/\\\nwidgets.git\n'),
    { name: 'origin', url: 'https://github.com/acme/widgets.git' },
  );
  t.is(parseRemoteUrl('[remote "origin"]\n\turl = https://github.com/acme/\\'), undefined);
});

test('a config truncated mid-header yields no remote instead of failing', async (t) => {
  const root = await makeRoot(t);
  await writeGitConfig(root, '[remote "origin"\n\turl = https://github.com/acme/widgets.git');

  const lookup = await locateRemoteUrl(root, { ceiling: root });

  t.deepEqual(lookup, { kind: 'absent', reason: 'no-remote', searchedFrom: root });
});

test('stray brackets do not hide a later remote', async (t) => {
  const root = await makeRoot(t);
  await writeGitConfig(
    root,
    ']]\n[\n[remote "origin"]\n\turl = https://github.com/acme/widgets.git\n[broken',
  );

  const lookup = await locateRemoteUrl(root, { ceiling: root });

  t.is(lookup.kind, 'found');
  if (lookup.kind === 'found') {
    t.is(lookup.record.url, 'https://github.com/acme/widgets.git');
  }
});

test('reports no-git-directory when nothing is found up to the ceiling', async (t) => {
  const root = await makeRoot(t);
  const nested = path.join(root, 'a', 'b');
  await mkdir(nested, { recursive: true });

  const lookup = await locateRemoteUrl(nested, { ceiling: root });

  t.deepEqual(lookup, { kind: 'absent', reason: 'no-git-directory', searchedFrom: nested });
});

test('the walk ends at the filesystem root', async (t) => {
  const fsRoot = path.parse(tmpdir()).root;
  const rootMetadata = await stat(path.join(fsRoot, '.git')).catch(() => undefined);
  if (rootMetadata) {
    t.pass('this filesystem root carries git metadata');
    return;
  }

  const lookup = await locateRemoteUrl(fsRoot);

  t.deepEqual(lookup, { kind: 'absent', reason: 'no-git-directory', searchedFrom: fsRoot });
});

test('a config cut off inside a quoted url yields no remote', async (t) => {
  const root = await makeRoot(t);
  await writeGitConfig(root, '[remote "origin"]\n\turl = "https://github.com/acme/wid');

  const lookup = await locateRemoteUrl(root, { ceiling: root });

  t.deepEqual(lookup, { kind: 'absent', reason: 'no-remote', searchedFrom: root });
});

test('reports path-not-found for a missing start path', async (t) => {
  const root = await makeRoot(t);
  const missing = path.join(root, 'does-not-exist');

  const lookup = await locateRemoteUrl(missing, { ceiling: root });

  t.deepEqual(lookup, { kind: 'absent', reason: 'path-not-found', searchedFrom: missing });
});

test('reports no-config when the metadata directory has no config file', async (t) => {
  const root = await makeRoot(t);
  await mkdir(path.join(root, '.git'));

  const lookup = await locateRemoteUrl(root, { ceiling: root });

  t.deepEqual(lookup, { kind: 'absent', reason: 'no-config', searchedFrom: root });
});

test('reports unreadable metadata when config cannot be read', async (t) => {
  const root = await makeRoot(t);
  const configPath = path.join(root, '.git', 'config');
  await mkdir(configPath, { recursive: true });

  const lookup = await locateRemoteUrl(root, { ceiling: root });

  t.is(lookup.kind, 'unreadable');
  if (lookup.kind === 'unreadable') {
    t.is(lookup.path, configPath);
    t.truthy(lookup.cause);
  }
});

test('a file path starts the walk from its directory', async (t) => {
  const root = await makeRoot(t);
  await writeGitConfig(root, ORIGIN_CONFIG);
  const file = path.join(root, 'README.md');
  await writeFile(file, '# widgets\n', 'utf8');

  const lookup = await locateRemoteUrl(file, { ceiling: root });

  t.is(lookup.kind, 'found');
});

test('quoted and padded start paths are cleaned', async (t) => {
  const root = await makeRoot(t);
  await writeGitConfig(root, ORIGIN_CONFIG);

  const lookup = await locateRemoteUrl(`  "${root}"  `, { ceiling: root });

  t.is(lookup.kind, 'found');
  t.is(cleanPathInput(`'${root}/src/'`), path.join(root, 'src/'));
});

test('relative start paths resolve against the cwd option', async (t) => {
  const root = await makeRoot(t);
  await writeGitConfig(root, ORIGIN_CONFIG);
  await mkdir(path.join(root, 'docs'));

  const relative = await locateRemoteUrl('docs', { cwd: root, ceiling: root });
  const implicit = await locateRemoteUrl(undefined, { cwd: path.join(root, 'docs'), ceiling: root });

  t.is(relative.kind, 'found');
  t.is(implicit.kind, 'found');
});

test('follows a gitdir file and the shared config of a linked worktree', async (t) => {
  const root = await makeRoot(t);
  const mainRepo = path.join(root, 'main');
  const configPath = await writeGitConfig(mainRepo, ORIGIN_CONFIG);
  const worktreeGitDir = path.join(mainRepo, '.git', 'worktrees', 'feature');
  await mkdir(worktreeGitDir, { recursive: true });
  await writeFile(path.join(worktreeGitDir, 'commondir'), '../..\n', 'utf8');
  const worktree = path.join(root, 'feature');
  await mkdir(worktree);
  await writeFile(path.join(worktree, '.git'), 'gitdir: ../main/.git/worktrees/feature\n', 'utf8');

  const lookup = await locateRemoteUrl(worktree, { ceiling: root });

  t.deepEqual(lookup, {
    kind: 'found',
    record: {
      url: 'https://github.com/acme/widgets.git',
      remoteName: 'origin',
      configPath,
      gitDir: worktreeGitDir,
    },
  });
});

test('a gitdir file pointing nowhere counts as no metadata', async (t) => {
  const root = await makeRoot(t);
  await writeFile(path.join(root, '.git'), 'gitdir: ./missing\n', 'utf8');

  const lookup = await locateRemoteUrl(root, { ceiling: root });

  t.deepEqual(lookup, { kind: 'absent', reason: 'no-git-directory', searchedFrom: root });
});

test('an unreadable .git file is reported as unreadable metadata', async (t) => {
  const root = await makeRoot(t);
  const gitFile = path.join(root, '.git');
  await writeFile(gitFile, 'gitdir: ../elsewhere\n', 'utf8');
  const cause = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });

  const lookup = await locateRemoteUrl(root, {
    ceiling: root,
    readText: async (file) => {
      if (file === gitFile) throw cause;
      return readFile(file, 'utf8');
    },
  });

  t.deepEqual(lookup, { kind: 'unreadable', path: gitFile, cause });
});

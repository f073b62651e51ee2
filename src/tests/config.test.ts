import { mkdir, mkdtemp, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import test, { type ExecutionContext } from 'ava';

import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  getConfigArg,
  loadConfig,
  loadConfigWithSource,
  resolveConfigPath,
} from '../config/load-config.js';

const makeDir = async (t: ExecutionContext): Promise<string> => {
  const dir = await realpath(await mkdtemp(path.join(tmpdir(), 'mcp-config-')));
  t.teardown(() => rm(dir, { recursive: true, force: true }));
  return dir;
};

test('defaults expose every tool with help at info level', (t) => {
  t.deepEqual(createDefaultConfig(), { tools: [], includeHelp: true, logLevel: 'info' });
});

test('getConfigArg understands the long, short and inline forms', (t) => {
  t.is(getConfigArg(['node', 'bin', '--config', 'a.json']), 'a.json');
  t.is(getConfigArg(['node', 'bin', '-c', '"b.json"']), 'b.json');
  t.is(getConfigArg(['node', 'bin', "--config='c.json'"]), 'c.json');
  t.is(getConfigArg(['node', 'bin', '--config=']), undefined);
  t.is(getConfigArg(['node', 'bin', '--config']), undefined);
  t.is(getConfigArg(['node', 'bin']), undefined);
});

test('an explicit --config file wins over a discovered one', async (t) => {
  const dir = await makeDir(t);
  await writeFile(
    path.join(dir, CONFIG_FILE_NAME),
    JSON.stringify({ tools: ['github_repo_info'] }),
    'utf8',
  );
  await writeFile(
    path.join(dir, 'custom.json'),
    JSON.stringify({ tools: ['github.getFile'], includeHelp: false, logLevel: 'debug' }),
    'utf8',
  );

  const loaded = loadConfigWithSource({}, ['node', 'bin', '--config', 'custom.json'], dir);

  t.deepEqual(loaded, {
    config: { tools: ['github.getFile'], includeHelp: false, logLevel: 'debug' },
    source: { type: 'file', path: path.join(dir, 'custom.json') },
  });
});

test('the nearest config file is found from a nested directory', async (t) => {
  const dir = await makeDir(t);
  const configPath = path.join(dir, CONFIG_FILE_NAME);
  await writeFile(configPath, JSON.stringify({ tools: ['github_list_issues'] }), 'utf8');
  const nested = path.join(dir, 'packages', 'app');
  await mkdir(nested, { recursive: true });

  const loaded = loadConfigWithSource({ MCP_CONFIG_JSON: '{"tools":[]}' }, [], nested);

  t.deepEqual(loaded.source, { type: 'file', path: configPath });
  t.deepEqual(loaded.config.tools, ['github_list_issues']);
});

test('MCP_CONFIG_JSON is used when no file is present', async (t) => {
  const dir = await makeDir(t);

  const loaded = loadConfigWithSource({ MCP_CONFIG_JSON: ' {"logLevel":"warn"} ' }, [], dir);

  t.deepEqual(loaded, {
    config: { tools: [], includeHelp: true, logLevel: 'warn' },
    source: { type: 'env' },
  });
});

test('falls back to defaults without file or environment', async (t) => {
  const dir = await makeDir(t);

  t.deepEqual(loadConfigWithSource({}, [], dir).source, { type: 'default' });
  t.deepEqual(loadConfig({}, [], dir), createDefaultConfig());
});

test('rejects malformed JSON and unknown keys', async (t) => {
  const dir = await makeDir(t);
  const broken = path.join(dir, 'broken.json');
  await writeFile(broken, '{ tools: ', 'utf8');
  await writeFile(path.join(dir, 'extra.json'), JSON.stringify({ transport: 'http' }), 'utf8');

  const badJson = t.throws(() => loadConfigWithSource({}, ['--config', 'broken.json'], dir));
  t.true(badJson?.message.startsWith(`Invalid JSON in ${broken}: `));

  const extra = t.throws(() => loadConfigWithSource({}, ['--config', 'extra.json'], dir));
  t.true(extra?.message.startsWith(`Invalid configuration in ${path.join(dir, 'extra.json')}: `));

  const badEnv = t.throws(() => loadConfigWithSource({ MCP_CONFIG_JSON: 'nope' }, [], dir));
  t.true(badEnv?.message.startsWith('Invalid MCP_CONFIG_JSON: '));

  const badLevel = t.throws(() =>
    loadConfigWithSource({ MCP_CONFIG_JSON: '{"logLevel":"loud"}' }, [], dir),
  );
  t.true(badLevel?.message.startsWith('Invalid configuration in MCP_CONFIG_JSON: logLevel: '));
});

test('relative config paths may not escape the working directory', async (t) => {
  const dir = await makeDir(t);

  const error = t.throws(() => resolveConfigPath('../elsewhere.json', dir));

  t.is(
    error?.message,
    `Refusing to access path outside of ${dir}: ${path.join(path.dirname(dir), 'elsewhere.json')}`,
  );
  t.is(
    resolveConfigPath('/etc/mcp.json', dir, { allowOutsideBase: true }),
    '/etc/mcp.json',
  );
});

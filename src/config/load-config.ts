import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { LOG_LEVELS } from '../core/logger.js';

export const CONFIG_FILE_NAME = 'github-intel.mcp.json';

const ToolId = z.string();

const Config = z
  .object({
    tools: z.array(ToolId).default([]),
    includeHelp: z.boolean().default(true),
    logLevel: z.enum(LOG_LEVELS).default('info'),
  })
  .strict();

export const ConfigSchema = Config;

export type AppConfig = z.infer<typeof Config>;

export type ConfigSource =
  | Readonly<{ type: 'file'; path: string }>
  | Readonly<{ type: 'env' }>
  | Readonly<{ type: 'default' }>;

export type LoadedConfig = Readonly<{
  config: AppConfig;
  source: ConfigSource;
}>;

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');

const normalizeConfig = (input: unknown, origin: string): AppConfig => {
  const parsed = Config.safeParse(input ?? {});
  if (!parsed.success) {
    throw new Error(`Invalid configuration in ${origin}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

const readJsonFileSync = (p: string): unknown => {
  const raw = fs.readFileSync(p, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${p}: ${message}`, { cause: error });
  }
};

const isFile = (candidate: string): boolean => {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
};

const findUpSync = (start: string, fileName: string): string | null => {
  let dir = path.resolve(start);
  for (;;) {
    const candidate = path.join(dir, fileName);
    if (isFile(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
};

const stripQuotes = (value: string): string => value.replace(/^['"]|['"]$/g, '');

/** `--config path`, `-c path` or `--config=path`. */
export const getConfigArg = (argv: readonly string[]): string | undefined => {
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (arg === '--config' || arg === '-c') {
      const next = argv[i + 1];
      return next ? stripQuotes(next) : undefined;
    }
    if (arg.startsWith('--config=')) {
      const value = stripQuotes(arg.slice('--config='.length));
      return value.length > 0 ? value : undefined;
    }
  }
  return undefined;
};

export const findConfigPath = (cwd: string = process.cwd()): string | null =>
  findUpSync(cwd, CONFIG_FILE_NAME);

export type ResolveConfigPathOptions = Readonly<{
  allowOutsideBase?: boolean;
}>;

export const resolveConfigPath = (
  filePath: string,
  baseDir: string = process.cwd(),
  options: ResolveConfigPathOptions = {},
): string => {
  const base = fs.realpathSync(baseDir);
  const normalizedInput = path.normalize(filePath);
  const candidate = path.isAbsolute(normalizedInput)
    ? normalizedInput
    : path.resolve(base, normalizedInput);

  if (!options.allowOutsideBase) {
    const relative = path.relative(base, candidate);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`Refusing to access path outside of ${base}: ${candidate}`);
    }
  }

  return candidate;
};

export const createDefaultConfig = (): AppConfig => normalizeConfig({}, 'defaults');

/**
 * Load config synchronously with the following precedence:
 * 1) --config / -c path (relative to cwd)
 * 2) nearest github-intel.mcp.json from cwd upward
 * 3) env MCP_CONFIG_JSON (object)
 * 4) defaults
 */
export const loadConfigWithSource = (
  env: Readonly<Record<string, string | undefined>>,
  argv: readonly string[] = process.argv,
  cwd: string = process.cwd(),
): LoadedConfig => {
  const fromFile = (filePath: string): LoadedConfig => {
    const allowOutsideBase = path.isAbsolute(filePath);
    const resolvedPath = resolveConfigPath(filePath, cwd, { allowOutsideBase });
    return {
      config: normalizeConfig(readJsonFileSync(resolvedPath), resolvedPath),
      source: { type: 'file', path: resolvedPath },
    };
  };

  const explicit = getConfigArg(argv);
  if (explicit) {
    return fromFile(explicit);
  }

  const auto = findConfigPath(cwd);
  if (auto) {
    return fromFile(auto);
  }

  const inline = env.MCP_CONFIG_JSON?.trim();
  if (inline) {
    let raw: unknown;
    try {
      raw = JSON.parse(inline);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid MCP_CONFIG_JSON: ${message}`, { cause: error });
    }
    return { config: normalizeConfig(raw, 'MCP_CONFIG_JSON'), source: { type: 'env' } };
  }

  return { config: createDefaultConfig(), source: { type: 'default' } };
};

export const loadConfig = (
  env: Readonly<Record<string, string | undefined>>,
  argv: readonly string[] = process.argv,
  cwd: string = process.cwd(),
): AppConfig => loadConfigWithSource(env, argv, cwd).config;

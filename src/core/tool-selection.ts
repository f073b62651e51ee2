import { silentLogger, type Logger } from './logger.js';
import type { ToolFactory } from './types.js';

export const HELP_TOOL_ID = 'mcp_help';

const CAMEL_SEGMENT = /([a-z0-9])([A-Z])/g;
const ACRONYM_BOUNDARY = /([A-Z]+)([A-Z][a-z])/g;

const collapseUnderscores = (value: string): string => value.replace(/__+/g, '_');

/**
 * Normalize tool identifiers so configuration may use dotted, kebab-case, or camelCase forms.
 */
export const normalizeToolId = (id: string): string => {
  if (!id) return '';

  const replaced = id
    .trim()
    .replace(/[.\s-]/g, '_')
    .replace(ACRONYM_BOUNDARY, '$1_$2')
    .replace(CAMEL_SEGMENT, '$1_$2');

  return collapseUnderscores(replaced).toLowerCase();
};

export const normalizeToolIds = (ids: readonly string[]): readonly string[] =>
  Array.from(
    new Set(ids.map(normalizeToolId).filter((value): value is string => value.length > 0)),
  );

export type ToolCatalog = ReadonlyMap<string, ToolFactory>;

export type ToolSelection = Readonly<{
  ids: readonly string[];
  factories: readonly ToolFactory[];
  unknown: readonly string[];
}>;

export type SelectToolsOptions = Readonly<{
  tools: readonly string[];
  includeHelp?: boolean;
  logger?: Logger;
}>;

/**
 * Pick catalog entries for the configured ids. An empty list selects the whole
 * catalog; the help tool is appended unless `includeHelp` is false.
 */
export const selectTools = (catalog: ToolCatalog, options: SelectToolsOptions): ToolSelection => {
  const logger = options.logger ?? silentLogger;
  const includeHelp = options.includeHelp ?? true;
  const requested = normalizeToolIds(options.tools);
  const base = requested.length > 0 ? requested : Array.from(catalog.keys());

  const known = base.filter((id) => catalog.has(id));
  const unknown = base.filter((id) => !catalog.has(id));
  for (const id of unknown) {
    logger.warn(`Unknown tool id in config: ${id}`);
  }

  const withoutHelp = known.filter((id) => id !== HELP_TOOL_ID);
  const ids =
    includeHelp && catalog.has(HELP_TOOL_ID) ? [...withoutHelp, HELP_TOOL_ID] : withoutHelp;

  const factories = ids.flatMap((id) => {
    const factory = catalog.get(id);
    return factory ? [factory] : [];
  });

  return { ids, factories, unknown };
};

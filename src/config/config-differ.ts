import type { JsonObject, JsonValue } from '../core/types.js';
import { diffLines, formatHunks, toHunks, type DiffHunk, type DiffLine } from '../tools/unified-diff.js';
import { dumpYaml } from '../utils/yaml.js';
import { MemoryConfigStorage, type ConfigStorage } from './config-storage.js';

/** Collections nested this deep or deeper are written in flow style. */
export const CANONICAL_INLINE_DEPTH = 3;
export const CANONICAL_INDENT = 2;
export const DIFF_CONTEXT_LINES = 1;

export interface ConfigItemDiff {
  name: string;
  /** Staging (old) to active (new). */
  lines: DiffLine[];
  hunks: DiffHunk[];
}

export interface ConfigDiffResult {
  created: string[];
  deleted: string[];
  updated: string[];
  diffs: ConfigItemDiff[];
}

export function isConfigMapping(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Sorts mapping keys at every depth. Sequences keep their order. */
export function normalizeConfigTree(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(normalizeConfigTree);
  if (!isConfigMapping(value)) return value;
  const out: JsonObject = {};
  for (const key of Object.keys(value).sort()) {
    const child = value[key];
    if (child !== undefined) out[key] = normalizeConfigTree(child);
  }
  return out;
}

export function dumpCanonicalYaml(value: JsonValue): string {
  return dumpYaml(value, { inlineDepth: CANONICAL_INLINE_DEPTH, indent: CANONICAL_INDENT });
}

export function canonicalLines(tree: JsonValue): string[] {
  return dumpCanonicalYaml(tree).replace(/\n+$/, '').split('\n');
}

/**
 * Compares two configuration stores. `created` and `deleted` follow each
 * store's own enumeration order; `updated` follows staging's. Items where
 * either side is not a mapping are left out of the comparison.
 */
export async function diffConfigStorages(active: ConfigStorage, staging: ConfigStorage): Promise<ConfigDiffResult> {
  const activeNames = await active.listAll();
  const stagingNames = await staging.listAll();
  const inActive = new Set(activeNames);
  const inStaging = new Set(stagingNames);

  const result: ConfigDiffResult = {
    created: activeNames.filter((name) => !inStaging.has(name)),
    deleted: stagingNames.filter((name) => !inActive.has(name)),
    updated: [],
    diffs: [],
  };

  for (const name of stagingNames.filter((n) => inActive.has(n))) {
    const activeTree = await active.read(name);
    const stagingTree = await staging.read(name);
    if (!isConfigMapping(activeTree) || !isConfigMapping(stagingTree)) continue;

    const newLines = canonicalLines(normalizeConfigTree(activeTree));
    const oldLines = canonicalLines(normalizeConfigTree(stagingTree));
    if (newLines.join('\n') === oldLines.join('\n')) continue;

    const lines = diffLines(oldLines, newLines);
    result.updated.push(name);
    result.diffs.push({ name, lines, hunks: toHunks(lines, DIFF_CONTEXT_LINES) });
  }
  return result;
}

/** Convenience over in-memory trees keyed by item name. */
export function diffConfigTrees(
  active: Record<string, JsonValue>,
  staging: Record<string, JsonValue>
): Promise<ConfigDiffResult> {
  return diffConfigStorages(new MemoryConfigStorage(active), new MemoryConfigStorage(staging));
}

/**
 * Plain-text report: the three name lists followed by a YAML map of each
 * updated item's line diff.
 */
export function formatConfigDiffReport(result: ConfigDiffResult): string {
  let out = 'CREATED:\n';
  for (const name of result.created) out += ` + ${name}\n`;
  out += '\nDELETED:\n';
  for (const name of result.deleted) out += ` - ${name}\n`;
  out += '\nUPDATED:\n';
  for (const name of result.updated) out += ` * ${name}\n`;
  if (result.diffs.length) {
    const texts: Record<string, string> = {};
    for (const d of result.diffs) texts[d.name] = formatHunks(d.hunks);
    out += dumpYaml(texts, { inlineDepth: 10 });
  }
  return out;
}

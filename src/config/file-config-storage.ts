import fs from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { JsonValue } from '../core/types.js';
import type { ConfigStorage } from './config-storage.js';

export interface FileConfigStorageOptions {
  directory: string;
  extension?: string;
}

/**
 * A directory of `<name>.yml` files, one configuration tree per file.
 */
export class FileConfigStorage implements ConfigStorage {
  private readonly directory: string;
  private readonly extension: string;

  constructor(opts: FileConfigStorageOptions) {
    this.directory = opts.directory;
    this.extension = opts.extension ?? '.yml';
  }

  async listAll(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.directory);
    } catch (e) {
      if (isMissing(e)) return [];
      throw e;
    }
    return files
      .filter((f) => f.endsWith(this.extension))
      .map((f) => f.slice(0, -this.extension.length))
      .sort();
  }

  async read(name: string): Promise<JsonValue | undefined> {
    if (name === '' || name.includes('/') || name.includes('\\') || name.startsWith('.')) return undefined;
    const file = path.join(this.directory, `${name}${this.extension}`);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (e) {
      if (isMissing(e)) return undefined;
      throw e;
    }
    const parsed: unknown = parseYaml(raw);
    return toJsonValue(parsed);
  }
}

function isMissing(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (Array.isArray(value)) return value.map((v: unknown) => toJsonValue(v) ?? null);
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [k, v] of Object.entries(value)) {
      const converted = toJsonValue(v);
      if (converted !== undefined) out[k] = converted;
    }
    return out;
  }
  return undefined;
}

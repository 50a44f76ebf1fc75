import type { JsonValue } from '../core/types.js';

/**
 * Read side of a configuration store: an enumerable set of named trees.
 */
export interface ConfigStorage {
  listAll(): Promise<string[]>;
  /** The stored tree, or undefined when `name` does not exist. */
  read(name: string): Promise<JsonValue | undefined>;
}

export class MemoryConfigStorage implements ConfigStorage {
  private readonly items = new Map<string, JsonValue>();

  constructor(items: Record<string, JsonValue> = {}) {
    for (const [name, tree] of Object.entries(items)) this.items.set(name, tree);
  }

  set(name: string, tree: JsonValue): void {
    this.items.set(name, tree);
  }

  delete(name: string): void {
    this.items.delete(name);
  }

  async listAll(): Promise<string[]> {
    return [...this.items.keys()];
  }

  async read(name: string): Promise<JsonValue | undefined> {
    return this.items.get(name);
  }
}

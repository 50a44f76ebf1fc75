import { InvalidInputError } from '../core/errors.js';
import type { EventBus } from '../core/event-bus.js';
import type { ExpirableKeyValueStore } from './expirable-store.js';

export const EPHEMERAL_TTL_SECONDS = 86_400;
export const DEFAULT_KEY_PREFIX = 'agent_tmp_';

export interface ScopedEphemeralStoreOptions {
  keyPrefix?: string;
  events?: EventBus;
}

/** Per-key operation queues, shared by every store over the same backing. */
const queuesByBacking = new WeakMap<ExpirableKeyValueStore, Map<string, Promise<unknown>>>();

function queuesFor(backing: ExpirableKeyValueStore): Map<string, Promise<unknown>> {
  let queues = queuesByBacking.get(backing);
  if (!queues) {
    queues = new Map();
    queuesByBacking.set(backing, queues);
  }
  return queues;
}

export interface SaveReceipt {
  key: string;
  overwritten: boolean;
}

/**
 * Owner-namespaced layer over an expirable key/value service. Keys always take
 * the form `<prefix><owner>:<suffix>`; operations on one key are serialised
 * across all stores sharing a backing, so a consume can never hand the same
 * payload out twice.
 */
export class ScopedEphemeralStore {
  private readonly keyPrefix: string;
  private readonly queues: Map<string, Promise<unknown>>;

  constructor(
    private readonly backing: ExpirableKeyValueStore,
    private readonly opts: ScopedEphemeralStoreOptions = {},
  ) {
    this.keyPrefix = opts.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.queues = queuesFor(backing);
  }

  normalizeKey(ownerId: string, rawKey: string): string {
    let key = rawKey.trim();
    if (key === '') throw new InvalidInputError('A non-empty key is required.');

    const ownerPrefix = `${this.keyPrefix}${ownerId}:`;
    if (!key.includes(':')) key = ownerPrefix + key;
    if (!key.startsWith(ownerPrefix)) throw new InvalidInputError('The provided key does not belong to the current user.');

    const sanitized = key
      .slice(ownerPrefix.length)
      .replace(/[^A-Za-z0-9_.-]/g, '_')
      .replace(/\.{2,}/g, (dots) => '_'.repeat(dots.length));
    if (sanitized === '') throw new InvalidInputError('The provided key is not valid after sanitization.');
    return ownerPrefix + sanitized;
  }

  async save(ownerId: string, rawKey: string, payload: string): Promise<SaveReceipt> {
    const key = this.normalizeKey(ownerId, rawKey);
    return this.enqueue(key, async () => {
      const overwritten = (await this.backing.get(key)) !== undefined;
      await this.backing.setWithExpire(key, payload, EPHEMERAL_TTL_SECONDS);
      this.opts.events?.emit({ type: 'ephemeral_write', key, overwritten, at: Date.now() });
      return { key, overwritten };
    });
  }

  async load(ownerId: string, rawKey: string): Promise<string | undefined> {
    const key = this.normalizeKey(ownerId, rawKey);
    return this.enqueue(key, async () => {
      const value = await this.backing.get(key);
      this.opts.events?.emit({ type: 'ephemeral_read', key, found: value !== undefined, at: Date.now() });
      return value;
    });
  }

  /** Load and delete in one step. */
  async consume(ownerId: string, rawKey: string): Promise<string | undefined> {
    const key = this.normalizeKey(ownerId, rawKey);
    return this.enqueue(key, async () => {
      const value = await this.backing.get(key);
      if (value !== undefined) await this.backing.delete(key);
      this.opts.events?.emit({ type: 'ephemeral_consume', key, found: value !== undefined, at: Date.now() });
      return value;
    });
  }

  private enqueue<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.queues.get(key) ?? Promise.resolve();
    const next = prev.then(fn, fn);
    const tail = next.catch(() => undefined);
    this.queues.set(key, tail);
    void tail.then(() => {
      if (this.queues.get(key) === tail) this.queues.delete(key);
    });
    return next;
  }
}

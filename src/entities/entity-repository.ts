import type { EntityRecord, JsonObject } from '../core/types.js';

/**
 * Read-only lookup of loaded domain objects, keyed by kind and id.
 * Persistence of the objects themselves is owned elsewhere.
 */
export interface EntityRepository {
  hasKind(kind: string): boolean;
  load(kind: string, id: string): Promise<EntityRecord | undefined>;
}

const ENTITY_BRAND: unique symbol = Symbol('capability-runtime.entity');

type BrandedEntity = EntityRecord & { readonly [ENTITY_BRAND]: true };

export function createEntity(kind: string, id: string, fields: JsonObject = {}, label?: string): EntityRecord {
  const entity: BrandedEntity = { kind, id, fields, ...(label !== undefined ? { label } : {}), [ENTITY_BRAND]: true };
  return Object.freeze(entity);
}

export function isEntityRecord(value: unknown): value is BrandedEntity {
  return typeof value === 'object' && value !== null && ENTITY_BRAND in value;
}

export class MemoryEntityRepository implements EntityRepository {
  private readonly kinds = new Map<string, Map<string, EntityRecord>>();
  private loads = 0;

  constructor(entities: EntityRecord[] = [], kinds: string[] = []) {
    for (const k of kinds) this.defineKind(k);
    for (const e of entities) this.add(e);
  }

  defineKind(kind: string): void {
    if (!this.kinds.has(kind)) this.kinds.set(kind, new Map());
  }

  add(entity: EntityRecord): void {
    this.defineKind(entity.kind);
    this.kinds.get(entity.kind)?.set(entity.id, isEntityRecord(entity) ? entity : createEntity(entity.kind, entity.id, entity.fields, entity.label));
  }

  hasKind(kind: string): boolean {
    return this.kinds.has(kind);
  }

  async load(kind: string, id: string): Promise<EntityRecord | undefined> {
    this.loads++;
    return this.kinds.get(kind)?.get(id);
  }

  /** Number of `load` calls served; lets callers assert on lookup counts. */
  get loadCount(): number {
    return this.loads;
  }
}

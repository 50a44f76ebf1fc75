import type { ContextValue, EntityRecord, JsonValue } from '../core/types.js';
import { isEntityRecord } from '../entities/entity-repository.js';

export const NULL_VALUE: ContextValue = { type: 'null' };

export function stringValue(value: string): ContextValue {
  return { type: 'string', value };
}

export function entityValue(entity: EntityRecord): ContextValue {
  return { type: 'entity', entity };
}

/** Tags an already-structured value (a decoded JSON payload or a programmatic argument). */
export function fromJson(raw: unknown): ContextValue {
  if (raw === null || raw === undefined) return NULL_VALUE;
  if (isEntityRecord(raw)) return { type: 'entity', entity: raw };
  switch (typeof raw) {
    case 'string':
      return { type: 'string', value: raw };
    case 'number':
      return Number.isInteger(raw) ? { type: 'integer', value: raw } : { type: 'float', value: raw };
    case 'bigint':
      return { type: 'integer', value: Number(raw) };
    case 'boolean':
      return { type: 'boolean', value: raw };
    case 'object': {
      if (Array.isArray(raw)) return { type: 'list', items: raw.map((item: unknown) => fromJson(item)) };
      const entries: Record<string, ContextValue> = {};
      for (const [k, v] of Object.entries(raw)) entries[k] = fromJson(v);
      return { type: 'map', entries };
    }
    default:
      return { type: 'string', value: String(raw) };
  }
}

/**
 * Plain JSON projection. Entities collapse to a reference shape so results stay serialisable.
 */
export function serializeContextValue(value: ContextValue): JsonValue {
  switch (value.type) {
    case 'string':
    case 'integer':
    case 'float':
    case 'boolean':
      return value.value;
    case 'null':
      return null;
    case 'list':
      return value.items.map(serializeContextValue);
    case 'map': {
      const out: { [key: string]: JsonValue } = {};
      for (const [k, v] of Object.entries(value.entries)) out[k] = serializeContextValue(v);
      return out;
    }
    case 'entity': {
      const ref: { [key: string]: JsonValue } = { entity_type: value.entity.kind, id: value.entity.id };
      if (value.entity.label !== undefined) ref['label'] = value.entity.label;
      return ref;
    }
  }
}

export function serializeContextRecord(values: Record<string, ContextValue>): { [key: string]: JsonValue } {
  const out: { [key: string]: JsonValue } = {};
  for (const [k, v] of Object.entries(values)) out[k] = serializeContextValue(v);
  return out;
}

export function isScalar(value: ContextValue): value is Extract<ContextValue, { value: unknown }> {
  return value.type === 'string' || value.type === 'integer' || value.type === 'float' || value.type === 'boolean';
}

/** Text form of a scalar, or undefined for null/composite values. */
export function scalarText(value: ContextValue): string | undefined {
  if (!isScalar(value)) return undefined;
  return String(value.value);
}

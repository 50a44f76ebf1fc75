import type { ContextValue } from '../core/types.js';
import type { EntityRepository } from '../entities/entity-repository.js';
import type { CapabilityDescriptor, ContextSpec } from './tool-types.js';
import { isEntityDataType } from './tool-types.js';
import type { CapabilityInstance } from './tool-instance.js';
import { entityValue } from './context-value.js';

/**
 * Kind named by the context's data type, or the capability's `operatesOn` kind
 * for a plain `entity` context when the repository knows it.
 */
export function entityKindFor(spec: ContextSpec, descriptor: CapabilityDescriptor, repo: EntityRepository): string | undefined {
  if (spec.dataType.startsWith('entity:')) return spec.dataType.slice('entity:'.length) || undefined;
  if (spec.dataType === 'entity' && descriptor.operatesOn && repo.hasKind(descriptor.operatesOn)) return descriptor.operatesOn;
  return undefined;
}

/**
 * Resolves one value to a loaded entity. A miss returns the value unchanged so
 * validation can decide whether a raw identifier is acceptable.
 */
export async function resolveEntityReference(value: ContextValue, kind: string | undefined, repo: EntityRepository): Promise<ContextValue> {
  if (value.type === 'entity') return value;

  let candidate: string | undefined;
  if (value.type === 'map') {
    const wrapped = value.entries['entity'];
    if (wrapped?.type === 'entity') return wrapped;
    const target = value.entries['target_id'];
    if (target) candidate = idText(target);
  } else if (value.type === 'list') {
    const first = value.items[0];
    if (first) candidate = idText(first);
  } else {
    candidate = idText(value);
  }

  // `kind:id` always loses its prefix; the prefix only supplies a missing kind the repository knows.
  let resolvedKind = kind;
  if (candidate !== undefined && candidate.includes(':')) {
    const sep = candidate.indexOf(':');
    const prefix = candidate.slice(0, sep);
    candidate = candidate.slice(sep + 1);
    if (resolvedKind === undefined && repo.hasKind(prefix)) resolvedKind = prefix;
  }

  if (!resolvedKind || candidate === undefined || candidate === '') return value;

  const loaded = await repo.load(resolvedKind, candidate);
  return loaded ? entityValue(loaded) : value;
}

/** Runs resolution once for every entity-typed context holding a value. */
export async function resolveEntityContexts(instance: CapabilityInstance, repo: EntityRepository): Promise<void> {
  for (const spec of instance.descriptor.contexts) {
    if (!isEntityDataType(spec.dataType) || !instance.hasContextValue(spec.name)) continue;
    const current = instance.getContextValue(spec.name);
    if (!current) continue;
    const kind = entityKindFor(spec, instance.descriptor, repo);
    const resolved = await resolveEntityReference(current, kind, repo);
    if (resolved !== current) instance.setContextValue(spec.name, resolved);
  }
}

function idText(value: ContextValue): string | undefined {
  if (value.type === 'string') return value.value;
  if (value.type === 'integer') return String(value.value);
  return undefined;
}

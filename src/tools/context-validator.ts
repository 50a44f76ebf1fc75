import { z } from 'zod';
import type { ContextValue, JsonValue } from '../core/types.js';
import type { Violation } from '../core/errors.js';
import type { ContextSpec } from './tool-types.js';
import type { CapabilityInstance } from './tool-instance.js';
import { serializeContextValue } from './context-value.js';

export const NOT_NULL_MESSAGE = 'This value should not be null.';
export const PRIMITIVE_TYPE_MESSAGE = 'This value should be of the correct primitive type.';
export const CHOICE_MESSAGE = 'The value you selected is not a valid choice.';
export const PATTERN_MESSAGE = 'This value is not valid.';

const schemaCache = new WeakMap<ContextSpec, z.ZodType<unknown>>();

/**
 * Collects every violation for the instance's declared contexts, in declaration
 * order. An empty result means the instance may execute.
 */
export function validateContexts(instance: CapabilityInstance): Violation[] {
  const violations: Violation[] = [];
  for (const spec of instance.descriptor.contexts) {
    const value = instance.getContextValue(spec.name);
    if (!value || value.type === 'null') {
      if (spec.required) violations.push(violation(spec, NOT_NULL_MESSAGE));
      continue;
    }
    for (const message of checkValue(spec, value)) violations.push(violation(spec, message));
  }
  return violations;
}

export function checkValue(spec: ContextSpec, value: ContextValue): string[] {
  const dt = spec.dataType;
  if (dt === 'entity' || dt.startsWith('entity:')) {
    if (value.type !== 'entity') return [`This value should reference a loaded ${dt === 'entity' ? 'entity' : dt.slice('entity:'.length)}.`];
    if (dt !== 'entity' && value.entity.kind !== dt.slice('entity:'.length)) {
      return [`The entity must be of type ${dt.slice('entity:'.length)}.`];
    }
    return [];
  }

  const parsed = schemaFor(spec).safeParse(serializeContextValue(value));
  if (parsed.success) return [];
  return [...new Set(parsed.error.issues.map((i) => i.message))];
}

function schemaFor(spec: ContextSpec): z.ZodType<unknown> {
  const cached = schemaCache.get(spec);
  if (cached) return cached;

  let schema: z.ZodType<unknown> = baseSchema(spec);
  const allowed = spec.constraints?.allowedValues;
  if (allowed?.length) {
    schema = schema.refine((v) => allowed.some((a) => sameJson(a, v)), { message: CHOICE_MESSAGE });
  }
  const pattern = spec.constraints?.pattern;
  if (pattern !== undefined) {
    const re = new RegExp(pattern);
    schema = schema.refine((v) => typeof v !== 'string' || re.test(v), { message: PATTERN_MESSAGE });
  }

  schemaCache.set(spec, schema);
  return schema;
}

function baseSchema(spec: ContextSpec): z.ZodType<unknown> {
  const primitive = { invalid_type_error: PRIMITIVE_TYPE_MESSAGE };
  switch (spec.dataType) {
    case 'string':
      return z.union([z.string(), z.number(), z.boolean()], { errorMap: () => ({ message: PRIMITIVE_TYPE_MESSAGE }) });
    case 'integer':
      return z.number(primitive).int({ message: PRIMITIVE_TYPE_MESSAGE });
    case 'float':
    case 'decimal':
      return z.number(primitive);
    case 'boolean':
      return z.boolean(primitive);
    case 'list':
      return z.array(z.unknown(), primitive);
    default:
      return z.unknown();
  }
}

function violation(spec: ContextSpec, message: string): Violation {
  return { context: spec.name, label: spec.label || spec.name, message };
}

function sameJson(a: JsonValue, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

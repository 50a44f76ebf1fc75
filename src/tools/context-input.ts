import { z } from 'zod';
import type { ContextValue } from '../core/types.js';
import { InvalidInputError } from '../core/errors.js';
import type { CapabilityDescriptor } from './tool-types.js';
import { findContextSpec } from './tool-types.js';
import { coerceContextValue } from './context-coercer.js';

export interface RawContextInput {
  /** One JSON object naming every context at once. */
  contextJson?: string;
  /** Already-decoded arguments, e.g. from an agent tool call. */
  values?: Record<string, unknown>;
  /** `name=value` assignments; these win over the other sources. */
  assignments?: string[];
}

const contextObjectSchema = z.record(z.unknown());

/**
 * Merges every raw source, rejects names the capability does not declare and
 * coerces each value by its declared type. Returned in provision order.
 */
export function parseContextInput(descriptor: CapabilityDescriptor, input: RawContextInput): Map<string, ContextValue> {
  const provided = new Map<string, unknown>();

  for (const [name, raw] of Object.entries(decodeContextJson(input.contextJson))) provided.set(name, raw);
  for (const [name, raw] of Object.entries(input.values ?? {})) provided.set(name, raw);
  for (const [name, raw] of parseAssignments(input.assignments ?? [])) provided.set(name, raw);

  const unknown = [...provided.keys()].filter((name) => !findContextSpec(descriptor, name));
  if (unknown.length) {
    const allowed = descriptor.contexts.map((c) => c.name);
    throw new InvalidInputError(
      `Unknown context "${unknown[0]}" for capability "${descriptor.id}". Allowed contexts: ${allowed.length ? allowed.join(', ') : '(none)'}`
    );
  }

  const coerced = new Map<string, ContextValue>();
  for (const [name, raw] of provided) {
    coerced.set(name, coerceContextValue(raw, findContextSpec(descriptor, name)?.dataType));
  }
  return coerced;
}

export function decodeContextJson(contextJson: string | undefined): Record<string, unknown> {
  const text = contextJson?.trim() ?? '';
  if (text === '') return {};

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (e) {
    throw new InvalidInputError(`Failed to decode context JSON payload: ${e instanceof Error ? e.message : String(e)}`, e);
  }

  const parsed = contextObjectSchema.safeParse(decoded);
  if (!parsed.success || Array.isArray(decoded)) {
    throw new InvalidInputError('The context JSON payload must decode to a JSON object with named properties.');
  }
  return parsed.data;
}

export function parseAssignments(assignments: string[]): Array<[string, string]> {
  const out: Array<[string, string]> = [];
  for (const assignment of assignments) {
    if (assignment === '') continue;
    const eq = assignment.indexOf('=');
    if (eq < 0) throw new InvalidInputError(`Context "${assignment}" must use key=value format.`);
    out.push([assignment.slice(0, eq).trim(), assignment.slice(eq + 1)]);
  }
  return out;
}

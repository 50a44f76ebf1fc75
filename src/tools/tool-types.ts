import type { JsonValue } from '../core/types.js';
import type { EventBus } from '../core/event-bus.js';
import type { AuthorizationContext } from '../auth/authorization.js';
import type { ContextReader } from './tool-instance.js';

export type ScalarDataType = 'string' | 'integer' | 'float' | 'decimal' | 'boolean' | 'list' | 'any';

/** `entity` takes its kind from the capability's `operatesOn`; `entity:<kind>` names it. */
export type EntityDataType = 'entity' | `entity:${string}`;

export type ContextDataType = ScalarDataType | EntityDataType;

export interface ContextConstraints {
  allowedValues?: JsonValue[];
  /** Regular expression source applied to string values. */
  pattern?: string;
}

export interface ContextSpec {
  readonly name: string;
  readonly dataType: ContextDataType;
  readonly required: boolean;
  readonly defaultValue?: JsonValue;
  readonly label: string;
  readonly description?: string;
  readonly constraints?: ContextConstraints;
}

export type ContextSpecInput = Omit<ContextSpec, 'name' | 'label' | 'required'> & { label?: string; required?: boolean };

export interface CapabilityDescriptor {
  readonly id: string;
  readonly functionName: string;
  readonly label: string;
  readonly description: string;
  readonly group: string;
  readonly contexts: readonly ContextSpec[];
  /** Entity kind the capability works on; gives plain `entity` contexts their kind. */
  readonly operatesOn?: string;
  /** Permission the effective principal must hold before anything runs. */
  readonly permission?: string;
}

export interface CapabilityDescriptorInput {
  id: string;
  functionName: string;
  label: string;
  description: string;
  group: string;
  /** Declaration order is preserved. */
  contexts?: Record<string, ContextSpecInput>;
  operatesOn?: string;
  permission?: string;
}

export interface CapabilityContext {
  contexts: ContextReader;
  auth: AuthorizationContext;
  events: EventBus;
  /** Invocation-scoped metadata (invocation id, run id). */
  metadata: Record<string, unknown>;
}

export interface CapabilityOutput {
  output: string;
  result?: JsonValue;
}

export interface CapabilityDefinition {
  descriptor: CapabilityDescriptor;
  execute(ctx: CapabilityContext): Promise<CapabilityOutput> | CapabilityOutput;
}

export function defineDescriptor(input: CapabilityDescriptorInput): CapabilityDescriptor {
  const contexts = Object.entries(input.contexts ?? {}).map(([name, spec]): ContextSpec =>
    Object.freeze({ ...spec, name, label: spec.label ?? name, required: spec.required ?? false })
  );
  return Object.freeze({
    id: input.id,
    functionName: input.functionName,
    label: input.label,
    description: input.description,
    group: input.group,
    contexts: Object.freeze(contexts),
    ...(input.operatesOn !== undefined ? { operatesOn: input.operatesOn } : {}),
    ...(input.permission !== undefined ? { permission: input.permission } : {}),
  });
}

export function findContextSpec(descriptor: CapabilityDescriptor, name: string): ContextSpec | undefined {
  return descriptor.contexts.find((c) => c.name === name);
}

export function isEntityDataType(dataType: ContextDataType): dataType is EntityDataType {
  return dataType === 'entity' || dataType.startsWith('entity:');
}

import type { JsonSchema } from '../core/types.js';
import { CapabilityNotFoundError, CapabilityRuntimeError } from '../core/errors.js';
import type { CapabilityDefinition, CapabilityDescriptor, ContextSpec } from './tool-types.js';
import { CapabilityInstance } from './tool-instance.js';

const FUNCTION_NAME_RE = /^[A-Za-z0-9_-]{1,64}$/;

export function isValidFunctionName(name: string): boolean {
  return FUNCTION_NAME_RE.test(name);
}

export interface RegistryEntry {
  descriptor: CapabilityDescriptor;
  instantiate(): CapabilityInstance;
}

/**
 * Explicit registration table: capability id and function name both map to
 * one definition. Nothing is discovered at run time.
 */
export class CapabilityRegistry {
  private readonly byId = new Map<string, CapabilityDefinition>();
  private readonly byFunctionName = new Map<string, CapabilityDefinition>();

  constructor(definitions: CapabilityDefinition[] = []) {
    for (const d of definitions) this.register(d);
  }

  register(definition: CapabilityDefinition): void {
    const { id, functionName } = definition.descriptor;
    const problems: string[] = [];
    if (!id.trim()) problems.push('Capability id must not be empty');
    if (!isValidFunctionName(functionName)) problems.push(`Invalid function name (must match ${FUNCTION_NAME_RE}): ${JSON.stringify(functionName)}`);
    if (this.byId.has(id)) problems.push(`Duplicate capability id: ${JSON.stringify(id)}`);
    if (this.byFunctionName.has(functionName)) problems.push(`Duplicate function name: ${JSON.stringify(functionName)}`);
    if (problems.length) throw new CapabilityRuntimeError(problems.join('\n'));

    this.byId.set(id, definition);
    this.byFunctionName.set(functionName, definition);
  }

  /** Looks `identifier` up as an id first, then as a function name. */
  resolve(identifier: string): RegistryEntry {
    const definition = this.byId.get(identifier) ?? this.byFunctionName.get(identifier);
    if (!definition) throw new CapabilityNotFoundError(identifier);
    return { descriptor: definition.descriptor, instantiate: () => new CapabilityInstance(definition) };
  }

  has(identifier: string): boolean {
    return this.byId.has(identifier) || this.byFunctionName.has(identifier);
  }

  list(group?: string): CapabilityDescriptor[] {
    const all = [...this.byId.values()].map((d) => d.descriptor);
    return group === undefined ? all : all.filter((d) => d.group === group);
  }

  describe(id: string): CapabilityDescriptor {
    return this.resolve(id).descriptor;
  }
}

/** Function-calling schema for agent loops, keyed by function name. */
export function toToolSchema(descriptor: CapabilityDescriptor): { name: string; description: string; parameters: JsonSchema } {
  const properties: Record<string, JsonSchema> = {};
  for (const spec of descriptor.contexts) properties[spec.name] = contextSchema(spec);
  return {
    name: descriptor.functionName,
    description: descriptor.description,
    parameters: {
      type: 'object',
      properties,
      required: descriptor.contexts.filter((c) => c.required && c.defaultValue === undefined).map((c) => c.name),
      additionalProperties: false,
    },
  };
}

function contextSchema(spec: ContextSpec): JsonSchema {
  const description = spec.description ?? spec.label;
  switch (spec.dataType) {
    case 'string': {
      const allowed = spec.constraints?.allowedValues?.filter((v): v is string => typeof v === 'string');
      return {
        type: 'string',
        description,
        ...(allowed?.length ? { enum: allowed } : {}),
        ...(spec.constraints?.pattern !== undefined ? { pattern: spec.constraints.pattern } : {}),
      };
    }
    case 'integer':
      return { type: 'integer', description };
    case 'float':
    case 'decimal':
      return { type: 'number', description };
    case 'boolean':
      return { type: 'boolean', description };
    case 'list':
      return { type: 'array', items: { type: 'string' }, description };
    case 'any':
      return { description };
    default:
      return { anyOf: [{ type: 'string' }, { type: 'integer' }], description: `${description} (entity id or "type:id")` };
  }
}

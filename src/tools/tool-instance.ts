import type { ContextValue, EntityRecord, JsonValue } from '../core/types.js';
import { CapabilityRuntimeError, InvalidInputError } from '../core/errors.js';
import type { CapabilityContext, CapabilityDefinition, CapabilityDescriptor } from './tool-types.js';
import { findContextSpec } from './tool-types.js';
import { fromJson, scalarText, serializeContextValue } from './context-value.js';

export type InstanceState = 'unexecuted' | 'executed';

/**
 * A single-use binding of a capability to its context values.
 */
export class CapabilityInstance {
  private readonly values = new Map<string, ContextValue>();
  private state: InstanceState = 'unexecuted';
  private output = '';
  private structured: JsonValue | null = null;

  constructor(readonly definition: CapabilityDefinition) {}

  get descriptor(): CapabilityDescriptor {
    return this.definition.descriptor;
  }

  get executed(): boolean {
    return this.state === 'executed';
  }

  get readableOutput(): string {
    return this.output;
  }

  get result(): JsonValue | null {
    return this.structured;
  }

  setContextValue(name: string, value: ContextValue): void {
    if (this.state === 'executed') throw new CapabilityRuntimeError(`Capability ${this.descriptor.id} has already executed`);
    if (!findContextSpec(this.descriptor, name)) {
      throw new InvalidInputError(`Unknown context "${name}" for capability "${this.descriptor.id}".`);
    }
    if (value.type === 'null') this.values.delete(name);
    else this.values.set(name, value);
  }

  /** True when a value was set explicitly (defaults do not count). */
  hasContextValue(name: string): boolean {
    return this.values.has(name);
  }

  /** Explicit value, else the declared default, else undefined. */
  getContextValue(name: string): ContextValue | undefined {
    const set = this.values.get(name);
    if (set) return set;
    const spec = findContextSpec(this.descriptor, name);
    return spec?.defaultValue !== undefined ? fromJson(spec.defaultValue) : undefined;
  }

  /** Every context holding a value, defaults included, in declaration order. */
  resolvedContext(): Record<string, ContextValue> {
    const out: Record<string, ContextValue> = {};
    for (const spec of this.descriptor.contexts) {
      const v = this.getContextValue(spec.name);
      if (v) out[spec.name] = v;
    }
    return out;
  }

  async execute(ctx: Omit<CapabilityContext, 'contexts'>): Promise<void> {
    if (this.state === 'executed') throw new CapabilityRuntimeError(`Capability ${this.descriptor.id} has already executed`);
    // Flip first: a failing execution still counts as the one attempt.
    this.state = 'executed';
    const out = await this.definition.execute({ ...ctx, contexts: new ContextReader(this) });
    this.output = out.output;
    this.structured = out.result ?? null;
  }
}

/**
 * Typed accessors capabilities use to read their inputs.
 */
export class ContextReader {
  constructor(private readonly instance: CapabilityInstance) {}

  value(name: string): ContextValue | undefined {
    return this.instance.getContextValue(name);
  }

  optionalString(name: string): string | undefined {
    const v = this.value(name);
    return v ? scalarText(v) : undefined;
  }

  string(name: string): string {
    const s = this.optionalString(name);
    if (s === undefined) throw new InvalidInputError(`Context "${name}" must be a scalar value.`);
    return s;
  }

  /** Scalars as text; structured values as their JSON encoding. */
  text(name: string): string | undefined {
    const v = this.value(name);
    if (!v) return undefined;
    return scalarText(v) ?? JSON.stringify(serializeContextValue(v));
  }

  entity(name: string): EntityRecord | undefined {
    const v = this.value(name);
    return v?.type === 'entity' ? v.entity : undefined;
  }
}

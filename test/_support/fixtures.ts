import { ADMINISTER_CONFIGURATION } from '../../src/auth/authorization.js';
import type { Principal, RuntimeEvent } from '../../src/core/types.js';
import type { EventBus } from '../../src/core/event-bus.js';
import type { CapabilityDescriptor, ContextSpec } from '../../src/tools/tool-types.js';
import { findContextSpec } from '../../src/tools/tool-types.js';
import type { InvocationOutcome } from '../../src/tools/tool-executor.js';

export const admin: Principal = { id: '1', name: 'admin', permissions: [], superuser: true };
export const siteBuilder: Principal = { id: '7', name: 'builder', permissions: [ADMINISTER_CONFIGURATION] };
export const visitor: Principal = { id: '9', name: 'visitor', permissions: [] };

export function specOf(descriptor: CapabilityDescriptor, name: string): ContextSpec {
  const spec = findContextSpec(descriptor, name);
  if (!spec) throw new Error(`No context ${name} on ${descriptor.id}`);
  return spec;
}

/** Collects every event emitted on `bus`. */
export function recordEvents(bus: EventBus): RuntimeEvent[] {
  const seen: RuntimeEvent[] = [];
  bus.subscribe((ev) => {
    seen.push(ev);
  });
  return seen;
}

export function eventTypes(events: RuntimeEvent[]): string[] {
  return events.map((e) => e.type);
}

export function failureOf(outcome: InvocationOutcome): { kind: string; message: string } {
  if (outcome.ok) throw new Error(`expected a failure, got: ${outcome.value.readableOutput}`);
  return { kind: outcome.error.kind, message: outcome.error.message };
}

export function outputOf(outcome: InvocationOutcome): string {
  if (!outcome.ok) throw outcome.error;
  return outcome.value.readableOutput;
}

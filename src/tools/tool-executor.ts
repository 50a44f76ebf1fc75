import type { EventBus } from '../core/event-bus.js';
import type { ContextValue, JsonValue, Principal } from '../core/types.js';
import type { ResultLedger } from '../core/ledger.js';
import type { EntityRepository } from '../entities/entity-repository.js';
import type { PrincipalDirectory } from '../auth/authorization.js';
import { AuthorizationContext, withElevation } from '../auth/authorization.js';
import type { ToolPolicy } from '../policies/tool-policy.js';
import { CompositePolicy, PermissionPolicy } from '../policies/tool-policy.js';
import {
  ExecutionFailedError,
  InvalidInputError,
  UnauthorizedError,
  ValidationFailedError,
  isInvocationError,
  type InvocationError,
} from '../core/errors.js';
import { invocationId } from '../utils/ids.js';
import type { CapabilityRegistry } from './tool-registry.js';
import { parseContextInput, type RawContextInput } from './context-input.js';
import { resolveEntityContexts } from './entity-resolver.js';
import { validateContexts } from './context-validator.js';

export interface CapabilityInvokerOptions {
  registry: CapabilityRegistry;
  entities: EntityRepository;
  principals: PrincipalDirectory;
  events: EventBus;
  /** Highest-trust principal every execution runs as. */
  elevatedPrincipalId: string;
  /** Applied to every invocation, after the descriptor's own permission check. */
  policy?: ToolPolicy;
}

export interface InvokeRequest extends RawContextInput {
  caller: Principal;
  /** Successful invocations are appended here. */
  ledger?: ResultLedger;
  /** Per-call policy, e.g. an agent's tool allow-list. */
  policy?: ToolPolicy;
}

export interface InvocationResult {
  invocationId: string;
  capabilityId: string;
  functionName: string;
  readableOutput: string;
  result: JsonValue | null;
  providedContext: Record<string, ContextValue>;
  resolvedContext: Record<string, ContextValue>;
}

export type InvocationOutcome = { ok: true; value: InvocationResult } | { ok: false; error: InvocationError };

export function unwrapOutcome(outcome: InvocationOutcome): InvocationResult {
  if (!outcome.ok) throw outcome.error;
  return outcome.value;
}

/**
 * Lookup, authorization, coercion, entity resolution and validation, then a
 * single execution. Failures come back as outcome variants, never half-run.
 */
export class CapabilityInvoker {
  constructor(private readonly opts: CapabilityInvokerOptions) {}

  async invoke(identifier: string, req: InvokeRequest): Promise<InvocationOutcome> {
    const id = invocationId();
    try {
      const value = await this.run(identifier, req, id);
      return { ok: true, value };
    } catch (e) {
      const error = isInvocationError(e) ? e : new ExecutionFailedError(identifier, e);
      this.opts.events.emit({
        type: 'invocation_error',
        capabilityId: identifier,
        kind: error.kind,
        error: error.message,
        at: Date.now(),
        meta: { invocationId: id },
      });
      return { ok: false, error };
    }
  }

  private async run(identifier: string, req: InvokeRequest, id: string): Promise<InvocationResult> {
    const { events } = this.opts;
    const entry = this.opts.registry.resolve(identifier);
    const { descriptor } = entry;
    const meta = { invocationId: id, ...(req.ledger?.runId ? { runId: req.ledger.runId } : {}) };

    const auth = new AuthorizationContext(req.caller, events);
    const elevated = await this.opts.principals.load(this.opts.elevatedPrincipalId);

    const result = await withElevation(auth, elevated, async (): Promise<InvocationResult> => {
      const policy = new CompositePolicy([new PermissionPolicy(), ...(this.opts.policy ? [this.opts.policy] : []), ...(req.policy ? [req.policy] : [])]);
      const decision = await policy.decide({ descriptor, principal: auth.current });
      if (decision.kind === 'deny') throw new UnauthorizedError(`Capability ${descriptor.id} denied: ${decision.reason}`);

      const provided = parseContextInput(descriptor, req);

      const instance = entry.instantiate();
      for (const [name, value] of provided) instance.setContextValue(name, value);

      await resolveEntityContexts(instance, this.opts.entities);

      const violations = validateContexts(instance);
      if (violations.length) throw new ValidationFailedError(violations);

      events.emit({ type: 'invocation_start', capabilityId: descriptor.id, functionName: descriptor.functionName, callerId: req.caller.id, at: Date.now(), meta });
      try {
        await instance.execute({ auth, events, metadata: { ...meta } });
      } catch (e) {
        // Capabilities may reject their own input or caller; anything else is an execution failure.
        if (e instanceof InvalidInputError || e instanceof UnauthorizedError) throw e;
        throw new ExecutionFailedError(descriptor.id, e);
      }

      return {
        invocationId: id,
        capabilityId: descriptor.id,
        functionName: descriptor.functionName,
        readableOutput: instance.readableOutput,
        result: instance.result,
        providedContext: Object.fromEntries(provided),
        resolvedContext: instance.resolvedContext(),
      };
    });

    const record = { capabilityId: result.capabilityId, functionName: result.functionName, readableOutput: result.readableOutput };
    if (req.ledger?.isRunning) req.ledger.recordInvocation(record);
    events.emit({ type: 'invocation_result', record, at: Date.now(), meta });
    return result;
  }
}

import type { InvocationRecord, JsonSchema, JsonValue, Principal, ToolCall, ToolResult } from './types.js';
import { EventBus } from './event-bus.js';
import { ResultLedger } from './ledger.js';
import { InvalidInputError } from './errors.js';
import { parseRuntimeConfig, type RuntimeConfig, type RuntimeConfigInput } from '../config/runtime-config.js';
import { MemoryConfigStorage, type ConfigStorage } from '../config/config-storage.js';
import { MemoryEntityRepository, type EntityRepository } from '../entities/entity-repository.js';
import { MemoryPrincipalDirectory, type PrincipalDirectory } from '../auth/authorization.js';
import { MemoryExpirableStore, type ExpirableKeyValueStore } from '../memory/expirable-store.js';
import { ScopedEphemeralStore } from '../memory/ephemeral-store.js';
import type { ToolPolicy } from '../policies/tool-policy.js';
import { CapabilityRegistry, toToolSchema } from '../tools/tool-registry.js';
import type { CapabilityDefinition, CapabilityDescriptor } from '../tools/tool-types.js';
import { CapabilityInvoker, type InvocationOutcome } from '../tools/tool-executor.js';
import { createBuiltinCapabilities } from '../tools/builtin.js';
import type { EntityAccessCheck } from '../tools/config-tools.js';
import type { ModuleLocator } from '../workspaces/module-locator.js';
import { MemoryWorkspace } from '../workspaces/memory-workspace.js';
import type { WorkspacePort } from '../workspaces/workspace.js';
import { toInvocationPayload } from '../compat/invocation-payload.js';

export interface CapabilityRuntimeOptions {
  config?: RuntimeConfigInput;
  events?: EventBus;
  entities?: EntityRepository;
  principals?: PrincipalDirectory;
  /** Backing service for the ephemeral store. */
  ephemeralBacking?: ExpirableKeyValueStore;
  activeConfig?: ConfigStorage;
  stagingConfig?: ConfigStorage;
  workspace?: WorkspacePort;
  modules?: ModuleLocator;
  entityAccess?: EntityAccessCheck;
  /** Applied to every invocation. */
  policy?: ToolPolicy;
  /** Registered after the built-ins. */
  capabilities?: CapabilityDefinition[];
  /** Set to false for a registry holding only `capabilities`. */
  builtins?: boolean;
}

export interface InvokeOptions {
  caller: Principal;
  policy?: ToolPolicy;
  /** Append to the current run when one is open. Defaults to true. */
  record?: boolean;
}

export interface ToolSchema {
  name: string;
  description: string;
  parameters: JsonSchema;
}

/**
 * Entry point: owns the registry, the invoker, the ephemeral store and the
 * ledger of the current run.
 */
export class CapabilityRuntime {
  readonly config: RuntimeConfig;
  readonly events: EventBus;
  readonly registry: CapabilityRegistry;
  readonly store: ScopedEphemeralStore;
  private readonly invoker: CapabilityInvoker;
  private ledger = new ResultLedger();

  constructor(opts: CapabilityRuntimeOptions = {}) {
    this.config = parseRuntimeConfig(opts.config);
    this.events = opts.events ?? new EventBus();
    this.registry = new CapabilityRegistry();
    this.store = new ScopedEphemeralStore(opts.ephemeralBacking ?? new MemoryExpirableStore(), {
      keyPrefix: this.config.ephemeral.keyPrefix,
      events: this.events,
    });

    const entities = opts.entities ?? new MemoryEntityRepository();

    if (opts.builtins ?? true) {
      const builtins = createBuiltinCapabilities({
        config: this.config,
        registry: this.registry,
        store: this.store,
        activeConfig: opts.activeConfig ?? new MemoryConfigStorage(),
        stagingConfig: opts.stagingConfig ?? new MemoryConfigStorage(),
        entities,
        workspace: opts.workspace ?? new MemoryWorkspace(),
        ...(opts.modules ? { modules: opts.modules } : {}),
        ...(opts.entityAccess ? { entityAccess: opts.entityAccess } : {}),
      });
      for (const d of builtins) this.registry.register(d);
    }
    for (const d of opts.capabilities ?? []) this.registry.register(d);

    this.invoker = new CapabilityInvoker({
      registry: this.registry,
      entities,
      principals: opts.principals ?? new MemoryPrincipalDirectory(),
      events: this.events,
      elevatedPrincipalId: this.config.elevatedPrincipalId,
      ...(opts.policy ? { policy: opts.policy } : {}),
    });
  }

  listCapabilities(group?: string): CapabilityDescriptor[] {
    return this.registry.list(group);
  }

  describeCapability(id: string): CapabilityDescriptor {
    return this.registry.describe(id);
  }

  toolSchemas(group?: string): ToolSchema[] {
    return this.listCapabilities(group).map(toToolSchema);
  }

  /**
   * Invokes by id or function name with `name=value` assignments and an
   * optional JSON object naming contexts.
   */
  invoke(identifier: string, assignments: string[], contextJson: string | undefined, opts: InvokeOptions): Promise<InvocationOutcome> {
    return this.invoker.invoke(identifier, {
      assignments,
      ...(contextJson !== undefined ? { contextJson } : {}),
      caller: opts.caller,
      ...(opts.policy ? { policy: opts.policy } : {}),
      ...((opts.record ?? true) ? { ledger: this.ledger } : {}),
    });
  }

  /** Starts a fresh run; entries of the previous one are discarded. */
  startRun(): string {
    this.ledger = new ResultLedger();
    return this.ledger.startRun();
  }

  recordInvocation(entry: InvocationRecord): void {
    this.ledger.recordInvocation(entry);
  }

  getRun(): readonly InvocationRecord[] {
    return this.ledger.getRun();
  }

  completeRun(): readonly InvocationRecord[] {
    this.ledger.complete();
    return this.ledger.getRun();
  }

  get currentRunId(): string | null {
    return this.ledger.runId;
  }

  /**
   * Agent-loop adapter: `call.args` is an object of context values. Failures
   * come back as error results rather than rejections.
   */
  async executeToolCall(call: ToolCall, opts: InvokeOptions): Promise<ToolResult> {
    const values = toArgsRecord(call.args);
    if (!values) {
      const error = new InvalidInputError(`Arguments for ${call.toolName} must be a JSON object.`);
      return { id: call.id, toolName: call.toolName, result: { error: error.message, kind: error.kind }, isError: true };
    }
    const outcome = await this.invoker.invoke(call.toolName, {
      values,
      caller: opts.caller,
      ...(opts.policy ? { policy: opts.policy } : {}),
      ...((opts.record ?? true) ? { ledger: this.ledger } : {}),
    });
    if (!outcome.ok) {
      return { id: call.id, toolName: call.toolName, result: { error: outcome.error.message, kind: outcome.error.kind }, isError: true };
    }
    const payload: JsonValue = toInvocationPayload(outcome.value);
    return { id: call.id, toolName: call.toolName, result: payload };
  }
}

function toArgsRecord(args: unknown): Record<string, unknown> | undefined {
  if (args === undefined || args === null) return {};
  if (typeof args === 'string') {
    if (args.trim() === '') return {};
    try {
      return toArgsRecord(JSON.parse(args));
    } catch {
      return undefined;
    }
  }
  if (typeof args !== 'object' || Array.isArray(args)) return undefined;
  return Object.fromEntries(Object.entries(args));
}

export * from './core/types.js';
export * from './core/errors.js';
export { EventBus, type EventHook } from './core/event-bus.js';
export { ResultLedger, attachLedger } from './core/ledger.js';
export { CapabilityRuntime, type CapabilityRuntimeOptions, type InvokeOptions, type ToolSchema } from './core/runtime.js';

export { attachEventLog, formatEvent, type EventLogSink, type EventLogOptions } from './compat/event-log.js';
export { toInvocationPayload, buildAgentResponsePayload, type AgentResponseInput, type ChatHistoryEntry } from './compat/invocation-payload.js';

export * from './policies/tool-policy.js';
export * from './auth/authorization.js';

export { AgentCatalog, agentDefinitionSchema, enabledTools, type AgentDefinition, type AgentDefinitionInput, type AgentSummary, type AgentDetails } from './agents/agent-catalog.js';

export { MemoryEntityRepository, createEntity, isEntityRecord, type EntityRepository } from './entities/entity-repository.js';

export { ScopedEphemeralStore, EPHEMERAL_TTL_SECONDS, DEFAULT_KEY_PREFIX, type SaveReceipt, type ScopedEphemeralStoreOptions } from './memory/ephemeral-store.js';
export { MemoryExpirableStore, type ExpirableKeyValueStore, type Clock } from './memory/expirable-store.js';

export { MemoryConfigStorage, type ConfigStorage } from './config/config-storage.js';
export { FileConfigStorage, type FileConfigStorageOptions } from './config/file-config-storage.js';
export {
  diffConfigStorages,
  diffConfigTrees,
  normalizeConfigTree,
  dumpCanonicalYaml,
  formatConfigDiffReport,
  type ConfigDiffResult,
  type ConfigItemDiff,
} from './config/config-differ.js';
export { loadRuntimeConfig, parseRuntimeConfig, runtimeConfigSchema, type RuntimeConfig, type RuntimeConfigInput } from './config/runtime-config.js';

export { NodeFsWorkspace } from './workspaces/node-fs-workspace.js';
export { MemoryWorkspace } from './workspaces/memory-workspace.js';
export { StaticModuleLocator, type ModuleLocator } from './workspaces/module-locator.js';
export type { WorkspacePort, StatLike } from './workspaces/workspace.js';

export * from './tools/tool-types.js';
export { CapabilityRegistry, toToolSchema, isValidFunctionName, type RegistryEntry } from './tools/tool-registry.js';
export { CapabilityInstance, ContextReader } from './tools/tool-instance.js';
export { CapabilityInvoker, unwrapOutcome, type InvocationOutcome, type InvocationResult, type InvokeRequest } from './tools/tool-executor.js';
export { coerceContextValue, coerceText, castByDataType } from './tools/context-coercer.js';
export { resolveEntityReference, resolveEntityContexts, entityKindFor } from './tools/entity-resolver.js';
export { validateContexts } from './tools/context-validator.js';
export { parseContextInput, type RawContextInput } from './tools/context-input.js';
export { serializeContextValue, fromJson } from './tools/context-value.js';
export { diffLines, toHunks, formatHunks, type DiffHunk, type DiffLine } from './tools/unified-diff.js';
export { createBuiltinCapabilities } from './tools/builtin.js';
export { createEphemeralTools } from './tools/ephemeral-tools.js';
export { createSchemaFileTool } from './tools/schema-file-tool.js';
export { createConfigTools, type EntityAccessCheck } from './tools/config-tools.js';
export { createRegistryTools } from './tools/registry-tools.js';

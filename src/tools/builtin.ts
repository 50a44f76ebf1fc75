import type { RuntimeConfig } from '../config/runtime-config.js';
import type { ConfigStorage } from '../config/config-storage.js';
import type { EntityRepository } from '../entities/entity-repository.js';
import type { ScopedEphemeralStore } from '../memory/ephemeral-store.js';
import { StaticModuleLocator, type ModuleLocator } from '../workspaces/module-locator.js';
import type { WorkspacePort } from '../workspaces/workspace.js';
import { createConfigTools, type EntityAccessCheck } from './config-tools.js';
import { createEphemeralTools } from './ephemeral-tools.js';
import { createRegistryTools } from './registry-tools.js';
import { createSchemaFileTool } from './schema-file-tool.js';
import type { CapabilityRegistry } from './tool-registry.js';
import type { CapabilityDefinition } from './tool-types.js';

export interface BuiltinCapabilityOptions {
  config: RuntimeConfig;
  registry: CapabilityRegistry;
  store: ScopedEphemeralStore;
  activeConfig: ConfigStorage;
  stagingConfig: ConfigStorage;
  entities: EntityRepository;
  workspace: WorkspacePort;
  /** Defaults to the modules named in `config.modules`. */
  modules?: ModuleLocator;
  entityAccess?: EntityAccessCheck;
}

export function createBuiltinCapabilities(opts: BuiltinCapabilityOptions): CapabilityDefinition[] {
  const { config } = opts;
  return [
    ...createEphemeralTools({ store: opts.store }),
    createSchemaFileTool({
      store: opts.store,
      modules: opts.modules ?? new StaticModuleLocator(config.modules),
      workspace: opts.workspace,
      schemaDirectory: config.schemaDirectory,
      schemaExtension: config.schemaExtension,
    }),
    ...createConfigTools({
      active: opts.activeConfig,
      staging: opts.stagingConfig,
      entities: opts.entities,
      ...(opts.entityAccess ? { entityAccess: opts.entityAccess } : {}),
    }),
    ...createRegistryTools(opts.registry),
  ];
}

import { ADMINISTER_CONFIGURATION } from '../auth/authorization.js';
import type { ScopedEphemeralStore } from '../memory/ephemeral-store.js';
import type { CapabilityDefinition } from './tool-types.js';
import { defineDescriptor } from './tool-types.js';

export const INFORMATION_TOOLS_GROUP = 'information_tools';
export const NO_DATA_FOUND = 'No data found.';

export interface EphemeralToolsOptions {
  store: ScopedEphemeralStore;
}

/**
 * Save/load of short-lived scratch data. Keys are scoped to the calling
 * principal, not the one the invocation runs as.
 */
export function createEphemeralTools(opts: EphemeralToolsOptions): CapabilityDefinition[] {
  const { store } = opts;
  return [
    {
      descriptor: defineDescriptor({
        id: 'agent:save_temporary_data',
        functionName: 'agent_save_temporary_data',
        label: 'Save Temporary Data',
        description: 'This method saves temporary data that can be retrieved later.',
        group: INFORMATION_TOOLS_GROUP,
        permission: ADMINISTER_CONFIGURATION,
        contexts: {
          key: { dataType: 'string', label: 'Key', required: true, description: 'The key for the data you want to save.' },
          // Opaque: structured payloads are kept as their JSON text.
          data: { dataType: 'any', label: 'Data', required: true, description: 'The data you want to save.' },
        },
      }),
      execute: async (ctx) => {
        ctx.auth.require(ADMINISTER_CONFIGURATION);
        const data = ctx.contexts.text('data') ?? '';
        const { key, overwritten } = await store.save(ctx.auth.caller.id, ctx.contexts.string('key'), data);
        return {
          output: `The data has been successfully saved. Use the key: ${key}`,
          result: { key, overwritten },
        };
      },
    },
    {
      descriptor: defineDescriptor({
        id: 'agent:load_temporary_data',
        functionName: 'agent_load_temporary_data',
        label: 'Load Temporary Data',
        description: 'This method loads temporary data.',
        group: INFORMATION_TOOLS_GROUP,
        permission: ADMINISTER_CONFIGURATION,
        contexts: {
          key: { dataType: 'string', label: 'Key', required: true, description: 'The key for the data you want to load.' },
        },
      }),
      execute: async (ctx) => {
        ctx.auth.require(ADMINISTER_CONFIGURATION);
        const data = await store.load(ctx.auth.caller.id, ctx.contexts.string('key'));
        return { output: data ?? NO_DATA_FOUND, result: data ?? null };
      },
    },
  ];
}

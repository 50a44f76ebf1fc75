import type { JsonObject } from '../core/types.js';
import type { CapabilityRegistry } from './tool-registry.js';
import type { CapabilityDefinition, CapabilityDescriptor } from './tool-types.js';
import { defineDescriptor } from './tool-types.js';
import { INFORMATION_TOOLS_GROUP } from './ephemeral-tools.js';

export function describeForListing(d: CapabilityDescriptor): JsonObject {
  return {
    id: d.id,
    function_name: d.functionName,
    label: d.label,
    group: d.group,
    contexts: d.contexts.map((c) => ({ name: c.name, data_type: c.dataType, required: c.required })),
  };
}

/** Lets an agent discover what else it may call. */
export function createRegistryTools(registry: CapabilityRegistry): CapabilityDefinition[] {
  return [
    {
      descriptor: defineDescriptor({
        id: 'agent:list_capabilities',
        functionName: 'agent_list_capabilities',
        label: 'List Capabilities',
        description: 'Lists the registered capabilities, optionally restricted to one group.',
        group: INFORMATION_TOOLS_GROUP,
        contexts: {
          group: { dataType: 'string', label: 'Group', description: 'Only list capabilities in this group.' },
        },
      }),
      execute: (ctx) => {
        const group = ctx.contexts.optionalString('group');
        const listed = registry.list(group);
        const lines = listed.map((d) => `${d.functionName} (${d.id}): ${d.description}`);
        return {
          output: lines.length ? lines.join('\n') : 'No capabilities found.',
          result: listed.map(describeForListing),
        };
      },
    },
  ];
}

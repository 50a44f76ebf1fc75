import { ADMINISTER_CONFIGURATION, hasPermission } from '../auth/authorization.js';
import type { ConfigStorage } from '../config/config-storage.js';
import { diffConfigStorages, formatConfigDiffReport } from '../config/config-differ.js';
import type { EntityRecord, JsonObject, JsonValue, Principal } from '../core/types.js';
import type { EntityRepository } from '../entities/entity-repository.js';
import { dumpYaml } from '../utils/yaml.js';
import type { CapabilityDefinition } from './tool-types.js';
import { defineDescriptor } from './tool-types.js';
import { INFORMATION_TOOLS_GROUP } from './ephemeral-tools.js';

export type EntityAccessCheck = (entity: EntityRecord, principal: Principal) => boolean;

/** Holders of `view <kind>` or the configuration permission may view an entity. */
export const defaultEntityAccess: EntityAccessCheck = (entity, principal) =>
  hasPermission(principal, `view ${entity.kind}`) || hasPermission(principal, ADMINISTER_CONFIGURATION);

export interface ConfigToolsOptions {
  active: ConfigStorage;
  staging: ConfigStorage;
  entities: EntityRepository;
  entityAccess?: EntityAccessCheck;
}

export function createConfigTools(opts: ConfigToolsOptions): CapabilityDefinition[] {
  const { active, staging, entities } = opts;
  const entityAccess = opts.entityAccess ?? defaultEntityAccess;

  return [
    {
      descriptor: defineDescriptor({
        id: 'agent:config_diff',
        functionName: 'agent_config_diff',
        label: 'Config Diff',
        description: 'This function will give you the difference between the staged config and the active config.',
        group: INFORMATION_TOOLS_GROUP,
        permission: ADMINISTER_CONFIGURATION,
      }),
      execute: async (ctx) => {
        ctx.auth.require(ADMINISTER_CONFIGURATION);
        const diff = await diffConfigStorages(active, staging);
        return {
          output: formatConfigDiffReport(diff),
          result: {
            created: diff.created,
            deleted: diff.deleted,
            updated: diff.updated,
            diffs: diff.diffs.map((d) => ({ name: d.name, lines: d.lines.map((l) => ({ kind: l.kind, text: l.text })) })),
          },
        };
      },
    },
    {
      descriptor: defineDescriptor({
        id: 'agent:get_config_by_id',
        functionName: 'agent_get_config_by_id',
        label: 'Get Config By ID',
        description: 'This gets the configuration by id.',
        group: INFORMATION_TOOLS_GROUP,
        permission: ADMINISTER_CONFIGURATION,
        contexts: {
          config_id: { dataType: 'string', label: 'Configuration id', required: true, description: 'The id to get the configuration for.' },
        },
      }),
      execute: async (ctx) => {
        ctx.auth.require(ADMINISTER_CONFIGURATION);
        const configId = ctx.contexts.string('config_id').replace(/\.yml$/, '');
        const data = await active.read(configId);
        if (data === undefined) return { output: `The config "${configId}" does not exist.`, result: null };
        return { output: JSON.stringify(data), result: data };
      },
    },
    {
      descriptor: defineDescriptor({
        id: 'agent:get_config_entity',
        functionName: 'agent_get_config_entity',
        label: 'Get Config Entity',
        description: 'This method gets one config entity.',
        group: INFORMATION_TOOLS_GROUP,
        permission: ADMINISTER_CONFIGURATION,
        contexts: {
          entity_id: {
            dataType: 'string',
            label: 'Config ID',
            required: true,
            description: 'The exact id of the config entity. For an entity config, this is the entity id.',
          },
          entity_type: {
            dataType: 'string',
            label: 'Entity Type',
            description: 'The entity type to load the config entity from. Leave empty for general config.',
          },
        },
      }),
      execute: async (ctx) => {
        const entityId = ctx.contexts.string('entity_id');
        const entityType = ctx.contexts.optionalString('entity_type');

        if (entityType) {
          if (!entities.hasKind(entityType)) return { output: 'Could not load the entity.', result: null };
          let entity: EntityRecord | undefined;
          try {
            entity = await entities.load(entityType, entityId);
          } catch (e) {
            ctx.events.emit({ type: 'warning', message: `Entity load failed: ${e instanceof Error ? e.message : String(e)}`, at: Date.now() });
            return { output: 'Could not load the entity.', result: null };
          }
          if (!entity) return { output: 'The entity does not exist.', result: null };
          if (!entityAccess(entity, ctx.auth.current)) return { output: 'You do not have access to the entity.', result: null };
          const data = entityToTree(entity);
          return { output: dumpYaml(data, { inlineDepth: 10 }), result: data };
        }

        if (!ctx.auth.hasPermission(ADMINISTER_CONFIGURATION)) {
          return { output: 'You do not have permission to view configuration.', result: null };
        }
        const data: JsonValue | undefined = await active.read(entityId);
        if (data === undefined) return { output: `The configuration "${entityId}" does not exist.`, result: null };
        return { output: dumpYaml(data, { inlineDepth: 10 }), result: data };
      },
    },
  ];
}

function entityToTree(entity: EntityRecord): JsonObject {
  return { id: entity.id, ...(entity.label !== undefined ? { label: entity.label } : {}), ...entity.fields };
}

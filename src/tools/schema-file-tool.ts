import path from 'node:path/posix';
import { parse as parseYaml } from 'yaml';
import { ADMINISTER_CONFIGURATION } from '../auth/authorization.js';
import { InvalidInputError } from '../core/errors.js';
import type { ScopedEphemeralStore } from '../memory/ephemeral-store.js';
import { dumpYaml } from '../utils/yaml.js';
import type { ModuleLocator } from '../workspaces/module-locator.js';
import { fileChange, writeText, type WorkspacePort } from '../workspaces/workspace.js';
import type { CapabilityDefinition, CapabilityOutput } from './tool-types.js';
import { defineDescriptor } from './tool-types.js';
import { INFORMATION_TOOLS_GROUP } from './ephemeral-tools.js';

export const OVERWRITE_NOTE = 'Note: An existing file was overwritten.';

export interface SchemaFileToolOptions {
  store: ScopedEphemeralStore;
  modules: ModuleLocator;
  workspace: WorkspacePort;
  /** Directory under each module, e.g. `config/schema`. */
  schemaDirectory: string;
  schemaExtension: string;
}

/** Basename only and never containing `..`. */
export function isPlainFilename(filename: string): boolean {
  return filename !== '' && path.basename(filename) === filename && !filename.includes('\\') && !filename.includes('..');
}

/**
 * Moves a schema draft out of the ephemeral store into a module's schema
 * directory. The draft is consumed even when the module turns out not to exist.
 */
export function createSchemaFileTool(opts: SchemaFileToolOptions): CapabilityDefinition {
  const { store, modules, workspace, schemaExtension } = opts;
  const schemaDirectory = opts.schemaDirectory.replace(/^\/+|\/+$/g, '');

  return {
    descriptor: defineDescriptor({
      id: 'agent:save_schema_file',
      functionName: 'agent_save_schema_file',
      label: 'Save Schema File to Module',
      description: "This method saves a schema file from a temporary storage to a given module's schema directory.",
      group: INFORMATION_TOOLS_GROUP,
      permission: ADMINISTER_CONFIGURATION,
      contexts: {
        key: { dataType: 'string', label: 'Key', required: true, description: 'The key for the data you want to save.' },
        filename: {
          dataType: 'string',
          label: 'Filename',
          required: true,
          description: `The name of the schema file to save, e.g., my_module${schemaExtension}.`,
        },
        module: { dataType: 'string', label: 'Module name', required: true, description: 'The machine name of the module to save the schema file to.' },
      },
    }),
    execute: async (ctx): Promise<CapabilityOutput> => {
      ctx.auth.require(ADMINISTER_CONFIGURATION);
      const rawKey = ctx.contexts.string('key');
      const filename = ctx.contexts.string('filename');
      const moduleName = ctx.contexts.string('module');

      if (!isPlainFilename(filename)) throw new InvalidInputError('Invalid filename provided.');
      if (!filename.endsWith(schemaExtension)) {
        throw new InvalidInputError(`Schema files must use the ${schemaExtension} extension.`);
      }

      const data = await store.consume(ctx.auth.caller.id, rawKey);
      if (data === undefined) return { output: 'Key not found.', result: { saved: false, reason: 'key_not_found' } };

      const modulePath = modules.exists(moduleName) ? modules.getPath(moduleName) : undefined;
      if (modulePath === undefined) return { output: 'Module not found.', result: { saved: false, reason: 'module_not_found' } };

      const filePath = path.join(modulePath, schemaDirectory, filename);
      const overwritten = (await workspace.stat(filePath)) !== null;

      let encoded: string;
      try {
        encoded = dumpYaml(parseYaml(data), { inlineDepth: 10 });
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        return { output: `Failed to save schema file: ${message}`, result: { saved: false, reason: 'invalid_yaml' } };
      }

      await writeText(workspace, filePath, encoded);
      ctx.events.emit({
        type: 'file_change',
        change: fileChange(overwritten ? 'update' : 'create', filePath),
        at: Date.now(),
      });

      const note = overwritten ? ` ${OVERWRITE_NOTE}` : '';
      return {
        output: `Schema file saved successfully to ${filePath}${note}`,
        result: { saved: true, path: filePath, overwritten },
      };
    },
  };
}

import { z } from 'zod';
import { InvalidInputError } from '../core/errors.js';
import { DEFAULT_KEY_PREFIX } from '../memory/ephemeral-store.js';

export const runtimeConfigSchema = z.object({
  /** Principal every invocation is elevated to. */
  elevatedPrincipalId: z.string().min(1).default('1'),
  ephemeral: z
    .object({
      keyPrefix: z
        .string()
        .regex(/^[A-Za-z0-9_]+$/, 'Key prefix may only contain letters, digits and underscores')
        .default(DEFAULT_KEY_PREFIX),
    })
    .default({}),
  /** Relative to a module's directory. */
  schemaDirectory: z.string().min(1).default('config/schema'),
  schemaExtension: z.string().startsWith('.').default('.schema.yml'),
  /** Module name to module directory, relative to the workspace root. */
  modules: z.record(z.string().min(1)).default({}),
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof runtimeConfigSchema>;

export function parseRuntimeConfig(input: RuntimeConfigInput = {}): RuntimeConfig {
  const parsed = runtimeConfigSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new InvalidInputError(`Invalid runtime configuration: ${detail}`, parsed.error);
  }
  return parsed.data;
}

/**
 * Builds the configuration from `AGENT_RUNTIME_*` variables layered over
 * `base`. Unset or empty variables leave the base value alone.
 */
export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env,
  base: RuntimeConfigInput = {}
): RuntimeConfig {
  const elevated = nonEmpty(env.AGENT_RUNTIME_ELEVATED_PRINCIPAL);
  const keyPrefix = nonEmpty(env.AGENT_RUNTIME_KEY_PREFIX);
  const schemaDir = nonEmpty(env.AGENT_RUNTIME_SCHEMA_DIR);

  return parseRuntimeConfig({
    ...base,
    ...(elevated ? { elevatedPrincipalId: elevated } : {}),
    ...(keyPrefix ? { ephemeral: { ...base.ephemeral, keyPrefix } } : {}),
    ...(schemaDir ? { schemaDirectory: schemaDir } : {}),
  });
}

function nonEmpty(v: string | undefined): string | undefined {
  const t = v?.trim();
  return t ? t : undefined;
}

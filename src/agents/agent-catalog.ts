import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import type { EventBus } from '../core/event-bus.js';
import type { JsonObject, JsonValue } from '../core/types.js';
import { CapabilityNotFoundError, InvalidInputError } from '../core/errors.js';
import { ToolAllowListPolicy } from '../policies/tool-policy.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const agentDefinitionSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  description: z.string().default(''),
  systemPrompt: z.string().default(''),
  /** Capability id or function name to enabled flag. */
  tools: z.record(z.boolean()).default({}),
  toolSettings: z.record(jsonValueSchema).default({}),
  toolUsageLimits: z.record(jsonValueSchema).default({}),
  /** YAML text describing information tools run before each loop. */
  defaultInformationTools: z.string().default(''),
  maxLoops: z.number().int().positive().default(3),
  orchestrationAgent: z.boolean().default(false),
  triageAgent: z.boolean().default(false),
});

export type AgentDefinition = Readonly<z.infer<typeof agentDefinitionSchema>>;
export type AgentDefinitionInput = z.input<typeof agentDefinitionSchema>;

export interface AgentSummary {
  id: string;
  label: string;
  description: string;
  /** Enabled tools, comma separated. */
  tools: string;
}

export interface AgentDetails {
  id: string;
  label: string;
  description: string;
  system_prompt: string;
  tools: string[];
  tool_settings: JsonObject;
  tool_usage_limits: JsonObject;
  default_information_tools: JsonValue;
  max_loops: number;
  orchestration_agent: boolean;
  triage_agent: boolean;
}

export function enabledTools(agent: AgentDefinition): string[] {
  return Object.entries(agent.tools)
    .filter(([, enabled]) => enabled)
    .map(([name]) => name);
}

/**
 * Immutable set of agent definitions, validated when loaded.
 */
export class AgentCatalog {
  private readonly agents = new Map<string, AgentDefinition>();

  constructor(
    definitions: AgentDefinitionInput[] = [],
    private readonly events?: EventBus,
  ) {
    for (const input of definitions) {
      const parsed = agentDefinitionSchema.safeParse(input);
      if (!parsed.success) {
        const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new InvalidInputError(`Invalid agent definition: ${detail}`, parsed.error);
      }
      if (this.agents.has(parsed.data.id)) throw new InvalidInputError(`Duplicate agent id: ${parsed.data.id}`);
      this.agents.set(parsed.data.id, Object.freeze(parsed.data));
    }
  }

  get(id: string): AgentDefinition | undefined {
    return this.agents.get(id);
  }

  listAgents(): AgentSummary[] {
    return [...this.agents.values()]
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((a) => ({ id: a.id, label: a.label, description: a.description, tools: enabledTools(a).join(', ') }));
  }

  describeAgent(id: string): AgentDetails {
    const agent = this.agents.get(id);
    if (!agent) throw new CapabilityNotFoundError(id, `AI agent "${id}" was not found.`);
    return {
      id: agent.id,
      label: agent.label,
      description: agent.description,
      system_prompt: agent.systemPrompt,
      tools: enabledTools(agent),
      tool_settings: { ...agent.toolSettings },
      tool_usage_limits: { ...agent.toolUsageLimits },
      default_information_tools: this.parseInformationTools(agent.defaultInformationTools),
      max_loops: agent.maxLoops,
      orchestration_agent: agent.orchestrationAgent,
      triage_agent: agent.triageAgent,
    };
  }

  /** Restricts invocations to the agent's enabled tools. */
  toolPolicyFor(agentOrId: AgentDefinition | string): ToolAllowListPolicy {
    const agent = typeof agentOrId === 'string' ? this.agents.get(agentOrId) : agentOrId;
    if (!agent) throw new CapabilityNotFoundError(String(agentOrId), `AI agent "${String(agentOrId)}" was not found.`);
    return new ToolAllowListPolicy(enabledTools(agent));
  }

  private parseInformationTools(definition: string): JsonValue {
    if (!definition.trim()) return [];
    try {
      const parsed = jsonValueSchema.safeParse(parseYaml(definition));
      if (parsed.success && parsed.data !== null && typeof parsed.data === 'object') return parsed.data;
      return { raw: definition };
    } catch (e) {
      this.events?.emit({
        type: 'warning',
        message: `Failed to parse default information tools YAML: ${e instanceof Error ? e.message : String(e)}`,
        at: Date.now(),
      });
      return { raw: definition };
    }
  }
}

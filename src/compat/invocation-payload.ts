import type { InvocationRecord, JsonObject, JsonValue } from '../core/types.js';
import type { InvocationResult } from '../tools/tool-executor.js';
import { serializeContextRecord } from '../tools/context-value.js';

/** Machine-readable form of a successful invocation. */
export function toInvocationPayload(result: InvocationResult): JsonObject {
  return {
    tool_id: result.capabilityId,
    function_name: result.functionName,
    output: result.readableOutput,
    result: result.result,
    provided_context: serializeContextRecord(result.providedContext),
    resolved_context: serializeContextRecord(result.resolvedContext),
  };
}

export interface ChatHistoryEntry {
  role: string;
  content: string;
}

export interface AgentResponseInput {
  agentId: string;
  response: string;
  /** Only included when given. */
  history?: ChatHistoryEntry[];
  toolResults?: readonly InvocationRecord[];
}

/**
 * Summary of an agent run for downstream tooling. `tool_results` is left out
 * when the run made no calls; empty fields are dropped from each entry.
 */
export function buildAgentResponsePayload(input: AgentResponseInput): JsonObject {
  const payload: JsonObject = { agent_id: input.agentId, response: input.response };
  if (input.history) payload['history'] = input.history.map((h) => ({ role: h.role, content: h.content }));

  const toolResults: JsonValue[] = (input.toolResults ?? []).map((r) => {
    const entry: JsonObject = {};
    if (r.capabilityId) entry['plugin_id'] = r.capabilityId;
    if (r.functionName) entry['function_name'] = r.functionName;
    if (r.readableOutput) entry['output'] = r.readableOutput;
    return entry;
  });
  if (toolResults.length) payload['tool_results'] = toolResults;
  return payload;
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type JsonSchema =
  | { type: 'object'; properties?: Record<string, JsonSchema>; required?: string[]; additionalProperties?: boolean | JsonSchema; description?: string }
  | { type: 'array'; items: JsonSchema; description?: string }
  | { type: 'string'; enum?: string[]; pattern?: string; description?: string }
  | { type: 'number'; description?: string }
  | { type: 'integer'; description?: string }
  | { type: 'boolean'; description?: string }
  | { anyOf: JsonSchema[]; description?: string }
  | { description?: string };

/**
 * A loaded domain object. Entity-typed contexts hold one of these once resolved.
 */
export interface EntityRecord {
  kind: string;
  id: string;
  label?: string;
  fields: JsonObject;
}

/**
 * Typed context value. Coercion, resolution and validation all switch on `type`
 * rather than inspecting raw JavaScript values.
 */
export type ContextValue =
  | { type: 'string'; value: string }
  | { type: 'integer'; value: number }
  | { type: 'float'; value: number }
  | { type: 'boolean'; value: boolean }
  | { type: 'null' }
  | { type: 'list'; items: ContextValue[] }
  | { type: 'map'; entries: Record<string, ContextValue> }
  | { type: 'entity'; entity: EntityRecord };

export interface Principal {
  id: string;
  name?: string;
  permissions: readonly string[];
  /** Holds every permission. */
  superuser?: boolean;
}

export interface ToolCall {
  id: string;
  toolName: string;
  args: unknown;
}

export interface ToolResult {
  id: string;
  toolName: string;
  result: JsonValue;
  isError?: boolean;
}

export interface InvocationRecord {
  capabilityId: string;
  functionName: string;
  readableOutput: string;
}

export type FileChangeKind = 'create' | 'update' | 'delete';

export interface FileChange {
  kind: FileChangeKind;
  path: string;
}

export interface RuntimeEventMeta {
  invocationId?: string;
  runId?: string;
}

type RuntimeEventCore =
  | { type: 'invocation_start'; capabilityId: string; functionName: string; callerId: string; at: number }
  | { type: 'invocation_result'; record: InvocationRecord; at: number }
  | { type: 'invocation_error'; capabilityId: string; kind: string; error: string; at: number }
  | { type: 'elevation_acquired'; callerId: string; principalId: string; at: number }
  | { type: 'elevation_released'; callerId: string; principalId: string; at: number }
  | { type: 'ephemeral_write'; key: string; overwritten: boolean; at: number }
  | { type: 'ephemeral_read'; key: string; found: boolean; at: number }
  | { type: 'ephemeral_consume'; key: string; found: boolean; at: number }
  | { type: 'file_change'; change: FileChange; at: number }
  | { type: 'warning'; message: string; at: number };

export type RuntimeEvent = RuntimeEventCore & { meta?: RuntimeEventMeta };

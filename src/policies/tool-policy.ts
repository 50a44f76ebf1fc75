import type { Principal } from '../core/types.js';
import type { CapabilityDescriptor } from '../tools/tool-types.js';
import { hasPermission } from '../auth/authorization.js';

export type ToolPolicyDecision = { kind: 'allow' } | { kind: 'deny'; reason: string };

export interface ToolPolicyContext {
  descriptor: CapabilityDescriptor;
  /** Effective principal, after any elevation. */
  principal: Principal;
}

export interface ToolPolicy {
  readonly name: string;
  decide(ctx: ToolPolicyContext): Promise<ToolPolicyDecision> | ToolPolicyDecision;
}

/** Matches on capability id or function name. */
export class ToolAllowListPolicy implements ToolPolicy {
  readonly name = 'tool_allow_list';
  constructor(private allowed: string[]) {}
  decide(ctx: ToolPolicyContext): ToolPolicyDecision {
    const { id, functionName } = ctx.descriptor;
    return this.allowed.includes(id) || this.allowed.includes(functionName)
      ? { kind: 'allow' }
      : { kind: 'deny', reason: `Tool not on allow-list` };
  }
}

export class ToolDenyListPolicy implements ToolPolicy {
  readonly name = 'tool_deny_list';
  constructor(private denied: string[]) {}
  decide(ctx: ToolPolicyContext): ToolPolicyDecision {
    const { id, functionName } = ctx.descriptor;
    return this.denied.includes(id) || this.denied.includes(functionName) ? { kind: 'deny', reason: `Tool denied` } : { kind: 'allow' };
  }
}

/** Enforces the descriptor's declared permission. */
export class PermissionPolicy implements ToolPolicy {
  readonly name = 'permission';
  decide(ctx: ToolPolicyContext): ToolPolicyDecision {
    const required = ctx.descriptor.permission;
    if (!required || hasPermission(ctx.principal, required)) return { kind: 'allow' };
    return { kind: 'deny', reason: `Missing permission: ${required}` };
  }
}

export class CompositePolicy implements ToolPolicy {
  readonly name = 'composite';
  constructor(private policies: ToolPolicy[]) {}
  async decide(ctx: ToolPolicyContext): Promise<ToolPolicyDecision> {
    for (const p of this.policies) {
      const d = await p.decide(ctx);
      if (d.kind !== 'allow') return { ...d, reason: `${d.reason} (via ${p.name})` };
    }
    return { kind: 'allow' };
  }
}

import type { Principal } from '../core/types.js';
import type { EventBus } from '../core/event-bus.js';
import { CapabilityRuntimeError, UnauthorizedError } from '../core/errors.js';

export const ADMINISTER_CONFIGURATION = 'administer site configuration';

export interface PrincipalDirectory {
  load(id: string): Promise<Principal | undefined>;
}

export class MemoryPrincipalDirectory implements PrincipalDirectory {
  private readonly byId = new Map<string, Principal>();

  constructor(principals: Principal[] = []) {
    for (const p of principals) this.byId.set(p.id, p);
  }

  async load(id: string): Promise<Principal | undefined> {
    return this.byId.get(id);
  }
}

export function hasPermission(principal: Principal, permission: string): boolean {
  return principal.superuser === true || principal.permissions.includes(permission);
}

/**
 * Released exactly once; later calls to `release` are no-ops.
 */
export class ElevationLease {
  private done = false;

  constructor(private readonly onRelease: () => void) {}

  get released(): boolean {
    return this.done;
  }

  release(): boolean {
    if (this.done) return false;
    this.done = true;
    this.onRelease();
    return true;
  }
}

/**
 * Call-local authorization state. Each invocation owns one, so elevation never
 * leaks into a concurrent invocation for the same caller.
 */
export class AuthorizationContext {
  private elevatedTo: Principal | null = null;

  constructor(
    readonly caller: Principal,
    private readonly events?: EventBus,
  ) {}

  /** Principal whose permissions apply right now. */
  get current(): Principal {
    return this.elevatedTo ?? this.caller;
  }

  get isElevated(): boolean {
    return this.elevatedTo !== null;
  }

  elevate(principal: Principal): ElevationLease {
    if (this.elevatedTo) throw new CapabilityRuntimeError('Authorization is already elevated for this invocation');
    this.elevatedTo = principal;
    this.events?.emit({ type: 'elevation_acquired', callerId: this.caller.id, principalId: principal.id, at: Date.now() });
    return new ElevationLease(() => {
      this.elevatedTo = null;
      this.events?.emit({ type: 'elevation_released', callerId: this.caller.id, principalId: principal.id, at: Date.now() });
    });
  }

  hasPermission(permission: string): boolean {
    return hasPermission(this.current, permission);
  }

  require(permission: string): void {
    if (!this.hasPermission(permission)) throw new UnauthorizedError();
  }
}

export async function withElevation<T>(auth: AuthorizationContext, principal: Principal | undefined, fn: () => Promise<T>): Promise<T> {
  const lease = principal ? auth.elevate(principal) : undefined;
  try {
    return await fn();
  } finally {
    lease?.release();
  }
}

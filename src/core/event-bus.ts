import type { RuntimeEvent } from './types.js';

export type EventHook = (ev: RuntimeEvent) => void | Promise<void>;

export class EventBus {
  private readonly hooks = new Set<EventHook>();

  /** Hooks run synchronously; a failing hook is reported to the others as a `warning` and never rethrown. */
  emit(ev: RuntimeEvent): void {
    for (const h of this.hooks) this.dispatch(h, ev);
  }

  subscribe(hook: EventHook): () => void {
    this.hooks.add(hook);
    return () => this.hooks.delete(hook);
  }

  private dispatch(h: EventHook, ev: RuntimeEvent): void {
    try {
      void Promise.resolve(h(ev)).catch((e: unknown) => this.reportHookFailure(h, ev, e));
    } catch (e) {
      this.reportHookFailure(h, ev, e);
    }
  }

  private reportHookFailure(failed: EventHook, ev: RuntimeEvent, e: unknown): void {
    // A failing warning hook would otherwise recurse.
    if (ev.type === 'warning') return;
    const warning: RuntimeEvent = {
      type: 'warning',
      message: `Event hook failed on ${ev.type}: ${e instanceof Error ? e.message : String(e)}`,
      at: Date.now(),
    };
    for (const h of this.hooks) {
      if (h !== failed) this.dispatch(h, warning);
    }
  }
}

import type { InvocationRecord } from './types.js';
import type { EventBus } from './event-bus.js';
import { CapabilityRuntimeError } from './errors.js';
import { runId as newRunId } from '../utils/ids.js';

type LedgerState = 'idle' | 'running' | 'completed';

/**
 * Ordered record of the invocations made during one run. Duplicates are kept;
 * a completed run is read-only.
 */
export class ResultLedger {
  private entries: InvocationRecord[] = [];
  private state: LedgerState = 'idle';
  private currentRunId: string | null = null;

  get runId(): string | null {
    return this.currentRunId;
  }

  get isRunning(): boolean {
    return this.state === 'running';
  }

  startRun(): string {
    this.entries = [];
    this.state = 'running';
    this.currentRunId = newRunId();
    return this.currentRunId;
  }

  recordInvocation(entry: InvocationRecord): void {
    if (this.state !== 'running') throw new CapabilityRuntimeError(`Cannot record an invocation: run is ${this.state}`);
    this.entries.push({ ...entry });
  }

  getRun(): readonly InvocationRecord[] {
    return Object.freeze(this.entries.map((e) => Object.freeze({ ...e })));
  }

  complete(): void {
    if (this.state === 'running') this.state = 'completed';
  }
}

/**
 * Records every `invocation_result` seen on the bus while the ledger's run is open.
 * Use this or pass the ledger to `invoke`, not both.
 */
export function attachLedger(bus: EventBus, ledger: ResultLedger): () => void {
  return bus.subscribe((ev) => {
    if (ev.type === 'invocation_result' && ledger.isRunning) ledger.recordInvocation(ev.record);
  });
}

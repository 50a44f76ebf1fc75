import type { RuntimeEvent } from '../core/types.js';

export interface EventLogSink {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface EventLogOptions {
  /** `warn` drops routine events and keeps warnings and failures. */
  level?: 'info' | 'warn';
}

type Severity = 'info' | 'warn' | 'error';

/** One log line per event, or undefined for events not worth a line. */
export function formatEvent(ev: RuntimeEvent): { severity: Severity; line: string } | undefined {
  const ctx = ev.meta?.invocationId ? ` [${ev.meta.invocationId}]` : '';
  switch (ev.type) {
    case 'invocation_start':
      return { severity: 'info', line: `invoke ${ev.capabilityId} as ${ev.callerId}${ctx}` };
    case 'invocation_result':
      return { severity: 'info', line: `done ${ev.record.capabilityId}${ctx}` };
    case 'invocation_error':
      return { severity: 'error', line: `failed ${ev.capabilityId} (${ev.kind}): ${ev.error}${ctx}` };
    case 'elevation_acquired':
      return { severity: 'info', line: `elevated ${ev.callerId} to ${ev.principalId}` };
    case 'elevation_released':
      return undefined;
    case 'ephemeral_write':
      return { severity: 'info', line: `ephemeral write ${ev.key}${ev.overwritten ? ' (overwritten)' : ''}` };
    case 'ephemeral_read':
    case 'ephemeral_consume':
      return { severity: 'info', line: `${ev.type.replace('_', ' ')} ${ev.key}${ev.found ? '' : ' (miss)'}` };
    case 'file_change':
      return { severity: 'info', line: `file ${ev.change.kind} ${ev.change.path}` };
    case 'warning':
      return { severity: 'warn', line: ev.message };
  }
}

/**
 * Renders bus events into a console-shaped sink. Returns the unsubscribe.
 */
export function attachEventLog(
  bus: { subscribe: (h: (ev: RuntimeEvent) => void) => () => void },
  sink: EventLogSink = console,
  opts: EventLogOptions = {}
): () => void {
  const level = opts.level ?? 'info';
  return bus.subscribe((ev) => {
    const formatted = formatEvent(ev);
    if (!formatted) return;
    if (formatted.severity === 'info' && level === 'warn') return;
    sink[formatted.severity](formatted.line);
  });
}

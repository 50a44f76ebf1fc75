import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ADMINISTER_CONFIGURATION, MemoryPrincipalDirectory } from '../src/auth/authorization.js';
import { EventBus } from '../src/core/event-bus.js';
import { ResultLedger } from '../src/core/ledger.js';
import { InvalidInputError } from '../src/core/errors.js';
import { MemoryEntityRepository, createEntity } from '../src/entities/entity-repository.js';
import { ToolDenyListPolicy } from '../src/policies/tool-policy.js';
import { CapabilityInvoker, unwrapOutcome, type InvocationOutcome } from '../src/tools/tool-executor.js';
import { CapabilityRegistry } from '../src/tools/tool-registry.js';
import { defineDescriptor, type CapabilityDefinition } from '../src/tools/tool-types.js';
import { admin, eventTypes, recordEvents, siteBuilder, visitor } from './_support/fixtures.js';

interface Harness {
  invoker: CapabilityInvoker;
  events: EventBus;
  seenAs: Array<{ caller: string; current: string }>;
}

function harness(opts: { withAdmin?: boolean; fail?: unknown } = {}): Harness {
  const events = new EventBus();
  const seenAs: Harness['seenAs'] = [];
  const echo: CapabilityDefinition = {
    descriptor: defineDescriptor({
      id: 'test:echo',
      functionName: 'test_echo',
      label: 'Echo',
      description: 'Repeats a message',
      group: 'test',
      permission: ADMINISTER_CONFIGURATION,
      contexts: {
        message: { dataType: 'string', label: 'Message', required: true },
        times: { dataType: 'integer', defaultValue: 1 },
      },
    }),
    execute: (ctx) => {
      seenAs.push({ caller: ctx.auth.caller.id, current: ctx.auth.current.id });
      if (opts.fail !== undefined) throw opts.fail;
      const message = ctx.contexts.string('message');
      const times = Number(ctx.contexts.string('times'));
      return { output: Array.from({ length: times }, () => message).join(' '), result: { times } };
    },
  };
  const tagged: CapabilityDefinition = {
    descriptor: defineDescriptor({
      id: 'test:describe_node',
      functionName: 'test_describe_node',
      label: 'Describe node',
      description: 'Describes a node',
      group: 'test',
      contexts: { node: { dataType: 'entity:node', required: true } },
    }),
    execute: (ctx) => ({ output: ctx.contexts.entity('node')?.label ?? '' }),
  };
  const invoker = new CapabilityInvoker({
    registry: new CapabilityRegistry([echo, tagged]),
    entities: new MemoryEntityRepository([createEntity('node', '5', {}, 'Front page')]),
    principals: new MemoryPrincipalDirectory(opts.withAdmin === false ? [] : [admin]),
    events,
    elevatedPrincipalId: '1',
  });
  return { invoker, events, seenAs };
}

function errorOf(outcome: InvocationOutcome): { kind: string; message: string } {
  assert.equal(outcome.ok, false);
  if (outcome.ok) throw new Error('expected failure');
  return { kind: outcome.error.kind, message: outcome.error.message };
}

describe('CapabilityInvoker', () => {
  it('coerces assignments and executes once', async () => {
    const h = harness();
    const result = unwrapOutcome(await h.invoker.invoke('test_echo', { caller: visitor, assignments: ['message=hi', 'times=3'] }));
    assert.equal(result.capabilityId, 'test:echo');
    assert.equal(result.readableOutput, 'hi hi hi');
    assert.deepEqual(result.result, { times: 3 });
    assert.deepEqual(result.providedContext, {
      message: { type: 'string', value: 'hi' },
      times: { type: 'integer', value: 3 },
    });
    assert.equal(h.seenAs.length, 1);
  });

  it('includes defaults in the resolved context only', async () => {
    const h = harness();
    const result = unwrapOutcome(await h.invoker.invoke('test:echo', { caller: visitor, assignments: ['message=hi'] }));
    assert.deepEqual(result.providedContext, { message: { type: 'string', value: 'hi' } });
    assert.deepEqual(result.resolvedContext, {
      message: { type: 'string', value: 'hi' },
      times: { type: 'integer', value: 1 },
    });
  });

  it('lets assignments override the JSON payload', async () => {
    const h = harness();
    const result = unwrapOutcome(
      await h.invoker.invoke('test:echo', { caller: visitor, contextJson: '{"message":"a","times":2}', assignments: ['message=b'] })
    );
    assert.equal(result.readableOutput, 'b b');
  });

  it('runs under the elevated principal and restores the caller', async () => {
    const h = harness();
    const seen = recordEvents(h.events);
    await h.invoker.invoke('test:echo', { caller: visitor, assignments: ['message=hi'] });
    assert.deepEqual(h.seenAs, [{ caller: '9', current: '1' }]);
    assert.deepEqual(eventTypes(seen), ['elevation_acquired', 'invocation_start', 'elevation_released', 'invocation_result']);
  });

  it('releases elevation exactly once when execution fails', async () => {
    const h = harness({ fail: new Error('boom') });
    const seen = recordEvents(h.events);
    const error = errorOf(await h.invoker.invoke('test:echo', { caller: visitor, assignments: ['message=hi'] }));
    assert.deepEqual(error, { kind: 'execution_failed', message: 'Capability test:echo failed: boom' });
    assert.equal(seen.filter((e) => e.type === 'elevation_released').length, 1);
    assert.equal(seen.at(-1)?.type, 'invocation_error');
  });

  it('keeps the kind of input errors a capability raises', async () => {
    const h = harness({ fail: new InvalidInputError('A non-empty key is required.') });
    assert.deepEqual(errorOf(await h.invoker.invoke('test:echo', { caller: visitor, assignments: ['message=hi'] })), {
      kind: 'invalid_input',
      message: 'A non-empty key is required.',
    });
  });

  it('fails validation without executing or recording', async () => {
    const h = harness();
    const ledger = new ResultLedger();
    ledger.startRun();
    const error = errorOf(await h.invoker.invoke('test:echo', { caller: visitor, assignments: [], ledger }));
    assert.deepEqual(error, { kind: 'validation_failed', message: 'Invalid value for Message: This value should not be null.' });
    assert.equal(h.seenAs.length, 0);
    assert.deepEqual(ledger.getRun(), []);
  });

  it('rejects unknown context names', async () => {
    const h = harness();
    const error = errorOf(await h.invoker.invoke('test:echo', { caller: visitor, assignments: ['message=hi', 'volume=11'] }));
    assert.deepEqual(error, {
      kind: 'invalid_input',
      message: 'Unknown context "volume" for capability "test:echo". Allowed contexts: message, times',
    });
    assert.equal(h.seenAs.length, 0);
  });

  it('rejects malformed payloads and assignments', async () => {
    const h = harness();
    assert.deepEqual(errorOf(await h.invoker.invoke('test:echo', { caller: visitor, contextJson: '[1]' })), {
      kind: 'invalid_input',
      message: 'The context JSON payload must decode to a JSON object with named properties.',
    });
    assert.deepEqual(errorOf(await h.invoker.invoke('test:echo', { caller: visitor, assignments: ['message'] })), {
      kind: 'invalid_input',
      message: 'Context "message" must use key=value format.',
    });
  });

  it('reports unknown capabilities as NotFound', async () => {
    const h = harness();
    assert.equal(errorOf(await h.invoker.invoke('missing', { caller: visitor })).kind, 'not_found');
  });

  it('checks permissions against the effective principal', async () => {
    const h = harness({ withAdmin: false });
    const denied = errorOf(await h.invoker.invoke('test:echo', { caller: visitor, assignments: ['message=hi'] }));
    assert.equal(denied.kind, 'unauthorized');
    assert.equal(h.seenAs.length, 0);
    const allowed = await h.invoker.invoke('test:echo', { caller: siteBuilder, assignments: ['message=hi'] });
    assert.equal(allowed.ok, true);
    assert.deepEqual(h.seenAs, [{ caller: '7', current: '7' }]);
  });

  it('applies per-call policies', async () => {
    const h = harness();
    const error = errorOf(
      await h.invoker.invoke('test:echo', { caller: visitor, assignments: ['message=hi'], policy: new ToolDenyListPolicy(['test_echo']) })
    );
    assert.deepEqual(error, {
      kind: 'unauthorized',
      message: 'Capability test:echo denied: Tool denied (via tool_deny_list)',
    });
  });

  it('records successful invocations in order, duplicates included', async () => {
    const h = harness();
    const ledger = new ResultLedger();
    ledger.startRun();
    await h.invoker.invoke('test:echo', { caller: visitor, assignments: ['message=a'], ledger });
    await h.invoker.invoke('test:echo', { caller: visitor, assignments: ['message=a'], ledger });
    await h.invoker.invoke('test:echo', { caller: visitor, assignments: [], ledger });
    assert.deepEqual(ledger.getRun(), [
      { capabilityId: 'test:echo', functionName: 'test_echo', readableOutput: 'a' },
      { capabilityId: 'test:echo', functionName: 'test_echo', readableOutput: 'a' },
    ]);
  });

  it('resolves entity references before validation', async () => {
    const h = harness();
    const found = unwrapOutcome(await h.invoker.invoke('test_describe_node', { caller: visitor, assignments: ['node=5'] }));
    assert.equal(found.readableOutput, 'Front page');
    const missing = errorOf(await h.invoker.invoke('test_describe_node', { caller: visitor, assignments: ['node=6'] }));
    assert.deepEqual(missing, { kind: 'validation_failed', message: 'Invalid value for node: This value should reference a loaded node.' });
    const prefixed = unwrapOutcome(await h.invoker.invoke('test_describe_node', { caller: visitor, assignments: ['node=node:5'] }));
    assert.equal(prefixed.readableOutput, 'Front page');
  });

  it('leaves colon-bearing values for validation when the prefix is not a kind', async () => {
    const show: CapabilityDefinition = {
      descriptor: defineDescriptor({
        id: 'test:show',
        functionName: 'test_show',
        label: 'Show',
        description: 'Shows any entity',
        group: 'test',
        contexts: { target: { dataType: 'entity', required: true } },
      }),
      execute: (ctx) => ({ output: ctx.contexts.entity('target')?.id ?? '' }),
    };
    const node = createEntity('node', '5');
    const invoker = new CapabilityInvoker({
      registry: new CapabilityRegistry([show]),
      entities: {
        hasKind: (kind) => kind === 'node',
        load: async (kind, id) => {
          if (kind !== 'node') throw new Error(`no storage for ${kind}`);
          return id === node.id ? node : undefined;
        },
      },
      principals: new MemoryPrincipalDirectory(),
      events: new EventBus(),
      elevatedPrincipalId: '1',
    });
    const raw = errorOf(await invoker.invoke('test_show', { caller: visitor, assignments: ['target=http://x'] }));
    assert.deepEqual(raw, { kind: 'validation_failed', message: 'Invalid value for target: This value should reference a loaded entity.' });
    const found = unwrapOutcome(await invoker.invoke('test_show', { caller: visitor, assignments: ['target=node:5'] }));
    assert.equal(found.readableOutput, '5');
  });
});

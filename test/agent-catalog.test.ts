import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AgentCatalog } from '../src/agents/agent-catalog.js';
import { MemoryPrincipalDirectory } from '../src/auth/authorization.js';
import { CapabilityNotFoundError, InvalidInputError } from '../src/core/errors.js';
import { EventBus } from '../src/core/event-bus.js';
import { CapabilityRuntime } from '../src/core/runtime.js';
import { admin, eventTypes, failureOf, recordEvents, visitor } from './_support/fixtures.js';

const definitions = [
  {
    id: 'zeta',
    label: 'Config helper',
    description: 'Answers configuration questions',
    systemPrompt: 'You help with configuration.',
    tools: { agent_config_diff: true, agent_get_config_by_id: false, agent_list_capabilities: true },
    defaultInformationTools: 'config_diff:\n  label: Diff\n  tool: agent:config_diff\n',
  },
  { id: 'alpha', label: 'Empty' },
];

describe('AgentCatalog', () => {
  it('lists agents by id with their enabled tools', () => {
    assert.deepEqual(new AgentCatalog(definitions).listAgents(), [
      { id: 'alpha', label: 'Empty', description: '', tools: '' },
      { id: 'zeta', label: 'Config helper', description: 'Answers configuration questions', tools: 'agent_config_diff, agent_list_capabilities' },
    ]);
  });

  it('describes one agent with parsed information tools', () => {
    const details = new AgentCatalog(definitions).describeAgent('zeta');
    assert.deepEqual(details, {
      id: 'zeta',
      label: 'Config helper',
      description: 'Answers configuration questions',
      system_prompt: 'You help with configuration.',
      tools: ['agent_config_diff', 'agent_list_capabilities'],
      tool_settings: {},
      tool_usage_limits: {},
      default_information_tools: { config_diff: { label: 'Diff', tool: 'agent:config_diff' } },
      max_loops: 3,
      orchestration_agent: false,
      triage_agent: false,
    });
    assert.deepEqual(new AgentCatalog(definitions).describeAgent('alpha').default_information_tools, []);
  });

  it('keeps unparseable information tools as raw text and warns', () => {
    const events = new EventBus();
    const seen = recordEvents(events);
    const catalog = new AgentCatalog([{ id: 'broken', label: 'Broken', defaultInformationTools: 'tools: [unclosed' }], events);
    assert.deepEqual(catalog.describeAgent('broken').default_information_tools, { raw: 'tools: [unclosed' });
    assert.deepEqual(eventTypes(seen), ['warning']);
  });

  it('rejects unknown ids, invalid definitions and duplicates', () => {
    const catalog = new AgentCatalog(definitions);
    assert.throws(
      () => catalog.describeAgent('missing'),
      (e: unknown) => e instanceof CapabilityNotFoundError && e.message === 'AI agent "missing" was not found.'
    );
    assert.throws(() => new AgentCatalog([{ id: 'x', label: 'X', maxLoops: 0 }]), InvalidInputError);
    assert.throws(
      () => new AgentCatalog([{ id: 'x', label: 'X' }, { id: 'x', label: 'Again' }]),
      (e: unknown) => e instanceof InvalidInputError && e.message === 'Duplicate agent id: x'
    );
  });

  it('limits an agent to its enabled tools', async () => {
    const catalog = new AgentCatalog(definitions);
    const rt = new CapabilityRuntime({ principals: new MemoryPrincipalDirectory([admin]) });
    const policy = catalog.toolPolicyFor('zeta');

    const allowed = await rt.invoke('agent_list_capabilities', [], undefined, { caller: visitor, policy });
    assert.equal(allowed.ok, true);
    const blocked = await rt.invoke('agent_load_temporary_data', ['key=x'], undefined, { caller: visitor, policy });
    assert.deepEqual(failureOf(blocked), {
      kind: 'unauthorized',
      message: 'Capability agent:load_temporary_data denied: Tool not on allow-list (via tool_allow_list)',
    });
  });
});

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createEntity, MemoryEntityRepository, type EntityRepository } from '../src/entities/entity-repository.js';
import { entityKindFor, resolveEntityContexts, resolveEntityReference } from '../src/tools/entity-resolver.js';
import { entityValue, fromJson, stringValue } from '../src/tools/context-value.js';
import { defineDescriptor } from '../src/tools/tool-types.js';
import { CapabilityInstance } from '../src/tools/tool-instance.js';
import { specOf } from './_support/fixtures.js';

const article = createEntity('node', '5', { title: 'Hello' }, 'Hello');

function repo(): MemoryEntityRepository {
  return new MemoryEntityRepository([article], ['user']);
}

describe('resolveEntityReference', () => {
  it('leaves a loaded entity alone', async () => {
    const r = repo();
    const value = entityValue(article);
    assert.equal(await resolveEntityReference(value, 'node', r), value);
    assert.equal(r.loadCount, 0);
  });

  it('unwraps an entity held in a map', async () => {
    const r = repo();
    const resolved = await resolveEntityReference(fromJson({ entity: article }), 'node', r);
    assert.deepEqual(resolved, { type: 'entity', entity: article });
    assert.equal(r.loadCount, 0);
  });

  it('extracts target_id references', async () => {
    const r = repo();
    const resolved = await resolveEntityReference(fromJson({ target_id: '5' }), 'node', r);
    assert.deepEqual(resolved, { type: 'entity', entity: article });
    assert.equal(r.loadCount, 1);
  });

  it('uses scalars as candidate ids', async () => {
    const r = repo();
    assert.deepEqual(await resolveEntityReference({ type: 'integer', value: 5 }, 'node', r), { type: 'entity', entity: article });
    assert.deepEqual(await resolveEntityReference(stringValue('5'), 'node', r), { type: 'entity', entity: article });
  });

  it('recovers the kind from a kind:id reference', async () => {
    const r = repo();
    const resolved = await resolveEntityReference(stringValue('node:5'), undefined, r);
    assert.deepEqual(resolved, { type: 'entity', entity: article });
  });

  it('strips a kind prefix when the kind is already known', async () => {
    const r = repo();
    assert.deepEqual(await resolveEntityReference(stringValue('node:5'), 'node', r), { type: 'entity', entity: article });
    assert.equal(r.loadCount, 1);
  });

  it('takes the kind from a prefix only when the repository knows it', async () => {
    const strict: EntityRepository = {
      hasKind: (kind) => kind === 'node',
      load: async (kind, id) => {
        if (kind !== 'node') throw new Error(`no storage for ${kind}`);
        return id === article.id ? article : undefined;
      },
    };
    const raw = stringValue('http://x');
    assert.equal(await resolveEntityReference(raw, undefined, strict), raw);
  });

  it('leaves the raw value in place on a miss', async () => {
    const r = repo();
    const raw = stringValue('99');
    assert.equal(await resolveEntityReference(raw, 'node', r), raw);
    assert.equal(r.loadCount, 1);
  });

  it('does not look anything up without a kind', async () => {
    const r = repo();
    const raw = stringValue('5');
    assert.equal(await resolveEntityReference(raw, undefined, r), raw);
    assert.equal(r.loadCount, 0);
  });
});

describe('entityKindFor', () => {
  const descriptor = defineDescriptor({
    id: 'test:entities',
    functionName: 'test_entities',
    label: 'Entities',
    description: 'Entity contexts',
    group: 'test',
    operatesOn: 'node',
    contexts: {
      target: { dataType: 'entity' },
      account: { dataType: 'entity:user' },
      title: { dataType: 'string' },
    },
  });

  it('prefers the explicit kind', () => {
    assert.equal(entityKindFor(specOf(descriptor, 'account'), descriptor, repo()), 'user');
  });

  it('falls back to the operating kind when the repository knows it', () => {
    assert.equal(entityKindFor(specOf(descriptor, 'target'), descriptor, repo()), 'node');
    assert.equal(entityKindFor(specOf(descriptor, 'target'), descriptor, new MemoryEntityRepository()), undefined);
  });

  it('ignores non-entity contexts', () => {
    assert.equal(entityKindFor(specOf(descriptor, 'title'), descriptor, repo()), undefined);
  });

  it('resolves every entity context of an instance once', async () => {
    const r = repo();
    const instance = new CapabilityInstance({ descriptor, execute: () => ({ output: '' }) });
    instance.setContextValue('target', { type: 'integer', value: 5 });
    instance.setContextValue('title', stringValue('5'));
    await resolveEntityContexts(instance, r);
    assert.deepEqual(instance.getContextValue('target'), { type: 'entity', entity: article });
    assert.deepEqual(instance.getContextValue('title'), { type: 'string', value: '5' });
    assert.equal(r.loadCount, 1);
  });
});

import { after, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  diffConfigTrees,
  dumpCanonicalYaml,
  formatConfigDiffReport,
  normalizeConfigTree,
} from '../src/config/config-differ.js';
import { FileConfigStorage } from '../src/config/file-config-storage.js';

describe('normalizeConfigTree', () => {
  it('sorts mapping keys at every depth and keeps sequence order', () => {
    const normalized = normalizeConfigTree({ b: 1, a: { d: 1, c: 2 }, l: [{ z: 1, y: 2 }, 'k'] });
    assert.equal(JSON.stringify(normalized), '{"a":{"c":2,"d":1},"b":1,"l":[{"y":2,"z":1},"k"]}');
  });
});

describe('dumpCanonicalYaml', () => {
  it('switches to flow style below three levels', () => {
    assert.equal(dumpCanonicalYaml({ a: { b: { c: { d: 1 } } } }), 'a:\n  b:\n    c: { d: 1 }\n');
  });
});

describe('diffConfigTrees', () => {
  it('finds nothing when a tree is compared with itself', async () => {
    const tree = { a: { x: 1 }, b: { y: [1, 2] } };
    assert.deepEqual(await diffConfigTrees(tree, tree), { created: [], deleted: [], updated: [], diffs: [] });
  });

  it('ignores key order inside nested mappings', async () => {
    const result = await diffConfigTrees({ a: { x: 1, y: { p: 1, q: 2 } } }, { a: { y: { q: 2, p: 1 }, x: 1 } });
    assert.deepEqual(result.updated, []);
  });

  it('reports items only present on one side', async () => {
    const result = await diffConfigTrees({ a: { x: 1, y: 2 } }, { a: { y: 2, x: 1 }, b: { z: 9 } });
    assert.deepEqual(result.created, []);
    assert.deepEqual(result.deleted, ['b']);
    assert.deepEqual(result.updated, []);
  });

  it('diffs updated items from staging to active', async () => {
    const result = await diffConfigTrees({ a: { x: 1 } }, { a: { x: 2 } });
    assert.deepEqual(result.updated, ['a']);
    assert.deepEqual(result.diffs[0]?.lines, [
      { kind: 'del', text: 'x: 2' },
      { kind: 'add', text: 'x: 1' },
    ]);
  });

  it('keeps one line of context around each change', async () => {
    const staging = { a: { k1: 1, k2: 2, k3: 30, k4: 4, k5: 5 } };
    const active = { a: { k1: 1, k2: 2, k3: 3, k4: 4, k5: 5 } };
    const result = await diffConfigTrees(active, staging);
    assert.deepEqual(result.diffs[0]?.hunks[0]?.lines, [
      { kind: 'context', text: 'k2: 2' },
      { kind: 'del', text: 'k3: 30' },
      { kind: 'add', text: 'k3: 3' },
      { kind: 'context', text: 'k4: 4' },
    ]);
  });

  it('lists names in each store\'s enumeration order', async () => {
    const result = await diffConfigTrees(
      { z: { v: 1 }, m: { v: 1 }, shared2: { v: 2 }, shared1: { v: 2 } },
      { shared1: { v: 1 }, y: { v: 1 }, shared2: { v: 1 }, b: { v: 1 } }
    );
    assert.deepEqual(result.created, ['z', 'm']);
    assert.deepEqual(result.deleted, ['y', 'b']);
    assert.deepEqual(result.updated, ['shared1', 'shared2']);
  });

  it('skips items where either side is not a mapping', async () => {
    const result = await diffConfigTrees({ a: [1, 2], b: { x: 1 } }, { a: { x: 1 }, b: 'text' });
    assert.deepEqual(result.updated, []);
    assert.deepEqual(result.created, []);
    assert.deepEqual(result.deleted, []);
  });
});

describe('formatConfigDiffReport', () => {
  it('lists names and appends the line diffs as YAML', async () => {
    const result = await diffConfigTrees({ a: { x: 1 }, c: { n: 1 } }, { a: { x: 2 }, b: { z: 9 } });
    const report = formatConfigDiffReport(result);
    const header = 'CREATED:\n + c\n\nDELETED:\n - b\n\nUPDATED:\n * a\n';
    assert.equal(report.slice(0, header.length), header);
    assert.deepEqual(parseYaml(report.slice(header.length)), { a: '-x: 2\n+x: 1' });
  });

  it('stops after the lists when nothing changed', async () => {
    const result = await diffConfigTrees({}, { b: { z: 9 } });
    assert.equal(formatConfigDiffReport(result), 'CREATED:\n\nDELETED:\n - b\n\nUPDATED:\n');
  });
});

describe('FileConfigStorage', () => {
  const dirs: string[] = [];
  after(async () => {
    await Promise.all(dirs.map((d) => fs.rm(d, { recursive: true, force: true })));
  });

  it('reads one tree per yml file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-storage-'));
    dirs.push(dir);
    await fs.writeFile(path.join(dir, 'system.site.yml'), 'name: Example\npage:\n  front: /home\n');
    await fs.writeFile(path.join(dir, 'core.extension.yml'), 'module:\n  node: 0\n');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'ignored');

    const storage = new FileConfigStorage({ directory: dir });
    assert.deepEqual(await storage.listAll(), ['core.extension', 'system.site']);
    assert.deepEqual(await storage.read('system.site'), { name: 'Example', page: { front: '/home' } });
    assert.equal(await storage.read('missing'), undefined);
    assert.equal(await storage.read('../system.site'), undefined);
  });

  it('treats a missing directory as empty', async () => {
    const storage = new FileConfigStorage({ directory: path.join(os.tmpdir(), 'config-storage-absent-dir') });
    assert.deepEqual(await storage.listAll(), []);
  });
});

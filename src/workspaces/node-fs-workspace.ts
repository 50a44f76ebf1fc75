import fs from 'node:fs/promises';
import path from 'node:path';
import { InvalidInputError } from '../core/errors.js';
import type { StatLike, WorkspacePort } from './workspace.js';

/** Confined to `rootDir`: paths resolving outside it are rejected. */
export class NodeFsWorkspace implements WorkspacePort {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  private resolve(p: string): string {
    const abs = path.resolve(this.rootDir, p);
    if (abs !== this.rootDir && !abs.startsWith(this.rootDir + path.sep)) {
      throw new InvalidInputError(`Path escapes the workspace: ${p}`);
    }
    return abs;
  }

  async readFile(p: string): Promise<Uint8Array> {
    return await fs.readFile(this.resolve(p));
  }

  async writeFile(p: string, contents: Uint8Array): Promise<void> {
    const abs = this.resolve(p);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, contents);
  }

  async stat(p: string): Promise<StatLike | null> {
    const abs = this.resolve(p);
    try {
      const s = await fs.stat(abs);
      return { isFile: s.isFile(), isDirectory: s.isDirectory(), mtimeMs: s.mtimeMs, size: s.size };
    } catch (e) {
      if (typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT') return null;
      throw e;
    }
  }
}

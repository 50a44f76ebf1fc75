import type { StatLike, WorkspacePort } from './workspace.js';

export class MemoryWorkspace implements WorkspacePort {
  private readonly files = new Map<string, Uint8Array>();

  constructor(initial: Record<string, string> = {}) {
    const enc = new TextEncoder();
    for (const [p, text] of Object.entries(initial)) this.files.set(normalize(p), enc.encode(text));
  }

  async readFile(p: string): Promise<Uint8Array> {
    const data = this.files.get(normalize(p));
    if (!data) throw new Error(`ENOENT: ${p}`);
    return data.slice();
  }

  async writeFile(p: string, contents: Uint8Array): Promise<void> {
    this.files.set(normalize(p), contents.slice());
  }

  async stat(p: string): Promise<StatLike | null> {
    const target = normalize(p);
    const data = this.files.get(target);
    if (data) return { isFile: true, isDirectory: false, size: data.byteLength };
    for (const key of this.files.keys()) {
      if (key.startsWith(`${target}/`)) return { isFile: false, isDirectory: true };
    }
    return null;
  }

  paths(): string[] {
    return [...this.files.keys()].sort();
  }
}

function normalize(p: string): string {
  return p.replace(/\\/g, '/').replace(/^\.\//, '').replace(/\/+/g, '/').replace(/\/$/, '');
}

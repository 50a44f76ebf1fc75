import type { FileChange, FileChangeKind } from '../core/types.js';

export interface StatLike {
  isFile: boolean;
  isDirectory: boolean;
  mtimeMs?: number;
  size?: number;
}

/**
 * File access for capabilities that write into the project tree. Paths are
 * relative to the workspace root.
 */
export interface WorkspacePort {
  readFile(path: string): Promise<Uint8Array>;
  writeFile(path: string, contents: Uint8Array): Promise<void>;
  stat(path: string): Promise<StatLike | null>;
}

export function fileChange(kind: FileChangeKind, path: string): FileChange {
  return { kind, path };
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export async function readText(ws: WorkspacePort, path: string): Promise<string> {
  return decoder.decode(await ws.readFile(path));
}

export async function writeText(ws: WorkspacePort, path: string, text: string): Promise<void> {
  await ws.writeFile(path, encoder.encode(text));
}

/**
 * Resolves module names to directories within the workspace.
 */
export interface ModuleLocator {
  exists(module: string): boolean;
  getPath(module: string): string | undefined;
}

export class StaticModuleLocator implements ModuleLocator {
  private readonly modules: ReadonlyMap<string, string>;

  constructor(modules: Record<string, string> = {}) {
    this.modules = new Map(Object.entries(modules).map(([name, dir]) => [name, dir.replace(/\/+$/, '')]));
  }

  exists(module: string): boolean {
    return this.modules.has(module);
  }

  getPath(module: string): string | undefined {
    return this.modules.get(module);
  }
}

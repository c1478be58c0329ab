/**
 * Per-unit import bookkeeping
 */

export type ImportUsage = "type" | "value";

/**
 * Collects the modules a generated unit refers to. Every reference made
 * through the type mapper lands here; rendering happens once the unit body
 * is complete.
 */
export class ImportSet {
  private readonly named = new Map<string, Map<string, ImportUsage>>();
  private readonly namespaceImports = new Map<string, string>();

  /**
   * Record a named import from a sibling module. A name used as a value
   * anywhere is imported as a value.
   */
  addNamed(moduleName: string, name: string, usage: ImportUsage): void {
    let names = this.named.get(moduleName);
    if (!names) {
      names = new Map();
      this.named.set(moduleName, names);
    }
    if (names.get(name) !== "value") {
      names.set(name, usage);
    }
  }

  addNamespace(alias: string, specifier: string): void {
    this.namespaceImports.set(alias, specifier);
  }

  get isEmpty(): boolean {
    return this.named.size === 0 && this.namespaceImports.size === 0;
  }

  /**
   * Import statements in a stable order: runtime, namespace imports, then
   * sibling modules, each sorted by name
   */
  render(runtimeModule: string): string[] {
    const lines = [`import * as $rt from ${JSON.stringify(runtimeModule)};`];

    const aliases = [...this.namespaceImports.keys()].sort();
    for (const alias of aliases) {
      lines.push(
        `import * as ${alias} from ${JSON.stringify(this.namespaceImports.get(alias))};`,
      );
    }

    const modules = [...this.named.keys()].sort();
    for (const moduleName of modules) {
      const names = this.named.get(moduleName);
      if (!names) {
        continue;
      }
      const specifiers = [...names.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([name, usage]) => (usage === "type" ? `type ${name}` : name));
      lines.push(
        `import { ${specifiers.join(", ")} } from ${JSON.stringify(`./${moduleName}.js`)};`,
      );
    }

    return lines;
  }
}

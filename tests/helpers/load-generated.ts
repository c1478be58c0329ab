/**
 * Evaluates generated bindings in process
 *
 * Units are transpiled to CommonJS with the compiler API and wired together
 * through a small module table; the runtime specifier resolves to the real
 * runtime sources, so errors thrown by generated code are the classes the
 * tests import.
 */

import ts from 'typescript';
import { posix } from 'path';
import * as runtime from '../../src/runtime/index.js';
import { DEFAULT_RUNTIME_MODULE } from '../../src/lib/synthesizer/index.js';
import type { EmissionUnit } from '../../src/lib/emitter/types.js';
import type { WireObject, WireValue } from '../../src/runtime/index.js';

export type ModuleExports = Record<string, unknown>;

export class GeneratedBindings {
  private readonly sources = new Map<string, string>();
  private readonly cache = new Map<string, ModuleExports>();

  constructor(units: readonly EmissionUnit[], private readonly runtimeModule = DEFAULT_RUNTIME_MODULE) {
    for (const unit of units) {
      this.sources.set(unit.path, unit.code);
    }
  }

  /**
   * Exports of a unit, by its path relative to the output root
   */
  load(path: string): ModuleExports {
    const cached = this.cache.get(path);
    if (cached) {
      return cached;
    }

    const source = this.sources.get(path);
    if (source === undefined) {
      throw new Error(`No generated unit at ${path}`);
    }

    const output = ts.transpileModule(source, {
      fileName: path,
      reportDiagnostics: true,
      compilerOptions: {
        module: ts.ModuleKind.CommonJS,
        target: ts.ScriptTarget.ES2022,
      },
    });
    const problems = output.diagnostics ?? [];
    if (problems.length > 0) {
      const messages = problems.map((d) => ts.flattenDiagnosticMessageText(d.messageText, '\n'));
      throw new Error(`${path} does not transpile: ${messages.join('; ')}`);
    }

    // Registered before running so that import cycles see the partial exports
    const exports: ModuleExports = {};
    this.cache.set(path, exports);

    const run = new Function('exports', 'require', output.outputText);
    const require = (specifier: string): unknown => this.resolve(path, specifier);
    Reflect.apply(run, undefined, [exports, require]);
    return exports;
  }

  /**
   * One export of a unit
   */
  get(path: string, name: string): unknown {
    const value = this.load(path)[name];
    if (value === undefined) {
      throw new Error(`${path} does not export ${name}`);
    }
    return value;
  }

  private resolve(from: string, specifier: string): unknown {
    if (specifier === this.runtimeModule) {
      return runtime;
    }
    if (!specifier.startsWith('.')) {
      throw new Error(`Generated code imports unexpected module ${specifier}`);
    }
    const target = posix.normalize(posix.join(posix.dirname(from), specifier)).replace(/\.js$/, '.ts');
    return this.load(target);
  }
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

/**
 * Read a property off a generated value
 */
export function prop(target: unknown, name: string): unknown {
  if (!isObjectLike(target)) {
    throw new Error(`Cannot read ${name} of ${String(target)}`);
  }
  return Reflect.get(target, name);
}

/**
 * `new ctor(...args)` for a generated class
 */
export function construct(ctor: unknown, ...args: unknown[]): unknown {
  if (typeof ctor !== 'function') {
    throw new Error(`${String(ctor)} is not a class`);
  }
  const instance: unknown = Reflect.construct(ctor, args);
  return instance;
}

/**
 * `target.method(...args)`, for static and instance methods alike
 */
export function invoke(target: unknown, method: string, ...args: unknown[]): unknown {
  const fn = prop(target, method);
  if (typeof fn !== 'function') {
    throw new Error(`${method} is not a function`);
  }
  const result: unknown = Reflect.apply(fn, target, args);
  return result;
}

/**
 * Encode through a generated class's or namespace's `encode`
 */
export function encode(codec: unknown, value: unknown): WireObject {
  const writer = new runtime.ObjectWriter();
  invoke(codec, 'encode', value, writer);
  return writer.toWire();
}

/**
 * Decode through a generated class's or namespace's `decode`
 */
export function decode(codec: unknown, wire: WireValue): unknown {
  return invoke(codec, 'decode', runtime.ObjectReader.from(wire, 'value'));
}

/**
 * Unit tests for synthesis orchestration
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_RUNTIME_MODULE,
  computeRelatedTypes,
  createSynthesisTools,
  synthesize,
} from '../../src/lib/synthesizer/index.js';
import { SchemaContractError } from '../../src/utils/errors.js';
import { api, family, field, list, ref, struct, t, union, variant } from '../helpers/model-builders.js';

const HEADER = [
  '// <auto-generated>',
  '// Generated by bindsmith from the type model. Changes made by hand are lost',
  '// the next time the bindings are generated.',
  '// </auto-generated>',
].join('\n');

function geometry() {
  const point = struct('geometry', 'Point', [field('x', t.int32), field('y', t.int32)]);
  const shape = struct('geometry', 'Shape');
  const circle = struct('geometry', 'Circle', [field('center', ref(point))]);
  family(shape, [['circle', circle]]);
  const polygon = struct('geometry', 'Polygon', [field('points', list(ref(point)))]);
  return { point, shape, circle, polygon };
}

describe('synthesize', () => {
  it('should emit one unit per type, then the barrels', () => {
    const { point, shape, circle } = geometry();
    const color = union('paint', 'Color', [variant('red')]);
    const result = synthesize(api(['geometry', [point, shape, circle]], ['paint', [color]]));

    expect(result.units.map((unit) => unit.path)).toEqual([
      'geometry/Point.ts',
      'geometry/Shape.ts',
      'geometry/Circle.ts',
      'geometry/index.ts',
      'paint/Color.ts',
      'paint/index.ts',
      'index.ts',
    ]);
    expect(result.metadata).toEqual({ namespaces: 2, structs: 3, unions: 1 });
  });

  it('should re-export every unit from its namespace barrel', () => {
    const { point, shape } = geometry();
    const result = synthesize(api(['geometry', [point, shape]]), { header: false });
    const barrel = result.units.find((unit) => unit.path === 'geometry/index.ts');
    expect(barrel?.code).toBe('export * from "./Point.js";\nexport * from "./Shape.js";\n');
  });

  it('should expose each namespace from the root index', () => {
    const result = synthesize(
      api(['geometry', [struct('geometry', 'Point')]], ['render_core', [struct('render_core', 'Canvas')]]),
    );
    const root = result.units.find((unit) => unit.path === 'index.ts');
    expect(root?.code).toBe(
      `${HEADER}\n\n` +
        'export * as geometry from "./geometry/index.js";\n' +
        'export * as renderCore from "./render_core/index.js";\n',
    );
  });

  it('should put the banner and imports before the body', () => {
    const { point, polygon } = geometry();
    const result = synthesize(api(['geometry', [point, polygon]]), { runtimeModule: '@acme/wire' });
    const unit = result.units.find((candidate) => candidate.path === 'geometry/Polygon.ts');
    expect(unit?.code.startsWith(
      `${HEADER}\n\n` +
        'import * as $rt from "@acme/wire";\n' +
        'import { Point } from "./Point.js";\n\n' +
        '/** The polygon object */\n',
    )).toBe(true);
  });

  it('should default the runtime module', () => {
    const result = synthesize(api(['geometry', [struct('geometry', 'Point')]]), { runtimeModule: undefined });
    expect(result.units[0].code).toContain(`import * as $rt from "${DEFAULT_RUNTIME_MODULE}";`);
    expect(DEFAULT_RUNTIME_MODULE).toBe('bindsmith/runtime');
  });

  it('should omit the banner on request', () => {
    const result = synthesize(api(['geometry', [struct('geometry', 'Point')]]), { header: false });
    expect(result.units[0].code.startsWith('import * as $rt from "bindsmith/runtime";\n\n')).toBe(true);
  });

  it('should name the type that cannot be generated', () => {
    const stray = struct('geometry', 'Stray');
    stray.isCatchAll = true;
    expect(() => synthesize(api(['geometry', [stray]]))).toThrow(
      'Cannot generate geometry.Stray: Struct "Stray" is a catch-all outside any family',
    );
  });

  it('should reject two types exporting the same name', () => {
    const shape = struct('geometry', 'Shape');
    family(shape, [['circle', struct('geometry', 'Circle')]]);
    const clash = struct('geometry', 'ShapeVariant');
    expect(() => synthesize(api(['geometry', [shape, clash]]))).toThrow(SchemaContractError);
  });

  it('should reject a namespace whose alias is the runtime alias', () => {
    expect(() => synthesize(api(['rt', [struct('rt', 'Thing')]]))).toThrow(/runtime import alias/);
  });
});

describe('computeRelatedTypes', () => {
  it('should link family members and the structs that hold a type', () => {
    const { point, shape, circle, polygon } = geometry();
    const related = computeRelatedTypes(
      { name: 'geometry', dataTypes: [point, shape, circle, polygon] },
      createSynthesisTools().names,
    );

    expect(related.get(point)).toEqual(['Circle', 'Polygon']);
    expect(related.get(shape)).toEqual(['Circle']);
    expect(related.get(circle)).toEqual(['Shape']);
    expect(related.has(polygon)).toBe(false);
  });
});

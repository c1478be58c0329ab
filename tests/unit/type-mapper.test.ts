/**
 * Unit tests for the type mapper and per-unit imports
 */

import { describe, it, expect } from 'vitest';
import { NameResolver } from '../../src/lib/naming/index.js';
import {
  ImportSet,
  TypeMapper,
  createEmitContext,
  withLocalNames,
} from '../../src/lib/type-mapper/index.js';
import { SchemaContractError } from '../../src/utils/errors.js';
import { family, list, nullable, ref, struct, t } from '../helpers/model-builders.js';

const RUNTIME_IMPORT = 'import * as $rt from "bindsmith/runtime";';

function createMapper(): TypeMapper {
  return new TypeMapper(new NameResolver());
}

describe('TypeMapper', () => {
  describe('typeName()', () => {
    it('should map scalars', () => {
      const mapper = createMapper();
      const ctx = createEmitContext('geometry', 'Shape');
      expect(mapper.typeName(t.string, ctx)).toBe('string');
      expect(mapper.typeName(t.bool, ctx)).toBe('boolean');
      expect(mapper.typeName(t.int32, ctx)).toBe('number');
      expect(mapper.typeName(t.int64, ctx)).toBe('bigint');
      expect(mapper.typeName(t.float64, ctx)).toBe('number');
      expect(mapper.typeName(t.binary, ctx)).toBe('Uint8Array');
      expect(mapper.typeName(t.timestamp, ctx)).toBe('Date');
    });

    it('should accept any iterable where a list is passed in', () => {
      const mapper = createMapper();
      const ctx = createEmitContext('geometry', 'Shape');
      expect(mapper.typeName(list(t.string), ctx, 'property')).toBe('string[]');
      expect(mapper.typeName(list(t.string), ctx, 'parameter')).toBe('Iterable<string>');
    });

    it('should store nullable lists as plain arrays', () => {
      const mapper = createMapper();
      const ctx = createEmitContext('geometry', 'Shape');
      expect(mapper.typeName(nullable(list(t.int32)), ctx, 'property')).toBe('number[]');
      expect(mapper.typeName(nullable(list(t.int32)), ctx, 'parameter')).toBe('Iterable<number> | null');
      expect(mapper.typeName(nullable(t.string), ctx, 'property')).toBe('string | null');
    });

    it('should use the runtime placeholder for void values', () => {
      const mapper = createMapper();
      const ctx = createEmitContext('geometry', 'Shape');
      expect(mapper.typeName(t.void, ctx, 'value')).toBe('$rt.Empty');
      expect(mapper.typeName(t.void, ctx, 'property')).toBe('void');
    });

    it('should refer to a family root through its variant union', () => {
      const mapper = createMapper();
      const shape = struct('geometry', 'Shape');
      const circle = struct('geometry', 'Circle');
      family(shape, [['circle', circle]]);
      const ctx = createEmitContext('geometry', 'Drawing');

      expect(mapper.typeName(ref(shape), ctx)).toBe('ShapeVariant');
      expect(ctx.imports.render('bindsmith/runtime')).toEqual([
        RUNTIME_IMPORT,
        'import { type ShapeVariant } from "./Shape.js";',
      ]);
    });
  });

  describe('composite references', () => {
    it('should import siblings by name', () => {
      const mapper = createMapper();
      const point = struct('geometry', 'Point');
      const ctx = createEmitContext('geometry', 'Segment');

      expect(mapper.typeName(ref(point), ctx)).toBe('Point');
      expect(ctx.imports.render('bindsmith/runtime')).toEqual([
        RUNTIME_IMPORT,
        'import { type Point } from "./Point.js";',
      ]);
    });

    it('should import a name as a value once any use needs the value', () => {
      const mapper = createMapper();
      const point = struct('geometry', 'Point');
      const ctx = createEmitContext('geometry', 'Segment');

      mapper.typeName(ref(point), ctx);
      expect(mapper.valueRef(point, ctx)).toBe('Point');
      mapper.typeName(ref(point), ctx);
      expect(ctx.imports.render('bindsmith/runtime')).toEqual([
        RUNTIME_IMPORT,
        'import { Point } from "./Point.js";',
      ]);
    });

    it('should not import the unit\'s own type', () => {
      const mapper = createMapper();
      const node = struct('tree', 'tree_node');
      const ctx = createEmitContext('tree', 'TreeNode');

      expect(mapper.typeName(ref(node), ctx)).toBe('TreeNode');
      expect(ctx.imports.isEmpty).toBe(true);
    });

    it('should go through the namespace barrel across namespaces', () => {
      const mapper = createMapper();
      const point = struct('geometry', 'Point');
      const ctx = createEmitContext('render_core', 'Canvas');

      expect(mapper.typeName(ref(point), ctx)).toBe('$geometry.Point');
      expect(ctx.imports.render('my-runtime')).toEqual([
        'import * as $rt from "my-runtime";',
        'import * as $geometry from "../geometry/index.js";',
      ]);
    });

    it('should qualify a reference hidden by a local name', () => {
      const mapper = createMapper();
      const point = struct('geometry', 'Point');
      const ctx = withLocalNames(createEmitContext('geometry', 'Location'), ['Point', 'Named']);

      expect(mapper.typeName(ref(point), ctx)).toBe('$geometry.Point');
      expect(ctx.imports.render('bindsmith/runtime')).toEqual([
        RUNTIME_IMPORT,
        'import * as $geometry from "./index.js";',
      ]);
    });
  });

  describe('namespaceAlias()', () => {
    it('should prefix the argument name with a dollar sign', () => {
      expect(createMapper().namespaceAlias('render_core')).toBe('$renderCore');
    });
  });

  describe('formatLiteral()', () => {
    it('should suffix 64-bit integers', () => {
      const mapper = createMapper();
      expect(mapper.formatLiteral(5n, t.int64)).toBe('5n');
      expect(mapper.formatLiteral(7, t.int32)).toBe('7');
      expect(mapper.formatLiteral(1.5, t.float64)).toBe('1.5');
    });

    it('should quote strings and spell booleans', () => {
      const mapper = createMapper();
      expect(mapper.formatLiteral('say "hi"', t.string)).toBe('"say \\"hi\\""');
      expect(mapper.formatLiteral(false, nullable(t.bool))).toBe('false');
    });

    it('should reject a literal of the wrong kind', () => {
      expect(() => createMapper().formatLiteral('seven', t.int32)).toThrow(SchemaContractError);
    });
  });

  describe('wireKind()', () => {
    it('should reject types with no scalar wire form', () => {
      expect(createMapper().wireKind(t.timestamp)).toBe('timestamp');
      expect(() => createMapper().wireKind(list(t.string))).toThrow(SchemaContractError);
    });
  });

  describe('zeroValue()', () => {
    it('should give lists and nullable fields a starting value', () => {
      const mapper = createMapper();
      expect(mapper.zeroValue(list(t.string))).toBe('[]');
      expect(mapper.zeroValue(nullable(list(t.string)))).toBe('[]');
      expect(mapper.zeroValue(nullable(t.string))).toBe('null');
      expect(mapper.zeroValue(t.string)).toBeUndefined();
    });
  });
});

describe('ImportSet', () => {
  it('should sort namespace imports and sibling modules', () => {
    const imports = new ImportSet();
    imports.addNamed('Square', 'Square', 'value');
    imports.addNamed('Circle', 'CircleFields', 'type');
    imports.addNamed('Circle', 'Circle', 'value');
    imports.addNamespace('$zoo', '../zoo/index.js');
    imports.addNamespace('$animals', '../animals/index.js');

    expect(imports.render('bindsmith/runtime')).toEqual([
      RUNTIME_IMPORT,
      'import * as $animals from "../animals/index.js";',
      'import * as $zoo from "../zoo/index.js";',
      'import { Circle, type CircleFields } from "./Circle.js";',
      'import { Square } from "./Square.js";',
    ]);
  });

  it('should never demote a value import to a type import', () => {
    const imports = new ImportSet();
    imports.addNamed('Point', 'Point', 'value');
    imports.addNamed('Point', 'Point', 'type');
    expect(imports.render('rt')).toContain('import { Point } from "./Point.js";');
  });
});

/**
 * Unit tests for the identifier engine
 */

import { describe, it, expect } from 'vitest';
import { NameResolver, NameScope, isReservedWord } from '../../src/lib/naming/index.js';

describe('NameResolver', () => {
  describe('segment()', () => {
    it('should split on slashes, underscores and camel-case boundaries', () => {
      const names = new NameResolver();
      expect(names.segment('HTTPServer/get_fileInfo')).toEqual(['http', 'server', 'get', 'file', 'info']);
    });

    it('should keep digits with the word before them', () => {
      const names = new NameResolver();
      expect(names.segment('version2Info')).toEqual(['version2', 'info']);
    });

    it('should drop empty segments', () => {
      const names = new NameResolver();
      expect(names.segment('__leading__and_trailing_')).toEqual(['leading', 'and', 'trailing']);
    });

    it.each(['HTTPServer/get_fileInfo', 'ABc', 'version2Info', '__x__', 'userID', 'plain'])(
      'should give the same segments when re-segmenting the joined words of %s',
      (name) => {
        const names = new NameResolver();
        const words = names.segment(name);
        expect(names.segment(words.join('_'))).toEqual(words);
      },
    );

    it('should memoize results per raw name', () => {
      const names = new NameResolver();
      const first = names.segment('user_id');
      expect(names.segment('user_id')).toBe(first);
      names.segment('userId');
      expect(names.size).toBe(2);
    });
  });

  describe('publicName()', () => {
    it('should give the same identifier for snake, camel and Pascal spellings', () => {
      const names = new NameResolver();
      expect(names.publicName('foo_bar')).toBe('FooBar');
      expect(names.publicName('fooBar')).toBe('FooBar');
      expect(names.publicName('FooBar')).toBe('FooBar');
    });
  });

  describe('memberName()', () => {
    it('should lower the first letter', () => {
      const names = new NameResolver();
      expect(names.memberName('display_name')).toBe('displayName');
    });

    it('should leave keywords alone', () => {
      const names = new NameResolver();
      expect(names.memberName('default')).toBe('default');
    });
  });

  describe('argName()', () => {
    it('should escape reserved words with a trailing underscore', () => {
      const names = new NameResolver();
      expect(names.argName('default')).toBe('default_');
      expect(names.argName('new')).toBe('new_');
    });

    it('should be idempotent', () => {
      const names = new NameResolver();
      const once = names.argName('default');
      expect(names.argName(once)).toBe(once);
      expect(names.argName(names.argName('class_name'))).toBe('className');
    });
  });

  describe('nameWords()', () => {
    it('should join segments with spaces', () => {
      const names = new NameResolver();
      expect(names.nameWords('getFileInfo')).toBe('get file info');
    });
  });
});

describe('isReservedWord', () => {
  it('should recognise keywords and contextual names', () => {
    expect(isReservedWord('class')).toBe(true);
    expect(isReservedWord('undefined')).toBe(true);
    expect(isReservedWord('shape')).toBe(false);
  });
});

describe('NameScope', () => {
  it('should start empty', () => {
    expect(NameScope.EMPTY.has('Circle')).toBe(false);
    expect(NameScope.EMPTY.depth).toBe(0);
  });

  it('should see names from every enclosing frame', () => {
    const outer = NameScope.EMPTY.with(['Circle']);
    const inner = outer.with(['Square']);
    expect(inner.has('Circle')).toBe(true);
    expect(inner.has('Square')).toBe(true);
    expect(inner.depth).toBe(2);
  });

  it('should leave the enclosing scope unchanged', () => {
    const outer = NameScope.EMPTY.with(['Circle']);
    outer.with(['Square']);
    expect(outer.has('Square')).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import { CodeWriter } from '../../../src/lib/emitter/code-writer.js';

describe('CodeWriter', () => {
  it('should indent block bodies by two spaces', () => {
    const writer = new CodeWriter();
    writer.block('if (ready)', () => {
      writer.block('for (const item of items)', () => writer.line('use(item);'));
    });
    expect(writer.toString()).toBe(
      'if (ready) {\n  for (const item of items) {\n    use(item);\n  }\n}\n',
    );
  });

  it('should support a custom closing line', () => {
    const writer = new CodeWriter();
    writer.block('try', () => writer.line('run();'), '} finally {');
    expect(writer.toString()).toBe('try {\n  run();\n} finally {\n');
  });

  it('should not indent blank lines', () => {
    const writer = new CodeWriter();
    writer.indented(() => writer.line('a;').line().line('b;'));
    expect(writer.toString()).toBe('  a;\n\n  b;\n');
  });

  it('should indent every line of multi-line text', () => {
    const writer = new CodeWriter();
    writer.indented(() => writer.line('call(\n  x,\n)'));
    expect(writer.toString()).toBe('  call(\n    x,\n  )\n');
  });

  it('should collapse one-line doc comments', () => {
    const writer = new CodeWriter();
    writer.docComment(['The point object']);
    expect(writer.toString()).toBe('/** The point object */\n');
  });

  it('should write multi-line doc comments with bare blank lines', () => {
    const writer = new CodeWriter();
    writer.docComment(['Summary', '', '@param x The x']);
    expect(writer.toString()).toBe('/**\n * Summary\n *\n * @param x The x\n */\n');
  });

  it('should write nothing for an empty doc comment', () => {
    const writer = new CodeWriter();
    writer.docComment([]);
    expect(writer.toString()).toBe('\n');
  });
});

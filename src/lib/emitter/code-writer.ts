/**
 * Indentation-aware text builder used by the synthesizers
 */

const INDENT = "  ";

export class CodeWriter {
  private readonly output: string[] = [];
  private depth = 0;

  /**
   * Emit text at the current indentation; an empty call emits a blank line.
   * Embedded newlines start further lines at the same depth.
   */
  line(text = ""): this {
    for (const part of text.split("\n")) {
      this.output.push(part ? INDENT.repeat(this.depth) + part : "");
    }
    return this;
  }

  indented(body: () => void): this {
    this.depth++;
    try {
      body();
    } finally {
      this.depth--;
    }
    return this;
  }

  /**
   * `header {`, indented body, then `}` (or a custom closing line such as
   * `} else {` chains)
   */
  block(header: string, body: () => void, close = "}"): this {
    this.line(`${header} {`);
    this.indented(body);
    return this.line(close);
  }

  /**
   * JSDoc comment; a single line collapses to `/** text *\/`
   */
  docComment(docLines: readonly string[]): this {
    const content = docLines.flatMap((text) => text.split("\n"));
    if (content.length === 0) {
      return this;
    }
    if (content.length === 1) {
      return this.line(`/** ${content[0]} */`);
    }
    this.line("/**");
    for (const text of content) {
      this.line(text ? ` * ${text}` : " *");
    }
    return this.line(" */");
  }

  toString(): string {
    return this.output.join("\n") + "\n";
  }
}

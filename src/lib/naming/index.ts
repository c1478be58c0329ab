/**
 * Identifier engine - turns raw schema names into TypeScript identifiers
 */

import reservedWords from "./reserved-words.json" with { type: "json" };

const RESERVED_WORDS: ReadonlySet<string> = new Set(reservedWords);

/**
 * Break before an uppercase letter that follows a lowercase letter or digit,
 * or that starts a capitalized word anywhere but the first position
 */
const CAMEL_CASE_BOUNDARY = /((?<=[a-z0-9])[A-Z]|(?!^)[A-Z](?=[a-z]))/g;

export function isReservedWord(word: string): boolean {
  return RESERVED_WORDS.has(word);
}

function capitalize(segment: string): string {
  return segment.charAt(0).toUpperCase() + segment.slice(1);
}

/**
 * Memoized name transforms for a single generation run.
 *
 * Create one resolver per run (or per worker); instances share nothing.
 */
export class NameResolver {
  private readonly segments = new Map<string, readonly string[]>();
  private readonly publicNames = new Map<string, string>();
  private readonly argNames = new Map<string, string>();

  /**
   * Split on `/`, `_` and camel-case boundaries into lowercase words
   *
   * @example
   * resolver.segment("HTTPServer/get_fileInfo"); // ["http", "server", "get", "file", "info"]
   */
  segment(name: string): readonly string[] {
    const cached = this.segments.get(name);
    if (cached) {
      return cached;
    }

    const words = name
      .replace(/\//g, "_")
      .replace(CAMEL_CASE_BOUNDARY, "_$1")
      .toLowerCase()
      .split("_")
      .filter((word) => word.length > 0);

    this.segments.set(name, words);
    return words;
  }

  /**
   * `foo_bar`, `fooBar` and `FooBar` all become `FooBar`
   */
  publicName(name: string): string {
    const cached = this.publicNames.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const result = this.segment(name).map(capitalize).join("");
    this.publicNames.set(name, result);
    return result;
  }

  /**
   * Property name: `foo_bar` becomes `fooBar`. Keywords are legal property
   * names, so nothing is escaped here.
   */
  memberName(name: string): string {
    const publicName = this.publicName(name);
    return publicName.charAt(0).toLowerCase() + publicName.slice(1);
  }

  /**
   * Parameter or local name. Reserved words get a trailing underscore, which
   * segment() discards, so applying argName twice changes nothing.
   */
  argName(name: string): string {
    const cached = this.argNames.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const member = this.memberName(name);
    const result = isReservedWord(member) ? `${member}_` : member;
    this.argNames.set(name, result);
    return result;
  }

  /**
   * Space separated words for generated prose
   */
  nameWords(name: string): string {
    return this.segment(name).join(" ");
  }

  /**
   * Number of distinct raw names segmented so far
   */
  get size(): number {
    return this.segments.size;
  }
}

/**
 * Names declared locally by the construct being generated (a union's variant
 * classes, for instance). Immutable: nesting returns a new scope and leaving
 * the construct simply drops the reference.
 */
export class NameScope {
  static readonly EMPTY = new NameScope([]);

  private constructor(private readonly frames: readonly ReadonlySet<string>[]) {}

  with(names: Iterable<string>): NameScope {
    return new NameScope([...this.frames, new Set(names)]);
  }

  has(name: string): boolean {
    return this.frames.some((frame) => frame.has(name));
  }

  get depth(): number {
    return this.frames.length;
  }
}

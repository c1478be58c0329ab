/**
 * Function signature layout
 */

const MAX_SIGNATURE_WIDTH = 100;

/**
 * `head(a, b)` on one line, or one parameter per line once that gets too wide
 */
export function renderSignature(head: string, params: readonly string[]): string {
  const single = `${head}(${params.join(", ")})`;
  if (single.length <= MAX_SIGNATURE_WIDTH || params.length < 2) {
    return single;
  }
  return `${head}(\n${params.map((param) => `  ${param},`).join("\n")}\n)`;
}

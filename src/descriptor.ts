import { NameTable } from "./types.js";

const ARRAY_MARKER = "[]";

/**
 * Single-letter descriptors of the primitive keywords.
 */
export const PRIMITIVE_DESCRIPTORS: ReadonlyMap<string, string> = new Map([
  ["int", "I"],
  ["double", "D"],
  ["boolean", "Z"],
  ["float", "F"],
  ["long", "J"],
  ["byte", "B"],
  ["short", "S"],
  ["char", "C"],
  ["void", "V"]
]);

/**
 * Remove trailing `[]` pairs from a type token.
 *
 * @param token - Raw type token such as `int[][]`.
 * @returns Token without array markers and the number of markers removed.
 */
export function stripArrayMarkers(token: string): { readonly base: string; readonly dimensions: number } {
  let base = token;
  let dimensions = 0;
  while (base.endsWith(ARRAY_MARKER)) {
    base = base.slice(0, -ARRAY_MARKER.length);
    dimensions += 1;
  }
  return { base, dimensions };
}

/**
 * Convert a dot-qualified class name into its slash-separated internal name.
 */
export function internalName(dotted: string): string {
  return dotted.replace(/\./g, "/");
}

function wrapReference(name: string): string {
  return `L${internalName(name)};`;
}

/**
 * Encode a type token as a descriptor, substituting obfuscated class names
 * found in the table.
 *
 * @param token - Primitive keyword or qualified class name, optionally followed by `[]` markers.
 * @param table - Deobfuscated-to-obfuscated class lookup; omitted during the name table pass.
 * @returns Descriptor such as `I`, `[[Lcom/example/Foo;` or `La;`.
 */
export function encodeDescriptor(token: string, table?: NameTable): string {
  const { base, dimensions } = stripArrayMarkers(token);
  let descriptor = PRIMITIVE_DESCRIPTORS.get(base) ?? wrapReference(base);
  const obfuscated = table?.get(descriptor);
  if (obfuscated !== undefined) {
    descriptor = wrapReference(obfuscated);
  }
  return "[".repeat(dimensions) + descriptor;
}

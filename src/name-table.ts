import { encodeDescriptor } from "./descriptor.js";
import { MappingLine, NameTable } from "./types.js";

/**
 * Collect every class header into a lookup keyed by the deobfuscated class
 * descriptor.
 *
 * Keys are encoded without consulting the table, so headers never resolve
 * against each other. A class declared twice keeps its last obfuscated name.
 *
 * @param lines - Classified lines of a whole mapping file.
 * @returns Table ready for the emitting pass.
 */
export function buildNameTable(lines: Iterable<MappingLine>): NameTable {
  const table: NameTable = new Map();
  for (const line of lines) {
    if (line.kind === "class") {
      table.set(encodeDescriptor(line.deobfuscated), line.obfuscated);
    }
  }
  return table;
}

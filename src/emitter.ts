import { encodeDescriptor, internalName } from "./descriptor.js";
import { MappingLine, NameTable } from "./types.js";

/**
 * Render one classified line in descriptor mapping form.
 *
 * @param line - Classified input line.
 * @param table - Complete name table of the file.
 * @returns Output line including its trailing newline, or `null` for comments and skipped lines.
 */
export function emitLine(line: MappingLine, table: NameTable): string | null {
  switch (line.kind) {
    case "class":
      return `${internalName(line.obfuscated)} ${internalName(line.deobfuscated)}\n`;
    case "method": {
      const parameters = line.parameters.map(parameter => encodeDescriptor(parameter, table)).join("");
      const returnType = encodeDescriptor(line.returnType, table);
      return `\t${line.obfuscated} (${parameters})${returnType} ${line.name}\n`;
    }
    case "field":
      return `\t${line.obfuscated} ${line.name}\n`;
    case "comment":
    case "skipped":
      return null;
  }
}

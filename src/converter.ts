import { classifyLine, splitLines } from "./classifier.js";
import { emitLine } from "./emitter.js";
import { buildNameTable } from "./name-table.js";
import { ConversionResult, ConversionStats, MappingLine } from "./types.js";

function countLines(lines: readonly MappingLine[]): ConversionStats {
  const stats = { classes: 0, methods: 0, fields: 0, comments: 0, skipped: 0 };
  for (const line of lines) {
    switch (line.kind) {
      case "class":
        stats.classes += 1;
        break;
      case "method":
        stats.methods += 1;
        break;
      case "field":
        stats.fields += 1;
        break;
      case "comment":
        stats.comments += 1;
        break;
      case "skipped":
        stats.skipped += 1;
        break;
    }
  }
  return stats;
}

/**
 * Convert ProGuard mapping text and report how many lines of each kind were seen.
 *
 * Blank lines are counted as skipped.
 *
 * @param mappings - Full mapping file contents.
 * @returns Converted text and line statistics.
 */
export function convertMappingsWithStats(mappings: string): ConversionResult {
  const lines = splitLines(mappings).map(classifyLine);
  const table = buildNameTable(lines);
  let output = "";
  for (const line of lines) {
    output += emitLine(line, table) ?? "";
  }
  return { output, stats: countLines(lines) };
}

/**
 * Convert ProGuard mapping text into descriptor mapping text.
 *
 * Class references anywhere in the file resolve to their obfuscated names,
 * including classes declared after the member that references them.
 *
 * @param mappings - Full mapping file contents.
 * @returns One output line per class, method and field, in input order.
 */
export function convertMappings(mappings: string): string {
  return convertMappingsWithStats(mappings).output;
}

import { MappingLine } from "./types.js";

export const SEPARATOR = " -> ";
const COMMENT_PREFIX = "#";
const MEMBER_INDENT = "    ";

const COMMENT: MappingLine = { kind: "comment" };
const NO_SEPARATOR: MappingLine = { kind: "skipped", reason: "no-separator" };
const MISSING_TOKENS: MappingLine = { kind: "skipped", reason: "missing-tokens" };

/**
 * Split mapping text into lines, accepting both LF and CRLF endings. A final
 * line terminator does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

function lastSegment(value: string, delimiter: string): string {
  return value.slice(value.lastIndexOf(delimiter) + 1);
}

function classifyMember(deobfuscatedSide: string, obfuscated: string): MappingLine {
  const tokens = deobfuscatedSide.split(/\s+/).filter(token => token.length > 0);
  if (tokens.length < 2) {
    return MISSING_TOKENS;
  }
  const [typeToken, nameToken] = tokens;

  if (!nameToken.includes("(") || !nameToken.includes(")")) {
    return { kind: "field", obfuscated, name: nameToken };
  }

  const openIndex = nameToken.indexOf("(");
  const afterLastOpen = lastSegment(nameToken, "(");
  const closeIndex = afterLastOpen.indexOf(")");
  const parameterList = closeIndex === -1 ? afterLastOpen : afterLastOpen.slice(0, closeIndex);

  return {
    kind: "method",
    obfuscated,
    name: nameToken.slice(0, openIndex),
    parameters: parameterList.length === 0 ? [] : parameterList.split(","),
    // `12:14:int` carries a source line range ahead of the type
    returnType: lastSegment(typeToken, ":")
  };
}

/**
 * Classify one raw mapping line.
 *
 * Lines that do not fit the grammar are reported as `skipped`; they never
 * raise.
 *
 * @param line - Line without its terminator.
 * @returns Parsed line.
 */
export function classifyLine(line: string): MappingLine {
  if (line.startsWith(COMMENT_PREFIX)) {
    return COMMENT;
  }

  const parts = line.split(SEPARATOR);
  if (parts.length < 2) {
    return NO_SEPARATOR;
  }
  const [left, right] = parts;

  if (line.startsWith(MEMBER_INDENT)) {
    return classifyMember(left.trimStart(), right.trim());
  }

  return {
    kind: "class",
    deobfuscated: left,
    obfuscated: right.trim().split(":")[0]
  };
}

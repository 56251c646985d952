import { describe, expect, it } from "vitest";
import { classifyLine, splitLines } from "../src/classifier.js";

describe("classifyLine", () => {
  it("recognises comments", () => {
    expect(classifyLine("# compiler: R8")).toEqual({ kind: "comment" });
  });

  it("parses class headers", () => {
    expect(classifyLine("com.example.Foo -> x:")).toEqual({
      kind: "class",
      deobfuscated: "com.example.Foo",
      obfuscated: "x"
    });
  });

  it("parses fields", () => {
    expect(classifyLine("    int count -> a")).toEqual({ kind: "field", obfuscated: "a", name: "count" });
  });

  it("parses methods without parameters", () => {
    expect(classifyLine("    void tick() -> b")).toEqual({
      kind: "method",
      obfuscated: "b",
      name: "tick",
      parameters: [],
      returnType: "void"
    });
  });

  it("strips line ranges from the return type", () => {
    expect(classifyLine("    12:14:com.example.Foo get(int,long[]) -> c")).toEqual({
      kind: "method",
      obfuscated: "c",
      name: "get",
      parameters: ["int", "long[]"],
      returnType: "com.example.Foo"
    });
  });

  it("keeps constructor names as written", () => {
    expect(classifyLine("    1:1:void <init>() -> <init>")).toMatchObject({ kind: "method", name: "<init>", obfuscated: "<init>" });
  });

  it("skips lines without a separator", () => {
    expect(classifyLine("")).toEqual({ kind: "skipped", reason: "no-separator" });
    expect(classifyLine("com.example.Foo x:")).toEqual({ kind: "skipped", reason: "no-separator" });
    expect(classifyLine("    # {\"fileName\":\"Foo.java\",\"id\":\"sourceFile\"}")).toEqual({
      kind: "skipped",
      reason: "no-separator"
    });
  });

  it("skips members with a single token", () => {
    expect(classifyLine("    count -> a")).toEqual({ kind: "skipped", reason: "missing-tokens" });
  });
});

describe("splitLines", () => {
  it("accepts CRLF and drops the final terminator", () => {
    expect(splitLines("a\r\nb\n")).toEqual(["a", "b"]);
    expect(splitLines("a\n\nb")).toEqual(["a", "", "b"]);
    expect(splitLines("")).toEqual([]);
  });
});

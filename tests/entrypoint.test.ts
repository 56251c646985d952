import fs from "fs-extra";
import os from "os";
import path from "path";
import { pathToFileURL } from "url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { isDirectRun } from "../src/utils/entrypoint.js";

describe("isDirectRun", () => {
  let workDir: string;
  let script: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "mappings-bin-"));
    script = path.join(workDir, "index.js");
    await fs.writeFile(script, "", "utf8");
  });

  afterEach(async () => {
    await fs.remove(workDir);
  });

  it("matches the script path itself", () => {
    expect(isDirectRun(script, pathToFileURL(script).href)).toBe(true);
  });

  it("matches a symlink to the script, as npm installs bins", async () => {
    const link = path.join(workDir, "bin", "mappings");
    await fs.ensureDir(path.dirname(link));
    await fs.symlink(script, link);

    expect(isDirectRun(link, pathToFileURL(script).href)).toBe(true);
  });

  it("rejects other scripts, missing paths and an absent argv entry", async () => {
    const other = path.join(workDir, "other.js");
    await fs.writeFile(other, "", "utf8");

    expect(isDirectRun(other, pathToFileURL(script).href)).toBe(false);
    expect(isDirectRun(path.join(workDir, "missing.js"), pathToFileURL(script).href)).toBe(false);
    expect(isDirectRun(undefined, pathToFileURL(script).href)).toBe(false);
  });
});

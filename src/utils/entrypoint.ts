import fs from "fs-extra";
import { fileURLToPath } from "url";

function realPath(file: string): string | undefined {
  // a script path that no longer resolves cannot be this module
  return fs.existsSync(file) ? fs.realpathSync(file) : undefined;
}

/**
 * Check whether a module is the script node was started with.
 *
 * Both sides are resolved through symlinks, so a bin linked into
 * `node_modules/.bin` still counts as a direct run.
 *
 * @param scriptPath - Usually `process.argv[1]`.
 * @param moduleUrl - `import.meta.url` of the candidate module.
 */
export function isDirectRun(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) {
    return false;
  }
  const script = realPath(scriptPath);
  return script !== undefined && script === realPath(fileURLToPath(moduleUrl));
}

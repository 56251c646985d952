import { Readable } from "stream";
import { downloadBytes, downloadStream } from "./api.js";
import { debug } from "./logger.js";
import { Downloadable, DownloadedLibrary, Library, LibraryDownload, LibraryFile, OsName, Rule } from "./types.js";

/**
 * Operating system of the running process in library rule terms.
 */
export function currentOs(platform: NodeJS.Platform = process.platform): OsName {
  switch (platform) {
    case "win32":
      return "windows";
    case "darwin":
      return "osx";
    default:
      return "linux";
  }
}

/**
 * Evaluate one rule for an operating system.
 *
 * An `allow` rule without an os clause allows everywhere; a `disallow` rule
 * without one disallows everywhere.
 */
export function ruleAllows(rule: Rule, os: OsName): boolean {
  if (rule.action === "allow") {
    return rule.os ? rule.os.name === os : true;
  }
  return rule.os ? rule.os.name !== os : false;
}

/**
 * Check whether every rule of a library allows the given operating system.
 */
export function libraryAllowed(library: Library, os: OsName = currentOs()): boolean {
  return library.rules.every(rule => ruleAllows(rule, os));
}

/**
 * Native classifier artifact of a library for an operating system, if any.
 */
export function libraryNative(library: Library, os: OsName = currentOs()): LibraryDownload | undefined {
  const classifier = library.natives[os];
  return classifier === undefined ? undefined : library.downloads.classifiers[classifier];
}

async function fetchLibrary<T>(
  library: Library,
  os: OsName,
  load: (artifact: Downloadable) => Promise<T>
): Promise<DownloadedLibrary<T> | null> {
  if (!libraryAllowed(library, os)) {
    debug(`Library ${library.name} not allowed on ${os}`);
    return null;
  }
  const { artifact } = library.downloads;
  const artifactFile: LibraryFile<T> = { path: artifact.path, data: await load(artifact) };
  const native = libraryNative(library, os);
  if (!native) {
    return { artifact: artifactFile };
  }
  return { artifact: artifactFile, native: { path: native.path, data: await load(native) } };
}

/**
 * Download a library and, when one exists for the platform, its natives.
 *
 * @returns `null` when the library's rules exclude the platform.
 * @throws FetchError on network or status failure.
 */
export async function downloadLibrary(library: Library, os: OsName = currentOs()): Promise<DownloadedLibrary<Buffer> | null> {
  return fetchLibrary(library, os, downloadBytes);
}

/**
 * Streaming variant of {@link downloadLibrary}.
 */
export async function downloadLibraryAsStream(
  library: Library,
  os: OsName = currentOs()
): Promise<DownloadedLibrary<Readable> | null> {
  return fetchLibrary(library, os, downloadStream);
}

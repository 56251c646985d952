#!/usr/bin/env node
import { runCli } from "./cli.js";
import { isDirectRun } from "./utils/entrypoint.js";

if (isDirectRun(process.argv[1], import.meta.url)) {
  void runCli(process.argv);
}

export { runCli };
export {
  LATEST_RELEASE,
  LATEST_SNAPSHOT,
  downloadBytes,
  downloadStream,
  downloadText,
  fetchConvertedMappings,
  fetchMappings,
  fetchRootManifest,
  fetchVersionManifest,
  findRelease,
  resolveVersion
} from "./api.js";
export { classifyLine, splitLines } from "./classifier.js";
export { convertMappings, convertMappingsWithStats } from "./converter.js";
export { PRIMITIVE_DESCRIPTORS, encodeDescriptor, internalName, stripArrayMarkers } from "./descriptor.js";
export { emitLine } from "./emitter.js";
export { FetchError } from "./errors.js";
export type { FetchFailure } from "./errors.js";
export { currentOs, downloadLibrary, downloadLibraryAsStream, libraryAllowed, libraryNative, ruleAllows } from "./libraries.js";
export { buildNameTable } from "./name-table.js";
export * from "./types.js";

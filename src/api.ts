import { Readable } from "stream";
import { SOURCES } from "./config.js";
import { convertMappings } from "./converter.js";
import { toRootManifest, toVersionManifest } from "./decode.js";
import { debug, info } from "./logger.js";
import { getBinary, getJson, getStream, getText } from "./utils/http.js";
import { Downloadable, JsonValue, MappingSide, RootManifest, VersionManifest, VersionRelease } from "./types.js";

/**
 * Aliases accepted wherever a version id is expected.
 */
export const LATEST_RELEASE = "latest-release";
export const LATEST_SNAPSHOT = "latest-snapshot";

/**
 * Download and decode the root version list.
 *
 * @param url - Manifest location; defaults to the configured source.
 * @returns Latest ids and every published version.
 * @throws FetchError on network, status or decode failure.
 */
export async function fetchRootManifest(url: string = SOURCES.MANIFEST): Promise<RootManifest> {
  const response = await getJson<JsonValue>(url);
  const manifest = toRootManifest(response.data, url);
  debug(`Root manifest lists ${manifest.versions.length} versions (latest ${manifest.latest.release})`);
  return manifest;
}

/**
 * Download and decode a per-version manifest.
 *
 * @param release - Root manifest entry or direct manifest URL.
 * @throws FetchError on network, status or decode failure.
 */
export async function fetchVersionManifest(release: VersionRelease | string): Promise<VersionManifest> {
  const url = typeof release === "string" ? release : release.url;
  const response = await getJson<JsonValue>(url);
  const manifest = toVersionManifest(response.data, url);
  debug(`Version manifest ${manifest.id} lists ${manifest.libraries.length} libraries`);
  return manifest;
}

/**
 * Download an artifact into memory.
 *
 * @throws FetchError on network or status failure.
 */
export async function downloadBytes(artifact: Downloadable): Promise<Buffer> {
  const response = await getBinary(artifact.url);
  return response.data;
}

/**
 * Open an artifact as a stream of chunks.
 *
 * @throws FetchError on network or status failure.
 */
export async function downloadStream(artifact: Downloadable): Promise<Readable> {
  const response = await getStream(artifact.url);
  return response.data;
}

/**
 * Download an artifact as UTF-8 text.
 *
 * @throws FetchError on network or status failure.
 */
export async function downloadText(artifact: Downloadable): Promise<string> {
  const response = await getText(artifact.url);
  return response.data;
}

/**
 * Look up a version in the root manifest.
 *
 * @param manifest - Root manifest.
 * @param id - Version id, `latest-release` or `latest-snapshot`.
 * @returns Matching entry, or undefined when the version is not listed.
 */
export function findRelease(manifest: RootManifest, id: string): VersionRelease | undefined {
  const resolved =
    id === LATEST_RELEASE ? manifest.latest.release : id === LATEST_SNAPSHOT ? manifest.latest.snapshot : id;
  return manifest.versions.find(version => version.id === resolved);
}

/**
 * Resolve a version id through the root manifest and fetch its manifest.
 *
 * @param id - Version id or latest alias.
 * @throws Error when the version is not listed.
 */
export async function resolveVersion(id: string): Promise<VersionManifest> {
  const root = await fetchRootManifest();
  const release = findRelease(root, id);
  if (!release) {
    throw new Error(`Unknown version: ${id}`);
  }
  return fetchVersionManifest(release);
}

/**
 * Download the raw ProGuard mappings of a version.
 *
 * @param id - Version id or latest alias.
 * @param side - Which distribution's mappings to fetch.
 */
export async function fetchMappings(id: string, side: MappingSide): Promise<string> {
  const manifest = await resolveVersion(id);
  const download = side === "client" ? manifest.downloads.client_mappings : manifest.downloads.server_mappings;
  info(`Downloading ${side} mappings for ${manifest.id} (${download.size} bytes)`);
  return downloadText(download);
}

/**
 * Download a version's ProGuard mappings and convert them to descriptor form.
 *
 * @param id - Version id or latest alias.
 * @param side - Which distribution's mappings to fetch.
 */
export async function fetchConvertedMappings(id: string, side: MappingSide): Promise<string> {
  return convertMappings(await fetchMappings(id, side));
}

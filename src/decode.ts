import { FetchError } from "./errors.js";
import {
  DownloadInfo,
  JsonValue,
  Library,
  LibraryDownload,
  OS_NAMES,
  OsName,
  RELEASE_KINDS,
  RootManifest,
  Rule,
  RULE_ACTIONS,
  VersionDownloads,
  VersionManifest,
  VersionRelease
} from "./types.js";

type JsonRecord = { readonly [key: string]: JsonValue };

/**
 * Position inside a payload, used for error messages.
 */
interface Where {
  readonly url: string;
  readonly path: string;
}

function isRecord(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(where: Where, key: string | number): Where {
  return { url: where.url, path: typeof key === "number" ? `${where.path}[${key}]` : `${where.path}.${key}` };
}

function fail(where: Where, expected: string): never {
  throw new FetchError("decode", where.url, `Malformed payload from ${where.url}: expected ${expected} at ${where.path}`);
}

function asRecord(value: JsonValue, where: Where): JsonRecord {
  return isRecord(value) ? value : fail(where, "an object");
}

function asArray(value: JsonValue, where: Where): readonly JsonValue[] {
  return Array.isArray(value) ? value : fail(where, "an array");
}

function asString(value: JsonValue, where: Where): string {
  return typeof value === "string" ? value : fail(where, "a string");
}

function asCount(value: JsonValue, where: Where): number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : fail(where, "a non-negative integer");
}

function asUrl(value: JsonValue, where: Where): string {
  const text = asString(value, where);
  return URL.canParse(text) ? text : fail(where, "an absolute URL");
}

function asDate(value: JsonValue, where: Where): Date {
  const parsed = new Date(asString(value, where));
  return Number.isNaN(parsed.getTime()) ? fail(where, "a timestamp") : parsed;
}

function asOneOf<T extends string>(value: JsonValue, allowed: readonly T[], where: Where): T {
  const match = allowed.find(candidate => candidate === value);
  return match ?? fail(where, `one of ${allowed.join(", ")}`);
}

function toVersionRelease(value: JsonValue, where: Where): VersionRelease {
  const raw = asRecord(value, where);
  return {
    id: asString(raw.id, child(where, "id")),
    type: asOneOf(raw.type, RELEASE_KINDS, child(where, "type")),
    url: asUrl(raw.url, child(where, "url")),
    time: asDate(raw.time, child(where, "time")),
    releaseTime: asDate(raw.releaseTime, child(where, "releaseTime")),
    sha1: asString(raw.sha1, child(where, "sha1")),
    complianceLevel: asCount(raw.complianceLevel, child(where, "complianceLevel"))
  };
}

/**
 * Validate and convert the root version list.
 *
 * @param value - Parsed JSON body.
 * @param url - Source URL, reported on failure.
 * @throws FetchError with reason `decode` when the payload does not match.
 */
export function toRootManifest(value: JsonValue, url: string): RootManifest {
  const root: Where = { url, path: "$" };
  const raw = asRecord(value, root);
  const latest = asRecord(raw.latest, child(root, "latest"));
  const versionsWhere = child(root, "versions");
  return {
    latest: {
      release: asString(latest.release, child(child(root, "latest"), "release")),
      snapshot: asString(latest.snapshot, child(child(root, "latest"), "snapshot"))
    },
    versions: asArray(raw.versions, versionsWhere).map((entry, index) => toVersionRelease(entry, child(versionsWhere, index)))
  };
}

function toDownloadInfo(value: JsonValue, where: Where): DownloadInfo {
  const raw = asRecord(value, where);
  return {
    sha1: asString(raw.sha1, child(where, "sha1")),
    size: asCount(raw.size, child(where, "size")),
    url: asUrl(raw.url, child(where, "url"))
  };
}

function toLibraryDownload(value: JsonValue, where: Where): LibraryDownload {
  const raw = asRecord(value, where);
  return {
    ...toDownloadInfo(raw, where),
    path: asString(raw.path, child(where, "path"))
  };
}

function toVersionDownloads(value: JsonValue, where: Where): VersionDownloads {
  const raw = asRecord(value, where);
  return {
    client: toDownloadInfo(raw.client, child(where, "client")),
    client_mappings: toDownloadInfo(raw.client_mappings, child(where, "client_mappings")),
    server: toDownloadInfo(raw.server, child(where, "server")),
    server_mappings: toDownloadInfo(raw.server_mappings, child(where, "server_mappings"))
  };
}

function toRule(value: JsonValue, where: Where): Rule {
  const raw = asRecord(value, where);
  const action = asOneOf(raw.action, RULE_ACTIONS, child(where, "action"));
  if (raw.os === undefined) {
    return { action };
  }
  const os = asRecord(raw.os, child(where, "os"));
  return { action, os: { name: asOneOf(os.name, OS_NAMES, child(child(where, "os"), "name")) } };
}

function toLibrary(value: JsonValue, where: Where): Library {
  const raw = asRecord(value, where);
  const downloadsWhere = child(where, "downloads");
  const downloads = asRecord(raw.downloads, downloadsWhere);

  const classifiers: { [classifier: string]: LibraryDownload } = {};
  if (downloads.classifiers !== undefined) {
    const classifiersWhere = child(downloadsWhere, "classifiers");
    for (const [name, entry] of Object.entries(asRecord(downloads.classifiers, classifiersWhere))) {
      classifiers[name] = toLibraryDownload(entry, child(classifiersWhere, name));
    }
  }

  const natives: Partial<Record<OsName, string>> = {};
  if (raw.natives !== undefined) {
    const nativesWhere = child(where, "natives");
    const rawNatives = asRecord(raw.natives, nativesWhere);
    for (const os of OS_NAMES) {
      if (rawNatives[os] !== undefined) {
        natives[os] = asString(rawNatives[os], child(nativesWhere, os));
      }
    }
  }

  let exclude: readonly string[] = [];
  if (raw.extract !== undefined) {
    const extractWhere = child(where, "extract");
    const extract = asRecord(raw.extract, extractWhere);
    const excludeWhere = child(extractWhere, "exclude");
    exclude = asArray(extract.exclude, excludeWhere).map((entry, index) => asString(entry, child(excludeWhere, index)));
  }

  const rulesWhere = child(where, "rules");
  const rules = raw.rules === undefined ? [] : asArray(raw.rules, rulesWhere).map((entry, index) => toRule(entry, child(rulesWhere, index)));

  return {
    name: asString(raw.name, child(where, "name")),
    downloads: {
      artifact: toLibraryDownload(downloads.artifact, child(downloadsWhere, "artifact")),
      classifiers
    },
    extract: { exclude },
    natives,
    rules
  };
}

/**
 * Validate and convert a per-version manifest.
 *
 * @param value - Parsed JSON body.
 * @param url - Source URL, reported on failure.
 * @throws FetchError with reason `decode` when the payload does not match.
 */
export function toVersionManifest(value: JsonValue, url: string): VersionManifest {
  const root: Where = { url, path: "$" };
  const raw = asRecord(value, root);
  const librariesWhere = child(root, "libraries");
  return {
    id: asString(raw.id, child(root, "id")),
    downloads: toVersionDownloads(raw.downloads, child(root, "downloads")),
    libraries: asArray(raw.libraries, librariesWhere).map((entry, index) => toLibrary(entry, child(librariesWhere, index)))
  };
}

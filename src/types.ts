/**
 * JSON-like value type used for permissive properties without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

export const RELEASE_KINDS = ["snapshot", "release", "old_beta", "old_alpha"] as const;

/**
 * Release channel a version belongs to.
 */
export type ReleaseKind = (typeof RELEASE_KINDS)[number];

export const OS_NAMES = ["linux", "windows", "osx"] as const;

/**
 * Operating system identifiers used by library rules and natives.
 */
export type OsName = (typeof OS_NAMES)[number];

/**
 * Latest version ids advertised by the root manifest.
 *
 * @property release - Id of the newest stable release.
 * @property snapshot - Id of the newest snapshot.
 */
export interface LatestReleases {
  readonly release: string;
  readonly snapshot: string;
}

/**
 * Entry of the root manifest pointing at a per-version manifest.
 *
 * @property id - Version identifier, e.g. `1.20.4`.
 * @property type - Release channel.
 * @property url - Location of the per-version manifest.
 * @property time - Last update of the version manifest.
 * @property releaseTime - Publication time.
 * @property sha1 - Hash of the per-version manifest as published.
 * @property complianceLevel - Player safety compliance level.
 */
export interface VersionRelease {
  readonly id: string;
  readonly type: ReleaseKind;
  readonly url: string;
  readonly time: Date;
  readonly releaseTime: Date;
  readonly sha1: string;
  readonly complianceLevel: number;
}

/**
 * Root version list.
 */
export interface RootManifest {
  readonly latest: LatestReleases;
  readonly versions: readonly VersionRelease[];
}

/**
 * Any remote artifact that can be downloaded.
 */
export interface Downloadable {
  readonly url: string;
}

/**
 * Download descriptor of a top-level artifact (jar or mappings file).
 */
export interface DownloadInfo extends Downloadable {
  readonly sha1: string;
  readonly size: number;
}

/**
 * The four artifacts published for every version that ships mappings.
 */
export interface VersionDownloads {
  readonly client: DownloadInfo;
  readonly client_mappings: DownloadInfo;
  readonly server: DownloadInfo;
  readonly server_mappings: DownloadInfo;
}

export const ARTIFACT_NAMES = ["client", "client_mappings", "server", "server_mappings"] as const;

export type ArtifactName = (typeof ARTIFACT_NAMES)[number];

export const MAPPING_SIDES = ["client", "server"] as const;

export type MappingSide = (typeof MAPPING_SIDES)[number];

/**
 * Library file with its path inside a maven-style repository layout.
 */
export interface LibraryDownload extends DownloadInfo {
  readonly path: string;
}

export interface LibraryDownloads {
  readonly artifact: LibraryDownload;
  readonly classifiers: { readonly [classifier: string]: LibraryDownload };
}

export interface LibraryExtractInstructions {
  readonly exclude: readonly string[];
}

export interface OsRule {
  readonly name: OsName;
}

export const RULE_ACTIONS = ["allow", "disallow"] as const;

/**
 * Platform rule attached to a library. A rule without `os` applies everywhere.
 */
export interface Rule {
  readonly action: (typeof RULE_ACTIONS)[number];
  readonly os?: OsRule;
}

/**
 * Library required by a version.
 *
 * @property name - Maven coordinate.
 * @property downloads - Main artifact and classifier artifacts.
 * @property extract - Entries to skip when unpacking natives.
 * @property natives - Classifier name to use per operating system.
 * @property rules - Platform rules; all must allow for the library to apply.
 */
export interface Library {
  readonly name: string;
  readonly downloads: LibraryDownloads;
  readonly extract: LibraryExtractInstructions;
  readonly natives: Partial<Record<OsName, string>>;
  readonly rules: readonly Rule[];
}

/**
 * Per-version manifest. Only the fields this tool consumes are modelled.
 */
export interface VersionManifest {
  readonly id: string;
  readonly downloads: VersionDownloads;
  readonly libraries: readonly Library[];
}

/**
 * A downloaded file together with its repository-relative path.
 */
export interface LibraryFile<T> {
  readonly path: string;
  readonly data: T;
}

export interface DownloadedLibrary<T> {
  readonly artifact: LibraryFile<T>;
  readonly native?: LibraryFile<T>;
}

/**
 * Lookup from the descriptor of a deobfuscated class name (`Lcom/example/Foo;`)
 * to the obfuscated class name declared for it.
 */
export type NameTable = Map<string, string>;

export interface CommentLine {
  readonly kind: "comment";
}

/**
 * `com.example.Foo -> x:`
 */
export interface ClassHeader {
  readonly kind: "class";
  readonly deobfuscated: string;
  readonly obfuscated: string;
}

/**
 * `    12:14:com.example.Foo get(int,long[]) -> c`
 */
export interface MethodMember {
  readonly kind: "method";
  readonly obfuscated: string;
  readonly name: string;
  readonly parameters: readonly string[];
  readonly returnType: string;
}

/**
 * `    int count -> a`
 */
export interface FieldMember {
  readonly kind: "field";
  readonly obfuscated: string;
  readonly name: string;
}

export type SkipReason = "no-separator" | "missing-tokens";

export interface SkippedLine {
  readonly kind: "skipped";
  readonly reason: SkipReason;
}

export type MappingLine = CommentLine | ClassHeader | MethodMember | FieldMember | SkippedLine;

/**
 * Line counts collected while converting.
 */
export interface ConversionStats {
  readonly classes: number;
  readonly methods: number;
  readonly fields: number;
  readonly comments: number;
  readonly skipped: number;
}

export interface ConversionResult {
  readonly output: string;
  readonly stats: ConversionStats;
}

import { Command, Option } from "commander";
import fs from "fs-extra";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { downloadStream, fetchMappings, fetchRootManifest, resolveVersion } from "./api.js";
import { convertMappingsWithStats } from "./converter.js";
import { currentOs, downloadLibrary, libraryAllowed, libraryNative } from "./libraries.js";
import { debug, error as logError, info, setLogLevel, warn } from "./logger.js";
import {
  ARTIFACT_NAMES,
  ArtifactName,
  ConversionStats,
  LibraryFile,
  MAPPING_SIDES,
  MappingSide,
  OS_NAMES,
  OsName,
  RELEASE_KINDS,
  ReleaseKind
} from "./types.js";

export interface ListOptions {
  readonly type?: ReleaseKind;
  readonly limit: number;
}

export interface ConvertOptions {
  readonly output?: string;
  readonly stats?: boolean;
}

export interface FetchOptions extends ConvertOptions {
  readonly side: MappingSide;
  readonly raw?: boolean;
}

export interface LibraryOptions {
  readonly os: OsName;
}

export interface LibraryDownloadOptions extends LibraryOptions {
  readonly dir: string;
}

export interface ArtifactOptions {
  readonly output: string;
}

const STDIN = "-";

/**
 * Parse a `--limit` style option value.
 *
 * @throws Error unless the value is a positive decimal integer.
 */
export function parseCount(value: string): number {
  const parsed = /^\d+$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, received ${value}`);
  }
  return parsed;
}

async function readInput(input: string, stdin: Readable): Promise<string> {
  if (input !== STDIN) {
    return fs.readFile(input, "utf8");
  }
  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function writeOutput(text: string, output: string | undefined): Promise<void> {
  if (!output) {
    process.stdout.write(text);
    return;
  }
  await fs.outputFile(output, text, "utf8");
  info(`Wrote ${output}`);
}

function reportStats(label: string, stats: ConversionStats, verbose: boolean): void {
  const summary = `${label} classes=${stats.classes} methods=${stats.methods} fields=${stats.fields} comments=${stats.comments} skipped=${stats.skipped}`;
  if (verbose) {
    info(summary);
  } else {
    debug(summary);
  }
}

/**
 * Convert mapping text and write the result.
 *
 * @param mappings - ProGuard mapping text.
 * @param options - Output location and statistics flag.
 */
export async function writeConverted(mappings: string, options: ConvertOptions): Promise<void> {
  const { output, stats } = convertMappingsWithStats(mappings);
  reportStats("Converted", stats, options.stats ?? false);
  await writeOutput(output, options.output);
}

/**
 * List versions from the root manifest, newest first as published.
 */
export async function listVersionsAction(options: ListOptions): Promise<void> {
  const manifest = await fetchRootManifest();
  const versions = manifest.versions.filter(version => !options.type || version.type === options.type);
  console.table(
    versions.slice(0, options.limit).map(version => ({
      id: version.id,
      type: version.type,
      released: version.releaseTime.toISOString()
    }))
  );
  info(`Showing ${Math.min(options.limit, versions.length)} of ${versions.length} versions.`);
}

/**
 * Print the latest release and snapshot ids.
 */
export async function latestAction(): Promise<void> {
  const manifest = await fetchRootManifest();
  console.log(`release  ${manifest.latest.release}`);
  console.log(`snapshot ${manifest.latest.snapshot}`);
}

/**
 * Convert a local mapping file, or stdin when the input is `-`.
 */
export async function convertAction(input: string, options: ConvertOptions, stdin: Readable = process.stdin): Promise<void> {
  await writeConverted(await readInput(input, stdin), options);
}

/**
 * Download a version's mappings and write them converted, or verbatim with `raw`.
 * With `raw` and `stats` the counts describe the downloaded text.
 */
export async function fetchAction(version: string, options: FetchOptions): Promise<void> {
  const mappings = await fetchMappings(version, options.side);
  if (options.raw) {
    if (options.stats) {
      reportStats("Fetched", convertMappingsWithStats(mappings).stats, true);
    }
    await writeOutput(mappings, options.output);
    return;
  }
  await writeConverted(mappings, options);
}

/**
 * Print the libraries of a version that apply to an operating system.
 */
export async function listLibrariesAction(version: string, options: LibraryOptions): Promise<void> {
  const manifest = await resolveVersion(version);
  const applicable = manifest.libraries.filter(library => libraryAllowed(library, options.os));
  console.table(
    applicable.map(library => ({
      name: library.name,
      artifact: library.downloads.artifact.path,
      native: libraryNative(library, options.os)?.path ?? ""
    }))
  );
  info(`${applicable.length} of ${manifest.libraries.length} libraries apply to ${options.os}.`);
}

/**
 * Resolve a manifest-supplied path below a target directory.
 *
 * @throws Error when the path leaves the directory.
 */
export function resolveInside(dir: string, relativePath: string): string {
  const root = path.resolve(dir);
  const target = path.resolve(root, relativePath);
  const relative = path.relative(root, target);
  if (relative === "" || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new Error(`Library path escapes ${dir}: ${relativePath}`);
  }
  return target;
}

async function saveLibraryFile(dir: string, file: LibraryFile<Buffer>): Promise<void> {
  await fs.outputFile(resolveInside(dir, file.path), file.data);
  debug(`Saved ${file.path} (${file.data.byteLength} bytes)`);
}

/**
 * Download every library of a version that applies to an operating system
 * into a maven-style directory tree.
 */
export async function downloadLibrariesAction(version: string, options: LibraryDownloadOptions): Promise<void> {
  const manifest = await resolveVersion(version);
  for (const library of manifest.libraries.filter(candidate => libraryAllowed(candidate, options.os))) {
    resolveInside(options.dir, library.downloads.artifact.path);
    const native = libraryNative(library, options.os);
    if (native) {
      resolveInside(options.dir, native.path);
    }
  }
  const results = await Promise.all(
    manifest.libraries.map(async library => {
      const downloaded = await downloadLibrary(library, options.os);
      if (!downloaded) {
        return 0;
      }
      await saveLibraryFile(options.dir, downloaded.artifact);
      if (downloaded.native) {
        await saveLibraryFile(options.dir, downloaded.native);
      }
      return 1;
    })
  );
  const saved = results.reduce<number>((total, count) => total + count, 0);
  if (saved === 0) {
    warn(`No libraries of ${manifest.id} apply to ${options.os}.`);
    return;
  }
  info(`Downloaded ${saved} libraries into ${options.dir}.`);
}

/**
 * Stream one top-level artifact of a version to disk.
 */
export async function downloadArtifactAction(version: string, artifact: ArtifactName, options: ArtifactOptions): Promise<void> {
  const manifest = await resolveVersion(version);
  const download = manifest.downloads[artifact];
  await fs.ensureDir(path.dirname(path.resolve(options.output)));
  const body = await downloadStream(download);
  await pipeline(body, fs.createWriteStream(options.output));
  info(`Saved ${artifact} of ${manifest.id} to ${options.output} (${download.size} bytes expected).`);
}

function isArtifactName(value: string): value is ArtifactName {
  return ARTIFACT_NAMES.some(name => name === value);
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("mappings")
    .description("Version manifest client and ProGuard mapping converter")
    .version("1.0.0")
    .option("--log-level <level>", "debug, info, warn or error")
    .hook("preAction", thisCommand => {
      const level: unknown = thisCommand.opts().logLevel;
      if (typeof level === "string") {
        setLogLevel(level);
      }
    });

  const versionsCommand = program.command("versions").description("Browse the version manifest");
  versionsCommand
    .command("list")
    .description("List published versions")
    .addOption(new Option("--type <kind>", "only show one release channel").choices(RELEASE_KINDS))
    .option("--limit <n>", "maximum number of rows", parseCount, 20)
    .action(async (options: ListOptions) => listVersionsAction(options));
  versionsCommand
    .command("latest")
    .description("Print the latest release and snapshot ids")
    .action(async () => latestAction());

  program
    .command("convert")
    .description("Convert a ProGuard mapping file to descriptor mappings")
    .argument("<input>", "mapping file, or - for stdin")
    .option("-o, --output <file>", "write to a file instead of stdout")
    .option("--stats", "report line counts")
    .action(async (input: string, options: ConvertOptions) => convertAction(input, options));

  program
    .command("fetch")
    .description("Download the mappings of a version and convert them")
    .argument("<version>", "version id, latest-release or latest-snapshot")
    .addOption(new Option("--side <side>", "distribution to fetch mappings for").choices(MAPPING_SIDES).default("client"))
    .option("-o, --output <file>", "write to a file instead of stdout")
    .option("--raw", "write the mappings without converting them")
    .option("--stats", "report line counts")
    .action(async (version: string, options: FetchOptions) => fetchAction(version, options));

  const librariesCommand = program.command("libraries").description("Inspect and download version libraries");
  const osOption = (): Option =>
    new Option("--os <name>", "operating system to evaluate rules for").choices(OS_NAMES).default(currentOs());
  librariesCommand
    .command("list")
    .description("List libraries that apply to an operating system")
    .argument("<version>", "version id, latest-release or latest-snapshot")
    .addOption(osOption())
    .action(async (version: string, options: LibraryOptions) => listLibrariesAction(version, options));
  librariesCommand
    .command("download")
    .description("Download libraries that apply to an operating system")
    .argument("<version>", "version id, latest-release or latest-snapshot")
    .requiredOption("--dir <dir>", "target directory")
    .addOption(osOption())
    .action(async (version: string, options: LibraryDownloadOptions) => downloadLibrariesAction(version, options));

  program
    .command("download")
    .description("Download a client or server jar or mappings file")
    .argument("<version>", "version id, latest-release or latest-snapshot")
    .addArgument(program.createArgument("<artifact>", "artifact name").choices(ARTIFACT_NAMES))
    .requiredOption("-o, --output <file>", "target file")
    .action(async (version: string, artifact: string, options: ArtifactOptions) => {
      if (!isArtifactName(artifact)) {
        throw new Error(`Unknown artifact: ${artifact}`);
      }
      await downloadArtifactAction(version, artifact, options);
    });

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trimEnd())
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`Command failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}

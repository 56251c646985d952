import { Readable } from "stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  LATEST_RELEASE,
  LATEST_SNAPSHOT,
  downloadBytes,
  downloadStream,
  downloadText,
  fetchConvertedMappings,
  fetchRootManifest,
  fetchVersionManifest,
  findRelease,
  resolveVersion
} from "../src/api.js";
import { FetchError } from "../src/errors.js";
import { VersionRelease } from "../src/types.js";
import * as http from "../src/utils/http.js";
import { ROOT_URL, rootManifestJson, versionManifestJson } from "./fixtures.js";

const VERSION_URL = "https://meta.example.com/v1/packages/bbb/1.20.4.json";

function jsonResponse<T>(data: T): http.HttpResult<T> {
  return { data, headers: {}, status: 200 };
}

describe("api.fetchRootManifest", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("requests the given url and decodes the version list", async () => {
    const spy = vi.spyOn(http, "getJson").mockResolvedValue(jsonResponse(rootManifestJson));
    const manifest = await fetchRootManifest(ROOT_URL);
    expect(spy).toHaveBeenCalledWith(ROOT_URL);
    expect(manifest.versions).toHaveLength(2);
    expect(manifest.latest.snapshot).toBe("24w03a");
  });

  it("surfaces malformed payloads as decode failures", async () => {
    vi.spyOn(http, "getJson").mockResolvedValue(jsonResponse({ latest: null }));
    await expect(fetchRootManifest(ROOT_URL)).rejects.toBeInstanceOf(FetchError);
    await expect(fetchRootManifest(ROOT_URL)).rejects.toMatchObject({ reason: "decode" });
  });

  it("passes transport failures through", async () => {
    vi.spyOn(http, "getJson").mockRejectedValue(new FetchError("status", ROOT_URL, "GET failed", 503));
    await expect(fetchRootManifest(ROOT_URL)).rejects.toMatchObject({ reason: "status", status: 503 });
  });
});

describe("api.fetchVersionManifest", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("follows the release url", async () => {
    const spy = vi.spyOn(http, "getJson").mockResolvedValue(jsonResponse(versionManifestJson));
    const release: VersionRelease = {
      id: "1.20.4",
      type: "release",
      url: VERSION_URL,
      time: new Date(0),
      releaseTime: new Date(0),
      sha1: "bbb",
      complianceLevel: 1
    };
    const manifest = await fetchVersionManifest(release);
    expect(spy).toHaveBeenCalledWith(VERSION_URL);
    expect(manifest.downloads.client.url).toBe("https://files.example.com/client.jar");
  });

  it("accepts a manifest url directly", async () => {
    const spy = vi.spyOn(http, "getJson").mockResolvedValue(jsonResponse(versionManifestJson));
    const manifest = await fetchVersionManifest(VERSION_URL);
    expect(spy).toHaveBeenCalledWith(VERSION_URL);
    expect(manifest.id).toBe("1.20.4");
  });
});

describe("api.findRelease", () => {
  it("resolves ids and latest aliases", async () => {
    vi.spyOn(http, "getJson").mockResolvedValue(jsonResponse(rootManifestJson));
    const manifest = await fetchRootManifest(ROOT_URL);
    vi.restoreAllMocks();

    expect(findRelease(manifest, "1.20.4")?.sha1).toBe("bbb");
    expect(findRelease(manifest, LATEST_RELEASE)?.id).toBe("1.20.4");
    expect(findRelease(manifest, LATEST_SNAPSHOT)?.id).toBe("24w03a");
    expect(findRelease(manifest, "0.0.1")).toBeUndefined();
  });
});

describe("api.fetchConvertedMappings", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("downloads the requested side's mappings and converts them", async () => {
    const jsonSpy = vi
      .spyOn(http, "getJson")
      .mockResolvedValueOnce(jsonResponse(rootManifestJson))
      .mockResolvedValueOnce(jsonResponse(versionManifestJson));
    const textSpy = vi
      .spyOn(http, "getText")
      .mockResolvedValue(jsonResponse("com.example.Foo -> x:\n    void tick() -> b\n"));

    const converted = await fetchConvertedMappings(LATEST_RELEASE, "server");

    expect(jsonSpy).toHaveBeenNthCalledWith(2, VERSION_URL);
    expect(textSpy).toHaveBeenCalledWith("https://files.example.com/server.txt");
    expect(converted).toBe("x com/example/Foo\n\tb ()V tick\n");
  });

  it("rejects versions missing from the root manifest", async () => {
    vi.spyOn(http, "getJson").mockResolvedValue(jsonResponse(rootManifestJson));
    await expect(resolveVersion("0.0.1")).rejects.toThrowError("Unknown version: 0.0.1");
  });
});

describe("api downloads", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns artifact bytes and text", async () => {
    vi.spyOn(http, "getBinary").mockResolvedValue(jsonResponse(Buffer.from("jar")));
    vi.spyOn(http, "getText").mockResolvedValue(jsonResponse("mappings"));
    const artifact = { url: "https://files.example.com/client.jar" };

    expect((await downloadBytes(artifact)).toString("utf8")).toBe("jar");
    expect(await downloadText(artifact)).toBe("mappings");
  });

  it("opens artifacts as streams", async () => {
    const body = Readable.from([Buffer.from("jar")]);
    const spy = vi.spyOn(http, "getStream").mockResolvedValue(jsonResponse(body));

    const stream = await downloadStream({ url: "https://files.example.com/server.jar" });

    expect(spy).toHaveBeenCalledWith("https://files.example.com/server.jar");
    expect(stream).toBe(body);
  });
});

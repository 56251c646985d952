import { JsonValue } from "../src/types.js";

export const ROOT_URL = "https://meta.example.com/mc/game/version_manifest_v2.json";

export const rootManifestJson = {
  latest: { release: "1.20.4", snapshot: "24w03a" },
  versions: [
    {
      id: "24w03a",
      type: "snapshot",
      url: "https://meta.example.com/v1/packages/aaa/24w03a.json",
      time: "2024-01-17T13:04:22+00:00",
      releaseTime: "2024-01-17T12:56:06+00:00",
      sha1: "aaa",
      complianceLevel: 1
    },
    {
      id: "1.20.4",
      type: "release",
      url: "https://meta.example.com/v1/packages/bbb/1.20.4.json",
      time: "2023-12-07T12:59:12+00:00",
      releaseTime: "2023-12-07T12:56:20+00:00",
      sha1: "bbb",
      complianceLevel: 1
    }
  ]
} satisfies JsonValue;

const download = (name: string, size: number) => ({
  sha1: `${name}-sha1`,
  size,
  url: `https://files.example.com/${name}`
});

export const versionManifestJson = {
  id: "1.20.4",
  mainClass: "net.example.client.main.Main",
  downloads: {
    client: download("client.jar", 100),
    client_mappings: download("client.txt", 20),
    server: download("server.jar", 90),
    server_mappings: download("server.txt", 10)
  },
  libraries: [
    {
      name: "com.example:core:1.0",
      downloads: {
        artifact: { path: "com/example/core/1.0/core-1.0.jar", ...download("core-1.0.jar", 5) }
      }
    },
    {
      name: "org.example:native:2.0",
      downloads: {
        artifact: { path: "org/example/native/2.0/native-2.0.jar", ...download("native-2.0.jar", 6) },
        classifiers: {
          "natives-linux": { path: "org/example/native/2.0/native-2.0-natives-linux.jar", ...download("native-linux.jar", 7) },
          "natives-windows": { path: "org/example/native/2.0/native-2.0-natives-windows.jar", ...download("native-windows.jar", 8) }
        }
      },
      natives: { linux: "natives-linux", windows: "natives-windows" },
      extract: { exclude: ["META-INF/"] }
    },
    {
      name: "org.example:mac-only:3.0",
      downloads: {
        artifact: { path: "org/example/mac-only/3.0/mac-only-3.0.jar", ...download("mac-only-3.0.jar", 9) }
      },
      rules: [{ action: "allow", os: { name: "osx" } }]
    }
  ]
} satisfies JsonValue;

import * as dotenv from "dotenv";

dotenv.config();

/**
 * Upstream metadata locations.
 */
export const SOURCES = {
  MANIFEST: process.env.VERSION_MANIFEST_URL ?? "https://piston-meta.mojang.com/mc/game/version_manifest_v2.json"
} as const;

/**
 * Network-level configuration for HTTP operations.
 *
 * Invariant: `CONCURRENCY` must be positive.
 */
export const NET = {
  TIMEOUT: Number.parseInt(process.env.HTTP_TIMEOUT ?? "30000", 10),
  CONCURRENCY: Number.parseInt(process.env.DOWNLOAD_CONCURRENCY ?? "4", 10)
} as const;

// src/version-updater.ts — Refresh collaborator for versions.json

import { copyFileSync, mkdirSync, renameSync, rmSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { VersionUpdater } from "./types.js";

/** Catalog shipped with the package, used to seed a missing versions.json. */
export const BUNDLED_VERSIONS_FILE = fileURLToPath(
  new URL("../data/versions.seed.json", import.meta.url),
);

let tmpCounter = 0;

/**
 * Updater that copies a seed catalog over the target file.
 * Writes go through a per-process temp file and a rename, so concurrent
 * refreshes never leave a partially written versions.json behind.
 */
export function createSeedUpdater(
  targetFile: string,
  seedFile: string = BUNDLED_VERSIONS_FILE,
): VersionUpdater {
  const target = resolve(targetFile);
  return {
    async updateVersions(): Promise<void> {
      mkdirSync(dirname(target), { recursive: true });
      const tmp = `${target}.${process.pid}.${++tmpCounter}.tmp`;
      try {
        copyFileSync(seedFile, tmp);
        renameSync(tmp, target);
      } catch (err: unknown) {
        rmSync(tmp, { force: true });
        throw err;
      }
    },
  };
}

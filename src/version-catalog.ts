// src/version-catalog.ts — Starter version catalog
// Reads versions.json, refreshing it once through the updater when it is missing.

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  ConfigurationUnavailableError,
  type StarterVersion,
  type VersionCatalog,
  type VersionUpdater,
  type Warning,
} from "./types.js";

export interface LoadCatalogOptions {
  versionsFile: string;
  updater?: VersionUpdater;
  warnings?: Warning[];
}

/**
 * Load the catalog. A missing file triggers exactly one refresh and one
 * re-read; anything else that goes wrong is fatal.
 */
export async function loadVersionCatalog(
  options: LoadCatalogOptions,
): Promise<VersionCatalog> {
  const path = resolve(options.versionsFile);
  const warnings = options.warnings ?? [];

  for (let attempt = 1; attempt <= 2; attempt++) {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (err: unknown) {
      if (isNotFound(err) && attempt === 1 && options.updater) {
        warnings.push({
          level: "info",
          module: "version-catalog",
          message: `Versions file not found, refreshing: ${path}`,
        });
        await options.updater.updateVersions();
        continue;
      }
      throw new ConfigurationUnavailableError(
        !isNotFound(err)
          ? `Failed to read versions file ${path}: ${errorMessage(err)}`
          : attempt === 2
            ? `Versions file still missing after refresh: ${path}`
            : `Versions file not found: ${path}`,
        path,
        { cause: err },
      );
    }
    return parseVersionCatalog(raw, path, warnings);
  }

  // Unreachable: the second attempt returns or throws
  throw new ConfigurationUnavailableError(`Versions file not loaded: ${path}`, path);
}

/**
 * Parse versions.json content. Later records override earlier ones with the
 * same id but keep the position where the id first appeared.
 */
export function parseVersionCatalog(
  raw: string,
  path: string,
  warnings: Warning[] = [],
): VersionCatalog {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigurationUnavailableError(
      `Malformed versions file ${path}: ${errorMessage(err)}`,
      path,
      { cause: err },
    );
  }

  const records = isRecord(parsed) ? parsed.starterVersions : undefined;
  if (!Array.isArray(records)) {
    throw new ConfigurationUnavailableError(
      `Versions file ${path} has no "starterVersions" array`,
      path,
    );
  }

  const catalog = new Map<string, StarterVersion>();
  records.forEach((record: unknown, index: number) => {
    const version = toStarterVersion(record);
    if (!version) {
      throw new ConfigurationUnavailableError(
        `Invalid entry at starterVersions[${index}] in ${path}`,
        path,
      );
    }
    if (catalog.has(version.starterVersion)) {
      warnings.push({
        level: "info",
        module: "version-catalog",
        message: `Duplicate starter version ${version.starterVersion}; later entry wins`,
        file: path,
      });
    }
    catalog.set(version.starterVersion, Object.freeze(version));
  });

  return catalog;
}

/** First declared starter version, or undefined for an empty catalog. */
export function defaultStarterVersion(catalog: VersionCatalog): string | undefined {
  for (const key of catalog.keys()) return key;
  return undefined;
}

function toStarterVersion(value: unknown): StarterVersion | null {
  if (!isRecord(value)) return null;
  const { starterVersion, camundaVersion, springBootVersion } = value;
  if (
    typeof starterVersion !== "string" || !starterVersion ||
    typeof camundaVersion !== "string" ||
    typeof springBootVersion !== "string"
  ) {
    return null;
  }
  return { starterVersion, camundaVersion, springBootVersion };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNotFound(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

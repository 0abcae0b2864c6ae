// src/request-normalizer.ts — Fill missing request fields with defaults
// Only checks emptiness; unknown values are rejected where they are used.

import {
  ConfigurationUnavailableError,
  type NormalizedRequest,
  type ProjectRequest,
  type VersionCatalog,
} from "./types.js";
import { defaultStarterVersion } from "./version-catalog.js";

export const REQUEST_DEFAULTS = {
  modules: ["camunda-rest"],
  group: "com.example.workflow",
  database: "h2",
  artifact: "my-project",
  javaVersion: "12",
  username: "demo",
  password: "demo",
  version: "1.0.0-SNAPSHOT",
} as const;

/**
 * Return a copy of the request with every empty or absent field defaulted.
 * The starter version defaults to the first catalog entry.
 */
export function normalizeRequest(
  request: ProjectRequest,
  catalog: VersionCatalog,
): NormalizedRequest {
  return {
    modules: request.modules && request.modules.length > 0
      ? [...request.modules]
      : [...REQUEST_DEFAULTS.modules],
    group: request.group || REQUEST_DEFAULTS.group,
    database: request.database || REQUEST_DEFAULTS.database,
    artifact: request.artifact || REQUEST_DEFAULTS.artifact,
    starterVersion: request.starterVersion || latestStarterVersion(catalog),
    javaVersion: request.javaVersion || REQUEST_DEFAULTS.javaVersion,
    username: request.username || REQUEST_DEFAULTS.username,
    password: request.password || REQUEST_DEFAULTS.password,
    version: request.version || REQUEST_DEFAULTS.version,
  };
}

function latestStarterVersion(catalog: VersionCatalog): string {
  const latest = defaultStarterVersion(catalog);
  if (latest === undefined) {
    throw new ConfigurationUnavailableError(
      "Version catalog is empty; no default starter version available",
      "",
    );
  }
  return latest;
}

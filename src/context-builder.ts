// src/context-builder.ts — Flat template context assembly

import {
  UnrecognizedSelectionError,
  type Dependency,
  type NormalizedRequest,
  type TemplateContext,
  type VersionCatalog,
  type Warning,
} from "./types.js";

const DATA_SOURCE_CLASSES: Readonly<Record<string, string>> = {
  postgresql: "org.postgresql.jdbc2.optional.SimpleDataSource",
  mysql: "com.mysql.cj.jdbc.MysqlDataSource",
};

/**
 * Assemble the values every template reads. The starter version must be in
 * the catalog; an unknown database only leaves dbClassRef empty.
 */
export function buildTemplateContext(
  request: NormalizedRequest,
  dependencies: readonly Dependency[],
  catalog: VersionCatalog,
  warnings: Warning[] = [],
): TemplateContext {
  const versions = catalog.get(request.starterVersion);
  if (!versions) {
    throw new UnrecognizedSelectionError("starter-version", request.starterVersion);
  }

  const dbClassRef = dataSourceClassFor(request.database);
  if (!dbClassRef) {
    warnings.push({
      level: "info",
      module: "context-builder",
      message: `No data source class for database "${request.database}"; leaving it unset`,
    });
  }

  return {
    packageName: request.group,
    dbType: request.database,
    dbClassRef,
    adminUsername: request.username,
    adminPassword: request.password,
    camundaVersion: versions.camundaVersion,
    springBootVersion: versions.springBootVersion,
    javaVersion: request.javaVersion,
    group: request.group,
    artifact: request.artifact,
    projectVersion: request.version,
    dependencies: dependencies.map((d) => ({ ...d })),
  };
}

export function dataSourceClassFor(database: string): string {
  const key = database.toLowerCase();
  return Object.prototype.hasOwnProperty.call(DATA_SOURCE_CLASSES, key)
    ? DATA_SOURCE_CLASSES[key]
    : "";
}

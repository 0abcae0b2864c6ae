// src/dependency-resolver.ts — Modules and database to Maven coordinates

import { UnrecognizedSelectionError, type Dependency } from "./types.js";

interface ModuleDescriptor {
  group: string;
  artifact: string;
  /** Pin to the request's starter version instead of the managed one. */
  pinned: boolean;
  description: string;
}

interface DatabaseDescriptor {
  group: string;
  artifact: string;
}

const MODULES: Readonly<Record<string, ModuleDescriptor>> = {
  "camunda-rest": {
    group: "org.camunda.bpm.springboot",
    artifact: "camunda-bpm-spring-boot-starter-rest",
    pinned: true,
    description: "Camunda REST API",
  },
  "camunda-webapps": {
    group: "org.camunda.bpm.springboot",
    artifact: "camunda-bpm-spring-boot-starter-webapp",
    pinned: true,
    description: "Camunda web applications (Cockpit, Tasklist, Admin)",
  },
  "spring-boot-security": {
    group: "org.springframework.boot",
    artifact: "spring-boot-starter-security",
    pinned: false,
    description: "Spring Security",
  },
  "spring-boot-web": {
    group: "org.springframework.boot",
    artifact: "spring-boot-starter-web",
    pinned: false,
    description: "Spring Web MVC",
  },
};

const DATABASES: Readonly<Record<string, DatabaseDescriptor>> = {
  postgresql: { group: "org.postgresql", artifact: "postgresql" },
  mysql: { group: "mysql", artifact: "mysql-connector-java" },
  h2: { group: "com.h2database", artifact: "h2" },
};

/**
 * Resolve modules (in the order given) followed by exactly one JDBC driver.
 * Repeated module ids are resolved once, at their first position.
 * Throws UnrecognizedSelectionError before building anything if an id is unknown.
 */
export function resolveDependencies(
  modules: readonly string[],
  database: string,
  starterVersion: string,
): Dependency[] {
  const dependencies: Dependency[] = [];

  for (const id of new Set(modules)) {
    const descriptor = lookup(MODULES, id);
    if (!descriptor) throw new UnrecognizedSelectionError("module", id);
    dependencies.push(
      descriptor.pinned
        ? { group: descriptor.group, artifact: descriptor.artifact, version: starterVersion }
        : { group: descriptor.group, artifact: descriptor.artifact },
    );
  }

  const driver = lookup(DATABASES, database);
  if (!driver) throw new UnrecognizedSelectionError("database", database);
  dependencies.push({ group: driver.group, artifact: driver.artifact });

  return dependencies;
}

export function listModules(): { id: string; description: string }[] {
  return Object.entries(MODULES).map(([id, m]) => ({ id, description: m.description }));
}

export function listDatabases(): string[] {
  return Object.keys(DATABASES);
}

// Own-property lookup so ids like "toString" are not found on the prototype
function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

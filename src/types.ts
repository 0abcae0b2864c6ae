// src/types.ts — Shared types for the project starter pipeline

// ─── Requests ────────────────────────────────────────────────────────────────

/**
 * Inbound generation request. Every field may be missing or empty;
 * normalizeRequest() fills the gaps.
 */
export interface ProjectRequest {
  group?: string;
  artifact?: string;
  /** Version of the generated project itself, e.g. "1.0.0-SNAPSHOT". */
  version?: string;
  modules?: string[];
  database?: string;
  starterVersion?: string;
  javaVersion?: string;
  username?: string;
  password?: string;
}

export type NormalizedRequest = Readonly<Required<ProjectRequest>>;

// ─── Version catalog ─────────────────────────────────────────────────────────

export interface StarterVersion {
  readonly starterVersion: string;
  readonly camundaVersion: string;
  readonly springBootVersion: string;
}

/** Insertion-ordered; the first key is the default starter version. */
export type VersionCatalog = ReadonlyMap<string, StarterVersion>;

export interface VersionUpdater {
  /** Makes the versions file readable. Called at most once per catalog load. */
  updateVersions(): Promise<void>;
}

// ─── Dependencies & context ──────────────────────────────────────────────────

export interface Dependency {
  group: string;
  artifact: string;
  /** Absent means the version is managed by the parent/BOM. */
  version?: string;
}

export interface TemplateContext {
  packageName: string;
  dbType: string;
  dbClassRef: string;
  adminUsername: string;
  adminPassword: string;
  camundaVersion: string;
  springBootVersion: string;
  javaVersion: string;
  group: string;
  artifact: string;
  projectVersion: string;
  dependencies: Dependency[];
}

export interface TemplateRenderer {
  render(context: TemplateContext, templateId: string): string;
}

export interface ArchiveEntry {
  path: string;
  bytes: Uint8Array;
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Config ──────────────────────────────────────────────────────────────────

export interface ResolvedConfig {
  versionsFile: string;
  outputDir: string;
  /** Base request; CLI flags override field by field. */
  defaults: ProjectRequest;
  verbose: boolean;
}

export interface GenerationOptions {
  versionsFile: string;
  updater?: VersionUpdater;
  renderer?: TemplateRenderer;
  verbose?: boolean;
  warnings?: Warning[];
}

export interface GenerationResult {
  archive: Uint8Array;
  fileName: string;
  context: TemplateContext;
  warnings: Warning[];
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class ConfigurationUnavailableError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigurationUnavailableError";
  }
}

export type SelectionKind =
  | "module"
  | "database"
  | "starter-version"
  | "file"
  | "artifact"
  | "group";

export class UnrecognizedSelectionError extends Error {
  constructor(
    public readonly kind: SelectionKind,
    public readonly value: string,
  ) {
    super(`Unrecognized ${kind}: "${value}"`);
    this.name = "UnrecognizedSelectionError";
  }
}

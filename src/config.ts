// src/config.ts — Config Resolver
// defaults ← starter-forge.config.json (or package.json "starterForge") ← CLI args

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import type { ProjectRequest, ResolvedConfig, Warning } from "./types.js";

export const CONFIG_FILENAME = "starter-forge.config.json";
export const PACKAGE_JSON_KEY = "starterForge";

export interface ParsedArgs {
  command: string;
  positionals: string[];
  group?: string;
  artifact?: string;
  projectVersion?: string;
  modules: string[];
  database?: string;
  starterVersion?: string;
  javaVersion?: string;
  username?: string;
  password?: string;
  output?: string;
  config?: string;
  versionsFile?: string;
  quiet: boolean;
  verbose: boolean;
  dryRun: boolean;
  help: boolean;
}

interface FileConfig {
  versionsFile?: string;
  outputDir?: string;
  defaults?: ProjectRequest;
  verbose?: boolean;
}

const DEFAULTS: ResolvedConfig = {
  versionsFile: "versions.json",
  outputDir: ".",
  defaults: {},
  verbose: false,
};

const REQUEST_STRING_KEYS = [
  "group",
  "artifact",
  "version",
  "database",
  "starterVersion",
  "javaVersion",
  "username",
  "password",
] as const;

/**
 * Resolve config from CLI args, config file, and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, warnings, cwd);

  return {
    versionsFile: resolve(
      cwd,
      args.versionsFile ?? fileConfig?.versionsFile ?? DEFAULTS.versionsFile,
    ),
    outputDir: resolve(cwd, args.output ?? fileConfig?.outputDir ?? DEFAULTS.outputDir),
    defaults: { ...DEFAULTS.defaults, ...fileConfig?.defaults },
    verbose: args.verbose || (fileConfig?.verbose ?? DEFAULTS.verbose),
  };
}

/**
 * Overlay CLI flags on the configured base request. Flags that were not
 * given leave the base value in place.
 */
export function buildRequest(args: ParsedArgs, base: ProjectRequest = {}): ProjectRequest {
  const request: ProjectRequest = { ...base };
  if (args.group !== undefined) request.group = args.group;
  if (args.artifact !== undefined) request.artifact = args.artifact;
  if (args.projectVersion !== undefined) request.version = args.projectVersion;
  if (args.modules.length > 0) request.modules = args.modules;
  if (args.database !== undefined) request.database = args.database;
  if (args.starterVersion !== undefined) request.starterVersion = args.starterVersion;
  if (args.javaVersion !== undefined) request.javaVersion = args.javaVersion;
  if (args.username !== undefined) request.username = args.username;
  if (args.password !== undefined) request.password = args.password;
  return request;
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
  cwd: string,
): FileConfig | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  // starterForge key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      const section = isRecord(pkg) ? pkg[PACKAGE_JSON_KEY] : undefined;
      if (isRecord(section)) return toFileConfig(section, pkgJson, warnings);
    } catch {
      // Invalid package.json
    }
  }

  return null;
}

function parseConfigFile(
  filePath: string,
  warnings: Warning[],
): FileConfig | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    if (!isRecord(parsed)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file ${filePath} must contain a JSON object`,
      });
      return null;
    }
    return toFileConfig(parsed, filePath, warnings);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

function toFileConfig(
  raw: Record<string, unknown>,
  filePath: string,
  warnings: Warning[],
): FileConfig {
  const config: FileConfig = {};
  if (typeof raw.versionsFile === "string") config.versionsFile = raw.versionsFile;
  if (typeof raw.outputDir === "string") config.outputDir = raw.outputDir;
  if (typeof raw.verbose === "boolean") config.verbose = raw.verbose;

  const rawDefaults = raw.defaults;
  if (isRecord(rawDefaults)) {
    const defaults: ProjectRequest = {};
    for (const key of REQUEST_STRING_KEYS) {
      const value = rawDefaults[key];
      if (typeof value === "string") defaults[key] = value;
    }
    const modules = rawDefaults.modules;
    if (Array.isArray(modules) && modules.every((m): m is string => typeof m === "string")) {
      defaults.modules = modules;
    }
    config.defaults = defaults;
  }

  // Credentials belong in flags or the environment, not in checked-in files
  if (config.defaults?.password) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Admin password found in ${filePath}; pass --password instead.`,
      file: filePath,
    });
  }

  return config;
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(
  argv: string[],
): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: {
      g: "group",
      a: "artifact",
      m: "module",
      d: "database",
      s: "starter-version",
      j: "java-version",
      o: "output",
      c: "config",
      q: "quiet",
      v: "verbose",
    },
    boolean: ["dry-run", "quiet", "verbose", "help"],
    string: [
      "group", "artifact", "project-version", "module", "database",
      "starter-version", "java-version", "username", "password",
      "output", "config", "versions-file",
    ],
  });

  const positionals = args._.map(String);
  const command = positionals.shift() ?? "generate";

  return {
    command,
    positionals,
    group: str(args.group),
    artifact: str(args.artifact),
    projectVersion: str(args["project-version"]),
    modules: list(args.module),
    database: str(args.database),
    starterVersion: str(args["starter-version"]),
    javaVersion: str(args["java-version"]),
    username: str(args.username),
    password: str(args.password),
    output: str(args.output),
    config: str(args.config),
    versionsFile: str(args["versions-file"]),
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    dryRun: args["dry-run"] === true,
    help: args.help === true,
  };
}

// mri yields an array when a flag repeats; the last occurrence wins
function str(value: unknown): string | undefined {
  if (Array.isArray(value)) return str(value[value.length - 1]);
  return typeof value === "string" ? value : undefined;
}

// --module a,b and -m a -m b both produce ["a", "b"]
function list(value: unknown): string[] {
  const raw: unknown[] = Array.isArray(value) ? value : value === undefined ? [] : [value];
  return raw
    .filter((v): v is string => typeof v === "string")
    .flatMap((v) => v.split(","))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

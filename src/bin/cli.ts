// src/bin/cli.ts — Subcommand dispatch for the starter-forge CLI

import { writeFileSync, mkdirSync } from "node:fs";
import { resolve, dirname } from "node:path";
import {
  generateProject,
  generateFile,
  prepareContext,
  loadVersionCatalog,
  createSeedUpdater,
  listModules,
  listDatabases,
  archiveLayout,
  PROJECT_FILES,
  UnrecognizedSelectionError,
} from "../index.js";
import { buildRequest, parseCliArgs, resolveConfig, CONFIG_FILENAME, type ParsedArgs } from "../config.js";
import type { ResolvedConfig, Warning } from "../types.js";

const HELP_TEXT = `
starter-forge — generate a Camunda Spring Boot project skeleton

Usage:
  starter-forge [generate] [options]     Write <artifact>.zip to the output directory
  starter-forge show <file> [options]    Print one rendered file (${PROJECT_FILES.join(", ")})
  starter-forge versions                 List available starter versions (default first)
  starter-forge modules                  List module and database identifiers

Project options:
  --group, -g            Group id / Java package (default: com.example.workflow)
  --artifact, -a         Artifact id / project directory (default: my-project)
  --project-version      Project version (default: 1.0.0-SNAPSHOT)
  --module, -m           Module id, repeatable or comma-separated (default: camunda-rest)
  --database, -d         postgresql, mysql or h2 (default: h2)
  --starter-version, -s  Starter version (default: latest in versions.json)
  --java-version, -j     Java version (default: 12)
  --username             Admin username (default: demo)
  --password             Admin password (default: demo)

Options:
  --output, -o           Output directory (default: current directory)
  --config, -c           Path to config file (default: ${CONFIG_FILENAME})
  --versions-file        Path to versions.json (default: ./versions.json)
  --dry-run              Print the archive layout without writing anything
  --quiet, -q            Suppress warnings
  --verbose, -v          Print pipeline details to stderr
  --help                 Show this help text

Examples:
  npx starter-forge -g org.acme.loans -a loan-approval -m camunda-rest,camunda-webapps -d postgresql
  npx starter-forge show pom.xml -m spring-boot-web
`.trim();

/**
 * Run one CLI invocation and return its exit code: 0 on success, 2 for an
 * unrecognized selection, 1 for anything else.
 */
export async function run(argv: string[], cwd: string = process.cwd()): Promise<number> {
  const warnings: Warning[] = [];
  let quiet = false;

  try {
    const args = await parseCliArgs(argv);
    quiet = args.quiet;

    if (args.help) {
      process.stdout.write(HELP_TEXT + "\n");
      return 0;
    }

    const config = resolveConfig(args, warnings, cwd);

    switch (args.command) {
      case "generate":
        await runGenerate(args, config, warnings);
        return 0;
      case "show":
        await runShow(args, config, warnings);
        return 0;
      case "versions":
        await runVersions(config, warnings);
        return 0;
      case "modules":
        runModules();
        return 0;
      default:
        process.stderr.write(`[error] Unknown command: ${args.command}\n\n${HELP_TEXT}\n`);
        return 1;
    }
  } catch (err: unknown) {
    if (err instanceof UnrecognizedSelectionError) {
      process.stderr.write(`[error] ${err.message}\n`);
      return 2;
    }
    process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  } finally {
    printWarnings(warnings, quiet);
  }
}

async function runGenerate(
  args: ParsedArgs,
  config: ResolvedConfig,
  warnings: Warning[],
): Promise<void> {
  const request = buildRequest(args, config.defaults);
  const options = {
    versionsFile: config.versionsFile,
    verbose: config.verbose,
    warnings,
  };

  if (args.dryRun) {
    const context = await prepareContext(request, options);
    for (const path of Object.values(archiveLayout(context)).sort()) {
      process.stdout.write(path + "\n");
    }
    return;
  }

  const result = await generateProject(request, options);
  const outputPath = resolve(config.outputDir, result.fileName);
  writeFileSafe(outputPath, result.archive);
  if (!args.quiet) process.stderr.write(`Written to ${outputPath}\n`);
}

async function runShow(
  args: ParsedArgs,
  config: ResolvedConfig,
  warnings: Warning[],
): Promise<void> {
  const fileId = args.positionals[0];
  if (!fileId) {
    throw new UnrecognizedSelectionError("file", "");
  }
  const text = await generateFile(buildRequest(args, config.defaults), fileId, {
    versionsFile: config.versionsFile,
    verbose: config.verbose,
    warnings,
  });
  process.stdout.write(text);
}

async function runVersions(config: ResolvedConfig, warnings: Warning[]): Promise<void> {
  const catalog = await loadVersionCatalog({
    versionsFile: config.versionsFile,
    updater: createSeedUpdater(config.versionsFile),
    warnings,
  });
  let first = true;
  for (const v of catalog.values()) {
    const marker = first ? " (default)" : "";
    process.stdout.write(
      `${v.starterVersion}${marker}  camunda ${v.camundaVersion}  spring-boot ${v.springBootVersion}\n`,
    );
    first = false;
  }
}

function runModules(): void {
  process.stdout.write("Modules:\n");
  for (const m of listModules()) process.stdout.write(`  ${m.id.padEnd(22)}${m.description}\n`);
  process.stdout.write("Databases:\n");
  for (const d of listDatabases()) process.stdout.write(`  ${d}\n`);
}

function printWarnings(warnings: Warning[], quiet: boolean): void {
  if (quiet) return;
  for (const w of warnings) {
    process.stderr.write(`[${w.level}] ${w.module}: ${w.message}\n`);
  }
}

/** Auto-create output directory before writing. */
function writeFileSafe(filePath: string, content: Uint8Array): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}

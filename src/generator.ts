// src/generator.ts — Pipeline orchestrator
// catalog → normalize → dependencies → context → render/package

import type {
  GenerationOptions,
  GenerationResult,
  ProjectRequest,
  TemplateContext,
  Warning,
} from "./types.js";
import { loadVersionCatalog } from "./version-catalog.js";
import { createSeedUpdater } from "./version-updater.js";
import { normalizeRequest } from "./request-normalizer.js";
import { resolveDependencies } from "./dependency-resolver.js";
import { buildTemplateContext } from "./context-builder.js";
import { createBuiltinRenderer } from "./template-renderer.js";
import { assembleArchive, renderFile } from "./archive-assembler.js";

/** Verbose logger — writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

/**
 * Resolve a request into its template context. The catalog is read fresh on
 * every call.
 */
export async function prepareContext(
  request: ProjectRequest,
  options: GenerationOptions,
): Promise<TemplateContext> {
  const verbose = options.verbose ?? false;
  const warnings: Warning[] = options.warnings ?? [];

  const catalog = await loadVersionCatalog({
    versionsFile: options.versionsFile,
    updater: options.updater ?? createSeedUpdater(options.versionsFile),
    warnings,
  });
  vlog(verbose, `Version catalog: ${catalog.size} starter versions`);

  const normalized = normalizeRequest(request, catalog);
  vlog(verbose, `Project: ${normalized.group}:${normalized.artifact}:${normalized.version} (starter ${normalized.starterVersion})`);

  const dependencies = resolveDependencies(
    normalized.modules,
    normalized.database,
    normalized.starterVersion,
  );
  vlog(verbose, `Dependencies: ${dependencies.map((d) => d.artifact).join(", ")}`);

  return buildTemplateContext(normalized, dependencies, catalog, warnings);
}

/**
 * Generate the full project archive.
 */
export async function generateProject(
  request: ProjectRequest,
  options: GenerationOptions,
): Promise<GenerationResult> {
  const warnings: Warning[] = options.warnings ?? [];
  const startTime = performance.now();
  const context = await prepareContext(request, { ...options, warnings });

  const archive = assembleArchive(context, options.renderer ?? createBuiltinRenderer());
  vlog(
    options.verbose ?? false,
    `Archive: ${archive.byteLength} bytes in ${Math.round(performance.now() - startTime)}ms`,
  );

  return {
    archive,
    fileName: `${context.artifact}.zip`,
    context,
    warnings,
  };
}

/**
 * Render a single project file (e.g. "pom.xml") to text.
 */
export async function generateFile(
  request: ProjectRequest,
  fileId: string,
  options: GenerationOptions,
): Promise<string> {
  const context = await prepareContext(request, options);
  return renderFile(context, fileId, options.renderer ?? createBuiltinRenderer());
}

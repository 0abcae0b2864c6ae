// src/index.ts — Library API
// Two entry points: generateProject() and generateFile()

export type {
  ProjectRequest,
  NormalizedRequest,
  StarterVersion,
  VersionCatalog,
  VersionUpdater,
  Dependency,
  TemplateContext,
  TemplateRenderer,
  ArchiveEntry,
  Warning,
  ResolvedConfig,
  GenerationOptions,
  GenerationResult,
  SelectionKind,
} from "./types.js";
export { ConfigurationUnavailableError, UnrecognizedSelectionError } from "./types.js";

export { generateProject, generateFile, prepareContext } from "./generator.js";
export { loadVersionCatalog, parseVersionCatalog, defaultStarterVersion } from "./version-catalog.js";
export { createSeedUpdater, BUNDLED_VERSIONS_FILE } from "./version-updater.js";
export { normalizeRequest, REQUEST_DEFAULTS } from "./request-normalizer.js";
export { resolveDependencies, listModules, listDatabases } from "./dependency-resolver.js";
export { buildTemplateContext, dataSourceClassFor } from "./context-builder.js";
export { createBuiltinRenderer, listTemplates } from "./template-renderer.js";
export {
  assembleArchive,
  renderFile,
  archiveLayout,
  zipEntries,
  PROJECT_FILES,
  ARCHIVE_MTIME,
} from "./archive-assembler.js";
export type { ProjectFile } from "./archive-assembler.js";

// src/archive-assembler.ts — Render the project files and pack them into a zip

import { strToU8, zipSync, type Zippable, type ZipOptions } from "fflate";
import {
  UnrecognizedSelectionError,
  type ArchiveEntry,
  type TemplateContext,
  type TemplateRenderer,
} from "./types.js";

export const PROJECT_FILES = ["Application.java", "application.yaml", "pom.xml"] as const;
export type ProjectFile = (typeof PROJECT_FILES)[number];

// fflate stamps entries with the current time unless mtime is given, and
// encodes the local-time fields of the Date; local midnight keeps them TZ-independent
export const ARCHIVE_MTIME = new Date(2020, 0, 1);

export function isProjectFile(fileId: string): fileId is ProjectFile {
  return PROJECT_FILES.some((f) => f === fileId);
}

/**
 * Archive path of each project file, rooted at `<artifact>/`.
 * Rejects an artifact or group that would place entries outside that root.
 */
export function archiveLayout(context: TemplateContext): Record<ProjectFile, string> {
  const root = context.artifact;
  if (!isSafeSegment(root)) throw new UnrecognizedSelectionError("artifact", root);
  const segments = context.group.split(".");
  if (!segments.every(isSafeSegment)) throw new UnrecognizedSelectionError("group", context.group);
  const packagePath = segments.join("/");
  return {
    "Application.java": `${root}/src/main/java/${packagePath}/Application.java`,
    "application.yaml": `${root}/src/main/resources/application.yaml`,
    "pom.xml": `${root}/pom.xml`,
  };
}

function isSafeSegment(segment: string): boolean {
  return segment.length > 0 && segment !== "." && segment !== ".." && !/[/\\]/.test(segment);
}

/** Render one project file to text, without packaging. */
export function renderFile(
  context: TemplateContext,
  fileId: string,
  renderer: TemplateRenderer,
): string {
  if (!isProjectFile(fileId)) throw new UnrecognizedSelectionError("file", fileId);
  return renderer.render(context, fileId);
}

/**
 * Render every project file, then zip them. Nothing is packed unless all
 * renders succeed.
 */
export function assembleArchive(
  context: TemplateContext,
  renderer: TemplateRenderer,
): Uint8Array {
  const layout = archiveLayout(context);
  const entries: ArchiveEntry[] = PROJECT_FILES.map((fileId) => ({
    path: layout[fileId],
    bytes: strToU8(renderer.render(context, fileId)),
  }));
  return zipEntries(entries);
}

export function zipEntries(entries: readonly ArchiveEntry[], level: ZipOptions["level"] = 6): Uint8Array {
  const sorted = [...entries].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const files: Zippable = {};
  for (const entry of sorted) files[entry.path] = entry.bytes;
  return zipSync(files, { level, mtime: ARCHIVE_MTIME });
}

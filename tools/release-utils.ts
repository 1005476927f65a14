import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { fileURLToPath } from "node:url";

export type ReleaseNotesErrorKind =
  | "usage"
  | "invalid-input"
  | "missing-resource"
  | "not-found"
  | "empty-section";

export class ReleaseNotesError extends Error {
  readonly kind: ReleaseNotesErrorKind;

  constructor(kind: ReleaseNotesErrorKind, message: string) {
    super(message);
    this.name = "ReleaseNotesError";
    this.kind = kind;
  }
}

export interface ChangelogSection {
  heading: string;
  body: string;
}

/** Changelog at the repository root, one level above `tools/`. */
export function resolveChangelogPath(): string {
  return fileURLToPath(new URL("../CHANGELOG.md", import.meta.url));
}

/**
 * Strips a single leading `v` (`v1.2.3` -> `1.2.3`). `vv1` keeps its second `v`.
 */
export function normalizeVersion(raw: string): string {
  const version = raw.startsWith("v") ? raw.slice(1) : raw;
  if (!version) {
    throw new ReleaseNotesError("invalid-input", "version must be non-empty");
  }
  return version;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Finds the first `## [version] - YYYY-MM-DD` (or `## version`) heading and returns it with the
 * text up to the next `##` heading (a bare `##` line counts). `###` sub-headings stay part of the
 * body.
 */
export function findChangelogSection(contents: string, version: string): ChangelogSection {
  const headingPattern = new RegExp(
    `^##[ \\t]+\\[?${escapeRegExp(version)}\\]?(?:[ \\t]*-[ \\t]*\\d{4}-\\d{2}-\\d{2})?[ \\t]*$`,
    "m",
  );
  const match = headingPattern.exec(contents);
  if (!match) {
    throw new ReleaseNotesError("not-found", `changelog entry for ${version} not found`);
  }

  const heading = match[0].trim();
  const sectionStart = match.index + match[0].length;
  const rest = contents.slice(sectionStart);
  const nextHeading = /^##(?:[ \t]|$)/m.exec(rest);
  const body = (nextHeading ? rest.slice(0, nextHeading.index) : rest).trim();

  if (!body) {
    throw new ReleaseNotesError("empty-section", `changelog entry for ${version} is empty`);
  }

  return { heading, body };
}

export async function readChangelog(changelogPath: string): Promise<string> {
  const isFile = await stat(changelogPath).then(
    (stats) => stats.isFile(),
    () => false,
  );
  if (!isFile) {
    throw new ReleaseNotesError("missing-resource", `changelog not found at ${changelogPath}`);
  }

  const content = await readFile(changelogPath, "utf-8");
  return content.replace(/\r\n/g, "\n");
}

export function formatReleaseNotes(section: ChangelogSection): string {
  return `${section.heading}\n\n${section.body}\n`;
}

export async function writeReleaseNotes(
  outputPath: string,
  section: ChangelogSection,
): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, formatReleaseNotes(section), "utf-8");
}

/**
 * Writes the CHANGELOG.md section for a version to a file, for use as release notes
 * (e.g. the body of a GitHub Release).
 *
 * Usage:
 *   extract-release-notes <version> <output_path>
 *
 * Installed as a bin through `extract-release-notes.js`, which registers the tsx loader from this
 * package so the tool runs from any working directory.
 *
 * The changelog is always read from the repository root, next to `tools/`. A leading `v` on the
 * version is ignored, so tag names can be passed through unchanged.
 *
 * @module
 */

import { parseArgs } from "node:util";
import { fileURLToPath } from "node:url";
import chalk from "chalk";
import {
  ReleaseNotesError,
  findChangelogSection,
  normalizeVersion,
  readChangelog,
  resolveChangelogPath,
  writeReleaseNotes,
} from "./release-utils.ts";

// Script metadata
export const VERSION = "0.1.0";
export const SCRIPT_NAME = "extract-release-notes";
export const USAGE = `usage: ${SCRIPT_NAME} <version> <output_path>`;

const log = {
  error: (msg: string) => console.error(chalk.red("error:") + " " + msg),
  usage: () => console.error(USAGE),
};

function showHelp() {
  console.log(`
${chalk.bold("Usage:")} ${SCRIPT_NAME} [options] <version> <output_path>

Writes the CHANGELOG.md section for <version> to <output_path>.

${chalk.bold("Options:")}
  -h, --help         Show this help message
  -V, --version      Show script version

${chalk.bold("Examples:")}
  ${SCRIPT_NAME} 1.2.3 dist/release-notes.md
  ${SCRIPT_NAME} v1.2.3 dist/release-notes.md   # Leading 'v' is ignored
`);
}

interface CliArgs {
  help: boolean;
  version: boolean;
  positionals: string[];
}

function parseCliArgs(argv: string[]): CliArgs {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      options: {
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "V" },
      },
      allowPositionals: true,
    });
    return {
      help: values.help ?? false,
      version: values.version ?? false,
      positionals,
    };
  } catch {
    throw new ReleaseNotesError("usage", USAGE);
  }
}

export interface RunOptions {
  /** Overrides the changelog location derived from the tool's install path. */
  changelogPath?: string;
}

/**
 * Runs the extractor and returns the process exit status. Every failure is reported as a single
 * line on stderr and leaves the output path untouched.
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  try {
    const args = parseCliArgs(argv);

    if (args.help) {
      showHelp();
      return 0;
    }
    if (args.version) {
      console.log(`${SCRIPT_NAME} version ${VERSION}`);
      return 0;
    }

    if (args.positionals.length !== 2) {
      throw new ReleaseNotesError("usage", USAGE);
    }
    const [versionArg, outputPath] = args.positionals;
    const version = normalizeVersion(versionArg);

    const contents = await readChangelog(options.changelogPath ?? resolveChangelogPath());
    const section = findChangelogSection(contents, version);
    await writeReleaseNotes(outputPath, section);
    return 0;
  } catch (error: unknown) {
    if (error instanceof ReleaseNotesError && error.kind === "usage") {
      log.usage();
    } else {
      log.error(error instanceof Error ? error.message : String(error));
    }
    return 1;
  }
}

/** Process entry: runs with the command-line arguments and sets the exit status. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  try {
    process.exitCode = await run(argv);
  } catch (error: unknown) {
    log.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await main();
}

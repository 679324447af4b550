/**
 * Local file mode: text search over a file or a directory tree.
 *
 * A plain substring search per line, not a manifest parse. Symbolic links
 * are never followed, so traversal cannot loop.
 */

import type { Dirent, Stats } from "node:fs";
import { readFile, readdir, stat } from "node:fs/promises";
import { join } from "node:path";

import { FileScanError, SetupError, describeError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";
import type { FileVerdict, RunResult } from "../types.js";

export type FileScanResult = RunResult<FileVerdict>;

export interface CollectedFiles {
  files: string[];
  /** Directories below the root that could not be listed. */
  errors: Error[];
}

/**
 * Regular files at or below `path`, sorted. A missing path is fatal; an
 * unreadable directory is recorded and the walk goes on.
 */
export async function collectFiles(path: string, logger: Logger = createSilentLogger()): Promise<CollectedFiles> {
  let info: Stats;
  try {
    info = await stat(path);
  } catch (err) {
    throw new SetupError(`unable to open file: ${path}`, { cause: err });
  }

  if (!info.isDirectory()) return { files: [path], errors: [] };

  const collected: CollectedFiles = { files: [], errors: [] };
  await walk(path, collected, logger);
  collected.files.sort();
  return collected;
}

async function walk(dir: string, collected: CollectedFiles, logger: Logger): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    logger.debug(`listing failed: ${describeError(err)}`, { dir });
    collected.errors.push(new FileScanError(dir, err, "directory"));
    return;
  }

  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isSymbolicLink()) {
      logger.debug(`skipping symbolic link ${full}`);
    } else if (entry.isDirectory()) {
      await walk(full, collected, logger);
    } else if (entry.isFile()) {
      collected.files.push(full);
    }
  }
}

/**
 * 1-based number of the first line containing `target`, or 0.
 */
export async function searchFile(file: string, target: string): Promise<number> {
  return firstMatchingLine(await readFile(file, "utf-8"), target);
}

/** Lines are split on `\n`. */
export function firstMatchingLine(text: string, target: string): number {
  const lines = text.split("\n");
  for (const [index, line] of lines.entries()) {
    if (line.includes(target)) return index + 1;
  }
  return 0;
}

export async function scanFiles(
  path: string,
  target: string,
  logger: Logger = createSilentLogger(),
): Promise<FileScanResult> {
  const { files, errors } = await collectFiles(path, logger);
  logger.debug(`scanning ${files.length} files`);

  const verdicts: FileVerdict[] = [];

  for (const file of files) {
    try {
      const line = await searchFile(file, target);
      verdicts.push({ file, line, mounted: line > 0 });
    } catch (err) {
      logger.debug(`read failed: ${describeError(err)}`, { file });
      errors.push(new FileScanError(file, err));
    }
  }

  return { verdicts, errors, exposureFound: verdicts.some((v) => v.mounted) };
}

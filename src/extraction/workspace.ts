/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * workspace.ts: Per-extraction temporary storage and artifact retention.
 */
import { LOG, formatError, isErrnoException, sanitizeFilename } from "../utils/index.js";
import type { Nullable, OutputFormat } from "../types/index.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/*
 * WORKSPACES
 *
 * Every extraction works in its own directory, <workDir>/<extraction id>/, with downloads under download/ and the transcoded output beside it. Extraction ids are
 * unique, so concurrent extractions never share a path. The directory is removed when the extraction settles, whatever the outcome. Finished artifacts are moved
 * to the output directory, where they are kept for cleanup.artifactMaxAge.
 *
 * A crash can still leave workspaces behind, so a periodic sweep removes every workspace directory not owned by an in-flight extraction.
 */

// Artifact ids are twelve hex digits.
export const ARTIFACT_ID_PATTERN = /^[0-9a-f]{12}$/;

export class Workspace {

  readonly downloadDir: string;
  readonly root: string;

  private constructor(root: string) {

    this.root = root;
    this.downloadDir = path.join(root, "download");
  }

  /**
   * Creates the workspace directory for an extraction.
   * @param workDir - The parent directory of all workspaces.
   * @param extractionId - The extraction id.
   * @returns The workspace.
   */
  static async create(workDir: string, extractionId: string): Promise<Workspace> {

    const workspace = new Workspace(path.join(workDir, extractionId));

    await fsPromises.mkdir(workspace.downloadDir, { recursive: true });

    return workspace;
  }

  /**
   * Deletes the downloaded parts once they are no longer needed.
   */
  async removeDownloads(): Promise<void> {

    await fsPromises.rm(this.downloadDir, { force: true, recursive: true });
  }

  /**
   * Deletes the whole workspace. Failures are logged; the sweeper gets another chance.
   */
  async dispose(): Promise<void> {

    try {

      await fsPromises.rm(this.root, { force: true, recursive: true });
    } catch(error) {

      LOG.warn("Unable to remove workspace %s: %s.", path.basename(this.root), formatError(error));
    }
  }
}

/**
 * Names a finished artifact after the page title: "<title>-<artifact id>.<format>".
 * @param title - The page title, or null.
 * @param artifactId - The artifact id.
 * @param format - The output format.
 * @returns The file name.
 */
export function artifactFileName(title: Nullable<string>, artifactId: string, format: OutputFormat): string {

  return [ sanitizeFilename(title ?? ""), "-", artifactId, ".", format ].join("");
}

/**
 * Moves a finished artifact into the output directory, copying when the two directories are on different filesystems.
 * @param source - The artifact in the workspace.
 * @param outputDir - The output directory.
 * @returns The artifact's new path.
 */
export async function publishArtifact(source: string, outputDir: string): Promise<string> {

  const target = path.join(outputDir, path.basename(source));

  await fsPromises.mkdir(outputDir, { recursive: true });

  try {

    await fsPromises.rename(source, target);
  } catch(error) {

    if(!isErrnoException(error, "EXDEV")) {

      throw error;
    }

    await fsPromises.copyFile(source, target);
    await fsPromises.rm(source, { force: true });
  }

  return target;
}

/**
 * Finds a published artifact by id.
 * @param outputDir - The output directory.
 * @param artifactId - The artifact id.
 * @returns The artifact path, or null when there is none.
 */
export async function findArtifact(outputDir: string, artifactId: string): Promise<Nullable<string>> {

  if(!ARTIFACT_ID_PATTERN.test(artifactId)) {

    return null;
  }

  let entries: string[];

  try {

    entries = await fsPromises.readdir(outputDir);
  } catch(error) {

    if(isErrnoException(error, "ENOENT")) {

      return null;
    }

    throw error;
  }

  const suffix = [ "-", artifactId, "." ].join("");
  const match = entries.find((entry) => entry.includes(suffix));

  return match ? path.join(outputDir, match) : null;
}

/**
 * Removes workspace directories that no in-flight extraction owns.
 * @param workDir - The parent directory of all workspaces.
 * @param active - Ids of in-flight extractions.
 * @returns The number of directories removed.
 */
export async function sweepStaleWorkspaces(workDir: string, active: ReadonlySet<string>): Promise<number> {

  let entries: fs.Dirent[];

  try {

    entries = await fsPromises.readdir(workDir, { withFileTypes: true });
  } catch(error) {

    if(isErrnoException(error, "ENOENT")) {

      return 0;
    }

    throw error;
  }

  let removed = 0;

  for(const entry of entries) {

    if(!entry.isDirectory() || active.has(entry.name)) {

      continue;
    }

    // eslint-disable-next-line no-await-in-loop
    await fsPromises.rm(path.join(workDir, entry.name), { force: true, recursive: true });

    removed++;
  }

  if(removed > 0) {

    LOG.debug("cleanup", "Removed %s stale workspace(s).", removed);
  }

  return removed;
}

/**
 * Deletes artifacts older than the retention period.
 * @param outputDir - The output directory.
 * @param maxAge - Retention in milliseconds.
 * @param now - Current time in milliseconds.
 * @returns Names of the deleted files.
 */
export async function expireArtifacts(outputDir: string, maxAge: number, now: number = Date.now()): Promise<string[]> {

  let entries: string[];

  try {

    entries = await fsPromises.readdir(outputDir);
  } catch(error) {

    if(isErrnoException(error, "ENOENT")) {

      return [];
    }

    throw error;
  }

  const expired: string[] = [];

  for(const entry of entries) {

    const file = path.join(outputDir, entry);

    try {

      // eslint-disable-next-line no-await-in-loop
      const stats = await fsPromises.stat(file);

      if(!stats.isFile() || ((now - stats.mtimeMs) < maxAge)) {

        continue;
      }

      // eslint-disable-next-line no-await-in-loop
      await fsPromises.rm(file, { force: true });

      expired.push(entry);
    } catch(error) {

      // Gone already is fine.
      if(!isErrnoException(error, "ENOENT")) {

        LOG.warn("Unable to expire artifact %s: %s.", entry, formatError(error));
      }
    }
  }

  if(expired.length > 0) {

    LOG.debug("cleanup", "Expired %s artifact(s).", expired.length);
  }

  return expired;
}

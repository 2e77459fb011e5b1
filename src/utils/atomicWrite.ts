/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * atomicWrite.ts: Crash-safe file replacement.
 */
import { LOG } from "./logger.js";
import { formatError } from "./errors.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Files that other runs depend on (the channel map, the playlists) are never written in place. The content goes to a temp file in the same directory, is flushed to
 * disk, and then renamed over the target. A rename within one filesystem replaces the directory entry in a single step, so a reader sees either the old file or the
 * new one, never a truncated mix.
 */

// Distinguishes temp files written by concurrent calls within this process.
let tempCounter = 0;

/**
 * Writes content to a file atomically. Creates the parent directory if needed. On failure the temp file is removed and the target is left as it was.
 * @param filePath - The file to replace.
 * @param content - The complete new content.
 * @throws If the content cannot be written or the rename fails.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {

  await fsPromises.mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = [ filePath, ".", String(process.pid), ".", String(++tempCounter), ".tmp" ].join("");

  try {

    const handle = await fsPromises.open(tempPath, "w");

    try {

      await handle.writeFile(content, "utf-8");
      await handle.sync();
    } finally {

      await handle.close();
    }

    await fsPromises.rename(tempPath, filePath);
  } catch(error) {

    await fsPromises.rm(tempPath, { force: true }).catch((cleanupError: unknown): void => {

      LOG.warn("Unable to remove temporary file %s: %s.", tempPath, formatError(cleanupError));
    });

    throw error;
  }
}

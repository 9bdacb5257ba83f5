/**
 * Atomic File Writes
 *
 * Writes through a temp file + rename so a failed write never leaves a
 * half-written output behind.
 *
 * @module tabular/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Write bytes to a file atomically, creating parent directories.
 *
 * @param filePath - Destination path
 * @param data - File contents
 * @throws {Error} With the destination path when the write fails
 */
export async function atomicWriteFile(filePath: string, data: Uint8Array): Promise<void> {
  const tempPath = `${filePath}.tmp.${Date.now()}`;

  try {
    // Ensure parent directory exists
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    // Clean up temp file if it exists
    await fs.rm(tempPath, { force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, {
      cause: error,
    });
  }
}

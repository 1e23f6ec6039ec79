/**
 * File system utilities
 */

import * as fs from "fs";
import { readFile as fsReadFile } from "fs/promises";
import { basename, dirname, join } from "path";

/** Directory mode for created config directories */
export const DIR_MODE = 0o771;

/** File mode for config files, which may hold plaintext tokens */
export const FILE_MODE = 0o600;

/**
 * Read a UTF-8 file, returning null when it does not exist.
 * Any other error is rethrown.
 */
export async function readFileIfExists(path: string): Promise<string | null> {
  try {
    return await fsReadFile(path, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export function ensureDirSync(path: string): void {
  fs.mkdirSync(path, { recursive: true, mode: DIR_MODE });
}

/**
 * Write a file atomically
 *
 * Writes to a temp file beside the target, then renames it over the target so
 * an interrupted write never leaves a truncated file behind.
 */
export function writeFileAtomicSync(path: string, content: string): void {
  ensureDirSync(dirname(path));

  const tempPath = join(
    dirname(path),
    `.${basename(path)}.${process.pid}.${Date.now()}.tmp`,
  );

  try {
    fs.writeFileSync(tempPath, content, { encoding: "utf-8", mode: FILE_MODE });
    fs.renameSync(tempPath, path);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.unlinkSync(tempPath);
    }
    throw error;
  }
}

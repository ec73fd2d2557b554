import fs from "node:fs";
import path from "node:path";

import { dirSync as tmpDir } from "tmp";

/** Create a temporary directory. */
export function makeTmpDir(): TmpDir {
  const { name, removeCallback } = tmpDir({ prefix: "tmp-certpin-", unsafeCleanup: true });
  const join = (...segments: string[]) => path.join(name, ...segments);
  return {
    name,
    join,
    createFile: (relPath, content) => {
      const filename = join(relPath);
      fs.mkdirSync(path.dirname(filename), { recursive: true });
      fs.writeFileSync(filename, content);
      return filename;
    },
    close: removeCallback,
  };
}

/**
 * Temporary directory.
 *
 * @remarks
 * Closing this object deletes the directory and its content.
 */
export interface TmpDir {
  /** Directory path. */
  readonly name: string;

  /** Join with additional path segment(s). */
  join: (...segments: string[]) => string;

  /**
   * Write content to a file within the directory, creating parent directories as needed.
   * @returns Full filename.
   */
  createFile: (relPath: string, content: string | Uint8Array) => string;

  /** Delete the directory. */
  close: () => void;
}

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import type { DirectoryReader } from '../kernel/contracts.js';

/**
 * Lists the files directly inside a directory. Subdirectories are left out;
 * symbolic links are kept when they point at a file.
 */
export function createDirectoryReader(): DirectoryReader {
  return {
    list: async (directory) => {
      const entries = await fs.readdir(directory, { withFileTypes: true });
      const names: string[] = [];
      for (const entry of entries) {
        if (entry.isFile()) {
          names.push(entry.name);
        } else if (entry.isSymbolicLink() && (await isFileTarget(join(directory, entry.name)))) {
          names.push(entry.name);
        }
      }
      return names;
    }
  };
}

async function isFileTarget(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isFile();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

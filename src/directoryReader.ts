import fs from 'node:fs';

export type EntryType = 'directory' | 'file' | 'other';

/**
 * Read-only view of the filesystem used by the tree builder.
 * Paths and names stay raw bytes so names that are not valid UTF-8 can
 * still be descended into. Both methods throw whatever the filesystem throws.
 */
export interface DirectoryReader {
  readNames(dirPath: Buffer): Buffer[];
  entryType(entryPath: Buffer): EntryType;
}

// lstat: symlinks are neither file nor directory
export const fsDirectoryReader: DirectoryReader = {
  readNames(dirPath: Buffer): Buffer[] {
    return fs.readdirSync(dirPath, { encoding: 'buffer' });
  },

  entryType(entryPath: Buffer): EntryType {
    const stats = fs.lstatSync(entryPath);
    if (stats.isDirectory()) return 'directory';
    if (stats.isFile()) return 'file';
    return 'other';
  },
};

import path from 'node:path';
import type { DirectoryReader, EntryType } from './directoryReader';
import { fsDirectoryReader } from './directoryReader';
import type { ExclusionConfig } from './exclusionConfig';
import { NodeKind } from './nodeKind';
import { TreeNode } from './treeNode';

const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);
const SEPARATOR = Buffer.from(path.sep);

/** UTF-8 byte order, which is code point order for valid names. */
export function compareNames(a: Buffer, b: Buffer): number {
  return Buffer.compare(a, b);
}

function joinRaw(dirPath: Buffer, name: Buffer): Buffer {
  const endsWithSeparator = dirPath.subarray(-SEPARATOR.length).equals(SEPARATOR);
  return endsWithSeparator
    ? Buffer.concat([dirPath, name])
    : Buffer.concat([dirPath, SEPARATOR, name]);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function describeListingFailure(dirPath: string, error: unknown): string {
  const code = errorCode(error);
  if (code && PERMISSION_CODES.has(code)) {
    return `Permission denied: ${dirPath}`;
  }
  return `Cannot read ${dirPath} (${code ?? 'unknown'})`;
}

function errorLeaf(displayPath: string, error: unknown): TreeNode {
  return new TreeNode(
    describeListingFailure(displayPath, error),
    NodeKind.PermissionError,
    displayPath
  );
}

export class DirectoryTree {
  private config: ExclusionConfig;
  private reader: DirectoryReader;

  constructor(config: ExclusionConfig, reader: DirectoryReader = fsDirectoryReader) {
    this.config = config;
    this.reader = reader;
  }

  /**
   * Walks `rootPath` depth-first and appends what it finds to `node`
   * (a new root node when omitted). Excluded directories are never
   * descended into. A directory that cannot be listed, or an entry that
   * vanishes before it can be inspected, becomes an error leaf; its
   * siblings are still visited.
   */
  build(rootPath: string, node?: TreeNode): TreeNode {
    const current = node ?? new TreeNode(rootPath, NodeKind.Root, rootPath);
    this.walk(Buffer.from(rootPath), rootPath, current);
    return current;
  }

  private walk(dirPath: Buffer, displayPath: string, current: TreeNode): void {
    let names: Buffer[];
    try {
      names = [...this.reader.readNames(dirPath)].sort(compareNames);
    } catch (error) {
      current.addChild(errorLeaf(displayPath, error));
      return;
    }

    for (const rawName of names) {
      // labels and exclusions use the decoded name, traversal the raw bytes
      const name = rawName.toString('utf8');
      const entryPath = joinRaw(dirPath, rawName);
      const displayEntryPath = path.join(displayPath, name);

      let type: EntryType;
      try {
        type = this.reader.entryType(entryPath);
      } catch (error) {
        current.addChild(errorLeaf(displayEntryPath, error));
        continue;
      }

      if (type === 'directory' && !this.config.excludedDirectoryNames.has(name)) {
        const child = current.addChild(
          new TreeNode(name, NodeKind.Directory, displayEntryPath)
        );
        this.walk(entryPath, displayEntryPath, child);
      } else if (type === 'file' && !this.config.excludedFileNames.has(name)) {
        current.addChild(new TreeNode(name, NodeKind.File, displayEntryPath));
      }
      // excluded names, symlinks and special files produce no node
    }
  }
}

export function buildTree(
  rootPath: string,
  config: ExclusionConfig,
  node?: TreeNode
): TreeNode {
  return new DirectoryTree(config).build(rootPath, node);
}

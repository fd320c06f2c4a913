import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { DirectoryReader, EntryType } from '../directoryReader';
import type { Logger } from '../logger';
import type { NodeKind } from '../nodeKind';
import type { TreeNode } from '../treeNode';
import { vi } from 'vitest';

export interface NodeShape {
  label: string;
  kind: NodeKind;
  children: NodeShape[];
}

export function shape(node: TreeNode): NodeShape {
  return {
    label: node.label,
    kind: node.kind,
    children: node.children.map(shape),
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'project-tree-'));
}

/** Creates files (plain paths) and directories (paths ending in '/') under root. */
export function layout(root: string, entries: string[]): void {
  for (const entry of entries) {
    const target = path.join(root, entry);
    if (entry.endsWith('/')) {
      fs.mkdirSync(target, { recursive: true });
    } else {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, '');
    }
  }
}

export function mockLogger(): Logger {
  return {
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function errnoError(code: string, message = code): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

type FakeEntryType = EntryType | 'gone';
type FakeListing = Array<{ name: string; type: FakeEntryType }> | Error;

/** In-memory reader keyed by path; 'gone' entries are listed but fail inspection. */
export class FakeReader implements DirectoryReader {
  readonly calls: string[] = [];
  private types = new Map<string, FakeEntryType>();

  constructor(private listings: Record<string, FakeListing>) {
    for (const [dirPath, listing] of Object.entries(listings)) {
      if (listing instanceof Error) continue;
      for (const { name, type } of listing) {
        this.types.set(path.join(dirPath, name), type);
      }
    }
  }

  readNames(dirPath: Buffer): Buffer[] {
    const key = dirPath.toString();
    this.calls.push(key);
    const listing = this.listings[key];
    if (listing === undefined) {
      throw errnoError('ENOENT');
    }
    if (listing instanceof Error) {
      throw listing;
    }
    return listing.map(({ name }) => Buffer.from(name));
  }

  entryType(entryPath: Buffer): EntryType {
    const type = this.types.get(entryPath.toString());
    if (type === undefined || type === 'gone') {
      throw errnoError('ENOENT');
    }
    return type;
  }
}

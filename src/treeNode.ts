import { NodeKind } from './nodeKind';

export class TreeNode {
  label: string;
  kind: NodeKind;
  path: string;
  children: TreeNode[];

  constructor(label: string, kind: NodeKind, path: string) {
    this.label = label;
    this.kind = kind;
    this.path = path;
    this.children = [];
  }

  /** Whether this node may own children (root and directories only). */
  get isContainer(): boolean {
    return this.kind === NodeKind.Root || this.kind === NodeKind.Directory;
  }

  addChild(node: TreeNode): TreeNode {
    if (!this.isContainer) {
      throw new TypeError(`Cannot add children to a ${this.kind} node`);
    }
    this.children.push(node);
    return node;
  }
}

import chalk from 'chalk';
import { ICONS, SYMBOLS } from './constants';
import { NodeKind } from './nodeKind';
import type { TreeNode } from './treeNode';

export interface RenderOptions {
  colors?: chalk.Chalk;
}

function decorate(node: TreeNode, colors: chalk.Chalk): string {
  switch (node.kind) {
    case NodeKind.Root:
      return colors.bold.cyan(
        node.label.endsWith('/') ? node.label : `${node.label}/`
      );
    case NodeKind.Directory:
      return colors.bold.blue(`${ICONS.DIRECTORY} ${node.label}/`);
    case NodeKind.File:
      return `${ICONS.FILE} ${node.label}`;
    case NodeKind.PermissionError:
      return `${ICONS.WARNING} ${colors.red(node.label)}`;
  }
}

function renderChildren(
  node: TreeNode,
  prefix: string,
  colors: chalk.Chalk,
  lines: string[]
): void {
  node.children.forEach((child, index) => {
    const isLast = index === node.children.length - 1;
    lines.push(`${prefix}${isLast ? SYMBOLS.LAST_BRANCH : SYMBOLS.BRANCH}${decorate(child, colors)}`);
    if (child.children.length > 0) {
      renderChildren(
        child,
        prefix + (isLast ? SYMBOLS.INDENT_EMPTY : SYMBOLS.INDENT),
        colors,
        lines
      );
    }
  });
}

export function renderTree(root: TreeNode, options: RenderOptions = {}): string[] {
  const colors = options.colors ?? chalk;
  const lines = [decorate(root, colors)];
  renderChildren(root, '', colors, lines);
  return lines;
}

export function printTree(
  root: TreeNode,
  write: (line: string) => void = (line) => console.log(line)
): void {
  renderTree(root).forEach((line) => write(line));
}

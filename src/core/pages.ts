import { join } from 'node:path';
import type { NavItem, NavTree } from './nav.js';
import { isFile, normalizePath } from './paths.js';

function collectInto(items: NavItem[], dir: string, pages: Set<string>): void {
  for (const item of items) {
    switch (item.kind) {
      case 'page':
      case 'path':
        pages.add(normalizePath(join(dir, 'docs', item.target)));
        break;
      case 'section':
        collectInto(item.children, dir, pages);
        break;
      case 'include':
        collectInto(item.tree.items, item.tree.dir, pages);
        break;
    }
  }
}

/**
 * Every filesystem path a nav leaf should occupy, in nav order.
 * Nothing is checked on disk here.
 */
export function collectPages(tree: NavTree): Set<string> {
  const pages = new Set<string>();
  collectInto(tree.items, tree.dir, pages);
  return pages;
}

function rootsInto(items: NavItem[], roots: Set<string>): void {
  for (const item of items) {
    if (item.kind === 'section') {
      rootsInto(item.children, roots);
    } else if (item.kind === 'include') {
      roots.add(normalizePath(item.tree.dir));
      rootsInto(item.tree.items, roots);
    }
  }
}

/**
 * Directories of every included config
 */
export function includeRoots(tree: NavTree): string[] {
  const roots = new Set<string>();
  rootsInto(tree.items, roots);
  return [...roots];
}

function hasOwnLeaves(items: NavItem[]): boolean {
  return items.some(item =>
    item.kind === 'page' || item.kind === 'path' || (item.kind === 'section' && hasOwnLeaves(item.children))
  );
}

/**
 * Directories walked for on-disk markdown. The config's own directory is never
 * one of them, only its docs/ folder when the root nav lists pages itself.
 */
export function markdownRoots(tree: NavTree): string[] {
  const roots = includeRoots(tree);
  if (hasOwnLeaves(tree.items)) {
    const ownDocs = join(tree.dir, 'docs');
    if (!roots.includes(ownDocs)) roots.unshift(ownDocs);
  }
  return roots;
}

export function missingFiles(paths: Iterable<string>): string[] {
  return [...paths].filter(p => !isFile(p));
}

import { statSync } from 'node:fs';
import { basename, dirname, join, normalize, sep } from 'node:path';

/**
 * Resolve `.` and `..` without touching the filesystem.
 * Trailing separators are dropped; an unpoppable leading `..` stays.
 */
export function normalizePath(p: string): string {
  const out = normalize(p);
  if (out.length > 1 && out.endsWith(sep)) return out.slice(0, -1);
  return out;
}

/**
 * Canonical `/`-joined URL: no empty or `.` segments, `..` pops (never past the start)
 */
export function normaliseUrl(p: string): string {
  const parts: string[] = [];
  for (const seg of p.split(/[\\/]/)) {
    if (seg === '' || seg === '.') continue;
    if (seg === '..') {
      parts.pop();
      continue;
    }
    parts.push(seg);
  }
  return parts.join('/');
}

function extensionStart(name: string): number {
  const dot = name.lastIndexOf('.');
  if (dot <= 0 || name === '..') return -1;
  return dot;
}

/**
 * Drop the extension of the last segment: `a/b.md` → `a/b`
 */
export function stripExtension(p: string): string {
  const slash = Math.max(p.lastIndexOf('/'), p.lastIndexOf(sep));
  const name = p.slice(slash + 1);
  const dot = extensionStart(name);
  if (dot === -1) return p;
  return p.slice(0, slash + 1 + dot);
}

/**
 * Extension of the last segment including the dot, or '' when there is none
 */
export function extensionOf(p: string): string {
  const name = p.slice(Math.max(p.lastIndexOf('/'), p.lastIndexOf(sep)) + 1);
  const dot = extensionStart(name);
  return dot === -1 ? '' : name.slice(dot);
}

/**
 * Parent of the nearest ancestor (or the path itself) named `docs`
 */
export function docsRootFor(p: string): string | null {
  let current = p;
  for (;;) {
    if (basename(current) === 'docs') return dirname(current);
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/**
 * Nearest ancestor (or the path itself) named `docs`
 */
export function docsDirFor(p: string): string | null {
  const root = docsRootFor(p);
  return root === null ? null : join(root, 'docs');
}

export function isFile(p: string): boolean {
  try {
    return statSync(p).isFile();
  } catch {
    return false;
  }
}

export function isDirectory(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

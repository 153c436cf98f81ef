import { basename } from 'node:path';
import { type BrokenLink, type ResolveContext, findBrokenLinks } from './resolver.js';
import { isFile } from './paths.js';
import { readFile } from './scanner.js';

export interface ScanResult {
  /** every page read, in the order it was read */
  scanned: string[];
  /** every link target that resolved, plus the help pages */
  referenced: Set<string>;
  brokenLinks: BrokenLink[];
}

/**
 * Follow links from the seed pages until no new page turns up.
 * Terminates because `scanned` only grows and is bounded by the files on disk.
 */
export function scanTransitively(
  seeds: Iterable<string>,
  ctx: ResolveContext,
  helpFiles: ReadonlySet<string> = new Set()
): ScanResult {
  const scanned = new Set<string>();
  const referenced = new Set<string>(helpFiles);
  const brokenLinks: BrokenLink[] = [];
  let frontier = [...new Set(seeds)].filter(isFile);

  for (;;) {
    const batch: Array<{ path: string; content: string }> = [];
    for (const path of frontier) {
      if (scanned.has(path)) continue;
      const content = readFile(path);
      if (content === null) continue;
      scanned.add(path);
      batch.push({ path, content });
    }
    if (batch.length === 0) break;

    const found = findBrokenLinks(batch, ctx, helpFiles);
    brokenLinks.push(...found.broken);
    frontier = [...found.referenced].filter(p => !scanned.has(p) && isFile(p));
    for (const target of found.referenced) referenced.add(target);
  }

  return { scanned: [...scanned], referenced, brokenLinks };
}

/**
 * Markdown on disk that the nav does not list. Print variants never count.
 */
export function orphans(navPages: ReadonlySet<string>, files: Iterable<string>): string[] {
  return [...files].filter(p => !navPages.has(p) && !basename(p).endsWith('-print.md'));
}

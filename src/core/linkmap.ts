import { join, posix, relative, sep } from 'node:path';
import type { NavItem, NavTree } from './nav.js';
import { normaliseUrl, normalizePath, stripExtension } from './paths.js';

/**
 * Rendered URL ⇄ source file. Both directions keep the first insertion.
 */
export interface LinkMaps {
  urlToSrc: Map<string, string>;
  srcToUrl: Map<string, string>;
}

export function slugify(title: string): string {
  return title
    .replace(/[^A-Za-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .toLowerCase();
}

function joinUrl(prefix: string, segment: string): string {
  return [prefix, segment].filter(Boolean).join('/');
}

function renderedUrl(target: string, urlPrefix: string): string {
  if (urlPrefix === '') return normaliseUrl(stripExtension(target));
  const stem = stripExtension(posix.basename(target.replace(/\\/g, '/')));
  return normaliseUrl(joinUrl(urlPrefix, stem));
}

function insertMapping(maps: LinkMaps, target: string, dir: string, urlPrefix: string): void {
  const fsPath = normalizePath(join(dir, 'docs', target));
  const url = renderedUrl(target, urlPrefix);
  if (!maps.urlToSrc.has(url)) maps.urlToSrc.set(url, fsPath);
  if (!maps.srcToUrl.has(fsPath)) maps.srcToUrl.set(fsPath, url);
}

function walk(items: NavItem[], dir: string, siteRoot: string, urlPrefix: string, maps: LinkMaps): void {
  for (const item of items) {
    switch (item.kind) {
      case 'page':
      case 'path':
        insertMapping(maps, item.target, dir, urlPrefix);
        break;
      case 'section':
        walk(item.children, dir, siteRoot, joinUrl(urlPrefix, slugify(item.title)), maps);
        break;
      case 'include': {
        // subsites are mounted under their directory name, not their title
        const rel = relative(siteRoot, item.tree.dir).split(sep).join('/');
        const childPrefix = rel.startsWith('..') ? urlPrefix : joinUrl(urlPrefix, rel);
        walk(item.tree.items, item.tree.dir, siteRoot, childPrefix, maps);
        break;
      }
    }
  }
}

/**
 * Map the nav's virtual URL hierarchy onto the files that back it.
 */
export function buildLinkMaps(tree: NavTree): LinkMaps {
  const maps: LinkMaps = { urlToSrc: new Map(), srcToUrl: new Map() };
  walk(tree.items, tree.dir, tree.dir, '', maps);
  return maps;
}

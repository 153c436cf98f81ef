import { basename, dirname, join, posix, relative, sep } from 'node:path';
import type { LinkMaps } from './linkmap.js';
import {
  docsDirFor,
  docsRootFor,
  extensionOf,
  isDirectory,
  isFile,
  normaliseUrl,
  normalizePath,
  stripExtension,
} from './paths.js';
import { extractLinks } from './scanner.js';

export interface BrokenLink {
  /** file the link appears in */
  from: string;
  /** normalised link text */
  link: string;
  fromHelpUrl: boolean;
}

export interface ResolveContext {
  maps: LinkMaps;
  /** every markdown file found on disk */
  files: ReadonlySet<string>;
  /** directory of the top-level nav config */
  siteRoot: string;
  includeRoots: readonly string[];
  trace?: (message: string) => void;
}

export type ResolveStrategy = (source: string, link: string, ctx: ResolveContext) => string | null;

/**
 * Drop anchors, external and mailto links, and anything that is not markdown.
 * `dir/` becomes `dir.md`, `page` becomes `page.md`.
 */
export function normaliseLinks(links: Iterable<string>): string[] {
  const out: string[] = [];
  for (const raw of links) {
    let link = raw.split('#')[0].trim();
    if (!link) continue;
    if (/^(https?:|mailto:)/i.test(link)) continue;

    if (link.endsWith('/')) {
      link = link.replace(/\/+$/, '');
      if (!link) continue;
      out.push(`${link}.md`);
      continue;
    }

    const ext = extensionOf(link);
    if (ext === '.md') out.push(link);
    else if (ext === '') out.push(`${link}.md`);
  }
  return out;
}

/**
 * `X.md`, or `X/index.md` when only the directory form exists
 */
export function checkWithIndexFallback(candidate: string, files: ReadonlySet<string>): string | null {
  const normalized = normalizePath(candidate);
  if (isFile(normalized) || files.has(normalized)) return normalized;

  const index = join(stripExtension(normalized), 'index.md');
  if (isFile(index) || files.has(index)) return index;

  return null;
}

/**
 * The link's rendered URL, computed from the source page's own nav URL
 */
export function renderedUrlForLink(source: string, link: string, maps: LinkMaps): string | null {
  const fromUrl = maps.srcToUrl.get(source);
  if (fromUrl === undefined) return null;
  const target = link.replace(/^\/+/, '');
  const joined = link.startsWith('/') ? target : posix.join(posix.dirname(fromUrl), target);
  return normaliseUrl(stripExtension(joined));
}

function lookupUrl(url: string, urlToSrc: ReadonlyMap<string, string>): string | null {
  const direct = urlToSrc.get(url);
  if (direct !== undefined) return direct;
  const trimmed = url.replace(/\/+$/, '');
  return urlToSrc.get(trimmed) ?? urlToSrc.get(`${trimmed}/index`) ?? null;
}

export const navUrlStrategy: ResolveStrategy = (source, link, ctx) => {
  const url = renderedUrlForLink(source, link, ctx.maps);
  return url === null ? null : lookupUrl(url, ctx.maps.urlToSrc);
};

/**
 * Map a URL back to a file: a first segment naming another subsite
 * (a sibling directory with its own docs/) switches to that subsite's docs/.
 */
function urlToFilesystem(url: string, subsite: string, docsDir: string, siteRoot: string): string {
  const [first, ...rest] = url.split('/');
  const otherDocs = join(siteRoot, first, 'docs');
  const path =
    first !== subsite && isDirectory(otherDocs)
      ? join(otherDocs, ...rest)
      : join(docsDir, url.startsWith(`${subsite}/`) ? url.slice(subsite.length + 1) : url);
  return normalizePath(`${path}.md`);
}

/**
 * Candidate files for a link interpreted in URL space. Relative links are tried
 * against the page-as-directory base first, then the plain parent base.
 */
export function urlSpaceCandidates(source: string, link: string, siteRoot: string): string[] {
  const docsDir = docsDirFor(source);
  if (docsDir === null) return [];
  const subsite = basename(dirname(docsDir));
  if (!subsite) return [];

  const withinDocs = relative(docsDir, source).split(sep).join('/');
  const sourceUrl = stripExtension(posix.join(subsite, withinDocs));
  const linkPath = stripExtension(link);

  if (link.startsWith('/')) {
    const url = normaliseUrl(linkPath);
    return url ? [urlToFilesystem(url, subsite, docsDir, siteRoot)] : [];
  }

  const candidates: string[] = [];
  for (const base of [sourceUrl, posix.dirname(sourceUrl)]) {
    const url = normaliseUrl(posix.join(base, linkPath));
    if (!url) continue;
    const candidate = urlToFilesystem(url, subsite, docsDir, siteRoot);
    if (!candidates.includes(candidate)) candidates.push(candidate);
  }
  return candidates;
}

export const urlSpaceStrategy: ResolveStrategy = (source, link, ctx) => {
  for (const candidate of urlSpaceCandidates(source, link, ctx.siteRoot)) {
    const resolved = checkWithIndexFallback(candidate, ctx.files);
    if (resolved !== null) return resolved;
  }
  return null;
};

export const renderedUnderRootsStrategy: ResolveStrategy = (source, link, ctx) => {
  const url = renderedUrlForLink(source, link, ctx.maps);
  if (url === null) return null;

  const docRoot = docsRootFor(source);
  const roots = docRoot === null ? ctx.includeRoots : [docRoot, ...ctx.includeRoots];
  for (const root of roots) {
    const resolved = checkWithIndexFallback(join(root, 'docs', `${url}.md`), ctx.files);
    if (resolved !== null) return resolved;
  }
  return null;
};

export const filesystemStrategy: ResolveStrategy = (source, link, ctx) => {
  let candidate: string;
  if (link.startsWith('/')) {
    const docRoot = docsRootFor(source);
    if (docRoot === null) return null;
    candidate = join(docRoot, 'docs', link.replace(/^\/+/, ''));
  } else {
    candidate = join(dirname(source), link);
  }
  return checkWithIndexFallback(candidate, ctx.files);
};

export const parentJoinStrategy: ResolveStrategy = (source, link, ctx) =>
  checkWithIndexFallback(join(dirname(source), link), ctx.files);

export const RESOLVE_STRATEGIES: ReadonlyArray<readonly [string, ResolveStrategy]> = [
  ['nav', navUrlStrategy],
  ['url space', urlSpaceStrategy],
  ['doc roots', renderedUnderRootsStrategy],
  ['fs', filesystemStrategy],
  ['parent', parentJoinStrategy],
];

/**
 * Resolve a normalised link found in `source` to the file it points at
 */
export function resolveLink(source: string, link: string, ctx: ResolveContext): string | null {
  for (const [name, strategy] of RESOLVE_STRATEGIES) {
    const target = strategy(source, link, ctx);
    if (target !== null) {
      ctx.trace?.(`resolved via ${name}: ${link} -> ${target}`);
      return target;
    }
  }
  ctx.trace?.(`broken: ${source} -> ${link}`);
  return null;
}

/**
 * Resolve every link of every file, return the referenced targets and the broken links
 */
export function findBrokenLinks(
  files: ReadonlyArray<{ path: string; content: string }>,
  ctx: ResolveContext,
  helpFiles: ReadonlySet<string> = new Set()
): { referenced: Set<string>; broken: BrokenLink[] } {
  const referenced = new Set<string>();
  const broken: BrokenLink[] = [];

  for (const { path, content } of files) {
    const fromHelpUrl = helpFiles.has(path);
    const links = normaliseLinks(extractLinks(content));
    ctx.trace?.(`analysing ${links.length} links for ${path}`);
    for (const link of links) {
      const target = resolveLink(path, link, ctx);
      if (target !== null) {
        referenced.add(target);
      } else {
        broken.push({ from: path, link, fromHelpUrl });
      }
    }
  }

  return { referenced, broken };
}

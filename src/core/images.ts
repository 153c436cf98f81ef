import { dirname, join } from 'node:path';
import { isDirectory, isFile, normalizePath } from './paths.js';
import { extractImageRefs, findFilesUnder, readFile } from './scanner.js';

export interface BrokenImage {
  from: string;
  image: string;
}

export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.svg', '.webp', '.ico', '.bmp'];
export const STYLESHEET_EXTENSIONS = ['.css', '.scss'];

const CSS_URL_RE = /url\s*\(\s*['"]?([^'")]+)['"]?\s*\)/g;

export function findImages(roots: string[]): string[] {
  return findFilesUnder(roots, IMAGE_EXTENSIONS);
}

/**
 * Stylesheets under the include roots and the site's shared documentation-assets/
 */
export function findStylesheets(roots: string[], siteRoot: string): string[] {
  const dirs = [...roots, join(siteRoot, 'documentation-assets')].filter(isDirectory);
  return findFilesUnder(dirs, STYLESHEET_EXTENSIONS);
}

export function extractCssImageRefs(css: string): string[] {
  const refs: string[] = [];
  for (const match of css.matchAll(CSS_URL_RE)) {
    const url = match[1].trim();
    if (url.startsWith('data:') || url.startsWith('http://') || url.startsWith('https://')) continue;
    refs.push(url);
  }
  return refs;
}

/**
 * Resolve an image reference made by `source` to a known image file
 */
export function resolveImageRef(
  source: string,
  ref: string,
  images: ReadonlySet<string>,
  roots: readonly string[]
): string | null {
  if (ref.startsWith('/')) {
    const rest = ref.slice(1);
    for (const root of roots) {
      const docs = join(root, 'docs');
      const candidate = normalizePath(isDirectory(docs) ? join(docs, rest) : join(root, rest));
      if (images.has(candidate)) return candidate;
    }
    return null;
  }

  const candidate = normalizePath(join(dirname(source), ref));
  // the referenced file may sit outside the walked roots
  if (images.has(candidate) || isFile(candidate)) return candidate;

  for (const root of roots) {
    const docs = join(root, 'docs');
    if (!isDirectory(docs)) continue;
    const fromDocs = normalizePath(join(docs, ref));
    if (images.has(fromDocs)) return fromDocs;
  }

  return null;
}

/**
 * Check image references of markdown pages and stylesheets. Only markdown
 * references are reported missing; stylesheets may point at build output.
 */
export function analyseImageRefs(
  markdownFiles: Iterable<string>,
  cssFiles: Iterable<string>,
  images: ReadonlySet<string>,
  roots: readonly string[]
): { missing: BrokenImage[]; referenced: Set<string> } {
  const missing: BrokenImage[] = [];
  const referenced = new Set<string>();

  for (const file of markdownFiles) {
    const content = readFile(file);
    if (content === null) continue;
    for (const image of extractImageRefs(content)) {
      const resolved = resolveImageRef(file, image, images, roots);
      if (resolved !== null) referenced.add(resolved);
      else missing.push({ from: file, image });
    }
  }

  for (const file of cssFiles) {
    const content = readFile(file);
    if (content === null) continue;
    for (const image of extractCssImageRefs(content)) {
      const resolved = resolveImageRef(file, image, images, roots);
      if (resolved !== null) referenced.add(resolved);
    }
  }

  return { missing, referenced };
}

export function orphanImages(images: Iterable<string>, referenced: ReadonlySet<string>): string[] {
  return [...images].filter(image => !referenced.has(image));
}

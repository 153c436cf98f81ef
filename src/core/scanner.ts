import { type Stats, readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { Definition, Root } from 'mdast';
import remarkGfm from 'remark-gfm';
import remarkParse from 'remark-parse';
import { unified } from 'unified';
import { visit } from 'unist-util-visit';
import { normalizePath } from './paths.js';

const markdown = unified().use(remarkParse).use(remarkGfm);

const HTML_HREF_RE = /<a\b[^>]*?\shref\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/gi;
const HTML_SRC_RE = /<img\b[^>]*?\ssrc\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/gi;

/**
 * Recursively find files with one of the given extensions (lower-cased match).
 * Dot-directories and node_modules are skipped; entries are visited in sorted order.
 */
export function findFiles(dir: string, extensions: string[]): string[] {
  const results: string[] = [];

  let entries: string[];
  try {
    entries = readdirSync(dir).sort();
  } catch {
    return results;
  }

  for (const entry of entries) {
    if (entry.startsWith('.') || entry === 'node_modules') continue;
    const full = join(dir, entry);
    let stat: Stats;
    try {
      stat = statSync(full);
    } catch {
      continue;
    }
    if (stat.isDirectory()) {
      results.push(...findFiles(full, extensions));
    } else if (extensions.some(ext => entry.toLowerCase().endsWith(ext))) {
      results.push(normalizePath(full));
    }
  }

  return results;
}

/**
 * Walk several roots; a file reachable from two roots is listed once
 */
export function findFilesUnder(roots: string[], extensions: string[]): string[] {
  const seen = new Set<string>();
  for (const root of roots) {
    for (const file of findFiles(root, extensions)) seen.add(file);
  }
  return [...seen];
}

function parseMarkdown(content: string): Root {
  return markdown.parse(content);
}

function definitionsOf(tree: Root): Map<string, Definition> {
  const definitions = new Map<string, Definition>();
  visit(tree, 'definition', node => {
    if (!definitions.has(node.identifier)) definitions.set(node.identifier, node);
  });
  return definitions;
}

function htmlAttributes(html: string, re: RegExp): string[] {
  const values: string[] = [];
  for (const match of html.matchAll(re)) {
    values.push(match[1] ?? match[2] ?? match[3] ?? '');
  }
  return values;
}

/**
 * Link destinations in document order: markdown links (reference links resolved
 * through their definitions) and href of <a> tags in raw HTML.
 */
export function extractLinks(content: string): string[] {
  const tree = parseMarkdown(content);
  const definitions = definitionsOf(tree);
  const links: string[] = [];

  visit(tree, node => {
    if (node.type === 'link') {
      links.push(node.url);
    } else if (node.type === 'linkReference') {
      const definition = definitions.get(node.identifier);
      if (definition) links.push(definition.url);
    } else if (node.type === 'html') {
      links.push(...htmlAttributes(node.value, HTML_HREF_RE));
    }
  });

  return links;
}

/**
 * Image references in document order: markdown images and src of <img> tags.
 * External and data: targets are left out.
 */
export function extractImageRefs(content: string): string[] {
  const tree = parseMarkdown(content);
  const definitions = definitionsOf(tree);
  const images: string[] = [];

  visit(tree, node => {
    if (node.type === 'image') {
      images.push(node.url);
    } else if (node.type === 'imageReference') {
      const definition = definitions.get(node.identifier);
      if (definition) images.push(definition.url);
    } else if (node.type === 'html') {
      images.push(...htmlAttributes(node.value, HTML_SRC_RE));
    }
  });

  return images.filter(ref => ref !== '' && !/^(https?:|data:)/.test(ref));
}

/**
 * True when the page has a footnote reference `[^id]` or definition `[^id]: ...`
 */
export function hasFootnotes(content: string): boolean {
  let found = false;
  visit(parseMarkdown(content), node => {
    if (node.type === 'footnoteReference' || node.type === 'footnoteDefinition') {
      found = true;
    }
  });
  return found;
}

/**
 * Read file content safely
 */
export function readFile(path: string): string | null {
  try {
    return readFileSync(path, 'utf-8');
  } catch {
    return null;
  }
}

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { HelpIndexError, describeError } from './errors.js';
import { normalizePath } from './paths.js';

const DEFINE_RE = /#define\s+(\w+)\s+"([^"]+)"/g;
// the key is a quoted string that may itself hold commas or escaped quotes
const HELP_URL_RE = /HELP_URL\s*\(\s*"(?:[^"\\]|\\.)*"\s*,\s*([^)]+)\)/g;

/**
 * Remove `/* *\/` and `//` comments; a line comment keeps its newline
 */
export function stripCComments(source: string): string {
  let out = '';
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    const next = source[i + 1];
    if (ch === '/' && next === '*') {
      const end = source.indexOf('*/', i + 2);
      i = end === -1 ? source.length : end + 2;
    } else if (ch === '/' && next === '/') {
      const end = source.indexOf('\n', i + 2);
      if (end === -1) break;
      out += '\n';
      i = end + 1;
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}

export function parseMacros(source: string): Map<string, string> {
  const macros = new Map<string, string>();
  for (const match of source.matchAll(DEFINE_RE)) {
    macros.set(match[1], match[2].trim());
  }
  return macros;
}

/**
 * Expand `MACRO"/suffix"`, `"literal"` or `MACRO` into one path
 */
export function expandUrl(expr: string, macros: ReadonlyMap<string, string>): string {
  return expr
    .split('"')
    .map(part => part.trim())
    .filter(Boolean)
    .map(part => macros.get(part) ?? part)
    .join('');
}

/**
 * `guide/a/b` → `guide/docs/a/b`: the first segment names the subsite
 */
export function injectDocs(path: string): string {
  const [first, ...rest] = path.split('/').filter(seg => seg !== '' && seg !== '.');
  if (first === undefined) return 'docs';
  return [first, 'docs', ...rest].join('/');
}

/**
 * Expected markdown file of every HELP_URL entry in the header, under `siteRoot`
 */
export function extractHelpUrls(file: string, siteRoot: string): string[] {
  let raw: string;
  try {
    raw = readFileSync(file, 'utf-8');
  } catch (err) {
    throw new HelpIndexError(`cannot read help index ${file}: ${describeError(err)}`, { cause: err });
  }

  const content = stripCComments(raw);
  const macros = parseMacros(content);
  const pages: string[] = [];
  for (const match of content.matchAll(HELP_URL_RE)) {
    const expanded = expandUrl(match[1].trim(), macros);
    pages.push(normalizePath(join(siteRoot, `${injectDocs(expanded)}.md`)));
  }
  return pages;
}

import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse, type ScalarTag } from 'yaml';
import { NavConfigError, describeError } from './errors.js';

/**
 * One nav entry. `include` only comes out of loadNav, never out of decodeNav.
 */
export type NavItem =
  | { kind: 'page'; title: string; target: string }
  | { kind: 'section'; title: string; children: NavItem[] }
  | { kind: 'path'; target: string }
  | { kind: 'include'; title: string; file: string; tree: NavTree };

export interface NavTree {
  /** absolute path of the config file */
  file: string;
  /** directory holding the config and its docs/ folder */
  dir: string;
  items: NavItem[];
}

const INCLUDE = '!include';

// `Title: !include ./x/mkdocs.yml` decodes to the same string as the quoted form
const includeTag: ScalarTag = {
  tag: INCLUDE,
  resolve: (value: string) => `${INCLUDE} ${value}`,
};

export function parseIncludeTarget(value: string): string | null {
  const trimmed = value.trim();
  if (!trimmed.startsWith(INCLUDE)) return null;
  return trimmed
    .slice(INCLUDE.length)
    .trim()
    .replace(/^["']+|["']+$/g, '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodePages(value: Record<string, unknown>): NavItem[] | null {
  const items: NavItem[] = [];
  for (const [title, target] of Object.entries(value)) {
    if (typeof target !== 'string') return null;
    items.push({ kind: 'page', title, target });
  }
  return items;
}

function decodeSections(value: Record<string, unknown>, file: string, at: string): NavItem[] | null {
  const entries = Object.entries(value);
  if (!entries.every(([, children]) => Array.isArray(children))) return null;
  return entries.map(([title, children]) => ({
    kind: 'section' as const,
    title,
    children: decodeNav(children, file, `${at}.${title}`),
  }));
}

/**
 * Decode a raw nav list. Each element is tried as Page, then Section, then PlainPath.
 */
export function decodeNav(value: unknown, file: string, at = 'nav'): NavItem[] {
  if (!Array.isArray(value)) {
    throw new NavConfigError(`${file}: ${at} must be a list`);
  }
  const items: NavItem[] = [];
  value.forEach((element: unknown, i) => {
    const where = `${at}[${i}]`;
    if (isRecord(element)) {
      const decoded = decodePages(element) ?? decodeSections(element, file, where);
      if (decoded === null) {
        throw new NavConfigError(`${file}: ${where} is neither a page nor a section`);
      }
      items.push(...decoded);
    } else if (typeof element === 'string') {
      items.push({ kind: 'path', target: element });
    } else {
      throw new NavConfigError(`${file}: ${where} is neither a page nor a section`);
    }
  });
  return items;
}

function readConfig(file: string): unknown {
  let source: string;
  try {
    source = readFileSync(file, 'utf-8');
  } catch (err) {
    throw new NavConfigError(`cannot read nav config ${file}: ${describeError(err)}`, { cause: err });
  }
  try {
    return parse(source, { customTags: [includeTag], logLevel: 'error' });
  } catch (err) {
    throw new NavConfigError(`cannot parse nav config ${file}: ${describeError(err)}`, { cause: err });
  }
}

function loadNavFrom(file: string, chain: string[]): NavTree {
  if (chain.includes(file)) {
    throw new NavConfigError(`include cycle: ${[...chain, file].join(' -> ')}`);
  }
  const config = readConfig(file);
  if (!isRecord(config) || !('nav' in config)) {
    throw new NavConfigError(`${file}: missing top-level nav`);
  }
  const dir = dirname(file);
  const entered = [...chain, file];

  const expand = (items: NavItem[]): NavItem[] =>
    items.map((item): NavItem => {
      if (item.kind === 'section') return { ...item, children: expand(item.children) };
      if (item.kind !== 'page') return item;
      const target = parseIncludeTarget(item.target);
      if (target === null) return item;
      const included = resolve(dir, target);
      return { kind: 'include', title: item.title, file: included, tree: loadNavFrom(included, entered) };
    });

  return { file, dir, items: expand(decodeNav(config.nav, file)) };
}

/**
 * Load a nav config and every config it includes, recursively.
 * Throws NavConfigError on the first unreadable, malformed or cyclic include.
 */
export function loadNav(file: string): NavTree {
  return loadNavFrom(resolve(file), []);
}

import { isAbsolute, relative, sep } from 'node:path';
import type { AuditResult } from './audit.js';

// ANSI color codes
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';
const GREEN = '\x1b[32m';

export type Section =
  | 'navMissing'
  | 'ghost'
  | 'helpMissing'
  | 'brokenLinks'
  | 'missingImages'
  | 'orphanImages'
  | 'pagesWithFootnotes';

export const ALL_SECTIONS: readonly Section[] = [
  'navMissing',
  'ghost',
  'helpMissing',
  'brokenLinks',
  'missingImages',
  'orphanImages',
  'pagesWithFootnotes',
];

// footnotes are informational and only shown on request
export const DEFAULT_SECTIONS: readonly Section[] = ALL_SECTIONS.filter(s => s !== 'pagesWithFootnotes');

export const SECTION_TITLES: Record<Section, string> = {
  navMissing: 'Missing nav entries',
  ghost: 'Ghost files (orphans)',
  helpMissing: 'Missing help URLs',
  brokenLinks: 'Broken links',
  missingImages: 'Missing images',
  orphanImages: 'Orphan images',
  pagesWithFootnotes: 'Pages with footnotes',
};

export interface ReportOptions {
  sections: readonly Section[];
  summary?: boolean;
  color?: boolean;
}

export interface JsonReport {
  totalIssues: number;
  navMissing?: string[];
  ghost?: string[];
  helpMissing?: string[];
  brokenLinks?: Array<{ from: string; link: string; fromHelpUrl: boolean }>;
  missingImages?: Array<{ from: string; image: string }>;
  orphanImages?: string[];
  pagesWithFootnotes?: string[];
}

/**
 * Path relative to the site root, `/`-separated
 */
export function displayPath(path: string, siteRoot: string): string {
  const rel = relative(siteRoot, path);
  if (rel.startsWith('..') || isAbsolute(rel)) return path;
  return rel.split(sep).join('/');
}

function subsiteOf(path: string, siteRoot: string): string | null {
  const rel = relative(siteRoot, path);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return null;
  return rel.split(sep)[0];
}

/**
 * Drop every finding that lives in one of the named subsites
 */
export function excludeSubsites(result: AuditResult, names: readonly string[]): AuditResult {
  if (names.length === 0) return result;
  const keep = (path: string) => {
    const subsite = subsiteOf(path, result.siteRoot);
    return subsite === null || !names.includes(subsite);
  };
  return {
    ...result,
    navMissing: result.navMissing.filter(keep),
    ghost: result.ghost.filter(keep),
    helpMissing: result.helpMissing.filter(keep),
    brokenLinks: result.brokenLinks.filter(b => keep(b.from)),
    missingImages: result.missingImages.filter(b => keep(b.from)),
    orphanImages: result.orphanImages.filter(keep),
    pagesWithFootnotes: result.pagesWithFootnotes.filter(keep),
  };
}

export function countIssues(result: AuditResult, sections: readonly Section[]): number {
  return sections.reduce((total, section) => total + result[section].length, 0);
}

function sectionLines(result: AuditResult, section: Section): string[] {
  const root = result.siteRoot;
  switch (section) {
    case 'brokenLinks':
      return result.brokenLinks.map(b => `${b.fromHelpUrl ? '[H] ' : ''}${displayPath(b.from, root)} -> ${b.link}`);
    case 'missingImages':
      return result.missingImages.map(b => `${displayPath(b.from, root)} -> ${b.image}`);
    default:
      return result[section].map(p => displayPath(p, root));
  }
}

/**
 * Render the selected sections for a terminal
 */
export function formatReport(result: AuditResult, opts: ReportOptions): string {
  const paint = (code: string, s: string) => (opts.color ? `${code}${s}${RESET}` : s);
  const lines: string[] = [];

  for (const section of opts.sections) {
    const items = sectionLines(result, section);
    const title = SECTION_TITLES[section];
    if (opts.summary) {
      const count = items.length === 0 ? paint(GREEN, '0') : paint(RED, String(items.length));
      lines.push(`${title}: ${count}`);
      continue;
    }
    lines.push('');
    lines.push(paint(BOLD, `${title}:`));
    if (items.length === 0) {
      lines.push(`  ${paint(DIM, '(none)')}`);
    } else {
      for (const item of items) lines.push(`  ${paint(YELLOW, item)}`);
    }
  }

  if (!opts.summary) {
    lines.push('');
    lines.push(`Total issues: ${countIssues(result, opts.sections)}`);
  }

  return lines.join('\n');
}

/**
 * Selected sections as a JSON-ready object, paths relative to the site root
 */
export function formatJson(result: AuditResult, sections: readonly Section[]): JsonReport {
  const root = result.siteRoot;
  const report: JsonReport = { totalIssues: countIssues(result, sections) };
  for (const section of sections) {
    switch (section) {
      case 'brokenLinks':
        report.brokenLinks = result.brokenLinks.map(b => ({ ...b, from: displayPath(b.from, root) }));
        break;
      case 'missingImages':
        report.missingImages = result.missingImages.map(b => ({ ...b, from: displayPath(b.from, root) }));
        break;
      default:
        report[section] = result[section].map(p => displayPath(p, root));
    }
  }
  return report;
}

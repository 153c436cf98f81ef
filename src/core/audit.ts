import { resolve } from 'node:path';
import { extractHelpUrls } from './help.js';
import { type BrokenImage, analyseImageRefs, findImages, findStylesheets, orphanImages } from './images.js';
import { buildLinkMaps } from './linkmap.js';
import { loadNav } from './nav.js';
import { collectPages, includeRoots, markdownRoots, missingFiles } from './pages.js';
import { isFile } from './paths.js';
import type { BrokenLink, ResolveContext } from './resolver.js';
import { findFilesUnder, hasFootnotes, readFile } from './scanner.js';
import { orphans, scanTransitively } from './transitive.js';

export type { BrokenImage } from './images.js';
export type { BrokenLink } from './resolver.js';
export { AuditConfigError, HelpIndexError, NavConfigError } from './errors.js';

export interface AuditOptions {
  /** top-level nav config, normally <monorepo>/mkdocs.yml */
  mkdocsYaml: string;
  /** header holding HELP_URL entries */
  helpUrls?: string;
  /** receives one line per resolution decision */
  trace?: (message: string) => void;
}

export interface AuditResult {
  /** directory of the top-level nav config; every path below is absolute */
  siteRoot: string;
  navMissing: string[];
  ghost: string[];
  helpMissing: string[];
  brokenLinks: BrokenLink[];
  missingImages: BrokenImage[];
  orphanImages: string[];
  pagesWithFootnotes: string[];
}

/**
 * Run the whole audit. Throws AuditConfigError when the nav config, one of
 * its includes, or the help index cannot be read; findings never throw.
 */
export function audit(options: AuditOptions): AuditResult {
  const tree = loadNav(resolve(options.mkdocsYaml));
  const siteRoot = tree.dir;

  const pages = collectPages(tree);
  const navMissing = missingFiles(pages);

  const roots = includeRoots(tree);
  const walked = markdownRoots(tree);
  const files = findFilesUnder(walked, ['.md']);
  const maps = buildLinkMaps(tree);

  const helpPages = options.helpUrls === undefined ? [] : extractHelpUrls(resolve(options.helpUrls), siteRoot);
  const helpMissing = missingFiles(helpPages);
  const helpFiles = new Set(helpPages);

  const ctx: ResolveContext = {
    maps,
    files: new Set(files),
    siteRoot,
    includeRoots: roots,
    trace: options.trace,
  };
  const scan = scanTransitively([...pages, ...helpPages].filter(isFile), ctx, helpFiles);

  const ghost = orphans(pages, files).filter(p => !scan.referenced.has(p));

  const images = findImages(walked);
  const stylesheets = findStylesheets(walked, siteRoot);
  const { missing, referenced } = analyseImageRefs(scan.scanned, stylesheets, new Set(images), walked);

  const pagesWithFootnotes = scan.scanned.filter(p => {
    const content = readFile(p);
    return content !== null && hasFootnotes(content);
  });

  return {
    siteRoot,
    navMissing,
    ghost,
    helpMissing,
    brokenLinks: scan.brokenLinks,
    missingImages: missing,
    orphanImages: orphanImages(images, referenced),
    pagesWithFootnotes,
  };
}

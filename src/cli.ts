#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { AuditConfigError, type AuditResult, audit } from './core/audit.js';
import {
  DEFAULT_SECTIONS,
  type Section,
  countIssues,
  excludeSubsites,
  formatJson,
  formatReport,
} from './core/reporter.js';

const VERSION = '0.1.0';

const HELP = `
ghost-audit: audit a MkDocs monorepo: nav entries, ghost pages, broken links and images

USAGE
  ghost-audit --mkdocs-yaml <path> [--help-urls <path>] [flags]

REPORTS (default: all but --footnotes)
  --nav-missing            nav entries with no file on disk
  --ghost                  markdown reachable from neither nav nor links
  --help-missing           HELP_URL entries with no file on disk
  --broken-links           internal links that resolve to nothing
  --missing-images         image references that resolve to nothing
  --orphan-images          images no page or stylesheet references
  --footnotes              pages that use footnotes

FLAGS
  --exclude <a,b>          skip findings in these subsites
  --summary                counts only
  --json                   output as JSON
  -q, --quiet              no output, exit code only
  --verbose                trace link resolution on stderr
`;

const SECTION_FLAGS: Record<string, Section> = {
  '--nav-missing': 'navMissing',
  '--ghost': 'ghost',
  '--help-missing': 'helpMissing',
  '--broken-links': 'brokenLinks',
  '--missing-images': 'missingImages',
  '--orphan-images': 'orphanImages',
  '--footnotes': 'pagesWithFootnotes',
};

export interface ParsedArgs {
  mkdocsYaml: string | null;
  helpUrls: string | null;
  sections: Section[];
  exclude: string[];
  summary: boolean;
  quiet: boolean;
  json: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
  errors: string[];
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  color: boolean;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const parsed: ParsedArgs = {
    mkdocsYaml: null,
    helpUrls: null,
    sections: [],
    exclude: [],
    summary: false,
    quiet: false,
    json: false,
    verbose: false,
    help: false,
    version: false,
    errors: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const section = SECTION_FLAGS[arg];
    if (section !== undefined) {
      if (!parsed.sections.includes(section)) parsed.sections.push(section);
    } else if (arg === '--help' || arg === '-h') {
      parsed.help = true;
    } else if (arg === '--version' || arg === '-v') {
      parsed.version = true;
    } else if (arg === '--summary') {
      parsed.summary = true;
    } else if (arg === '--quiet' || arg === '-q') {
      parsed.quiet = true;
    } else if (arg === '--json') {
      parsed.json = true;
    } else if (arg === '--verbose') {
      parsed.verbose = true;
    } else if ((arg === '--mkdocs-yaml' || arg === '--help-urls' || arg === '--exclude') && i + 1 < args.length) {
      const value = args[++i];
      if (arg === '--mkdocs-yaml') parsed.mkdocsYaml = value;
      else if (arg === '--help-urls') parsed.helpUrls = value;
      else parsed.exclude.push(...value.split(',').map(s => s.trim()).filter(Boolean));
    } else {
      parsed.errors.push(`unexpected argument: ${arg}`);
    }
  }

  return parsed;
}

const defaultIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
  color: !process.env.NO_COLOR && process.stdout.isTTY === true,
};

/**
 * Exit codes: 0 clean, 1 issues found, 2 bad usage or unreadable config
 */
export function main(argv: string[] = process.argv, io: CliIO = defaultIO): number {
  const opts = parseArgs(argv);

  if (opts.help) {
    io.stdout(HELP.trim() + '\n');
    return 0;
  }

  if (opts.version) {
    io.stdout(`ghost-audit v${VERSION}\n`);
    return 0;
  }

  if (opts.errors.length > 0 || opts.mkdocsYaml === null) {
    const problems = opts.errors.length > 0 ? opts.errors : ['--mkdocs-yaml is required'];
    for (const problem of problems) io.stderr(`Error: ${problem}\n`);
    io.stderr('Run ghost-audit --help for usage.\n');
    return 2;
  }

  let result: AuditResult;
  try {
    result = audit({
      mkdocsYaml: opts.mkdocsYaml,
      helpUrls: opts.helpUrls ?? undefined,
      trace: opts.verbose ? line => io.stderr(line + '\n') : undefined,
    });
  } catch (err) {
    if (err instanceof AuditConfigError) {
      io.stderr(`Error: ${err.message}\n`);
      return 2;
    }
    throw err;
  }

  result = excludeSubsites(result, opts.exclude);
  const sections = opts.sections.length > 0 ? opts.sections : DEFAULT_SECTIONS;
  const issues = countIssues(result, sections);

  if (!opts.quiet) {
    if (opts.json) {
      io.stdout(JSON.stringify(formatJson(result, sections), null, 2) + '\n');
    } else {
      io.stdout(formatReport(result, { sections, summary: opts.summary, color: io.color }) + '\n');
    }
  }

  return issues > 0 ? 1 : 0;
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Run
if (invokedDirectly()) {
  const exitCode = main();
  if (exitCode !== 0) process.exit(exitCode);
}

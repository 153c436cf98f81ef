import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  docsDirFor,
  docsRootFor,
  extensionOf,
  isDirectory,
  isFile,
  normaliseUrl,
  normalizePath,
  stripExtension,
} from '../src/core/paths.js';

const TMP = join(process.cwd(), '.test-tmp-paths');

describe('normalizePath', () => {
  it('resolves . and .. lexically', () => {
    assert.equal(normalizePath('/base/./docs/../docs/a.md'), '/base/docs/a.md');
  });

  it('keeps an unpoppable leading ..', () => {
    assert.equal(normalizePath('../a/./b'), '../a/b');
  });

  it('drops trailing separators', () => {
    assert.equal(normalizePath('/base/docs/'), '/base/docs');
  });
});

describe('normaliseUrl', () => {
  it('joins segments with /', () => {
    assert.equal(normaliseUrl('guide/./config//editor'), 'guide/config/editor');
  });

  it('pops on .. and never goes above the start', () => {
    assert.equal(normaliseUrl('release-notes/../../prg/intro'), 'prg/intro');
  });

  it('is idempotent', () => {
    const once = normaliseUrl('./a/b/../c/');
    assert.equal(once, 'a/c');
    assert.equal(normaliseUrl(once), once);
  });
});

describe('stripExtension / extensionOf', () => {
  it('strips only the last segment extension', () => {
    assert.equal(stripExtension('v1.2/page.md'), 'v1.2/page');
    assert.equal(stripExtension('dir/page'), 'dir/page');
  });

  it('treats dotfiles as having no extension', () => {
    assert.equal(stripExtension('dir/.hidden'), 'dir/.hidden');
    assert.equal(extensionOf('dir/.hidden'), '');
  });

  it('returns the extension with its dot', () => {
    assert.equal(extensionOf('a/b.md'), '.md');
    assert.equal(extensionOf('image.PNG'), '.PNG');
    assert.equal(extensionOf('../sibling'), '');
  });
});

describe('docsRootFor', () => {
  it('finds the parent of the nearest docs ancestor', () => {
    assert.equal(docsRootFor('/base/guide/docs/config/page.md'), '/base/guide');
    assert.equal(docsDirFor('/base/guide/docs/config/page.md'), '/base/guide/docs');
  });

  it('returns null outside any docs tree', () => {
    assert.equal(docsRootFor('/base/guide/page.md'), null);
    assert.equal(docsDirFor('/base/guide/page.md'), null);
  });
});

describe('isFile / isDirectory', () => {
  it('probes without throwing', () => {
    rmSync(TMP, { recursive: true, force: true });
    mkdirSync(TMP, { recursive: true });
    writeFileSync(join(TMP, 'a.md'), '# A');

    assert.equal(isFile(join(TMP, 'a.md')), true);
    assert.equal(isFile(TMP), false);
    assert.equal(isDirectory(TMP), true);
    assert.equal(isFile(join(TMP, 'missing.md')), false);
    assert.equal(isDirectory(join(TMP, 'missing')), false);
    rmSync(TMP, { recursive: true, force: true });
  });
});

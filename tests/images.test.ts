import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import {
  analyseImageRefs,
  extractCssImageRefs,
  findImages,
  findStylesheets,
  orphanImages,
  resolveImageRef,
} from '../src/core/images.js';

const TMP = join(process.cwd(), '.test-tmp-images');
const GUIDE = join(TMP, 'guide');
const DOCS = join(GUIDE, 'docs');

function setup() {
  rmSync(TMP, { recursive: true, force: true });
  mkdirSync(TMP, { recursive: true });
  write('guide/docs/img/logo.png');
  write('guide/docs/img/bg.png');
  write('guide/docs/img/unused.png');
  write('guide/docs/assets/diagram.svg');
}

function teardown() {
  rmSync(TMP, { recursive: true, force: true });
}

function write(rel: string, content = '') {
  const full = join(TMP, rel);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
}

describe('extractCssImageRefs', () => {
  it('reads url() references in any quoting', () => {
    const css = 'a { background: url("../img/a.png"); }\nb { background: url( \'b.svg\' ) }\nc { background: url(c.gif) }';
    assert.deepEqual(extractCssImageRefs(css), ['../img/a.png', 'b.svg', 'c.gif']);
  });

  it('skips data and remote urls', () => {
    const css = "a { background: url(data:image/png;base64,AAAA) } b { background: url('https://example.com/x.png') }";
    assert.deepEqual(extractCssImageRefs(css), []);
  });
});

describe('findImages and findStylesheets', () => {
  it('walks roots in sorted order', () => {
    setup();
    assert.deepEqual(findImages([GUIDE]), [
      join(DOCS, 'assets', 'diagram.svg'),
      join(DOCS, 'img', 'bg.png'),
      join(DOCS, 'img', 'logo.png'),
      join(DOCS, 'img', 'unused.png'),
    ]);
    teardown();
  });

  it('includes the shared documentation-assets folder', () => {
    setup();
    write('guide/docs/css/extra.css', '');
    write('documentation-assets/theme.scss', '');
    assert.deepEqual(findStylesheets([GUIDE], TMP), [
      join(DOCS, 'css', 'extra.css'),
      join(TMP, 'documentation-assets', 'theme.scss'),
    ]);
    teardown();
  });
});

describe('resolveImageRef', () => {
  it('resolves relative to the page', () => {
    setup();
    const images = new Set(findImages([GUIDE]));
    assert.equal(resolveImageRef(join(DOCS, 'a.md'), 'img/logo.png', images, [GUIDE]), join(DOCS, 'img', 'logo.png'));
    teardown();
  });

  it('resolves absolute references under each root docs/', () => {
    setup();
    const images = new Set(findImages([GUIDE]));
    assert.equal(
      resolveImageRef(join(DOCS, 'deep', 'page.md'), '/assets/diagram.svg', images, [GUIDE]),
      join(DOCS, 'assets', 'diagram.svg')
    );
    teardown();
  });

  it('falls back to the root docs/ for relative references', () => {
    setup();
    const images = new Set(findImages([GUIDE]));
    assert.equal(resolveImageRef(join(DOCS, 'sub', 'page.md'), 'img/logo.png', images, [GUIDE]), join(DOCS, 'img', 'logo.png'));
    assert.equal(resolveImageRef(join(DOCS, 'sub', 'page.md'), 'img/nope.png', images, [GUIDE]), null);
    teardown();
  });
});

describe('analyseImageRefs', () => {
  it('reports missing markdown images, never stylesheet ones', () => {
    setup();
    write('guide/docs/a.md', '![logo](img/logo.png)\n\n![gone](nope.png)\n');
    write('guide/docs/css/extra.css', 'body { background: url("../img/bg.png"); }\n.x { background: url(not-there.png) }\n');

    const images = findImages([GUIDE]);
    const { missing, referenced } = analyseImageRefs(
      [join(DOCS, 'a.md')],
      [join(DOCS, 'css', 'extra.css')],
      new Set(images),
      [GUIDE]
    );
    assert.deepEqual(missing, [{ from: join(DOCS, 'a.md'), image: 'nope.png' }]);
    assert.deepEqual([...referenced], [join(DOCS, 'img', 'logo.png'), join(DOCS, 'img', 'bg.png')]);
    assert.deepEqual(orphanImages(images, referenced), [join(DOCS, 'assets', 'diagram.svg'), join(DOCS, 'img', 'unused.png')]);
    teardown();
  });
});

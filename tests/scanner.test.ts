import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { extractImageRefs, extractLinks, findFiles, findFilesUnder, hasFootnotes } from '../src/core/scanner.js';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';

const TMP = join(process.cwd(), '.test-tmp-scanner');

function setup() {
  rmSync(TMP, { recursive: true, force: true });
  mkdirSync(TMP, { recursive: true });
}

function teardown() {
  rmSync(TMP, { recursive: true, force: true });
}

describe('extractLinks', () => {
  it('extracts markdown and HTML links', () => {
    const content = [
      '# Test Page',
      '',
      'Here is a [markdown link](markdown-target.md).',
      '',
      'And here is <a href="html-target.md">an HTML link</a>.',
      '',
      '<div><a class="x" href=\'block.md\'>block</a></div>',
    ].join('\n');
    assert.deepEqual(extractLinks(content), ['markdown-target.md', 'html-target.md', 'block.md']);
  });

  it('extracts links with formatted text', () => {
    const links = extractLinks('[**Applies To**](../propertyapplies/accelerator.md)');
    assert.deepEqual(links, ['../propertyapplies/accelerator.md']);
  });

  it('extracts links inside tables', () => {
    const content = [
      '| A | B |',
      '|---|---|',
      '|[ActiveXControl](../objects/activexcontrol.md)|[Bitmap](../objects/bitmap.md)|',
    ].join('\n');
    assert.deepEqual(extractLinks(content), ['../objects/activexcontrol.md', '../objects/bitmap.md']);
  });

  it('resolves reference-style links through their definitions', () => {
    const content = 'See [the guide][guide].\n\n[guide]: guide/intro.md\n';
    assert.deepEqual(extractLinks(content), ['guide/intro.md']);
  });

  it('ignores links in code', () => {
    assert.deepEqual(extractLinks('`[x](in-code.md)`\n\n```\n[y](fenced.md)\n```\n'), []);
  });
});

describe('extractImageRefs', () => {
  it('extracts markdown images and img tags', () => {
    const content = '![logo](img/logo.png)\n\n<img alt="x" src="/assets/diagram.svg">\n';
    assert.deepEqual(extractImageRefs(content), ['img/logo.png', '/assets/diagram.svg']);
  });

  it('skips external and data: images', () => {
    const content = '![a](https://example.com/a.png) ![b](data:image/png;base64,AAAA) ![c](c.png)';
    assert.deepEqual(extractImageRefs(content), ['c.png']);
  });
});

describe('hasFootnotes', () => {
  it('detects footnote references', () => {
    assert.equal(hasFootnotes('Text with a note[^1].\n\n[^1]: The note.\n'), true);
  });

  it('ignores a reference without a definition', () => {
    assert.equal(hasFootnotes('Dangling note[^1] here.\n'), false);
  });

  it('ignores footnote syntax in code', () => {
    assert.equal(hasFootnotes('`a[^1]`\n\n```\n[^1]: x\n```\n'), false);
  });

  it('is false for plain pages', () => {
    assert.equal(hasFootnotes('Just [a link](a.md).\n'), false);
  });
});

describe('findFiles', () => {
  it('finds files recursively in sorted order', () => {
    setup();
    mkdirSync(join(TMP, 'sub'), { recursive: true });
    writeFileSync(join(TMP, 'b.md'), '# B');
    writeFileSync(join(TMP, 'a.md'), '# A');
    writeFileSync(join(TMP, 'c.txt'), 'not md');
    writeFileSync(join(TMP, 'sub', 'd.md'), '# D');

    assert.deepEqual(findFiles(TMP, ['.md']), [join(TMP, 'a.md'), join(TMP, 'b.md'), join(TMP, 'sub', 'd.md')]);
    teardown();
  });

  it('matches extensions case-insensitively', () => {
    setup();
    writeFileSync(join(TMP, 'LOGO.PNG'), '');
    assert.deepEqual(findFiles(TMP, ['.png']), [join(TMP, 'LOGO.PNG')]);
    teardown();
  });

  it('skips node_modules and dotdirs', () => {
    setup();
    mkdirSync(join(TMP, 'node_modules'), { recursive: true });
    mkdirSync(join(TMP, '.git'), { recursive: true });
    writeFileSync(join(TMP, 'a.md'), '# A');
    writeFileSync(join(TMP, 'node_modules', 'b.md'), '# B');
    writeFileSync(join(TMP, '.git', 'c.md'), '# C');

    assert.deepEqual(findFiles(TMP, ['.md']), [join(TMP, 'a.md')]);
    teardown();
  });

  it('returns empty for a missing directory', () => {
    assert.deepEqual(findFiles(join(TMP, 'nope'), ['.md']), []);
  });

  it('lists a file reachable from two roots once', () => {
    setup();
    mkdirSync(join(TMP, 'sub'), { recursive: true });
    writeFileSync(join(TMP, 'sub', 'a.md'), '# A');

    assert.deepEqual(findFilesUnder([TMP, join(TMP, 'sub')], ['.md']), [join(TMP, 'sub', 'a.md')]);
    teardown();
  });
});

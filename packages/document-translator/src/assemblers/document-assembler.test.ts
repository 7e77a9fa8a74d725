import { describe, expect, test } from 'vitest';

import { DocumentAssembler, combine } from './document-assembler';

describe('DocumentAssembler', () => {
  test('should wrap pages in page and document containers', () => {
    expect(
      DocumentAssembler.combine([
        '<html><body><p>A</p></body></html>',
        '<p>B</p>',
      ]),
    ).toBe(
      "<div class='document'>\n" +
        "<div class='page'>\n<p>A</p>\n</div>\n" +
        "<div class='page'>\n<p>B</p>\n</div>\n" +
        '</div>',
    );
  });

  test('should produce an empty document for no pages', () => {
    expect(DocumentAssembler.combine([])).toBe("<div class='document'>\n</div>");
  });

  test('should strip wrapper tags with attributes and doctype', () => {
    expect(
      DocumentAssembler.stripDocumentWrappers(
        '<!DOCTYPE html><html lang="en"><head><title>T</title></head>' +
          '<body class="x"><header>H</header></body></html>',
      ),
    ).toBe('<title>T</title><header>H</header>');
  });

  test('combine should delegate to DocumentAssembler', () => {
    expect(combine(['<p>C</p>'])).toBe(
      "<div class='document'>\n<div class='page'>\n<p>C</p>\n</div>\n</div>",
    );
  });
});

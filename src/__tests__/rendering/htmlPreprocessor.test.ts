import {
  PLACEHOLDER_IMAGE_DATA_URI,
  buildHtmlDocument,
  sanitizeCidReferences,
} from '../../rendering/htmlPreprocessor';

const HEADER_PRE = '<pre style="font-family: monospace; white-space: pre-wrap;">';

describe('sanitizeCidReferences', () => {
  it('should replace inline image sources with a placeholder', () => {
    expect(sanitizeCidReferences('<img src="cid:logo@mail">')).toBe(
      `<img src="${PLACEHOLDER_IMAGE_DATA_URI}" alt="[Embedded Image]">`
    );
  });

  it('should match single quotes, spacing and any case', () => {
    expect(sanitizeCidReferences("<IMG SRC = 'CID:part1'>")).toBe(
      `<IMG src="${PLACEHOLDER_IMAGE_DATA_URI}" alt="[Embedded Image]">`
    );
  });

  it('should neutralize cid links', () => {
    expect(sanitizeCidReferences('<a href="cid:doc">doc</a>')).toBe(
      '<a href="#" title="[Embedded Content]">doc</a>'
    );
  });

  it('should leave ordinary references alone', () => {
    const html = '<img src="https://example.test/a.png"><a href="mailto:a@example.test">a</a>';
    expect(sanitizeCidReferences(html)).toBe(html);
  });
});

describe('buildHtmlDocument', () => {
  it('should insert the escaped header right after the body tag', () => {
    const html = buildHtmlDocument(
      'From: Alice <alice@example.test>\n',
      '<html><body class="mail"><p>Hi</p></body></html>'
    );

    expect(html).toBe(
      `<html><body class="mail">\n${HEADER_PRE}From: Alice &lt;alice@example.test&gt;\n</pre><p>Hi</p></body></html>`
    );
  });

  it('should wrap fragments in a complete document', () => {
    const html = buildHtmlDocument('Subject: A & B', '<p>Hi</p>');

    expect(html.split('\n')).toEqual([
      '<!DOCTYPE html>',
      '<html>',
      '<head><meta charset="utf-8"></head>',
      '<body>',
      `${HEADER_PRE}Subject: A &amp; B</pre>`,
      '<p>Hi</p>',
      '</body>',
      '</html>',
    ]);
  });

  it('should sanitize cid references in the body', () => {
    const html = buildHtmlDocument('h', '<img src="cid:x">');
    expect(html).toContain(`<img src="${PLACEHOLDER_IMAGE_DATA_URI}" alt="[Embedded Image]">`);
  });
});

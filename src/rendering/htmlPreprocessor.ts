import he from 'he';

/** Transparent 1x1 PNG used in place of inline images we cannot resolve */
export const PLACEHOLDER_IMAGE_DATA_URI =
  'data:image/png;base64,iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==';

const CID_SRC_PATTERN = /src\s*=\s*(["'])cid:[^"']*\1/gi;
const CID_HREF_PATTERN = /href\s*=\s*(["'])cid:[^"']*\1/gi;

/**
 * Replace `cid:` references, which only resolve inside a mail client, with
 * placeholders the renderer can load.
 */
export function sanitizeCidReferences(html: string): string {
  return html
    .replace(CID_SRC_PATTERN, `src="${PLACEHOLDER_IMAGE_DATA_URI}" alt="[Embedded Image]"`)
    .replace(CID_HREF_PATTERN, 'href="#" title="[Embedded Content]"');
}

/**
 * Put the escaped header block above the message body.
 */
export function buildHtmlDocument(header: string, bodyHtml: string): string {
  const headerBlock = `<pre style="font-family: monospace; white-space: pre-wrap;">${he.escape(header)}</pre>`;
  const body = sanitizeCidReferences(bodyHtml);

  if (/<body[^>]*>/i.test(body)) {
    return body.replace(/<body[^>]*>/i, (tag) => `${tag}\n${headerBlock}`);
  }

  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head><meta charset="utf-8"></head>',
    '<body>',
    headerBlock,
    body,
    '</body>',
    '</html>',
  ].join('\n');
}

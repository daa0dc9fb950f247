import { extname } from 'path';

/** Declared types that say nothing about the content */
const GENERIC_CONTENT_TYPES = new Set(['', 'application/octet-stream']);

/**
 * Determine content type from filename extension
 */
export function getContentType(filename: string): string {
  const ext = extname(filename).toLowerCase();

  switch (ext) {
    case '.pdf':
      return 'application/pdf';
    case '.png':
      return 'image/png';
    case '.jpg':
    case '.jpeg':
      return 'image/jpeg';
    case '.gif':
      return 'image/gif';
    case '.bmp':
      return 'image/bmp';
    case '.tif':
    case '.tiff':
      return 'image/tiff';
    case '.txt':
    case '.log':
      return 'text/plain';
    case '.csv':
      return 'text/csv';
    case '.htm':
    case '.html':
      return 'text/html';
    case '.doc':
      return 'application/msword';
    case '.docx':
      return 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
    default:
      return 'application/octet-stream';
  }
}

/**
 * Normalize a declared content type, falling back to the extension when the
 * declaration is missing or generic.
 */
export function resolveContentType(declared: string | undefined, filename: string): string {
  const normalized = (declared ?? '').split(';')[0].trim().toLowerCase();
  if (GENERIC_CONTENT_TYPES.has(normalized)) {
    return getContentType(filename);
  }
  return normalized === 'image/jpg' ? 'image/jpeg' : normalized;
}

/**
 * Format file size for display
 */
export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(2)} ${units[unitIndex]}`;
}

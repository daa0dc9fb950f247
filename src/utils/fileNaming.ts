/**
 * File naming utilities for files written to the print spool directory.
 */

import path from 'path';

const UNSAFE_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;
const MAX_BASENAME_LENGTH = 100;

/**
 * Make a name safe to create inside a directory: no separators, no control
 * characters, no leading dots, bounded length.
 *
 * @param fileName - Name as received (e.g. an attachment filename)
 * @param fallback - Used when nothing printable is left
 */
export function toSafeFileName(fileName: string, fallback = 'attachment'): string {
  const cleaned = fileName.replace(UNSAFE_CHARS, '_').replace(/^\.+/, '').trim();
  if (!cleaned) {
    return fallback;
  }

  const ext = path.extname(cleaned);
  const base = path.basename(cleaned, ext).slice(0, MAX_BASENAME_LENGTH);
  return `${base || fallback}${ext}`;
}

/**
 * Generate a unique filename by appending a counter if needed.
 *
 * @param baseName - The base filename
 * @param existingNames - Set or array of existing filenames
 * @returns A unique filename
 */
export function generateUniqueFileName(
  baseName: string,
  existingNames: Set<string> | string[]
): string {
  const nameSet = existingNames instanceof Set ? existingNames : new Set(existingNames);

  if (!nameSet.has(baseName)) {
    return baseName;
  }

  const ext = path.extname(baseName);
  const nameWithoutExt = path.basename(baseName, ext);

  let counter = 1;
  let uniqueName: string;

  do {
    uniqueName = `${nameWithoutExt}_${counter}${ext}`;
    counter++;
  } while (nameSet.has(uniqueName) && counter < 1000);

  return uniqueName;
}

/**
 * Path of a derived file beside its source, e.g. photo.png -> photo.pdf.
 */
export function siblingWithExtension(filePath: string, extension: string): string {
  const ext = path.extname(filePath);
  const base = ext ? filePath.slice(0, -ext.length) : filePath;
  return `${base}${extension}`;
}

import { promises as fs } from 'fs';
import pdf from 'pdf-parse';
import logger from '../utils/logger';

export const LINES_PER_PAGE = 60;

export function estimateTextPages(text: string): number {
  const lines = text.split('\n').length;
  return Math.max(1, Math.floor(lines / LINES_PER_PAGE));
}

/**
 * Rough page count used to enforce the per-document page limit.
 * Anything that cannot be estimated counts as one page.
 */
export async function estimatePageCount(filePath: string, contentType: string): Promise<number> {
  try {
    if (contentType === 'application/pdf') {
      const data = await pdf(await fs.readFile(filePath));
      return Math.max(1, data.numpages);
    }
    if (contentType.startsWith('text/')) {
      return estimateTextPages(await fs.readFile(filePath, 'utf-8'));
    }
  } catch (error: unknown) {
    logger.warn('Page count estimate failed, assuming one page', {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return 1;
}

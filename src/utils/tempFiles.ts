import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import logger from './logger';

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` succeeds or throws.
 */
export async function withTempDirectory<T>(
  prefix: string,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true }).catch((error: unknown) => {
      logger.warn('Failed to remove temporary directory', {
        dir,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }
}

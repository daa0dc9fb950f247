import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { getRequestContext, runWithContext } from '../../utils/requestContext';
import { withTempDirectory } from '../../utils/tempFiles';

describe('withTempDirectory', () => {
  it('should create a directory under the system temp dir and remove it afterwards', async () => {
    let seen = '';

    const result = await withTempDirectory('relay-test-', async (dir) => {
      seen = dir;
      await fs.writeFile(path.join(dir, 'a.txt'), 'x');
      return 'done';
    });

    expect(result).toBe('done');
    expect(path.dirname(seen)).toBe(os.tmpdir());
    expect(path.basename(seen)).toMatch(/^relay-test-/);
    await expect(fs.access(seen)).rejects.toThrow();
  });

  it('should remove the directory when the callback throws', async () => {
    let seen = '';

    await expect(
      withTempDirectory('relay-test-', async (dir) => {
        seen = dir;
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(fs.access(seen)).rejects.toThrow();
  });
});

describe('requestContext', () => {
  it('should expose the context inside the callback only', async () => {
    const inside = await runWithContext({ cycleId: 'c1' }, async () => {
      await Promise.resolve();
      return getRequestContext();
    });

    expect(inside).toEqual({ cycleId: 'c1' });
    expect(getRequestContext()).toBeUndefined();
  });
});

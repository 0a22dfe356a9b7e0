import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir } from 'fs-extra';

/**
 * Writes through a temporary sibling file and renames it into place,
 * so readers never observe a half-written file.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(dirname(path));
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.tmp-' });
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, path);
}

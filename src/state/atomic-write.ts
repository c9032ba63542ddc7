import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';

let tempCounter = 0;

/**
 * Replace `filePath` with `data` through a sibling temp file and a rename,
 * so readers see either the old content or the new, never a partial write.
 */
export async function writeFileAtomic(
  filePath: string,
  data: string | Buffer,
  options: { mode?: number } = {},
): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });
  const tempPath = join(dir, `.${basename(filePath)}.${process.pid}.${++tempCounter}.tmp`);
  try {
    await writeFile(tempPath, data, { mode: options.mode });
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

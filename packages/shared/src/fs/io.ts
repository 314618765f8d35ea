import path from 'path';
import fs from 'fs-extra';
import { tmpName } from 'tmp-promise';

/**
 * Creates the directory that will hold `filePath`.
 */
export async function ensureParentDir(filePath: string): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
}

/**
 * Writes through a temp file in the target directory and renames it into place,
 * so readers see either the old file or the complete new one. The temp file is
 * removed when the write or the rename fails.
 */
export async function atomicWrite(filePath: string, content: string | Buffer): Promise<void> {
  await ensureParentDir(filePath);
  const tempPath = await tmpName({ dir: path.dirname(filePath), prefix: `.${path.basename(filePath)}-` });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.remove(tempPath);
    throw error;
  }
}

export async function atomicWriteJson(filePath: string, value: unknown): Promise<void> {
  await atomicWrite(filePath, JSON.stringify(value, null, 2) + '\n');
}

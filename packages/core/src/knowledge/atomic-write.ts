import { writeFile, rename, mkdir, rm } from 'node:fs/promises';
import { dirname } from 'node:path';

// Write to a sibling temp file, then rename over the target
export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  const tmpPath = `${path}.tmp`;
  await mkdir(dirname(path), { recursive: true });
  try {
    await writeFile(tmpPath, data);
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

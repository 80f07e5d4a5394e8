import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

const tempDirs = new Set<string>();

/**
 * Create a temporary directory
 */
export async function createTempDir(prefix = 'benchrun-test-'): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  tempDirs.add(dir);
  return dir;
}

/**
 * Clean up a temporary directory
 */
export async function cleanupTempDir(dir: string): Promise<void> {
  if (tempDirs.has(dir)) {
    await rm(dir, { recursive: true, force: true });
    tempDirs.delete(dir);
  }
}

/**
 * Write files below a directory, keyed by relative path
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const path = join(root, relativePath);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  }
}

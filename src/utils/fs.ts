/**
 * File system utilities
 */

import { promises as fs } from 'fs';
import { join } from 'path';

/**
 * Read file safely, return null if not found
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Check if a file or directory exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Recursively list files under dir whose names end with one of the extensions.
 * Results are sorted so output order does not depend on the file system.
 */
export async function listFilesRecursive(dir: string, extensions: readonly string[]): Promise<string[]> {
  const found: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await listFilesRecursive(fullPath, extensions)));
    } else if (entry.isFile() && extensions.some(ext => entry.name.toLowerCase().endsWith(ext))) {
      found.push(fullPath);
    }
  }

  return found.sort();
}

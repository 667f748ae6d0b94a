// Filesystem and in-memory implementations of DocumentReader.

import * as fs from 'node:fs/promises';
import type { DocumentReader } from './types.js';

/**
 * Create a DocumentReader that reads from the local filesystem.
 */
export function createFilesystemReader(): DocumentReader {
  return {
    async exists(filePath: string): Promise<boolean> {
      try {
        const stat = await fs.stat(filePath);
        return stat.isFile();
      } catch {
        return false;
      }
    },

    async readFile(filePath: string): Promise<string> {
      return fs.readFile(filePath, 'utf-8');
    },
  };
}

/**
 * Create an in-memory DocumentReader from a map of path → content.
 * Reads count every readFile call per path, for asserting single loads.
 */
export function createInMemoryReader(
  files: Map<string, string> | Record<string, string>
): DocumentReader & { reads: Map<string, number> } {
  const contents = files instanceof Map ? files : new Map(Object.entries(files));
  const reads = new Map<string, number>();

  return {
    reads,

    async exists(filePath: string): Promise<boolean> {
      return contents.has(filePath);
    },

    async readFile(filePath: string): Promise<string> {
      reads.set(filePath, (reads.get(filePath) ?? 0) + 1);
      const content = contents.get(filePath);
      if (content === undefined) {
        throw new Error(`File not found: ${filePath}`);
      }
      return content;
    },
  };
}

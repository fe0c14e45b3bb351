import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { wrapError } from '@posledger/core';
import { ok, type Result } from 'neverthrow';

import { sourceFileKind } from '../../infrastructure/readers/raw-table-reader.js';

// Root, BANK/ and BANK/YYYY-MM/
const MAX_DEPTH = 2;

function isIgnored(name: string): boolean {
  // Hidden files and Office lock files (~$report.xlsx)
  return name.startsWith('.') || name.startsWith('~$');
}

async function walk(dir: string, depth: number, found: string[]): Promise<void> {
  const entries: Dirent[] = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (isIgnored(entry.name)) continue;

    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (depth < MAX_DEPTH) {
        await walk(fullPath, depth + 1, found);
      }
    } else if (entry.isFile() && sourceFileKind(entry.name) !== undefined) {
      found.push(fullPath);
    }
  }
}

/**
 * Source files under `dir`, sorted by path so runs see them in a stable
 * order.
 */
export async function discoverSourceFiles(dir: string): Promise<Result<string[], Error>> {
  const found: string[] = [];
  try {
    await walk(dir, 0, found);
  } catch (error) {
    return wrapError(error, `Failed to scan ${dir}`);
  }
  return ok(found.sort());
}

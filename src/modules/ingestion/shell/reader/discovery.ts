import fs from 'node:fs/promises';
import path from 'node:path';

import { compareCodePoints } from '../../../../common/utils/compare.js';

export interface RegionFileEntry {
  region: string;
  absolutePath: string;
}

/** The region label is the last parenthesized part of the file name */
const REGION_PATTERN = /\(([^()]+)\)[^()]*$/;

/**
 * Extracts the region label from a source file name, or null if the name does
 * not belong to a region source.
 */
export const regionFromFileName = (
  fileName: string,
  marker: string,
  extension: string
): string | null => {
  if (!fileName.endsWith(extension) || !fileName.includes(marker)) {
    return null;
  }

  const match = REGION_PATTERN.exec(fileName.slice(0, -extension.length));
  const region = match?.[1]?.trim();
  return region === undefined || region === '' ? null : region;
};

/**
 * Lists region source files directly under rootDir, sorted by region label.
 */
export const listRegionFiles = async (
  rootDir: string,
  marker: string,
  extension: string
): Promise<RegionFileEntry[]> => {
  const normalizedRoot = path.resolve(rootDir);
  const entries = await fs.readdir(normalizedRoot, { withFileTypes: true });

  const files: RegionFileEntry[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }
    const region = regionFromFileName(entry.name, marker, extension);
    if (region !== null) {
      files.push({ region, absolutePath: path.join(normalizedRoot, entry.name) });
    }
  }

  return files.sort((a, b) => compareCodePoints(a.region, b.region));
};

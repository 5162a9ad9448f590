import fs from 'fs/promises';
import fsSync from 'fs';
import path from 'path';
import zlib from 'zlib';
import { pipeline } from 'stream/promises';
import JSZip from 'jszip';
import type { Logger } from '../logger.js';
import { ExpansionError, getErrorMessage } from '../types/errors.js';
import { resolveInside, sanitizeForLog, validateMemberPath } from '../validation.js';

export type ArchivePlugin = {
  name: string;
  suffix: string;
  /**
   * Extracts next to `filePath` and returns the files it created. Never
   * removes the input.
   */
  expand(filePath: string, logger?: Logger): Promise<string[]>;
};

function hasSuffix(filePath: string, suffix: string) {
  return filePath.toLowerCase().endsWith(suffix);
}

function stripSuffix(filePath: string, suffix: string) {
  // a bare `.gz` would strip to the directory itself
  return path.basename(filePath).length > suffix.length
    ? filePath.slice(0, -suffix.length)
    : path.join(path.dirname(filePath), 'decompressed');
}

export const gzipArchive: ArchivePlugin = {
  name: 'gzip',
  suffix: '.gz',
  async expand(filePath: string, logger?: Logger): Promise<string[]> {
    const out = stripSuffix(filePath, '.gz');
    logger?.info(`Decompressing ${filePath}`, { format: 'gzip' });
    try {
      await pipeline(fsSync.createReadStream(filePath), zlib.createGunzip(), fsSync.createWriteStream(out));
    } catch (err) {
      await fs.rm(out, { force: true }).catch((rmErr: unknown) => {
        logger?.warning(`Could not remove partial output ${out}`, { error: getErrorMessage(rmErr) });
      });
      throw new ExpansionError(filePath, `Cannot decompress ${filePath}: ${getErrorMessage(err)}`, { cause: err });
    }
    return [out];
  },
};

export const zipArchive: ArchivePlugin = {
  name: 'zip',
  suffix: '.zip',
  async expand(filePath: string, logger?: Logger): Promise<string[]> {
    const outDir = stripSuffix(filePath, '.zip');
    logger?.info(`Decompressing ${filePath}`, { format: 'zip' });
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(await fs.readFile(filePath));
    } catch (err) {
      throw new ExpansionError(filePath, `Cannot read zip archive ${filePath}: ${getErrorMessage(err)}`, { cause: err });
    }
    await fs.mkdir(outDir, { recursive: true });
    const written: string[] = [];
    for (const entry of Object.values(zip.files)) {
      if (entry.dir) continue;
      // jszip normalizes `name`; judge the name as recorded in the archive
      const recorded = 'unsafeOriginalName' in entry && typeof entry.unsafeOriginalName === 'string'
        ? entry.unsafeOriginalName
        : entry.name;
      const check = validateMemberPath(recorded);
      const target = check.valid ? resolveInside(outDir, recorded) : undefined;
      if (!target) {
        logger?.warning('Skipping unsafe archive member', {
          archive: filePath,
          member: sanitizeForLog(recorded, 200),
          reason: check.error ?? 'Resolves outside the extraction directory',
        });
        continue;
      }
      try {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await pipeline(entry.nodeStream('nodebuffer'), fsSync.createWriteStream(target));
      } catch (err) {
        throw new ExpansionError(filePath, `Cannot extract ${recorded} from ${filePath}: ${getErrorMessage(err)}`, { cause: err });
      }
      written.push(target);
    }
    return written;
  },
};

export function getArchivePlugins(): ArchivePlugin[] {
  return [gzipArchive, zipArchive];
}

export function findArchivePlugin(filePath: string): ArchivePlugin | undefined {
  return getArchivePlugins().find((p) => hasSuffix(filePath, p.suffix));
}

/**
 * Chooses a format by filename suffix alone. Files with no recognized suffix
 * are not archives and yield no extracted files.
 */
export async function expandArchive(filePath: string, logger?: Logger): Promise<string[]> {
  const plugin = findArchivePlugin(filePath);
  if (!plugin) {
    logger?.debug(`Not an archive: ${filePath}`);
    return [];
  }
  return plugin.expand(filePath, logger);
}

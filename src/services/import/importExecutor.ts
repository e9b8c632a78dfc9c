import { createHash } from 'crypto';
import fs from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import logger from '../../config/logger';
import { IntegrityError, ValidationError, classifyError, errorCode } from '../../utils/errors';
import type { AudioQuality, QualityProbe } from './mediaProbe';
import { formatFromExtension } from './mediaProbe';

export const SUPPORTED_IMPORT_FORMATS = ['m4b', 'm4a', 'mp3', 'flac', 'ogg', 'opus', 'aac'];

/** Destination must have this multiple of the source size free. */
export const FREE_SPACE_FACTOR = 1.1;

export type ImportMode = 'move' | 'copy';

export interface ImportRequest {
  source: string;
  /** Full destination file path, extension included. */
  destination: string;
  /** `copy` keeps the source in place, e.g. while a torrent is still seeding. */
  mode: ImportMode;
  signal?: AbortSignal;
}

export interface ImportResult {
  source: string;
  destination: string;
  size: number;
  checksum: string;
  /** The destination already held identical content; nothing was written. */
  duplicate: boolean;
  quality: AudioQuality;
  completedAt: string;
}

export type FreeSpaceProbe = (directory: string) => Promise<number>;

export async function statfsFreeSpace(directory: string): Promise<number> {
  const stats = await fs.promises.statfs(directory);
  return stats.bavail * stats.bsize;
}

export async function sha256File(filePath: string, signal?: AbortSignal): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of fs.createReadStream(filePath, { signal })) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.promises.access(target);
    return true;
  } catch {
    return false;
  }
}

async function nearestExistingDirectory(target: string): Promise<string> {
  let current = path.resolve(target);
  while (!(await exists(current))) {
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return current;
}

export function isSupportedImportFile(filePath: string): boolean {
  return SUPPORTED_IMPORT_FORMATS.includes(formatFromExtension(filePath));
}

/** Audio files under a path (the path itself when it is a file), sorted by name. */
export async function collectAudioFiles(target: string): Promise<string[]> {
  const stats = await fs.promises.stat(target);
  if (stats.isFile()) {
    return isSupportedImportFile(target) ? [target] : [];
  }

  const found: string[] = [];
  const entries = await fs.promises.readdir(target, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(target, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await collectAudioFiles(full)));
    } else if (entry.isFile() && isSupportedImportFile(full)) {
      found.push(full);
    }
  }
  return found.sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));
}

/**
 * Places one finished file into the library. The source is checksummed before
 * anything moves and the destination is checked against it afterwards; on a
 * mismatch the source stays where it was and no partial destination is left.
 */
export class ImportExecutor {
  constructor(private readonly probe: QualityProbe, private readonly freeSpace: FreeSpaceProbe = statfsFreeSpace) {}

  async importFile(request: ImportRequest): Promise<ImportResult> {
    const { source, destination, mode, signal } = request;

    const size = await this.validateSource(source);
    const checksum = await sha256File(source, signal);

    if (await exists(destination)) {
      const existing = await sha256File(destination, signal);
      if (existing !== checksum) {
        throw new IntegrityError(`Destination ${destination} already exists with different content`);
      }
      logger.info(`[Import] ${path.basename(destination)} already imported, skipping`);
      return this.result(source, destination, size, checksum, true);
    }

    const directory = path.dirname(destination);
    const available = await this.freeSpace(await nearestExistingDirectory(directory));
    const required = Math.ceil(size * FREE_SPACE_FACTOR);
    if (available < required) {
      throw new IntegrityError(
        `Insufficient disk space at ${directory}: ${available} bytes free, ${required} required`,
      );
    }

    await fs.promises.mkdir(directory, { recursive: true });

    if (mode === 'move' && (await this.tryRename(source, destination))) {
      const moved = await sha256File(destination, signal);
      if (moved !== checksum) {
        await fs.promises.rename(destination, source);
        throw new IntegrityError(`Checksum mismatch after moving ${path.basename(source)}`);
      }
    } else {
      await this.copyVerified(source, destination, checksum, signal);
      if (mode === 'move') {
        await fs.promises.unlink(source);
      }
    }

    logger.info(`[Import] ${mode === 'move' ? 'Moved' : 'Copied'} ${path.basename(source)} -> ${destination}`);
    return this.result(source, destination, size, checksum, false);
  }

  /**
   * Take back a placed file: a copy is deleted, a move goes back to its
   * source. Duplicates wrote nothing and are left alone.
   */
  async undo(placed: ImportResult, mode: ImportMode): Promise<void> {
    if (placed.duplicate) return;

    if (mode === 'copy') {
      await fs.promises.rm(placed.destination, { force: true });
    } else if (!(await this.tryRename(placed.destination, placed.source))) {
      await fs.promises.mkdir(path.dirname(placed.source), { recursive: true });
      await fs.promises.copyFile(placed.destination, placed.source);
      await fs.promises.unlink(placed.destination);
    }
    logger.info(`[Import] Rolled back ${path.basename(placed.destination)}`);
  }

  private async validateSource(source: string): Promise<number> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(source);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new ValidationError(`Source file does not exist: ${source}`);
      }
      throw classifyError(error);
    }

    if (!stats.isFile()) {
      throw new ValidationError(`Source is not a regular file: ${source}`);
    }
    if (stats.size === 0) {
      throw new ValidationError(`Source file is empty: ${source}`);
    }
    if (!isSupportedImportFile(source)) {
      throw new ValidationError(`Unsupported audio format: ${formatFromExtension(source)}`);
    }
    return stats.size;
  }

  /** Same-filesystem move. False when source and destination are on different devices. */
  private async tryRename(source: string, destination: string): Promise<boolean> {
    try {
      await fs.promises.rename(source, destination);
      return true;
    } catch (error) {
      if (errorCode(error) === 'EXDEV') {
        logger.debug(`[Import] Cross-device move for ${path.basename(source)}, copying instead`);
        return false;
      }
      throw classifyError(error);
    }
  }

  private async copyVerified(source: string, destination: string, checksum: string, signal?: AbortSignal) {
    const partial = `${destination}.partial`;
    try {
      await pipeline(fs.createReadStream(source), fs.createWriteStream(partial), { signal });
      const copied = await sha256File(partial, signal);
      if (copied !== checksum) {
        throw new IntegrityError(`Checksum mismatch after copying ${path.basename(source)}`);
      }
      await fs.promises.rename(partial, destination);
    } catch (error) {
      await fs.promises.rm(partial, { force: true });
      throw error instanceof IntegrityError ? error : classifyError(error);
    }
  }

  private async result(
    source: string,
    destination: string,
    size: number,
    checksum: string,
    duplicate: boolean,
  ): Promise<ImportResult> {
    return {
      source,
      destination,
      size,
      checksum,
      duplicate,
      quality: await this.probe.detectQuality(destination),
      completedAt: new Date().toISOString(),
    };
  }
}

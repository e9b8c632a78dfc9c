import { execFile } from 'child_process';
import fs from 'fs';
import path from 'path';
import { promisify } from 'util';
import logger from '../../config/logger';
import type { PipelineItem } from '../../models/PipelineItem';
import { TransientError, ValidationError, errorCode, errorMessage } from '../../utils/errors';

const execFileAsync = promisify(execFile);

/** Containers that need a decrypting remux before they can be imported. */
const DRM_FORMATS = new Set(['aax', 'aaxc']);

export interface FormatConverter {
  /** Convert one file into `outputDir`; resolves to the output path. */
  convert(inputPath: string, outputDir: string, signal?: AbortSignal): Promise<string>;
}

export function requiresConversion(item: Pick<PipelineItem, 'candidate'>): boolean {
  if (!item.candidate) return false;
  if (item.candidate.sourceType === 'catalog') return true;
  return DRM_FORMATS.has((item.candidate.format ?? '').toLowerCase());
}

export function isDrmContainer(filePath: string): boolean {
  return DRM_FORMATS.has(path.extname(filePath).replace(/^\./, '').toLowerCase());
}

/**
 * ffmpeg stream-copy into an .m4b container. DRM containers get the
 * configured activation bytes; nothing is re-encoded.
 */
export class FfmpegConverter implements FormatConverter {
  constructor(
    private readonly ffmpegPath = 'ffmpeg',
    private readonly activationBytes: string | null = null,
    private readonly timeoutMs = 2 * 60 * 60 * 1000,
  ) {}

  buildArgs(inputPath: string, outputPath: string): string[] {
    const args = ['-y', '-hide_banner', '-loglevel', 'error'];
    if (this.activationBytes && isDrmContainer(inputPath)) {
      args.push('-activation_bytes', this.activationBytes);
    }
    args.push('-i', inputPath, '-map', '0:a', '-map_metadata', '0', '-c', 'copy', '-f', 'mp4', outputPath);
    return args;
  }

  async convert(inputPath: string, outputDir: string, signal?: AbortSignal): Promise<string> {
    if (isDrmContainer(inputPath) && !this.activationBytes) {
      throw new ValidationError(`${path.basename(inputPath)} is encrypted and no activation bytes are configured`);
    }

    await fs.promises.mkdir(outputDir, { recursive: true });
    const outputPath = path.join(outputDir, `${path.parse(inputPath).name}.m4b`);
    const partialPath = `${outputPath}.partial`;

    logger.info(`[Converter] Converting ${path.basename(inputPath)} -> ${path.basename(outputPath)}`);
    try {
      await execFileAsync(this.ffmpegPath, this.buildArgs(inputPath, partialPath), {
        timeout: this.timeoutMs,
        maxBuffer: 10 * 1024 * 1024,
        signal,
      });
      await fs.promises.rename(partialPath, outputPath);
    } catch (error) {
      await fs.promises.rm(partialPath, { force: true });
      if (errorCode(error) === 'ENOENT') {
        throw new ValidationError(`ffmpeg not found at ${this.ffmpegPath}`);
      }
      throw new TransientError(`ffmpeg failed for ${path.basename(inputPath)}: ${errorMessage(error)}`, error);
    }

    logger.info(`[Converter] Finished ${path.basename(outputPath)}`);
    return outputPath;
  }
}

import { execFile } from 'child_process';
import path from 'path';
import { promisify } from 'util';
import { z } from 'zod';
import logger from '../../config/logger';
import { errorMessage } from '../../utils/errors';

const execFileAsync = promisify(execFile);

export interface AudioQuality {
  format: string;
  /** kbps, 0 when unknown */
  bitrate: number;
  channels: number;
}

export interface QualityProbe {
  detectQuality(filePath: string): Promise<AudioQuality>;
}

const ffprobeSchema = z.object({
  streams: z
    .array(
      z
        .object({
          codec_type: z.string().optional(),
          codec_name: z.string().optional(),
          channels: z.number().optional(),
          bit_rate: z.string().optional(),
        })
        .passthrough(),
    )
    .default([]),
  format: z
    .object({
      format_name: z.string().optional(),
      bit_rate: z.string().optional(),
    })
    .passthrough()
    .default({}),
});

export function formatFromExtension(filePath: string): string {
  return path.extname(filePath).replace(/^\./, '').toLowerCase() || 'unknown';
}

export function parseFfprobeOutput(stdout: string, filePath: string): AudioQuality {
  const parsed = ffprobeSchema.parse(JSON.parse(stdout));
  const audio = parsed.streams.find((stream) => stream.codec_type === 'audio');
  const bits = Number(audio?.bit_rate ?? parsed.format.bit_rate ?? NaN);

  return {
    // Container from the extension: ffprobe reports m4b/m4a as "mov,mp4,m4a,3gp,3g2,mj2"
    format: formatFromExtension(filePath),
    bitrate: Number.isFinite(bits) ? Math.round(bits / 1000) : 0,
    channels: audio?.channels ?? 0,
  };
}

/** ffprobe-backed probe with a filename fallback when ffprobe is missing or fails. */
export class FfprobeQualityProbe implements QualityProbe {
  constructor(private readonly ffprobePath = 'ffprobe', private readonly timeoutMs = 30000) {}

  async detectQuality(filePath: string): Promise<AudioQuality> {
    try {
      const { stdout } = await execFileAsync(
        this.ffprobePath,
        ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', filePath],
        { timeout: this.timeoutMs, maxBuffer: 10 * 1024 * 1024 },
      );
      return parseFfprobeOutput(stdout, filePath);
    } catch (error) {
      logger.warn(`[MediaProbe] ffprobe failed for ${path.basename(filePath)}, using filename: ${errorMessage(error)}`);
      return { format: formatFromExtension(filePath), bitrate: 0, channels: 0 };
    }
  }
}

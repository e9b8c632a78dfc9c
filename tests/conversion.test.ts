import fs from 'fs';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { FfmpegConverter, isDrmContainer, requiresConversion } from '../src/services/conversion/converter';
import { formatFromExtension, parseFfprobeOutput } from '../src/services/import/mediaProbe';
import { ValidationError } from '../src/utils/errors';
import { makeSelected, makeTempDir, writeFile } from './helpers/fixtures';

describe('requiresConversion', () => {
  it('converts catalog downloads and DRM containers only', () => {
    expect(requiresConversion({ candidate: makeSelected({ sourceType: 'catalog', format: 'm4b' }) })).toBe(true);
    expect(requiresConversion({ candidate: makeSelected({ format: 'aaxc' }) })).toBe(true);
    expect(requiresConversion({ candidate: makeSelected({ format: 'mp3' }) })).toBe(false);
    expect(requiresConversion({ candidate: null })).toBe(false);
  });

  it('recognises DRM containers by extension', () => {
    expect(isDrmContainer('/downloads/book.AAX')).toBe(true);
    expect(isDrmContainer('/downloads/book.m4b')).toBe(false);
  });
});

describe('FfmpegConverter', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it('stream-copies into mp4 and passes activation bytes for DRM input', () => {
    const converter = new FfmpegConverter('ffmpeg', 'abcd1234');
    expect(converter.buildArgs('/in/book.aax', '/out/book.m4b.partial')).toEqual([
      '-y',
      '-hide_banner',
      '-loglevel',
      'error',
      '-activation_bytes',
      'abcd1234',
      '-i',
      '/in/book.aax',
      '-map',
      '0:a',
      '-map_metadata',
      '0',
      '-c',
      'copy',
      '-f',
      'mp4',
      '/out/book.m4b.partial',
    ]);
    expect(converter.buildArgs('/in/book.mp3', '/out/book.m4b.partial')).not.toContain('-activation_bytes');
  });

  it('refuses encrypted input without activation bytes', async () => {
    dir = makeTempDir();
    const input = writeFile(path.join(dir, 'book.aax'), 'encrypted');
    await expect(new FfmpegConverter('ffmpeg', null).convert(input, path.join(dir, 'out'))).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it('reports a missing ffmpeg binary as a validation failure and leaves no partial file', async () => {
    dir = makeTempDir();
    const input = writeFile(path.join(dir, 'book.mp3'), 'audio');
    const outputDir = path.join(dir, 'out');

    await expect(
      new FfmpegConverter(path.join(dir, 'no-such-ffmpeg')).convert(input, outputDir),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });
});

describe('mediaProbe', () => {
  it('takes bitrate and channels from the audio stream and format from the extension', () => {
    const stdout = JSON.stringify({
      streams: [
        { codec_type: 'video', codec_name: 'mjpeg' },
        { codec_type: 'audio', codec_name: 'aac', channels: 2, bit_rate: '127999' },
      ],
      format: { format_name: 'mov,mp4,m4a,3gp,3g2,mj2', bit_rate: '130000' },
    });
    expect(parseFfprobeOutput(stdout, '/library/book.M4B')).toEqual({ format: 'm4b', bitrate: 128, channels: 2 });
  });

  it('falls back to the container bitrate', () => {
    const stdout = JSON.stringify({ streams: [{ codec_type: 'audio', channels: 1 }], format: { bit_rate: '64000' } });
    expect(parseFfprobeOutput(stdout, 'book.mp3')).toEqual({ format: 'mp3', bitrate: 64, channels: 1 });
  });

  it('reports unknown for files without an extension', () => {
    expect(formatFromExtension('/downloads/book')).toBe('unknown');
  });
});

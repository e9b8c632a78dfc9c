import path from 'path';

export interface NamingMetadata {
  title: string;
  author: string;
  narrator?: string | null;
  series?: string | null;
  seriesPosition?: string | null;
  year?: number | null;
}

export interface PathResolver {
  /** Absolute destination path, without file extension. */
  resolvePath(metadata: NamingMetadata, template: string): string;
}

// Clean a string for use as one path segment
export function cleanSegment(value: string): string {
  return value
    .replace(/:/g, ' -')
    .replace(/[<>"/\\|?*\x00-\x1f]/g, '')
    .replace(/\s{2,}/g, ' ')
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .trim();
}

/**
 * Template-based path builder. Tokens: {Author} {Title} {Series}
 * {SeriesPosition} {Narrator} {Year}. Segments that come out empty are dropped,
 * so "{Author}/{Series}/{Title}" works for books without a series.
 */
export class TemplatePathResolver implements PathResolver {
  constructor(private readonly libraryRoot: string) {}

  resolvePath(metadata: NamingMetadata, template: string): string {
    const tokens: Record<string, string> = {
      Author: metadata.author || 'Unknown Author',
      Title: metadata.title || 'Unknown Title',
      Series: metadata.series ?? '',
      SeriesPosition: metadata.seriesPosition ?? '',
      Narrator: metadata.narrator ?? '',
      Year: metadata.year ? String(metadata.year) : '',
    };

    const segments = template
      .split('/')
      .map((segment) =>
        cleanSegment(
          segment
            .replace(/\{(\w+)\}/g, (match, name: string) => (name in tokens ? cleanSegment(tokens[name]) : match))
            // Leftover separators from empty tokens, e.g. "Book  - " when SeriesPosition is blank
            .replace(/(^[\s\-–.#]+)|([\s\-–.#]+$)/g, '')
            .replace(/\(\s*\)|\[\s*\]/g, ''),
        ),
      )
      .filter((segment) => segment.length > 0);

    if (segments.length === 0) {
      segments.push(cleanSegment(tokens.Title));
    }

    return path.join(this.libraryRoot, ...segments);
  }
}

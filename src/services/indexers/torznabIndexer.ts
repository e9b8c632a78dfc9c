import xml2js from 'xml2js';
import { z } from 'zod';
import logger from '../../config/logger';
import type { IndexerConfig } from '../../config/settings';
import type { HttpClient } from '../../utils/http';
import { ValidationError } from '../../utils/errors';
import type { Indexer, RawResult, SearchQuery } from './types';

const attrSchema = z.object({ $: z.object({ name: z.string(), value: z.string() }) });

const textNode = z.union([z.string(), z.object({ _: z.string() }).passthrough()]);

const xmlItemSchema = z.object({
  title: z.array(z.string()).min(1),
  guid: z.array(textNode).optional(),
  link: z.array(z.string()).optional(),
  pubDate: z.array(z.string()).optional(),
  description: z.array(textNode).optional(),
  size: z.array(z.string()).optional(),
  enclosure: z
    .array(z.object({ $: z.object({ url: z.string(), length: z.string().optional() }).passthrough() }))
    .optional(),
  'torznab:attr': z.array(attrSchema).optional(),
  'newznab:attr': z.array(attrSchema).optional(),
});

const feedSchema = z.object({
  rss: z.object({
    channel: z.array(z.object({ item: z.array(z.unknown()).optional() }).passthrough()).min(1),
  }),
});

const errorFeedSchema = z.object({
  error: z.object({ $: z.object({ code: z.string().optional(), description: z.string().optional() }) }),
});

const optionalNumber = z.union([z.number(), z.string()]).optional().nullable();

const jsonItemSchema = z
  .object({
    title: z.string().optional(),
    Title: z.string().optional(),
    guid: z.string().optional(),
    downloadUrl: z.string().optional(),
    magnetUrl: z.string().optional(),
    link: z.string().optional(),
    size: optionalNumber,
    seeders: optionalNumber,
    leechers: optionalNumber,
    peers: optionalNumber,
    protocol: z.string().optional(),
    infoHash: z.string().optional().nullable(),
    publishDate: z.string().optional(),
  })
  .passthrough();

function toNumber(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function nodeText(node: z.infer<typeof textNode> | undefined): string | undefined {
  if (node === undefined) return undefined;
  return typeof node === 'string' ? node : node._;
}

/**
 * Torznab/Newznab indexer (Jackett, Prowlarr or a native endpoint). Accepts the
 * standard RSS response as well as the JSON array Prowlarr returns.
 */
export class TorznabIndexer implements Indexer {
  readonly name: string;

  constructor(private readonly config: IndexerConfig, private readonly http: HttpClient) {
    this.name = config.name;
  }

  private get apiUrl(): string {
    const base = this.config.url.replace(/\/$/, '');
    return base.endsWith('/api') ? base : `${base}/api`;
  }

  async search(query: SearchQuery, signal?: AbortSignal): Promise<RawResult[]> {
    const terms = [query.title, query.author].filter((term): term is string => Boolean(term && term.trim()));
    const results = await this.request(terms.join(' '), signal);

    // Author+title can be too narrow for some trackers; retry on the title alone
    if (results.length === 0 && terms.length > 1) {
      logger.debug(`[Indexer] ${this.name}: no results for "${terms.join(' ')}", retrying with title only`);
      return this.request(query.title, signal);
    }
    return results;
  }

  private async request(q: string, signal?: AbortSignal): Promise<RawResult[]> {
    logger.debug(`[Indexer] ${this.name}: t=search q="${q}"`);

    const response = await this.http.get(this.apiUrl, {
      params: {
        t: 'search',
        apikey: this.config.apiKey,
        q,
        cat: this.config.categories.join(','),
        limit: 100,
      },
      signal,
      responseType: 'text',
    });

    if (response.status >= 400) {
      throw new ValidationError(`Indexer ${this.name} answered HTTP ${response.status}`);
    }

    return this.parseResults(response.data);
  }

  async parseResults(data: unknown): Promise<RawResult[]> {
    if (Array.isArray(data)) {
      return this.parseJsonResults(data);
    }
    if (typeof data !== 'string' || data.trim() === '') {
      logger.warn(`[Indexer] Empty response from ${this.name}`);
      return [];
    }

    const text = data.trim();
    if (text.startsWith('[') || text.startsWith('{')) {
      const json: unknown = JSON.parse(text);
      if (Array.isArray(json)) return this.parseJsonResults(json);
      const wrapped = z.object({ results: z.array(z.unknown()) }).safeParse(json);
      return wrapped.success ? this.parseJsonResults(wrapped.data.results) : [];
    }

    const parser = new xml2js.Parser();
    const parsed: unknown = await parser.parseStringPromise(text);

    const failure = errorFeedSchema.safeParse(parsed);
    if (failure.success) {
      const { code, description } = failure.data.error.$;
      throw new ValidationError(`Indexer ${this.name} error ${code ?? '?'}: ${description ?? 'unknown error'}`);
    }

    const feed = feedSchema.safeParse(parsed);
    if (!feed.success) {
      logger.warn(`[Indexer] ${this.name} returned an unrecognised document`);
      return [];
    }

    return this.parseXmlItems(feed.data.rss.channel[0].item ?? []);
  }

  private parseXmlItems(items: unknown[]): RawResult[] {
    const results: RawResult[] = [];

    for (const entry of items) {
      const parsed = xmlItemSchema.safeParse(entry);
      if (!parsed.success) {
        logger.debug(`[Indexer] ${this.name}: skipping malformed item`);
        continue;
      }
      const item = parsed.data;
      const attrs = [...(item['torznab:attr'] ?? []), ...(item['newznab:attr'] ?? [])];
      const attr = (name: string) => attrs.find((a) => a.$.name === name)?.$.value;

      const enclosure = item.enclosure?.[0]?.$;
      const magnet = attr('magneturl');
      const downloadUrl = enclosure?.url || item.link?.[0] || magnet || '';
      if (!downloadUrl) continue;

      const seeders = toNumber(attr('seeders'));
      const peers = toNumber(attr('peers'));
      const isUsenet =
        this.config.type === 'newznab' ||
        downloadUrl.toLowerCase().includes('.nzb') ||
        (item['newznab:attr'] !== undefined && item['torznab:attr'] === undefined);

      results.push({
        title: item.title[0],
        guid: nodeText(item.guid?.[0]),
        downloadUrl,
        indexer: this.name,
        protocol: isUsenet ? 'usenet' : 'torrent',
        size: toNumber(attr('size')) ?? toNumber(enclosure?.length) ?? toNumber(item.size?.[0]),
        seeders: isUsenet ? null : seeders,
        peers: isUsenet || peers === null ? null : Math.max(0, peers - (seeders ?? 0)),
        infoHash: attr('infohash') ?? null,
        publishDate: item.pubDate?.[0] ?? null,
        description: nodeText(item.description?.[0]) ?? null,
      });
    }

    return results;
  }

  private parseJsonResults(items: unknown[]): RawResult[] {
    const results: RawResult[] = [];

    for (const entry of items) {
      const parsed = jsonItemSchema.safeParse(entry);
      if (!parsed.success) continue;
      const item = parsed.data;

      const title = item.title ?? item.Title ?? '';
      const downloadUrl = item.downloadUrl ?? item.magnetUrl ?? item.link ?? '';
      if (!title || !downloadUrl) continue;

      let protocol: 'torrent' | 'usenet';
      if (item.protocol) {
        protocol = item.protocol === 'usenet' ? 'usenet' : 'torrent';
      } else if (this.config.type === 'newznab' || downloadUrl.toLowerCase().includes('.nzb')) {
        protocol = 'usenet';
      } else {
        protocol = 'torrent';
      }

      results.push({
        title,
        guid: item.guid,
        downloadUrl,
        indexer: this.name,
        protocol,
        size: toNumber(item.size),
        seeders: protocol === 'torrent' ? toNumber(item.seeders) : null,
        peers: protocol === 'torrent' ? toNumber(item.leechers ?? item.peers) : null,
        infoHash: item.infoHash ?? null,
        publishDate: item.publishDate ?? null,
      });
    }

    return results;
  }
}

import { describe, expect, it } from 'vitest';
import { ClientRegistry } from '../src/services/clients/registry';
import {
  QBittorrentClient,
  infoHashFromMagnet,
  mapTorrentState,
} from '../src/services/clients/qbittorrent';
import { SABnzbdClient, parseTimeLeft } from '../src/services/clients/sabnzbd';
import { ConfigurationError, ValidationError } from '../src/utils/errors';
import { FakeDownloadClient } from './helpers/fakeClient';
import type { RecordedRequest } from './helpers/fakeHttp';
import { FakeHttp, formOf, headerOf, paramOf, respond } from './helpers/fakeHttp';

const QBT = { url: 'http://qbittorrent.test:8080', username: 'admin', password: 'test-secret', category: 'audiobooks' };
const HASH = '0123456789abcdef0123456789abcdef01234567';

function endpoint(request: RecordedRequest): string {
  return request.url.replace(`${QBT.url}/api/v2/`, '');
}

function loginResponse() {
  return respond('Ok.', 200, { 'set-cookie': ['SID=session-1; HttpOnly; path=/'] });
}

describe('QBittorrentClient', () => {
  it('logs in once and adds a magnet with the item tag', async () => {
    const http = new FakeHttp((request) => (endpoint(request) === 'auth/login' ? loginResponse() : respond('Ok.')));
    const client = new QBittorrentClient(QBT, http);

    const handle = await client.submit(`magnet:?xt=urn:btih:${HASH.toUpperCase()}&dn=book`, {
      name: 'The Glass Orchard',
      tag: 'audiobook-item-1',
    });

    expect(handle).toBe(HASH);
    expect(http.requests.map(endpoint)).toEqual(['auth/login', 'torrents/add']);
    const add = http.requests[1];
    expect(headerOf(add, 'Cookie')).toBe('SID=session-1');
    expect(formOf(add).get('tags')).toBe('audiobook-item-1');
    expect(formOf(add).get('category')).toBe('audiobooks');
  });

  it('returns no handle for .torrent URLs and finds the job by tag', async () => {
    const http = new FakeHttp((request) => {
      if (endpoint(request) === 'auth/login') return loginResponse();
      if (endpoint(request) === 'torrents/info') {
        return respond(paramOf(request, 'tag') === 'audiobook-item-1' ? [{ hash: 'ABC123', name: 'Book', state: 'metaDL' }] : []);
      }
      return respond('Ok.');
    });
    const client = new QBittorrentClient(QBT, http);
    const options = { name: 'Book', tag: 'audiobook-item-1' };

    expect(await client.submit('http://indexer.test/dl/1.torrent', options)).toBeNull();
    expect(await client.findHandle(options)).toBe('abc123');
  });

  it('logs in again when the session expires', async () => {
    let infoCalls = 0;
    const http = new FakeHttp((request) => {
      if (endpoint(request) === 'auth/login') return loginResponse();
      infoCalls++;
      return infoCalls === 1 ? respond('Forbidden', 403) : respond([]);
    });
    const client = new QBittorrentClient(QBT, http);

    expect(await client.status(HASH)).toMatchObject({ state: 'missing' });
    expect(http.requests.map(endpoint)).toEqual(['auth/login', 'torrents/info', 'auth/login', 'torrents/info']);
  });

  it('reports invalid credentials as a validation failure', async () => {
    const client = new QBittorrentClient(QBT, new FakeHttp(() => respond('Fails.')));
    await expect(client.status(HASH)).rejects.toBeInstanceOf(ValidationError);
  });

  it('maps torrent details into a job status', async () => {
    const http = new FakeHttp((request) =>
      endpoint(request) === 'auth/login'
        ? loginResponse()
        : respond([
            {
              hash: HASH,
              name: 'The Glass Orchard',
              progress: 0.5,
              dlspeed: 2048,
              eta: 8640000,
              state: 'downloading',
              save_path: '/downloads/',
              ratio: 0.1,
            },
          ]),
    );

    expect(await new QBittorrentClient(QBT, http).status(HASH)).toEqual({
      state: 'downloading',
      progress: 50,
      downloadSpeed: 2048,
      etaSeconds: null,
      ratio: 0.1,
      seedingSeconds: null,
      contentPath: '/downloads/The Glass Orchard',
      message: null,
    });
  });

  it('falls back to stop when pause is not available', async () => {
    const http = new FakeHttp((request) => {
      if (endpoint(request) === 'auth/login') return loginResponse();
      return endpoint(request) === 'torrents/pause' ? respond('', 404) : respond('Ok.');
    });
    await new QBittorrentClient(QBT, http).pause(HASH);

    expect(http.requests.map(endpoint)).toEqual(['auth/login', 'torrents/pause', 'torrents/stop']);
    expect(formOf(http.requests[2]).get('hashes')).toBe(HASH);
  });

  it('maps qBittorrent states', () => {
    expect(mapTorrentState('stalledUP', 1)).toBe('seeding');
    expect(mapTorrentState('pausedUP', 1)).toBe('completed');
    expect(mapTorrentState('missingFiles', 0.4)).toBe('error');
    expect(mapTorrentState('pausedDL', 0.4)).toBe('paused');
    expect(mapTorrentState('metaDL', 0)).toBe('queued');
    expect(mapTorrentState('stalledDL', 0.4)).toBe('downloading');
    expect(mapTorrentState('stalledDL', 1)).toBe('completed');
  });

  it('reads hex and base32 info hashes from magnets', () => {
    expect(infoHashFromMagnet(`magnet:?xt=urn:btih:${HASH}`)).toBe(HASH);
    expect(infoHashFromMagnet(`magnet:?xt=urn:btih:${'A'.repeat(32)}`)).toBe('0'.repeat(40));
    expect(infoHashFromMagnet('http://indexer.test/dl/1')).toBeNull();
  });
});

const SAB = { url: 'http://sabnzbd.test:8080', apiKey: 'test-secret', category: 'audiobooks' };

function sabHttp(queue: unknown[], history: unknown[]) {
  return new FakeHttp((request) => {
    const mode = paramOf(request, 'mode');
    if (mode === 'queue') return respond({ queue: { slots: queue, kbpersec: '100' } });
    if (mode === 'history') return respond({ history: { slots: history } });
    return respond({ status: true, nzo_ids: ['SABnzbd_nzo_1'] });
  });
}

describe('SABnzbdClient', () => {
  it('adds an NZB by URL under the item tag', async () => {
    const http = sabHttp([], []);
    const handle = await new SABnzbdClient(SAB, http).submit('http://indexer.test/get/5.nzb', {
      name: 'The Glass Orchard',
      tag: 'audiobook-item-1',
    });

    expect(handle).toBe('SABnzbd_nzo_1');
    const [request] = http.requests;
    expect(request.url).toBe('http://sabnzbd.test:8080/api');
    expect(paramOf(request, 'mode')).toBe('addurl');
    expect(paramOf(request, 'name')).toBe('http://indexer.test/get/5.nzb');
    expect(paramOf(request, 'nzbname')).toBe('audiobook-item-1');
    expect(paramOf(request, 'apikey')).toBe('test-secret');
  });

  it('rejects an NZB SABnzbd refuses', async () => {
    const http = new FakeHttp(() => respond({ status: false, error: 'invalid nzb' }));
    await expect(new SABnzbdClient(SAB, http).submit('http://indexer.test/get/5.nzb', { name: 'x', tag: 't' })).rejects.toThrow(
      'SABnzbd rejected the NZB: invalid nzb',
    );
  });

  it('reports queue progress', async () => {
    const http = sabHttp(
      [
        {
          nzo_id: 'SABnzbd_nzo_1',
          filename: 'audiobook-item-1',
          status: 'Downloading',
          percentage: '40',
          mb: '100',
          mbleft: '60',
          timeleft: '0:01:00',
        },
      ],
      [],
    );

    expect(await new SABnzbdClient(SAB, http).status('SABnzbd_nzo_1')).toEqual({
      state: 'downloading',
      progress: 40,
      downloadSpeed: 1048576,
      etaSeconds: 60,
      ratio: null,
      seedingSeconds: null,
      contentPath: null,
      message: '40.0 of 100.0 MB',
    });
  });

  it('reports completed and failed history entries', async () => {
    const http = sabHttp(
      [],
      [
        { nzo_id: 'done', name: 'audiobook-a', status: 'Completed', storage: '/downloads/complete/Book' },
        { nzo_id: 'broken', name: 'audiobook-b', status: 'Failed', fail_message: 'Repair failed' },
        { nzo_id: 'unpacking', name: 'audiobook-c', status: 'Extracting' },
      ],
    );
    const client = new SABnzbdClient(SAB, http);

    expect(await client.status('done')).toMatchObject({ state: 'completed', progress: 100, contentPath: '/downloads/complete/Book' });
    expect(await client.status('broken')).toMatchObject({ state: 'error', message: 'Repair failed' });
    expect(await client.status('unpacking')).toMatchObject({ state: 'downloading', progress: 99 });
    expect(await client.status('gone')).toMatchObject({ state: 'missing' });
  });

  it('finds a job by tag in the queue or history', async () => {
    const client = new SABnzbdClient(SAB, sabHttp([], [{ nzo_id: 'done', name: 'audiobook-a', status: 'Completed' }]));
    expect(await client.findHandle({ name: 'Book', tag: 'audiobook-a' })).toBe('done');
    expect(await client.findHandle({ name: 'Book', tag: 'audiobook-z' })).toBeNull();
  });

  it('parses SABnzbd time-left strings', () => {
    expect(parseTimeLeft('1:02:03')).toBe(3723);
    expect(parseTimeLeft('2:01:02:03')).toBe(176523);
    expect(parseTimeLeft('05:00')).toBe(300);
    expect(parseTimeLeft('soon')).toBeNull();
  });
});

describe('ClientRegistry', () => {
  it('routes by source type and rewrites loopback references before submitting', async () => {
    const torrents = new FakeDownloadClient('qbittorrent', ['torrent']);
    const registry = new ClientRegistry([torrents], { baseUrl: 'http://indexer-proxy:9696', allowLoopback: false });

    const { client, handle } = await registry.submit('torrent', 'http://localhost:9696/1/dl?id=7', {
      name: 'Book',
      tag: 'audiobook-item-1',
    });

    expect(client).toBe(torrents);
    expect(handle).toBe('qbittorrent-job-1');
    expect(torrents.submitted[0].reference).toBe('http://indexer-proxy:9696/1/dl?id=7');
    expect(registry.byClientName('qbittorrent')).toBe(torrents);
  });

  it('has no route for an unconfigured source type', () => {
    const registry = new ClientRegistry([new FakeDownloadClient('qbittorrent', ['torrent'])], {
      baseUrl: null,
      allowLoopback: false,
    });
    expect(registry.supports('usenet')).toBe(false);
    expect(() => registry.forSource('usenet')).toThrow(ValidationError);
  });

  it('refuses two clients with the same name', () => {
    expect(
      () =>
        new ClientRegistry(
          [new FakeDownloadClient('direct', ['catalog']), new FakeDownloadClient('direct', ['catalog'])],
          { baseUrl: null, allowLoopback: false },
        ),
    ).toThrow(ConfigurationError);
  });
});

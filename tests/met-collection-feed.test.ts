import fs from 'fs';
import os from 'os';
import path from 'path';
import { MetCollectionFeed, readObjectIdsFile } from '../server/feed/met-collection-feed';
import { fakeFetch } from './helpers/fake-document';

const BASE = 'https://api.example.test/v1';

function feedWith(responses: Record<string, string | number | Error>) {
  const fetchImpl = fakeFetch(responses);
  const feed = new MetCollectionFeed({ baseUrl: BASE, timeoutMs: 1000, retryAttempts: 2, retryBaseDelayMs: 1, fetchImpl });
  return { feed, fetchImpl };
}

describe('MetCollectionFeed', () => {
  it('parses an object record and drops unusable fields', async () => {
    const { feed } = feedWith({
      [`${BASE}/objects/1`]: JSON.stringify({
        objectID: 1,
        title: 'Sword',
        culture: null,
        objectBeginDate: '1600',
        additionalImages: ['https://images.example.test/1b.jpg'],
        isHighlight: true,
      }),
    });

    const record = await feed.fetchRecord('1');

    expect(record).toEqual({
      objectID: 1,
      title: 'Sword',
      additionalImages: ['https://images.example.test/1b.jpg'],
    });
    expect(record?.culture).toBeUndefined();
    expect(record?.objectBeginDate).toBeUndefined();
  });

  it('returns null for a missing object without retrying', async () => {
    const { feed, fetchImpl } = feedWith({ [`${BASE}/objects/2`]: 404 });

    expect(await feed.fetchRecord('2')).toBeNull();
    expect(fetchImpl.calls).toHaveLength(1);
  });

  it('retries server errors and then gives up with null', async () => {
    const { feed, fetchImpl } = feedWith({ [`${BASE}/objects/3`]: 503 });

    expect(await feed.fetchRecord('3')).toBeNull();
    expect(fetchImpl.calls).toHaveLength(2);
  });

  it('returns null for invalid JSON and for payloads that are not objects', async () => {
    const { feed, fetchImpl } = feedWith({
      [`${BASE}/objects/4`]: 'not json',
      [`${BASE}/objects/5`]: '[1, 2]',
    });

    expect(await feed.fetchRecord('4')).toBeNull();
    expect(await feed.fetchRecord('5')).toBeNull();
    expect(fetchImpl.calls).toHaveLength(2);
  });

  it('searches object IDs with the query parameters', async () => {
    const { feed, fetchImpl } = feedWith({
      [`${BASE}/search?q=sword&hasImages=true&departmentId=4`]: JSON.stringify({ total: 3, objectIDs: [30, 10, 20] }),
    });

    const ids = await feed.searchObjectIds({ q: 'sword', departmentId: 4, hasImages: true }, 2);

    expect(ids).toEqual(['30', '10']);
    expect(fetchImpl.calls).toEqual([`${BASE}/search?q=sword&hasImages=true&departmentId=4`]);
  });

  it('treats an empty search result as no IDs', async () => {
    const { feed } = feedWith({ [`${BASE}/search?q=halberd`]: JSON.stringify({ total: 0, objectIDs: null }) });

    expect(await feed.searchObjectIds({ q: 'halberd' })).toEqual([]);
  });
});

describe('readObjectIdsFile', () => {
  it('skips blank lines and comments', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ids-'));
    try {
      const file = path.join(dir, 'ids.txt');
      fs.writeFileSync(file, '1\n\n# armor\n 2 \r\n3\n');

      expect(await readObjectIdsFile(file)).toEqual(['1', '2', '3']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

import fs from 'fs';
import os from 'os';
import path from 'path';
import { DescriptionResolver } from '../server/extract/description-resolver';
import { ImageAssetManager } from '../server/extract/image-assets';
import { ObjectExtractionPipeline, objectPageUrl } from '../server/extract/pipeline';
import { TabContentExtractor } from '../server/extract/tab-extractor';
import type { StructuredRecord } from '../server/types';
import { DEFAULT_CONFIG } from '../server/utils/config-loader';
import { NavigationError } from '../server/utils/error-types';
import { FakeFeed, FakeRenderer, fakeFetch, type FakePage } from './helpers/fake-document';

const IMG = (name: string) => `https://images.example.test/${name}`;
const OG_TEXT = 'A single-edged sword with a curved blade and a silver-mounted grip.';
const PAGE_URL = (id: string) => objectPageUrl(DEFAULT_CONFIG.site.objectPageUrl, id);

describe('ObjectExtractionPipeline', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  function build(
    records: Record<string, StructuredRecord>,
    pages: Record<string, FakePage>,
    failures: Record<string, Error> = {},
    downloads: Record<string, string | number> = {},
  ) {
    const config = {
      site: DEFAULT_CONFIG.site,
      tabs: { ...DEFAULT_CONFIG.tabs, labels: ['Inscriptions', 'Provenance'], quietWindowMs: 5, maxWaitMs: 20, graceMs: 10 },
      images: { ...DEFAULT_CONFIG.images, rootDir: path.join(workDir, 'downloaded_images'), retryBaseDelayMs: 1 },
    };
    const renderer = new FakeRenderer(pages, failures);
    const pipeline = new ObjectExtractionPipeline({
      feed: new FakeFeed(records),
      renderer,
      tabs: new TabContentExtractor(config.tabs),
      descriptions: new DescriptionResolver(DEFAULT_CONFIG.description),
      images: new ImageAssetManager(config.images, { fetchImpl: fakeFetch(downloads) }),
      config,
      now: () => new Date('2024-05-01T12:00:00.000Z'),
    });
    return { pipeline, renderer };
  }

  it('assembles the record for object 12345', async () => {
    const { pipeline, renderer } = build(
      {
        '12345': {
          objectID: 12345,
          title: 'Example Sword',
          primaryImage: IMG('12345-a.jpg'),
          additionalImages: [IMG('12345-b.jpg')],
        },
      },
      {
        '12345': {
          heading: 'Sword',
          html: `<html><head><meta property="og:description" content="${OG_TEXT}"></head><body></body></html>`,
          tabs: {
            Inscriptions: { text: 'ABC' },
            Provenance: { text: '', settle: 'hang' },
          },
        },
      },
      {},
      { [IMG('12345-a.jpg')]: 'a', [IMG('12345-b.jpg')]: 'b' },
    );

    const { outcome, record } = await pipeline.process('12345');

    expect(record.fields.title).toBe('Example Sword');
    expect(record.description).toBe(OG_TEXT);
    expect(record.descriptionTier).toBe('og-description');
    expect(record.tabs).toEqual({ Inscriptions: 'ABC', Provenance: '' });
    expect(record.images.map((image) => path.relative(workDir, image.localPath))).toEqual([
      path.join('downloaded_images', '12345', '12345_1.jpg'),
      path.join('downloaded_images', '12345', '12345_2.jpg'),
    ]);
    expect(record.images.map((image) => image.role)).toEqual(['primary', 'additional']);
    expect(record.notes).toEqual(['tab_timeout:Provenance']);
    expect(record.status).toBe('partial');
    expect(outcome).toBe('degraded');
    expect(record.fields.objectURL).toBe(PAGE_URL('12345'));
    expect(record.scrapedAt).toBe('2024-05-01T12:00:00.000Z');
    expect(renderer.opened[0].closeCount).toBe(1);
  });

  it('reports a complete record when nothing is missing', async () => {
    const { pipeline } = build(
      { '1': { objectID: 1, title: 'Dagger', objectURL: 'https://museum.example.test/objects/1', primaryImage: IMG('1.png') } },
      {
        '1': {
          html: `<html><head><meta name="description" content="${OG_TEXT}"></head></html>`,
          tabs: { Inscriptions: { text: 'Signed' }, Provenance: { text: 'Bequest' } },
        },
      },
      {},
      { [IMG('1.png')]: 'png-bytes' },
    );

    const { outcome, record } = await pipeline.process('1');

    expect(outcome).toBe('complete');
    expect(record.status).toBe('complete');
    expect(record.notes).toEqual([]);
    expect(record.descriptionTier).toBe('meta-description');
    expect(record.fields.objectURL).toBe('https://museum.example.test/objects/1');
    expect(record.images[0].localPath).toBe(path.join(workDir, 'downloaded_images', '1', '1_1.png'));
  });

  it('keeps only feed fields when the page cannot be rendered', async () => {
    const { pipeline, renderer } = build(
      { '55': { objectID: 55, title: 'Helmet', culture: 'Italian' } },
      {},
      { '55': new NavigationError('55', 'Timeout 90000ms exceeded') },
    );

    const { outcome, record } = await pipeline.process('55');

    expect(outcome).toBe('degraded');
    expect(record.status).toBe('render_failed');
    expect(record.error).toBe('Navigation failed: Timeout 90000ms exceeded');
    expect(record.fields.title).toBe('Helmet');
    expect(record.fields.culture).toBe('Italian');
    expect(record.tabs).toEqual({});
    expect(record.images).toEqual([]);
    expect(renderer.requestedUrls).toEqual([PAGE_URL('55')]);
  });

  it('falls back to page data and records every gap when the feed has no entry', async () => {
    const { pipeline } = build({}, { '77': { heading: 'Page Title' } });

    const { outcome, record } = await pipeline.process('77');

    expect(outcome).toBe('degraded');
    expect(record.notes).toEqual([
      'feed_missing',
      'tab_missing:Inscriptions',
      'tab_missing:Provenance',
      'description_not_found',
      'no_images',
    ]);
    expect(record.fields.objectID).toBe('77');
    expect(record.fields.title).toBe('Page Title');
    expect(record.tabs).toEqual({ Inscriptions: '', Provenance: '' });
    expect(record.descriptionTier).toBe('none');
  });

  it('converts an unexpected failure into an extraction_error record and closes the page', async () => {
    const { pipeline, renderer } = build(
      { '9': { objectID: 9, title: 'Spear' } },
      { '9': { failSnapshot: true } },
    );

    const { outcome, record } = await pipeline.process('9');

    expect(outcome).toBe('error');
    expect(record.status).toBe('extraction_error');
    expect(record.error).toBe('snapshot exploded');
    expect(record.fields.title).toBe('Spear');
    expect(renderer.opened[0].closeCount).toBe(1);
  });

  it('treats a renderer crash that is not a navigation failure as an extraction error', async () => {
    const { pipeline } = build({}, {}, { '3': new Error('browser crashed') });

    const { outcome, record } = await pipeline.process('3');

    expect(outcome).toBe('error');
    expect(record.notes).toEqual(['feed_missing']);
    expect(record.error).toBe('browser crashed');
  });

  it('strips control characters from every field', async () => {
    const { pipeline } = build(
      { '4': { objectID: 4, title: 'Sabre\x07', medium: 'Steel\x00, gold' } },
      { '4': { tabs: { Inscriptions: { text: 'In\x1Fscribed' } } } },
    );

    const { record } = await pipeline.process('4');

    expect(record.fields.title).toBe('Sabre');
    expect(record.fields.medium).toBe('Steel, gold');
    expect(record.tabs.Inscriptions).toBe('Inscribed');
  });
});

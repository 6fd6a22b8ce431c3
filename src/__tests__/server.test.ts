import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import type { Server } from 'node:http';
import { createApp, type AppDeps } from '../server.js';
import type { ScrapeOutcome } from '../scrape.js';
import type { BlogExtraction } from '../extract/types.js';

const extraction: BlogExtraction = {
  title: 'Hello',
  contentHtml: '<figure data-img-slot="1"><img src="images/image1.jpg" alt="Banner"></figure><p>Text</p>',
  images: ['https://cdn.test/banner.jpg'],
  imageNames: ['image1.jpg'],
  imageUrlMap: { 'image1.jpg': 'https://cdn.test/banner.jpg' },
  banner: { url: 'https://cdn.test/banner.jpg', source: 'og-image' },
  rootSource: 'article',
  removedImageCount: 0,
};

describe('HTTP server', () => {
  const scrape = vi.fn<AppDeps['scrape']>();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createApp({ scrape });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  beforeEach(() => {
    scrape.mockReset();
  });

  function postScrape(body: string): Promise<Response> {
    return fetch(`${baseUrl}/scrape-blog`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  }

  it('answers health checks', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('returns the extraction in wire format', async () => {
    const outcome: ScrapeOutcome = { success: true, url: 'https://blog.test/post', latencyMs: 5, extraction };
    scrape.mockResolvedValue(outcome);

    const res = await postScrape(JSON.stringify({ url: ' https://blog.test/post ' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      title: 'Hello',
      content_html: extraction.contentHtml,
      images: ['https://cdn.test/banner.jpg'],
      image_names: ['image1.jpg'],
      image_url_map: { 'image1.jpg': 'https://cdn.test/banner.jpg' },
    });
    expect(scrape).toHaveBeenCalledWith('https://blog.test/post');
  });

  it('rejects a missing url field', async () => {
    const res = await postScrape(JSON.stringify({ link: 'https://blog.test/post' }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'input_error', message: "Missing 'url' field" });
    expect(scrape).not.toHaveBeenCalled();
  });

  it('rejects a blank url field', async () => {
    const res = await postScrape(JSON.stringify({ url: '   ' }));
    expect(res.status).toBe(400);
  });

  it('rejects malformed JSON', async () => {
    const res = await postScrape('{"url":');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'input_error', message: 'Malformed JSON body' });
  });

  it('maps failure outcomes to HTTP statuses', async () => {
    scrape.mockResolvedValue({
      success: false,
      url: 'https://blog.test/post',
      latencyMs: 3,
      error: 'extraction_failed',
      message: 'Could not extract blog content',
    });
    const res = await postScrape(JSON.stringify({ url: 'https://blog.test/post' }));
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: 'extraction_failed',
      message: 'Could not extract blog content',
    });
  });

  it('reports transport failures as 502', async () => {
    scrape.mockResolvedValue({
      success: false,
      url: 'https://blog.test/post',
      latencyMs: 3,
      error: 'transport_error',
      message: 'HTTP 503',
      fetchError: 'http_status_error',
      statusCode: 503,
    });
    const res = await postScrape(JSON.stringify({ url: 'https://blog.test/post' }));
    expect(res.status).toBe(502);
  });

  it('turns a thrown error into a 500', async () => {
    scrape.mockRejectedValue(new Error('boom'));
    const res = await postScrape(JSON.stringify({ url: 'https://blog.test/post' }));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'internal_error',
      message: 'Internal error while extracting content',
    });
  });
});

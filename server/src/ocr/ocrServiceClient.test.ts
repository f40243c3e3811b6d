import { describe, it, expect, vi } from 'vitest';

import type { OcrRequest } from './types';
import { createOcrConfig } from './config';
import { OcrServiceClient } from './ocrServiceClient';
import type { FetchLike } from './ocrServiceClient';

const config = createOcrConfig({ baseUrl: 'http://ocr.test', timeoutMs: 1000 });

function makeRequest(): OcrRequest {
  return {
    image: {
      bytes: Buffer.from('png-bytes'),
      format: 'png',
      width: 10,
      height: 10,
      originalWidth: 10,
      originalHeight: 10,
      resized: false,
    },
    language: 'fr',
    requestId: 'req-1',
  };
}

function respond(status: number, body: unknown): FetchLike {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return vi.fn(async () => new Response(text, { status }));
}

// Never settles on its own; rejects once the request signal aborts.
const hanging: FetchLike = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });

describe('OcrServiceClient.call', () => {
  it('posts the image and language as multipart form data', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(JSON.stringify({ success: true, text: 'hi' })));
    const client = new OcrServiceClient(config, fetchImpl);

    const result = await client.call(makeRequest());

    expect(result).toEqual({ status: 'ok', httpStatus: 200, body: { success: true, text: 'hi' } });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://ocr.test/ocr');
    expect(init?.method).toBe('POST');
    expect(new Headers(init?.headers).get('x-request-id')).toBe('req-1');

    const body = init?.body;
    if (!(body instanceof FormData)) throw new Error('expected FormData body');
    expect(body.get('language')).toBe('fr');
    const file = body.get('file');
    if (!(file instanceof Blob)) throw new Error('expected file part');
    expect(file.type).toBe('image/png');
    expect(Buffer.from(await file.arrayBuffer()).toString()).toBe('png-bytes');
  });

  it('classifies a slow service as a retriable timeout', async () => {
    const client = new OcrServiceClient(config, hanging);

    const result = await client.call(makeRequest(), { timeoutMs: 20 });

    expect(result).toMatchObject({
      status: 'failure',
      code: 'TIMEOUT',
      retriable: true,
      message: 'OCR service did not respond within 20ms.',
    });
  });

  it('classifies caller cancellation as CANCELLED', async () => {
    const client = new OcrServiceClient(config, hanging);
    const controller = new AbortController();

    const pending = client.call(makeRequest(), { signal: controller.signal });
    controller.abort();

    await expect(pending).resolves.toMatchObject({ status: 'failure', code: 'CANCELLED', retriable: false });
  });

  it('does not call out when already cancelled', async () => {
    const fetchImpl = vi.fn<FetchLike>();
    const client = new OcrServiceClient(config, fetchImpl);
    const controller = new AbortController();
    controller.abort();

    const result = await client.call(makeRequest(), { signal: controller.signal });

    expect(result).toMatchObject({ code: 'CANCELLED' });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('classifies transport errors as SERVICE_UNAVAILABLE', async () => {
    const client = new OcrServiceClient(config, async () => {
      throw new TypeError('fetch failed');
    });

    expect(await client.call(makeRequest())).toEqual({
      status: 'failure',
      code: 'SERVICE_UNAVAILABLE',
      message: 'Could not reach OCR service.',
      retriable: true,
      cause: 'TypeError: fetch failed',
    });
  });

  it('classifies 5xx as retriable and keeps the engine error as cause', async () => {
    const client = new OcrServiceClient(config, respond(500, { success: false, error: 'could not execute a primitive' }));

    expect(await client.call(makeRequest())).toEqual({
      status: 'failure',
      code: 'SERVICE_UNAVAILABLE',
      message: 'OCR service error (HTTP 500).',
      retriable: true,
      cause: 'could not execute a primitive',
    });
  });

  it('classifies 4xx as a permanent invalid request', async () => {
    const client = new OcrServiceClient(config, respond(400, { success: false, error: 'No image provided' }));

    expect(await client.call(makeRequest())).toMatchObject({
      status: 'failure',
      code: 'INVALID_REQUEST',
      message: 'No image provided',
      retriable: false,
    });
  });

  it('falls back to the status code when a 4xx has no body', async () => {
    const client = new OcrServiceClient(config, respond(404, ''));

    expect(await client.call(makeRequest())).toMatchObject({
      code: 'INVALID_REQUEST',
      message: 'OCR service rejected the request (HTTP 404).',
    });
  });

  it('reports a non-JSON 200 body as malformed', async () => {
    const client = new OcrServiceClient(config, respond(200, '<html>proxy page</html>'));

    expect(await client.call(makeRequest())).toMatchObject({
      status: 'failure',
      code: 'MALFORMED_RESPONSE',
      retriable: false,
    });
  });
});

describe('OcrServiceClient.callPdf', () => {
  it('posts the document to the PDF endpoint', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(JSON.stringify({ success: true, text: 'p1', pages: [] })));
    const client = new OcrServiceClient(config, fetchImpl);

    const result = await client.callPdf({ pdf: Buffer.from('%PDF-1.4'), language: 'en', requestId: 'req-pdf' });

    expect(result).toEqual({ status: 'ok', httpStatus: 200, body: { success: true, text: 'p1', pages: [] } });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://ocr.test/api/ocr/pdf');
    expect(new Headers(init?.headers).get('x-request-id')).toBe('req-pdf');
    const body = init?.body;
    if (!(body instanceof FormData)) throw new Error('expected FormData body');
    const file = body.get('file');
    if (!(file instanceof Blob)) throw new Error('expected file part');
    expect(file.type).toBe('application/pdf');
    expect(Buffer.from(await file.arrayBuffer()).toString()).toBe('%PDF-1.4');
  });

  it('uses the PDF timeout rather than the image timeout', async () => {
    const client = new OcrServiceClient(createOcrConfig({ baseUrl: 'http://ocr.test', timeoutMs: 5, pdfTimeoutMs: 40 }), hanging);

    const result = await client.callPdf({ pdf: Buffer.from('%PDF-1.4'), language: 'en', requestId: 'req-pdf' });

    expect(result).toMatchObject({ code: 'TIMEOUT', retriable: true, message: 'OCR service did not respond within 40ms.' });
  });

  it('classifies a 500 from the PDF endpoint like any other', async () => {
    const client = new OcrServiceClient(config, respond(500, { success: false, error: 'PDF OCR failed', text: '', pages: [] }));

    const result = await client.callPdf({ pdf: Buffer.from('%PDF-1.4'), language: 'en', requestId: 'req-pdf' });

    expect(result).toEqual({
      status: 'failure',
      code: 'SERVICE_UNAVAILABLE',
      message: 'OCR service error (HTTP 500).',
      retriable: true,
      cause: 'PDF OCR failed',
    });
  });
});

describe('OcrServiceClient probes', () => {
  it('reports health from the health endpoint', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(JSON.stringify({ status: 'healthy' })));
    const client = new OcrServiceClient(config, fetchImpl);

    expect(await client.health()).toEqual({ ok: true, httpStatus: 200, body: { status: 'healthy' } });
    expect(fetchImpl.mock.calls[0][0]).toBe('http://ocr.test/health');
  });

  it('reports an unreachable service as unhealthy without throwing', async () => {
    const client = new OcrServiceClient(config, async () => {
      throw new TypeError('fetch failed');
    });

    expect(await client.health()).toEqual({ ok: false, error: 'TypeError: fetch failed' });
  });

  it('returns the supported language map', async () => {
    const client = new OcrServiceClient(config, respond(200, { languages: { en: 'English', fr: 'French' } }));

    expect(await client.languages()).toEqual({ en: 'English', fr: 'French' });
  });

  it('returns no languages when the endpoint misbehaves', async () => {
    expect(await new OcrServiceClient(config, respond(500, {})).languages()).toEqual({});
    expect(await new OcrServiceClient(config, respond(200, { languages: ['en'] })).languages()).toEqual({});
  });
});

describe('OcrServiceClient.warmup', () => {
  it('sends a small image to the OCR endpoint and reports success', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(JSON.stringify({ success: true, text: '' })));
    const client = new OcrServiceClient(config, fetchImpl);

    const result = await client.warmup();

    expect(result.ok).toBe(true);
    expect(fetchImpl.mock.calls[0][0]).toBe('http://ocr.test/ocr');
  });

  it('reports a warmup that times out', async () => {
    const client = new OcrServiceClient(config, hanging);

    const result = await client.warmup({ timeoutMs: 20 });

    expect(result).toMatchObject({ ok: false, code: 'TIMEOUT' });
  });
});

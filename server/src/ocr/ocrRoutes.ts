import { Router } from 'express';
import type { Request, Response } from 'express';

import type { ImageInput, OcrFailure, OcrOutcome } from './types';
import type { OcrService } from './ocrService';
import { ocrLog } from './ocrLog';

const BUSY_MESSAGE = 'The OCR service is busy right now. Please try again shortly.';
const RETRY_AFTER_SECONDS = 5;

/** HTTP status the web layer answers with for an outcome. */
export function outcomeHttpStatus(outcome: OcrOutcome): number {
  if (outcome.status !== 'failure') return 200;
  switch (outcome.code) {
    case 'TIMEOUT':
      return 504;
    case 'SERVICE_UNAVAILABLE':
      return 503;
    case 'UPSTREAM_ERROR':
      return outcome.retriable ? 503 : 422;
    case 'INVALID_IMAGE':
    case 'INVALID_REQUEST':
      return 400;
    case 'MALFORMED_RESPONSE':
      return 502;
    case 'CANCELLED':
      return 499;
  }
}

/** Text safe to show an end user. Upstream strings are only echoed when the user can act on them. */
export function userMessageFor(failure: OcrFailure): string {
  switch (failure.code) {
    case 'TIMEOUT':
    case 'SERVICE_UNAVAILABLE':
      return BUSY_MESSAGE;
    case 'UPSTREAM_ERROR':
      return failure.retriable ? BUSY_MESSAGE : `Could not read this image: ${failure.message}`;
    case 'INVALID_IMAGE':
    case 'INVALID_REQUEST':
      return `Unsupported file: ${failure.message}`;
    case 'MALFORMED_RESPONSE':
      return 'The OCR service returned an unexpected response.';
    case 'CANCELLED':
      return 'Request cancelled.';
  }
}

type ScanInput = { kind: 'image' | 'pdf'; input: ImageInput };

const PDF_DATA_URL_RE = /^data:application\/pdf;/i;

function readScanInput(body: unknown): ScanInput | null {
  if (!body || typeof body !== 'object') return null;
  if ('pdf_base64' in body && typeof body.pdf_base64 === 'string' && body.pdf_base64) {
    return { kind: 'pdf', input: { kind: 'base64', base64: body.pdf_base64 } };
  }
  if ('image_base64' in body && typeof body.image_base64 === 'string' && body.image_base64) {
    return { kind: 'image', input: { kind: 'base64', base64: body.image_base64 } };
  }
  if ('dataUrl' in body && typeof body.dataUrl === 'string' && body.dataUrl) {
    return { kind: PDF_DATA_URL_RE.test(body.dataUrl) ? 'pdf' : 'image', input: { kind: 'dataUrl', dataUrl: body.dataUrl } };
  }
  return null;
}

function readLanguage(body: unknown): string | undefined {
  if (!body || typeof body !== 'object' || !('language' in body)) return undefined;
  return typeof body.language === 'string' ? body.language : undefined;
}

function toResponseBody(outcome: OcrOutcome) {
  if (outcome.status === 'success') {
    const body = {
      success: true,
      text: outcome.text,
      confidence: outcome.confidence,
      lines_detected: outcome.lineCount,
      details: outcome.lines.map((l) => ({ text: l.text, confidence: l.confidence, bbox: l.boundingQuadrilateral })),
    };
    if (!outcome.pages) return body;
    return {
      ...body,
      total_pages: outcome.pages.length,
      pages: outcome.pages.map((p) => ({ page_number: p.pageNumber, text: p.text, line_count: p.lineCount })),
    };
  }
  if (outcome.status === 'empty') {
    return { success: true, text: '', confidence: 0, lines_detected: 0, details: [], message: 'No text detected in image' };
  }
  return { success: false, code: outcome.code, retriable: outcome.retriable, error: userMessageFor(outcome) };
}

export function createOcrRouter(service: OcrService): Router {
  const router = Router();

  router.post('/api/ocr/scan', async (req: Request, res: Response) => {
    const scan = readScanInput(req.body);
    if (!scan) {
      res.status(400).json({ success: false, code: 'INVALID_REQUEST', error: 'No file provided. Send image_base64, pdf_base64 or dataUrl.' });
      return;
    }

    // Client went away: stop retrying and free the upstream connection.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const opts = { language: readLanguage(req.body), signal: controller.signal };
      const outcome =
        scan.kind === 'pdf'
          ? await service.extractOcrFromPdf(scan.input, opts)
          : await service.extractOcrFromImage(scan.input, opts);
      if (controller.signal.aborted) return;

      const status = outcomeHttpStatus(outcome);
      if (status === 503 || status === 504) res.set('Retry-After', String(RETRY_AFTER_SECONDS));
      res.status(status).json(toResponseBody(outcome));
    } catch (err) {
      ocrLog('error', 'scan handler failed', { err: String(err) });
      res.status(500).json({ success: false, error: 'Internal error' });
    }
  });

  router.get('/api/ocr/health', async (_req: Request, res: Response) => {
    const health = await service.client.health();
    res.status(health.ok ? 200 : 503).json({
      ok: health.ok,
      upstreamStatus: health.httpStatus ?? null,
      upstream: health.body ?? null,
    });
  });

  router.get('/api/ocr/languages', async (_req: Request, res: Response) => {
    res.json({ languages: await service.client.languages() });
  });

  return router;
}

import sharp from 'sharp';

import type { OcrConfig } from './config';
import type { ImageBuffer, OcrErrorCode, OcrFailure, OcrPdfRequest, OcrRequest } from './types';
import { ocrFailure } from './types';
import { ocrLog, tailString } from './ocrLog';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type ClientSuccess = { status: 'ok'; httpStatus: number; body: unknown };
export type ClientResult = ClientSuccess | OcrFailure;

export type HealthResult = { ok: boolean; httpStatus?: number; body?: unknown; error?: string };
export type CallOptions = { signal?: AbortSignal; timeoutMs?: number };
export type WarmupResult = { ok: boolean; durationMs: number; code?: OcrErrorCode; message?: string };

type RawExchange =
  | { kind: 'response'; httpStatus: number; text: string }
  | { kind: 'timeout' }
  | { kind: 'cancelled' }
  | { kind: 'network'; error: unknown };

const HEALTH_TIMEOUT_MS = 5000;

// Engine-side resource exhaustion surfaced under load; retried like any 5xx.
const RESOURCE_EXHAUSTION_RE = /could not execute a primitive/i;

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; error: unknown } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e) {
    return { ok: false, error: e };
  }
}

function upstreamErrorText(text: string): string | undefined {
  const parsed = parseJson(text);
  if (parsed.ok && parsed.value && typeof parsed.value === 'object' && 'error' in parsed.value) {
    const err = parsed.value.error;
    if (typeof err === 'string' && err.trim()) return err.trim();
  }
  return text.trim() ? tailString(text.trim(), 500) : undefined;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === 'string');
}

export class OcrServiceClient {
  constructor(
    private readonly config: OcrConfig,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  get endpoint(): string {
    return this.config.baseUrl + this.config.ocrPath;
  }

  async call(request: OcrRequest, opts?: CallOptions): Promise<ClientResult> {
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(request.image.bytes)], { type: 'image/png' }), 'image.png');
    form.append('language', request.language);
    return await this.post(this.endpoint, form, request.requestId, opts?.timeoutMs ?? this.config.timeoutMs, opts?.signal);
  }

  /** Same classification as `call`, against the PDF endpoint with the longer PDF timeout. */
  async callPdf(request: OcrPdfRequest, opts?: CallOptions): Promise<ClientResult> {
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(request.pdf)], { type: 'application/pdf' }), 'document.pdf');
    form.append('language', request.language);
    return await this.post(
      this.config.baseUrl + this.config.pdfPath,
      form,
      request.requestId,
      opts?.timeoutMs ?? this.config.pdfTimeoutMs,
      opts?.signal
    );
  }

  private async post(url: string, form: FormData, requestId: string, timeoutMs: number, signal?: AbortSignal): Promise<ClientResult> {
    const exchange = await this.exchange(
      url,
      { method: 'POST', body: form, headers: { 'X-Request-Id': requestId } },
      timeoutMs,
      signal
    );

    switch (exchange.kind) {
      case 'timeout':
        return ocrFailure('TIMEOUT', `OCR service did not respond within ${timeoutMs}ms.`, true);
      case 'cancelled':
        return ocrFailure('CANCELLED', 'OCR request was cancelled.', false);
      case 'network':
        return ocrFailure('SERVICE_UNAVAILABLE', 'Could not reach OCR service.', true, exchange.error);
      case 'response':
        return this.classifyResponse(requestId, exchange.httpStatus, exchange.text);
    }
  }

  private classifyResponse(requestId: string, httpStatus: number, text: string): ClientResult {
    if (httpStatus >= 500) {
      const cause = upstreamErrorText(text);
      if (cause && RESOURCE_EXHAUSTION_RE.test(cause)) {
        ocrLog('warn', 'engine resource exhaustion', { requestId, httpStatus });
      }
      return ocrFailure('SERVICE_UNAVAILABLE', `OCR service error (HTTP ${httpStatus}).`, true, cause);
    }

    if (httpStatus < 200 || httpStatus >= 300) {
      const reason = upstreamErrorText(text);
      return ocrFailure('INVALID_REQUEST', reason || `OCR service rejected the request (HTTP ${httpStatus}).`, false);
    }

    const parsed = parseJson(text);
    if (!parsed.ok) {
      ocrLog('error', 'upstream returned non-JSON body', {
        requestId,
        httpStatus,
        body: tailString(text, 400),
      });
      return ocrFailure('MALFORMED_RESPONSE', 'OCR service returned a body that is not JSON.', false, parsed.error);
    }
    return { status: 'ok', httpStatus, body: parsed.value };
  }

  /**
   * Forces model initialization on a cold service. Slow on purpose; run from
   * deploy tooling, not request handlers.
   */
  async warmup(opts?: { timeoutMs?: number }): Promise<WarmupResult> {
    const start = Date.now();
    const bytes = await sharp({ create: { width: 64, height: 64, channels: 3, background: '#ffffff' } })
      .png()
      .toBuffer();
    const image: ImageBuffer = {
      bytes,
      format: 'png',
      width: 64,
      height: 64,
      originalWidth: 64,
      originalHeight: 64,
      resized: false,
    };

    const result = await this.call(
      { image, language: this.config.defaultLanguage, requestId: `warmup-${start}` },
      { timeoutMs: opts?.timeoutMs ?? this.config.warmupTimeoutMs }
    );
    const durationMs = Date.now() - start;
    if (result.status === 'ok') return { ok: true, durationMs };
    return { ok: false, durationMs, code: result.code, message: result.message };
  }

  async health(opts?: { timeoutMs?: number; signal?: AbortSignal }): Promise<HealthResult> {
    const exchange = await this.exchange(
      this.config.baseUrl + this.config.healthPath,
      { method: 'GET' },
      opts?.timeoutMs ?? HEALTH_TIMEOUT_MS,
      opts?.signal
    );
    if (exchange.kind !== 'response') {
      return { ok: false, error: exchange.kind === 'network' ? String(exchange.error) : exchange.kind };
    }
    const parsed = parseJson(exchange.text);
    return {
      ok: exchange.httpStatus >= 200 && exchange.httpStatus < 300,
      httpStatus: exchange.httpStatus,
      body: parsed.ok ? parsed.value : undefined,
    };
  }

  async languages(opts?: { timeoutMs?: number; signal?: AbortSignal }): Promise<Record<string, string>> {
    const exchange = await this.exchange(
      this.config.baseUrl + this.config.languagesPath,
      { method: 'GET' },
      opts?.timeoutMs ?? HEALTH_TIMEOUT_MS,
      opts?.signal
    );
    if (exchange.kind !== 'response' || exchange.httpStatus !== 200) return {};
    const parsed = parseJson(exchange.text);
    if (!parsed.ok || !parsed.value || typeof parsed.value !== 'object' || !('languages' in parsed.value)) return {};
    const languages = parsed.value.languages;
    return isStringRecord(languages) ? languages : {};
  }

  // The timeout covers the whole exchange: connect, headers and body.
  private async exchange(url: string, init: RequestInit, timeoutMs: number, signal?: AbortSignal): Promise<RawExchange> {
    if (signal?.aborted) return { kind: 'cancelled' };

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const res = await this.fetchImpl(url, { ...init, signal: controller.signal });
      const text = await res.text();
      return { kind: 'response', httpStatus: res.status, text };
    } catch (e) {
      if (timedOut) return { kind: 'timeout' };
      if (signal?.aborted) return { kind: 'cancelled' };
      return { kind: 'network', error: e };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

import crypto from 'crypto';

import type { OcrConfig } from './config';
import type { OcrFailure, OcrOutcome, OcrPdfRequest, OcrRequest, OrchestratorState, RetryState } from './types';
import { ocrFailure } from './types';
import type { ClientResult } from './ocrServiceClient';
import type { ImagePreprocessor } from './imagePreprocess';
import { preprocessImage } from './imagePreprocess';
import { checkPdfDocument } from './pdfDocument';
import { normalizeOcrResponse } from './resultNormalizer';
import { backoffDelayMs, canRetry, createRetryState, realSleep } from './retryPolicy';
import type { Sleep } from './retryPolicy';
import type { Semaphore } from './concurrency';
import { scopedOcrLog } from './ocrLog';
import type { ScopedOcrLog } from './ocrLog';

export type OcrCaller = {
  call(request: OcrRequest, opts?: { signal?: AbortSignal }): Promise<ClientResult>;
  callPdf(request: OcrPdfRequest, opts?: { signal?: AbortSignal }): Promise<ClientResult>;
};

export type StateTransition = {
  requestId: string;
  from: OrchestratorState;
  to: OrchestratorState;
  attempt: number;
};

export type OrchestratorDeps = {
  config: OcrConfig;
  client: OcrCaller;
  semaphore: Semaphore;
  sleep?: Sleep;
  preprocess?: ImagePreprocessor;
  createRequestId?: () => string;
  onTransition?: (transition: StateTransition) => void;
};

export type HandleOptions = {
  signal?: AbortSignal;
};

type Send = (signal?: AbortSignal) => Promise<ClientResult>;

function cancelled(): OcrFailure {
  return ocrFailure('CANCELLED', 'OCR request was cancelled.', false);
}

/** Bookkeeping for one `handle` call: current state, retry budget, timing. */
class RequestRun {
  state: OrchestratorState = 'preprocessing';
  readonly retry: RetryState;
  readonly log: ScopedOcrLog;
  readonly language: string;
  private readonly start = Date.now();

  constructor(
    readonly requestId: string,
    config: OcrConfig,
    language: string | undefined,
    readonly signal: AbortSignal | undefined,
    private readonly onTransition?: (transition: StateTransition) => void
  ) {
    this.retry = createRetryState(config.maxAttempts);
    this.log = scopedOcrLog(requestId);
    this.language = String(language || '').trim() || config.defaultLanguage;
  }

  moveTo(to: OrchestratorState): void {
    const transition: StateTransition = { requestId: this.requestId, from: this.state, to, attempt: this.retry.attempt };
    this.log('trace', 'transition', { from: this.state, to, attempt: this.retry.attempt });
    this.state = to;
    try {
      this.onTransition?.(transition);
    } catch (err) {
      this.log('error', 'transition hook failed', { to, err: String(err) });
    }
  }

  finish(outcome: OcrOutcome): OcrOutcome {
    this.moveTo('done');
    this.log(outcome.status === 'failure' ? 'warn' : 'info', 'request done', {
      status: outcome.status,
      code: outcome.status === 'failure' ? outcome.code : undefined,
      attempts: this.retry.attempt,
      totalMs: Date.now() - this.start,
    });
    return outcome;
  }
}

/**
 * Runs one image through preprocess -> call (with retries) -> normalize.
 * Every path ends in `done` with an OcrOutcome; `handle` never rejects on
 * expected failures.
 */
export class OcrRequestOrchestrator {
  private readonly sleep: Sleep;
  private readonly preprocess: ImagePreprocessor;
  private readonly createRequestId: () => string;

  constructor(private readonly deps: OrchestratorDeps) {
    this.sleep = deps.sleep ?? realSleep;
    this.preprocess = deps.preprocess ?? preprocessImage;
    this.createRequestId = deps.createRequestId ?? (() => crypto.randomUUID());
  }

  async handle(imageBytes: Buffer, language?: string, opts?: HandleOptions): Promise<OcrOutcome> {
    const { config, client } = this.deps;
    const run = this.begin(language, opts);

    run.log('debug', 'request start', { bytes: imageBytes?.length ?? 0, language: run.language });
    if (run.signal?.aborted) return run.finish(cancelled());

    const image = await this.preprocess(imageBytes, config.maxDimension, { enhance: config.enhanceImages });
    if ('status' in image) {
      run.log('info', 'preprocess rejected image', { message: image.message, cause: image.cause });
      return run.finish(image);
    }
    run.log('debug', 'preprocessed', {
      from: `${image.originalWidth}x${image.originalHeight}`,
      to: `${image.width}x${image.height}`,
      resized: image.resized,
      bytes: image.bytes.length,
    });
    if (run.signal?.aborted) return run.finish(cancelled());

    const request: OcrRequest = { image, language: run.language, requestId: run.requestId };
    return await this.callWithRetries(run, (signal) => client.call(request, { signal }));
  }

  /** PDF variant: no image preprocessing, same retry, concurrency and normalization path. */
  async handlePdf(pdfBytes: Buffer, language?: string, opts?: HandleOptions): Promise<OcrOutcome> {
    const { client } = this.deps;
    const run = this.begin(language, opts);

    run.log('debug', 'pdf request start', { bytes: pdfBytes?.length ?? 0, language: run.language });
    if (run.signal?.aborted) return run.finish(cancelled());

    const invalid = checkPdfDocument(pdfBytes);
    if (invalid) {
      run.log('info', 'pdf rejected', { message: invalid.message });
      return run.finish(invalid);
    }

    const request: OcrPdfRequest = { pdf: pdfBytes, language: run.language, requestId: run.requestId };
    return await this.callWithRetries(run, (signal) => client.callPdf(request, { signal }));
  }

  private begin(language: string | undefined, opts?: HandleOptions): RequestRun {
    return new RequestRun(this.createRequestId(), this.deps.config, language, opts?.signal, this.deps.onTransition);
  }

  private async callWithRetries(run: RequestRun, send: Send): Promise<OcrOutcome> {
    const { retry, log, signal } = run;
    run.moveTo('calling');

    for (;;) {
      const result = await this.attempt(run, send);

      if (result.status === 'ok') {
        run.moveTo('normalizing');
        return run.finish(normalizeOcrResponse(result.body));
      }

      retry.lastError = result;
      if (!canRetry(retry, result)) {
        if (result.retriable) log('warn', 'retries exhausted', { attempts: retry.attempt, code: result.code });
        return run.finish(result);
      }

      run.moveTo('retrying');
      const delayMs = backoffDelayMs(retry.attempt, this.deps.config.backoffInitialMs);
      log('info', 'retrying after backoff', { attempt: retry.attempt, delayMs, code: result.code, cause: result.cause });
      await this.sleep(delayMs, signal);
      if (signal?.aborted) return run.finish(cancelled());
      run.moveTo('calling');
    }
  }

  private async attempt(run: RequestRun, send: Send): Promise<ClientResult> {
    const { config, semaphore } = this.deps;
    const { retry, log, signal } = run;
    retry.attempt++;

    const release = await semaphore.acquire(config.acquireTimeoutMs, signal);
    if (!release) {
      if (signal?.aborted) return cancelled();
      log('warn', 'concurrency slot not acquired', { waitedMs: config.acquireTimeoutMs, pending: semaphore.pending });
      return ocrFailure('SERVICE_UNAVAILABLE', 'Too many OCR requests in flight.', true);
    }

    const t0 = Date.now();
    try {
      const result = await send(signal);
      log('debug', 'attempt finished', {
        attempt: retry.attempt,
        ms: Date.now() - t0,
        result: result.status === 'ok' ? `http ${result.httpStatus}` : result.code,
      });
      return result;
    } finally {
      release();
    }
  }
}

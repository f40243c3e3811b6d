import type { ImageInput, OcrOutcome } from './types';
import type { OcrConfig } from './config';
import { loadOcrConfig } from './config';
import { resolveImageBuffer } from './imageInput';
import { OcrServiceClient } from './ocrServiceClient';
import type { FetchLike } from './ocrServiceClient';
import { Semaphore } from './concurrency';
import { OcrRequestOrchestrator } from './requestOrchestrator';
import type { OrchestratorDeps } from './requestOrchestrator';

export type ExtractOptions = { language?: string; signal?: AbortSignal };

export class OcrService {
  readonly client: OcrServiceClient;
  readonly orchestrator: OcrRequestOrchestrator;

  constructor(
    readonly config: OcrConfig,
    opts?: { fetchImpl?: FetchLike } & Partial<Omit<OrchestratorDeps, 'config' | 'client'>>
  ) {
    this.client = new OcrServiceClient(config, opts?.fetchImpl);
    this.orchestrator = new OcrRequestOrchestrator({
      ...opts,
      config,
      client: this.client,
      semaphore: opts?.semaphore ?? new Semaphore(config.maxConcurrency),
    });
  }

  /** Image input of any supported kind -> OcrOutcome. Bad input never reaches the network. */
  async extractOcrFromImage(input: ImageInput, opts?: ExtractOptions): Promise<OcrOutcome> {
    const resolved = resolveImageBuffer(input);
    if (resolved.status !== 'resolved') return resolved;
    return await this.orchestrator.handle(resolved.buffer, opts?.language, { signal: opts?.signal });
  }

  /** PDF document -> OcrOutcome with per-page text. Skips image preprocessing. */
  async extractOcrFromPdf(input: ImageInput, opts?: ExtractOptions): Promise<OcrOutcome> {
    const resolved = resolveImageBuffer(input);
    if (resolved.status !== 'resolved') return resolved;
    return await this.orchestrator.handlePdf(resolved.buffer, opts?.language, { signal: opts?.signal });
  }
}

let service: OcrService | null = null;

export function getOcrService(): OcrService {
  if (service) return service;
  service = new OcrService(loadOcrConfig());
  return service;
}

export async function extractOcrFromImage(input: ImageInput, opts?: ExtractOptions): Promise<OcrOutcome> {
  return await getOcrService().extractOcrFromImage(input, opts);
}

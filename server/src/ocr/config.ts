export type OcrConfig = Readonly<{
  baseUrl: string;
  ocrPath: string;
  healthPath: string;
  languagesPath: string;
  pdfPath: string;
  timeoutMs: number;
  pdfTimeoutMs: number;
  warmupTimeoutMs: number;
  maxAttempts: number;
  backoffInitialMs: number;
  maxDimension: number;
  maxConcurrency: number;
  acquireTimeoutMs: number;
  enhanceImages: boolean;
  defaultLanguage: string;
}>;

type Env = Record<string, string | undefined>;

export const MIN_WARMUP_TIMEOUT_MS = 150_000;

export const DEFAULT_OCR_CONFIG = {
  ocrPath: '/ocr',
  healthPath: '/health',
  languagesPath: '/languages',
  pdfPath: '/api/ocr/pdf',
  timeoutMs: 120_000,
  // Multi-page documents are rasterized and recognized page by page upstream.
  pdfTimeoutMs: 300_000,
  warmupTimeoutMs: 180_000,
  maxAttempts: 3,
  backoffInitialMs: 1000,
  maxDimension: 2048,
  maxConcurrency: 2,
  acquireTimeoutMs: 30_000,
  enhanceImages: false,
  defaultLanguage: 'en',
} as const;

function envString(env: Env, name: string): string {
  return String(env[name] || '').trim();
}

function envBool(env: Env, name: string, fallback: boolean): boolean {
  const v = envString(env, name).toLowerCase();
  if (!v) return fallback;
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

function envPositive(env: Env, name: string, fallback: number, opts?: { integer?: boolean }): number {
  const raw = envString(env, name);
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`Invalid ${name}. Must be a positive number.`);
  }
  if (opts?.integer && !Number.isInteger(n)) {
    throw new Error(`Invalid ${name}. Must be a positive integer.`);
  }
  return n;
}

function envPath(env: Env, name: string, fallback: string): string {
  const raw = envString(env, name);
  if (!raw) return fallback;
  return raw.startsWith('/') ? raw : `/${raw}`;
}

function normalizeBaseUrl(name: string, raw: string): string {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new Error(`Invalid ${name}. Must be an absolute http(s) URL.`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`Invalid ${name}. Must be an absolute http(s) URL.`);
  }
  return parsed.toString().replace(/\/+$/, '');
}

export function loadOcrConfig(env: Env = process.env): OcrConfig {
  const baseRaw = envString(env, 'OCR_SERVICE_URL');
  if (!baseRaw) throw new Error('Missing required environment variable: OCR_SERVICE_URL');

  const warmupSeconds = envPositive(env, 'OCR_WARMUP_TIMEOUT_SECONDS', DEFAULT_OCR_CONFIG.warmupTimeoutMs / 1000);

  return Object.freeze({
    baseUrl: normalizeBaseUrl('OCR_SERVICE_URL', baseRaw),
    ocrPath: envPath(env, 'OCR_PATH', DEFAULT_OCR_CONFIG.ocrPath),
    healthPath: envPath(env, 'OCR_HEALTH_PATH', DEFAULT_OCR_CONFIG.healthPath),
    languagesPath: envPath(env, 'OCR_LANGUAGES_PATH', DEFAULT_OCR_CONFIG.languagesPath),
    pdfPath: envPath(env, 'OCR_PDF_PATH', DEFAULT_OCR_CONFIG.pdfPath),
    timeoutMs: envPositive(env, 'OCR_TIMEOUT_SECONDS', DEFAULT_OCR_CONFIG.timeoutMs / 1000) * 1000,
    pdfTimeoutMs: envPositive(env, 'OCR_PDF_TIMEOUT_SECONDS', DEFAULT_OCR_CONFIG.pdfTimeoutMs / 1000) * 1000,
    // Cold start downloads model weights; anything shorter just times out.
    warmupTimeoutMs: Math.max(MIN_WARMUP_TIMEOUT_MS, warmupSeconds * 1000),
    maxAttempts: envPositive(env, 'OCR_MAX_ATTEMPTS', DEFAULT_OCR_CONFIG.maxAttempts, { integer: true }),
    backoffInitialMs: envPositive(env, 'OCR_BACKOFF_INITIAL_MS', DEFAULT_OCR_CONFIG.backoffInitialMs),
    maxDimension: envPositive(env, 'OCR_MAX_DIMENSION', DEFAULT_OCR_CONFIG.maxDimension, { integer: true }),
    maxConcurrency: envPositive(env, 'OCR_MAX_CONCURRENCY', DEFAULT_OCR_CONFIG.maxConcurrency, { integer: true }),
    acquireTimeoutMs: envPositive(env, 'OCR_ACQUIRE_TIMEOUT_SECONDS', DEFAULT_OCR_CONFIG.acquireTimeoutMs / 1000) * 1000,
    enhanceImages: envBool(env, 'OCR_ENHANCE_IMAGES', DEFAULT_OCR_CONFIG.enhanceImages),
    defaultLanguage: envString(env, 'OCR_DEFAULT_LANGUAGE') || DEFAULT_OCR_CONFIG.defaultLanguage,
  });
}

const POSITIVE_NUMBER_FIELDS = ['timeoutMs', 'pdfTimeoutMs', 'warmupTimeoutMs', 'backoffInitialMs', 'acquireTimeoutMs'] as const;
const POSITIVE_INTEGER_FIELDS = ['maxAttempts', 'maxDimension', 'maxConcurrency'] as const;

function assertValidConfig(config: OcrConfig): OcrConfig {
  for (const field of POSITIVE_NUMBER_FIELDS) {
    const v = config[field];
    if (!Number.isFinite(v) || v <= 0) throw new Error(`Invalid ${field}. Must be a positive number.`);
  }
  for (const field of POSITIVE_INTEGER_FIELDS) {
    const v = config[field];
    if (!Number.isInteger(v) || v <= 0) throw new Error(`Invalid ${field}. Must be a positive integer.`);
  }
  return config;
}

/** Programmatic config (tests, embedding). Throws on values `loadOcrConfig` would also reject. */
export function createOcrConfig(overrides: Partial<OcrConfig> & { baseUrl: string }): OcrConfig {
  return Object.freeze(assertValidConfig({ ...DEFAULT_OCR_CONFIG, ...overrides }));
}

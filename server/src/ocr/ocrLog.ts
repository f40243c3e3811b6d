export type OcrLogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

type LevelNum = 0 | 1 | 2 | 3 | 4 | 5;

const LEVELS: Record<OcrLogLevel, LevelNum> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

function isLevel(s: string): s is OcrLogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, s);
}

export function parseOcrLogLevel(raw: unknown): OcrLogLevel {
  const s = String(raw ?? '').trim().toLowerCase();
  if (!s) return 'info';
  if (isLevel(s)) return s;
  if (s === 'none' || s === 'off') return 'silent';
  if (s === 'warning') return 'warn';
  return 'info';
}

function shouldLog(level: OcrLogLevel): boolean {
  return LEVELS[parseOcrLogLevel(process.env.OCR_LOG_LEVEL)] >= LEVELS[level];
}

function safeExtra(extra: unknown): unknown {
  if (extra == null) return undefined;
  if (typeof extra === 'string') return extra;
  if (typeof extra === 'number' || typeof extra === 'boolean') return extra;
  try {
    return JSON.parse(JSON.stringify(extra));
  } catch {
    return String(extra);
  }
}

export function ocrLog(level: Exclude<OcrLogLevel, 'silent'>, msg: string, extra?: unknown): void {
  if (!shouldLog(level)) return;
  const payload = safeExtra(extra);
  const prefix = `[OCR] ${msg}`;

  try {
    if (level === 'error') console.error(prefix, payload ?? '');
    else if (level === 'warn') console.warn(prefix, payload ?? '');
    else if (level === 'trace' || level === 'debug') console.debug(prefix, payload ?? '');
    else console.info(prefix, payload ?? '');
  } catch {
    // never throw from logging
  }
}

export type ScopedOcrLog = (level: Exclude<OcrLogLevel, 'silent'>, msg: string, extra?: Record<string, unknown>) => void;

/** Logger bound to one request's correlation id. */
export function scopedOcrLog(requestId: string): ScopedOcrLog {
  return (level, msg, extra) => ocrLog(level, msg, { requestId, ...(extra || {}) });
}

export function tailString(s: unknown, max = 1200): string {
  const str = String(s ?? '');
  if (str.length <= max) return str;
  return str.slice(0, max) + `…(+${str.length - max} chars)`;
}

import type { ImageInput, OcrFailure } from './types';
import { ocrFailure } from './types';

export type ResolvedImage = { status: 'resolved'; buffer: Buffer };

const BASE64_RE = /^[A-Za-z0-9+/\r\n]+={0,2}$/;

function invalid(message: string): OcrFailure {
  return ocrFailure('INVALID_IMAGE', message, false);
}

export function isDataUrl(s: string): boolean {
  return /^data:[^;]+;base64,/i.test(String(s || ''));
}

export function parseBase64ToBuffer(raw: string): Buffer | null {
  const s = String(raw || '').trim();
  if (!s || !BASE64_RE.test(s)) return null;
  const buf = Buffer.from(s, 'base64');
  return buf.length ? buf : null;
}

export function parseDataUrlToBuffer(dataUrl: string): Buffer | null {
  const m = String(dataUrl || '').match(/^data:[^;]+;base64,(.+)$/is);
  if (!m) return null;
  return parseBase64ToBuffer(m[1]);
}

export function resolveImageBuffer(input: ImageInput): ResolvedImage | OcrFailure {
  if (input.kind === 'buffer') {
    if (!Buffer.isBuffer(input.buffer) || input.buffer.length === 0) return invalid('Image buffer is empty.');
    return { status: 'resolved', buffer: input.buffer };
  }

  if (input.kind === 'dataUrl') {
    const buf = parseDataUrlToBuffer(input.dataUrl);
    if (!buf) return invalid('Invalid data URL (expected base64 data URL).');
    return { status: 'resolved', buffer: buf };
  }

  // Raw base64 may still arrive with a data URL prefix from browser FileReader.
  const buf = isDataUrl(input.base64) ? parseDataUrlToBuffer(input.base64) : parseBase64ToBuffer(input.base64);
  if (!buf) return invalid('Invalid base64 image payload.');
  return { status: 'resolved', buffer: buf };
}

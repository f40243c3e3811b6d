import type { OcrFailure } from './types';
import { ocrFailure } from './types';

const PDF_MAGIC = Buffer.from('%PDF-');
// Readers accept the header anywhere in the first 1024 bytes.
const HEADER_WINDOW = 1024;

export function isPdfBuffer(buf: Buffer): boolean {
  return buf.subarray(0, HEADER_WINDOW).indexOf(PDF_MAGIC) !== -1;
}

/** Cheap local check before a document is sent upstream; null when it looks like a PDF. */
export function checkPdfDocument(raw: Buffer): OcrFailure | null {
  if (!raw || !Buffer.isBuffer(raw) || raw.length === 0) {
    return ocrFailure('INVALID_IMAGE', 'Document buffer is empty.', false);
  }
  if (!isPdfBuffer(raw)) return ocrFailure('INVALID_IMAGE', 'Not a PDF document.', false);
  return null;
}

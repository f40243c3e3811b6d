import type { OcrFailure, OcrLine, OcrOutcome, OcrPage, OcrPoint } from './types';
import { ocrFailure } from './types';
import { ocrLog, tailString } from './ocrLog';

type JsonObject = Record<string, unknown>;

/**
 * Where extracted text may live, in priority order. The enriched shape nests
 * the parsed question; the bare shape only carries `text`. Append new shapes
 * here rather than branching on feature flags in callers.
 */
export const TEXT_LOOKUP_RULES: ReadonlyArray<{ name: string; path: readonly string[] }> = [
  { name: 'question.question_text', path: ['question', 'question_text'] },
  { name: 'question_text', path: ['question_text'] },
  { name: 'extracted_text', path: ['extracted_text'] },
  { name: 'text', path: ['text'] },
];

const TRANSIENT_UPSTREAM_RE = /timeout|timed out|primitive/i;

class MalformedShape extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedShape';
  }
}

function isObject(value: unknown): value is JsonObject {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function lookup(body: JsonObject, path: readonly string[]): unknown {
  let cur: unknown = body;
  for (const key of path) {
    if (!isObject(cur)) return undefined;
    cur = cur[key];
  }
  return cur;
}

function clampConfidence(value: unknown, field: string): number {
  if (value == null) return 1;
  if (typeof value !== 'number' || !Number.isFinite(value)) throw new MalformedShape(`${field} is not a number`);
  return Math.min(1, Math.max(0, value));
}

function parseQuadrilateral(value: unknown, idx: number): OcrPoint[] | null {
  if (value == null) return null;
  if (!Array.isArray(value)) throw new MalformedShape(`details[${idx}].bbox is not an array`);
  return value.map((pt): OcrPoint => {
    if (!Array.isArray(pt) || pt.length < 2) throw new MalformedShape(`details[${idx}].bbox has a bad point`);
    const [x, y] = pt;
    if (typeof x !== 'number' || typeof y !== 'number') throw new MalformedShape(`details[${idx}].bbox has a bad point`);
    return [x, y];
  });
}

function parseLines(details: unknown): OcrLine[] {
  if (details == null) return [];
  if (!Array.isArray(details)) throw new MalformedShape('details is not an array');
  return details.map((d, idx): OcrLine => {
    if (!isObject(d)) throw new MalformedShape(`details[${idx}] is not an object`);
    const text = d.text ?? '';
    if (typeof text !== 'string') throw new MalformedShape(`details[${idx}].text is not a string`);
    return {
      text,
      confidence: clampConfidence(d.confidence, `details[${idx}].confidence`),
      boundingQuadrilateral: parseQuadrilateral(d.bbox ?? d.box, idx),
    };
  });
}

function countField(value: unknown, fallback: number, field: string): number {
  if (value == null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new MalformedShape(`${field} is not a non-negative integer`);
  }
  return value;
}

// PDF shape: { text, total_pages, pages: [{ page_number, text, line_count }] }
function parsePages(pages: unknown): OcrPage[] | null {
  if (pages == null) return null;
  if (!Array.isArray(pages)) throw new MalformedShape('pages is not an array');
  return pages.map((p, idx): OcrPage => {
    if (!isObject(p)) throw new MalformedShape(`pages[${idx}] is not an object`);
    const text = p.text ?? '';
    if (typeof text !== 'string') throw new MalformedShape(`pages[${idx}].text is not a string`);
    const pageNumber = countField(p.page_number, idx + 1, `pages[${idx}].page_number`);
    return { pageNumber, text: text.trim(), lineCount: countField(p.line_count, 0, `pages[${idx}].line_count`) };
  });
}

function findText(body: JsonObject): string | null {
  for (const rule of TEXT_LOOKUP_RULES) {
    const value = lookup(body, rule.path);
    if (value == null) continue;
    if (typeof value !== 'string') throw new MalformedShape(`${rule.name} is not a string`);
    const trimmed = value.trim();
    if (trimmed) return trimmed;
  }
  return null;
}

function parseLineCount(value: unknown, lines: OcrLine[], pages: OcrPage[] | null): number {
  const pageLines = pages ? pages.reduce((sum, p) => sum + p.lineCount, 0) : 0;
  return countField(value, lines.length || pageLines || 1, 'lines_detected');
}

function upstreamFailure(body: JsonObject): OcrFailure | null {
  const err = body.error;
  const hasError = typeof err === 'string' ? err.trim() !== '' : err != null;
  if (body.success !== false && !hasError) return null;

  const message = typeof err === 'string' && err.trim() ? err.trim() : 'OCR service reported failure.';
  return ocrFailure('UPSTREAM_ERROR', message, TRANSIENT_UPSTREAM_RE.test(message));
}

function malformed(reason: string, raw: unknown): OcrFailure {
  let preview: string;
  try {
    preview = tailString(JSON.stringify(raw), 400);
  } catch {
    preview = tailString(raw, 400);
  }
  ocrLog('error', 'malformed upstream response (contract mismatch?)', { reason, body: preview });
  return ocrFailure('MALFORMED_RESPONSE', `Unexpected OCR response shape: ${reason}.`, false);
}

/** Maps any upstream JSON body onto an OcrOutcome. Never throws. */
export function normalizeOcrResponse(raw: unknown): OcrOutcome {
  if (!isObject(raw)) return malformed('body is not a JSON object', raw);

  try {
    const failure = upstreamFailure(raw);
    if (failure) return failure;

    const text = findText(raw);
    if (text === null) return { status: 'empty' };

    const lines = parseLines(raw.details);
    const pages = parsePages(raw.pages);
    return {
      status: 'success',
      text,
      confidence: clampConfidence(raw.confidence, 'confidence'),
      lineCount: parseLineCount(raw.lines_detected, lines, pages),
      lines,
      ...(pages ? { pages } : {}),
    };
  } catch (e) {
    if (e instanceof MalformedShape) return malformed(e.message, raw);
    return malformed(String(e), raw);
  }
}

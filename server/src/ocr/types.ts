export type OcrPoint = [number, number];

export type OcrLine = {
  text: string;
  confidence: number; // 0..1
  boundingQuadrilateral: OcrPoint[] | null; // 4 corners, engine order
};

export type ImageBuffer = {
  bytes: Buffer;
  format: 'png';
  width: number;
  height: number;
  originalWidth: number;
  originalHeight: number;
  resized: boolean;
};

export type OcrRequest = {
  image: ImageBuffer;
  language: string;
  requestId: string;
};

// PDFs go to the service as-is; it rasterizes each page itself.
export type OcrPdfRequest = {
  pdf: Buffer;
  language: string;
  requestId: string;
};

export type OcrErrorCode =
  | 'INVALID_IMAGE'
  | 'INVALID_REQUEST'
  | 'TIMEOUT'
  | 'SERVICE_UNAVAILABLE'
  | 'UPSTREAM_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'CANCELLED';

export type OcrPage = {
  pageNumber: number;
  text: string;
  lineCount: number;
};

export type OcrSuccess = {
  status: 'success';
  text: string;
  confidence: number;
  lineCount: number;
  lines: OcrLine[];
  pages?: OcrPage[]; // PDF responses only
};

export type OcrEmpty = {
  status: 'empty';
};

export type OcrFailure = {
  status: 'failure';
  code: OcrErrorCode;
  message: string;
  retriable: boolean;
  cause?: string;
};

export type OcrOutcome = OcrSuccess | OcrEmpty | OcrFailure;

export type OrchestratorState = 'preprocessing' | 'calling' | 'retrying' | 'normalizing' | 'done';

export type RetryState = {
  attempt: number;
  maxAttempts: number;
  lastError: OcrFailure | null;
};

export type ImageInput =
  | { kind: 'buffer'; buffer: Buffer }
  | { kind: 'dataUrl'; dataUrl: string }
  | { kind: 'base64'; base64: string };

export function ocrFailure(code: OcrErrorCode, message: string, retriable: boolean, cause?: unknown): OcrFailure {
  return { status: 'failure', code, message, retriable, cause: cause ? String(cause) : undefined };
}

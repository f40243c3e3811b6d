import express from 'express';

import type { OcrService } from './ocr/ocrService';
import { createOcrRouter } from './ocr/ocrRoutes';

// Base64 images are sent inline in JSON, so the body limit bounds upload size.
export function imageUploadLimitMb(raw = process.env.MAX_IMAGE_UPLOAD_MB): number {
  const n = raw ? Number(raw) : 10;
  return Number.isFinite(n) && n > 0 ? n : 10;
}

export function createApp(service: OcrService, opts?: { uploadLimitMb?: number }): express.Express {
  const app = express();
  app.use(express.json({ limit: `${opts?.uploadLimitMb ?? imageUploadLimitMb()}mb` }));
  app.use(createOcrRouter(service));
  return app;
}

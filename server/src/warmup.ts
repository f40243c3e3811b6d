import dotenv from 'dotenv';

import { loadOcrConfig } from './ocr/config';
import { OcrServiceClient } from './ocr/ocrServiceClient';

dotenv.config();

// Run right after a deploy: the first OCR call downloads and loads model
// weights, which would otherwise land on a user request.
async function main() {
  const config = loadOcrConfig();
  const client = new OcrServiceClient(config);

  const health = await client.health();
  console.log(`health: ${health.ok ? 'ok' : 'unavailable'} (${health.httpStatus ?? health.error ?? 'no response'})`);

  console.log(`warming up ${client.endpoint} (timeout ${Math.round(config.warmupTimeoutMs / 1000)}s)...`);
  const result = await client.warmup();
  if (result.ok) {
    console.log(`warmup done in ${(result.durationMs / 1000).toFixed(1)}s`);
    return;
  }
  console.error(`warmup failed after ${(result.durationMs / 1000).toFixed(1)}s: ${result.code} ${result.message ?? ''}`.trim());
  process.exitCode = 1;
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

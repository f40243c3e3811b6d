import http from 'http';
import dotenv from 'dotenv';

import { createApp } from './app';
import { getOcrService } from './ocr/ocrService';
import { ocrLog } from './ocr/ocrLog';

dotenv.config();

const PORT = process.env.PORT ? Number(process.env.PORT) : 4000;

async function start() {
  const service = getOcrService();
  const app = createApp(service);
  const server = http.createServer(app);

  // Informational only; the hot path never depends on it.
  const health = await service.client.health();
  if (health.ok) {
    ocrLog('info', 'OCR service reachable', { url: service.config.baseUrl });
  } else {
    ocrLog('warn', 'OCR service not reachable at startup', { url: service.config.baseUrl, status: health.httpStatus, error: health.error });
  }

  server.listen(PORT, () => {
    console.log(`OCR gateway running on http://localhost:${PORT}`);
  });

  const shutdown = () => {
    server.close((err) => {
      if (err) console.error('server close failed:', err);
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});

import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { cors } from 'hono/cors';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createTailorRoutes, type TailorRouteDeps } from './routes/tailor.js';
import { MarkdownResumeRenderer } from './agents/renderer.js';
import { HttpJobScraper } from './lib/job-scraper.js';
import { LlmStructuredCompletion, type StructuredCompletion } from './lib/structured-completion.js';
import { createProvider, getDefaultModel } from './lib/llm.js';
import {
  ALLOWED_ORIGINS,
  LLM_REPAIR_ATTEMPTS,
  PORT,
  SCRAPE_TIMEOUT_MS,
  TAILOR_OUTPUT_DIR,
  getProviderName,
  isLlmKeyPresent,
} from './lib/config.js';
import logger from './lib/logger.js';

export function createApp(deps: TailorRouteDeps): Hono {
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.use('*', cors({ origin: ALLOWED_ORIGINS }));

  app.get('/health', (c) => c.json({
    status: 'ok',
    provider: getProviderName(),
    llm_key_present: isLlmKeyPresent(),
  }));

  app.route('/api/tailor', createTailorRoutes(deps));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

let completion: StructuredCompletion | null = null;

function getCompletion(): StructuredCompletion {
  if (!completion) {
    completion = new LlmStructuredCompletion(createProvider(), getDefaultModel(), {
      repairAttempts: LLM_REPAIR_ATTEMPTS,
    });
  }
  return completion;
}

const app = createApp({
  getCompletion,
  scraper: new HttpJobScraper({ timeoutMs: SCRAPE_TIMEOUT_MS }),
  renderer: new MarkdownResumeRenderer(),
  outputRoot: path.resolve(TAILOR_OUTPUT_DIR),
});

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit if connections don't drain (a tailoring run can take minutes).
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 30_000).unref();
}

export function startServer() {
  if (server) return server;

  if (!isLlmKeyPresent()) {
    logger.warn({ provider: getProviderName() }, 'No API key for the configured LLM provider; tailoring requests will fail');
  }
  server = serve({ fetch: app.fetch, port: PORT });
  logger.info({ port: PORT, outputDir: TAILOR_OUTPUT_DIR }, `Server running at http://localhost:${PORT}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}

export { app };

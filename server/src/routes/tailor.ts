import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { Hono } from 'hono';
import { z } from 'zod';
import { MAX_JOB_TEXT_CHARS } from '../agents/extractor.js';
import { runTailorPipeline } from '../agents/pipeline.js';
import type { ResumeRenderer } from '../agents/renderer.js';
import { MAX_TAILOR_BODY_BYTES } from '../lib/config.js';
import { TailorError, errorMessage, type TailorErrorCode } from '../lib/errors.js';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import type { JobScraper } from '../lib/job-scraper.js';
import type { StructuredCompletion } from '../lib/structured-completion.js';
import { validateBody } from '../lib/validate.js';

export const TailorRequestSchema = z
  .object({
    resume_text: z.string().min(1).max(200_000),
    job_url: z.string().url().max(2_000).optional(),
    job_text: z.string().max(MAX_JOB_TEXT_CHARS).optional(),
    concurrency_limit: z.number().int().min(1).max(16).optional(),
  })
  .refine((body) => Boolean(body.job_url?.trim() || body.job_text?.trim()), {
    message: 'Provide either job_url or job_text',
    path: ['job_url'],
  });

export type TailorRequest = z.infer<typeof TailorRequestSchema>;

export interface TailorRouteDeps {
  /** Resolved per request so a missing API key surfaces as a 503, not a crash at startup. */
  getCompletion: () => StructuredCompletion;
  scraper: JobScraper;
  renderer: ResumeRenderer;
  /** Each run writes to `<outputRoot>/<run id>/`; all runs share `<outputRoot>/.resume_cache`. */
  outputRoot: string;
  sectionTimeoutMs?: number;
}

type ErrorStatus = 400 | 422 | 500 | 502;

const STATUS_BY_CODE: Record<TailorErrorCode, ErrorStatus> = {
  INVALID_INPUT: 400,
  NOISE_CONTENT: 422,
  SCRAPE_FAILURE: 422,
  EXTRACTION_FAILURE: 502,
  COMPLETION_FAILURE: 502,
  SECTION_TAILORING_FAILURE: 500,
  RENDERING_FAILURE: 500,
};

export function statusForError(err: unknown): ErrorStatus {
  return err instanceof TailorError ? STATUS_BY_CODE[err.code] : 500;
}

/** Resolves `<outputRoot>/<runId>`, refusing anything that escapes the root. */
export function runDirectory(outputRoot: string, runId: string): string {
  const root = path.resolve(outputRoot);
  const dir = path.resolve(root, runId);
  const relative = path.relative(root, dir);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Run id ${JSON.stringify(runId)} does not name a directory under the output root`);
  }
  return dir;
}

export function createTailorRoutes(deps: TailorRouteDeps) {
  const tailor = new Hono();

  // POST /api/tailor: run one tailoring pipeline to completion
  tailor.post('/', async (c) => {
    const requestId = c.get('requestId');

    const parsedBody = await parseJsonBodyWithLimit(c, MAX_TAILOR_BODY_BYTES);
    if (!parsedBody.ok) return parsedBody.response;

    const validated = validateBody(TailorRequestSchema, parsedBody.data);
    if (!validated.success) {
      return c.json({ error: validated.error, code: 'INVALID_INPUT' }, 400);
    }
    const body = validated.data;

    let completion: StructuredCompletion;
    try {
      completion = deps.getCompletion();
    } catch (err) {
      c.get('log').error({ error: errorMessage(err) }, 'Language model is not configured');
      return c.json({ error: 'Language model is not configured', code: 'UNAVAILABLE' }, 503);
    }

    // Run directories use a server-minted id, never the caller's request id.
    const runId = randomUUID();
    const outputDir = runDirectory(deps.outputRoot, runId);
    const log = c.get('log').child({ runId });
    const progress: string[] = [];
    try {
      const result = await runTailorPipeline(
        {
          resume_text: body.resume_text,
          job_url: body.job_url,
          job_text: body.job_text,
          concurrency_limit: body.concurrency_limit,
          output_dir: outputDir,
          cache_dir: path.join(deps.outputRoot, '.resume_cache'),
          run_id: runId,
        },
        {
          completion,
          scraper: deps.scraper,
          renderer: deps.renderer,
          progress: (message) => progress.push(message),
          logger: log,
          sectionTimeoutMs: deps.sectionTimeoutMs,
        },
      );
      return c.json({
        run_id: result.run_id,
        request_id: requestId,
        tailored_resume: result.tailored_resume,
        artifact_path: result.artifact_path,
        source_path: result.source_path,
        cache_hit: result.cache_hit,
        sections: result.sections,
        failed_sections: result.failed_sections,
        progress,
      });
    } catch (err) {
      if (!(err instanceof TailorError)) throw err;
      return c.json({ error: err.message, code: err.code, progress }, statusForError(err));
    }
  });

  return tailor;
}

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createApp } from '../index.js';
import { MAX_JOB_TEXT_CHARS } from '../agents/extractor.js';
import { runDirectory } from '../routes/tailor.js';
import { MarkdownResumeRenderer } from '../agents/renderer.js';
import type { StructuredCompletion } from '../lib/structured-completion.js';
import { FakeCompletion, FakeScraper, JOB_DATA_JSON, defaultResponder, type Responder } from './helpers/fakes.js';

const RESUME_TEXT = '# Alex Rivera\n\nEngineer at Initech.';

const RunBodySchema = z.object({
  run_id: z.string(),
  request_id: z.string(),
  cache_hit: z.boolean(),
  failed_sections: z.array(z.string()),
  artifact_path: z.string(),
  progress: z.array(z.string()),
});

const ErrorBodySchema = z.object({
  error: z.string(),
  code: z.string(),
  progress: z.array(z.string()),
});

describe('POST /api/tailor', () => {
  let outputRoot: string;

  beforeEach(() => {
    outputRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'tailor-route-'));
  });

  afterEach(() => {
    fs.rmSync(outputRoot, { recursive: true, force: true });
  });

  function appWith(getCompletion: () => StructuredCompletion, scraper = new FakeScraper()) {
    return createApp({
      getCompletion,
      scraper,
      renderer: new MarkdownResumeRenderer(),
      outputRoot,
    });
  }

  function appResponding(respond: Responder) {
    const completion = new FakeCompletion(respond);
    return { app: appWith(() => completion), completion };
  }

  function post(app: ReturnType<typeof createApp>, body: unknown, headers: Record<string, string> = {}) {
    return app.request('http://test/api/tailor', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });
  }

  it('tailors a resume and writes the artifacts under a minted run id', async () => {
    const { app } = appResponding(defaultResponder);

    const res = await post(app, { resume_text: RESUME_TEXT, job_text: 'Backend Engineer at Globex.' }, {
      'X-Request-ID': 'req-1',
    });

    expect(res.status).toBe(200);
    const body = RunBodySchema.parse(await res.json());
    expect(body.request_id).toBe('req-1');
    expect(body.run_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(body.cache_hit).toBe(false);
    expect(body.failed_sections).toEqual([]);
    expect(body.artifact_path).toBe(path.join(outputRoot, body.run_id, 'tailored_resume.md'));
    expect(fs.existsSync(body.artifact_path)).toBe(true);
    expect(body.progress[0]).toBe('Starting resume tailoring');
    expect(body.progress[body.progress.length - 1]).toBe('Resume tailored');
    expect(fs.existsSync(path.join(outputRoot, '.resume_cache', 'cache.db'))).toBe(true);
  });

  it('keeps artifacts under the output root when the request id is a parent reference', async () => {
    const { app } = appResponding(defaultResponder);

    const res = await post(app, { resume_text: RESUME_TEXT, job_text: 'Backend Engineer at Globex.' }, {
      'X-Request-ID': '..',
    });

    expect(res.status).toBe(200);
    const body = RunBodySchema.parse(await res.json());
    expect(path.dirname(path.dirname(body.artifact_path))).toBe(outputRoot);
    expect(fs.existsSync(path.join(path.dirname(outputRoot), 'tailored_resume.md'))).toBe(false);
  });

  it('gives each request its own run directory even when request ids repeat', async () => {
    const { app } = appResponding(defaultResponder);
    const request = { resume_text: RESUME_TEXT, job_text: 'Backend Engineer at Globex.' };

    const first = RunBodySchema.parse(await (await post(app, request, { 'X-Request-ID': 'same' })).json());
    const second = RunBodySchema.parse(await (await post(app, request, { 'X-Request-ID': 'same' })).json());

    expect(first.run_id).not.toBe(second.run_id);
    expect(path.dirname(first.artifact_path)).not.toBe(path.dirname(second.artifact_path));
  });

  it('rejects job text longer than extraction accepts', async () => {
    const { app, completion } = appResponding(defaultResponder);

    const res = await post(app, { resume_text: RESUME_TEXT, job_text: 'x'.repeat(MAX_JOB_TEXT_CHARS + 1) });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'INVALID_INPUT' });
    expect(completion.calls).toHaveLength(0);
  });

  it('scrapes the job URL when no job text is sent', async () => {
    const scraper = new FakeScraper();
    const completion = new FakeCompletion(defaultResponder);
    const app = appWith(() => completion, scraper);

    const res = await post(app, { resume_text: RESUME_TEXT, job_url: 'https://jobs.example/42' });

    expect(res.status).toBe(200);
    expect(scraper.urls).toEqual(['https://jobs.example/42']);
  });

  it('rejects a request without job_url or job_text', async () => {
    const { app, completion } = appResponding(defaultResponder);

    const res = await post(app, { resume_text: RESUME_TEXT });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'job_url: Provide either job_url or job_text',
      code: 'INVALID_INPUT',
    });
    expect(completion.calls).toHaveLength(0);
  });

  it('rejects malformed JSON', async () => {
    const { app } = appResponding(defaultResponder);

    const res = await post(app, '{"resume_text": ');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON', code: 'INVALID_INPUT' });
  });

  it('rejects non-JSON content types', async () => {
    const { app } = appResponding(defaultResponder);

    const res = await post(app, 'resume', { 'Content-Type': 'text/plain' });

    expect(res.status).toBe(415);
  });

  it('maps noise-only job content to 422 with the progress so far', async () => {
    const { app } = appResponding((call) => (call.shape === 'job_extraction'
      ? { is_noise_only: true, data: null }
      : defaultResponder(call)));

    const res = await post(app, { resume_text: RESUME_TEXT, job_text: 'Please verify you are human.' });

    expect(res.status).toBe(422);
    const body = ErrorBodySchema.parse(await res.json());
    expect(body.code).toBe('NOISE_CONTENT');
    expect(body.progress).toEqual([
      'Starting resume tailoring',
      'Extracting job details',
      `Tailoring failed: ${body.error}`,
    ]);
  });

  it('maps extraction failures to 502', async () => {
    const { app } = appResponding((call) => (call.shape === 'resume_extraction'
      ? { personal_info: null }
      : { is_noise_only: false, data: JOB_DATA_JSON }));

    const res = await post(app, { resume_text: RESUME_TEXT, job_text: 'Backend Engineer at Globex.' });

    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({ code: 'EXTRACTION_FAILURE' });
  });

  it('returns 503 when no language model can be built', async () => {
    const app = appWith(() => {
      throw new Error('ANTHROPIC_API_KEY is not set');
    });

    const res = await post(app, { resume_text: RESUME_TEXT, job_text: 'Backend Engineer at Globex.' });

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: 'Language model is not configured', code: 'UNAVAILABLE' });
  });
});

describe('runDirectory', () => {
  it('nests the run id under the output root', () => {
    expect(runDirectory('/srv/out', 'abc')).toBe(path.resolve('/srv/out', 'abc'));
  });

  it.each(['..', '.', '', '../elsewhere', '/etc'])('refuses %j', (runId) => {
    expect(() => runDirectory('/srv/out', runId)).toThrow('does not name a directory under the output root');
  });
});

describe('app surface', () => {
  const app = createApp({
    getCompletion: () => new FakeCompletion(defaultResponder),
    scraper: new FakeScraper(),
    renderer: new MarkdownResumeRenderer(),
    outputRoot: os.tmpdir(),
  });

  it('reports health', async () => {
    const res = await app.request('http://test/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
  });

  it('returns JSON 404s for unknown paths', async () => {
    const res = await app.request('http://test/nope');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});

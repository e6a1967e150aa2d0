import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';

function createApp(maxBytes: number) {
  const app = new Hono();
  app.post('/echo', async (c) => {
    const parsed = await parseJsonBodyWithLimit(c, maxBytes);
    if (!parsed.ok) return parsed.response;
    return c.json({ received: parsed.data });
  });
  return app;
}

function post(body: string, headers: Record<string, string> = { 'Content-Type': 'application/json' }, maxBytes = 64) {
  return createApp(maxBytes).request('http://test/echo', { method: 'POST', headers, body });
}

describe('parseJsonBodyWithLimit', () => {
  it('parses a JSON body within the limit', async () => {
    const res = await post('{"resume_text":"hi"}');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ received: { resume_text: 'hi' } });
  });

  it('treats an empty body as an empty object', async () => {
    const res = await post('');
    expect(await res.json()).toEqual({ received: {} });
  });

  it('rejects bodies larger than the limit', async () => {
    const res = await post(JSON.stringify({ resume_text: 'x'.repeat(100) }));
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'Request too large (max 64 bytes)', code: 'INVALID_INPUT' });
  });

  it('rejects non-JSON content types', async () => {
    const res = await post('hello', { 'Content-Type': 'text/plain' });
    expect(res.status).toBe(415);
  });

  it('rejects malformed JSON', async () => {
    const res = await post('{"resume_text":');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON', code: 'INVALID_INPUT' });
  });

  it('answers 400 when the body stream fails mid-read', async () => {
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new Error('client went away'));
      },
    });
    const res = await createApp(64).request('http://test/echo', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
      duplex: 'half',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Failed to read request body', code: 'INVALID_INPUT' });
  });
});

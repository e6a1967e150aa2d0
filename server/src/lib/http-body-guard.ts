import type { Context } from 'hono';

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

function tooLarge(c: Context, maxBytes: number): Response {
  return c.json({ error: `Request too large (max ${maxBytes} bytes)`, code: 'INVALID_INPUT' }, 413);
}

async function readUtf8BodyWithLimit(
  c: Context,
  maxBytes: number,
): Promise<{ ok: true; raw: string } | { ok: false; response: Response }> {
  const stream = c.req.raw.body;
  if (!stream) return { ok: true, raw: '' };

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        return { ok: false, response: tooLarge(c, maxBytes) };
      }
      chunks.push(value);
    }
  } catch {
    // Client aborted or the stream broke mid-body.
    return { ok: false, response: c.json({ error: 'Failed to read request body', code: 'INVALID_INPUT' }, 400) };
  }

  const merged = new Uint8Array(totalBytes);
  let offset = 0;
  for (const chunk of chunks) {
    merged.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return { ok: true, raw: new TextDecoder().decode(merged) };
}

/**
 * Parses a JSON body, enforcing the byte limit on the bytes actually read
 * (Content-Length is only a first check). Malformed JSON is a 400.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const declared = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (Number.isFinite(declared) && declared > maxBytes) {
    return { ok: false, response: tooLarge(c, maxBytes) };
  }

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.', code: 'INVALID_INPUT' }, 415),
    };
  }

  const read = await readUtf8BodyWithLimit(c, maxBytes);
  if (!read.ok) return read;
  if (!read.raw.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(read.raw) };
  } catch {
    return { ok: false, response: c.json({ error: 'Request body is not valid JSON', code: 'INVALID_INPUT' }, 400) };
  }
}

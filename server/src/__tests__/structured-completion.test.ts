import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { LlmStructuredCompletion, type ResponseShape } from '../lib/structured-completion.js';
import { CompletionError } from '../lib/errors.js';
import type { ChatParams, ChatResponse, LLMProvider } from '../lib/llm-provider.js';

type Step = string | Error;

class ScriptedProvider implements LLMProvider {
  readonly name = 'scripted';
  readonly requests: ChatParams[] = [];

  constructor(private readonly steps: Step[]) {}

  async chat(params: ChatParams): Promise<ChatResponse> {
    this.requests.push(params);
    const step = this.steps[Math.min(this.requests.length - 1, this.steps.length - 1)];
    if (step === undefined) throw new Error('no scripted response');
    if (step instanceof Error) throw step;
    return { text: step, usage: { input_tokens: 1, output_tokens: 1 } };
  }
}

function statusError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

const shape: ResponseShape<{ ok: boolean }> = {
  name: 'probe',
  schema: z.object({ ok: z.boolean() }),
  example: '{"ok": true}',
};

function completion(provider: LLMProvider, repairAttempts = 2) {
  return new LlmStructuredCompletion(provider, 'test-model', {
    repairAttempts,
    transientAttempts: 3,
    retryBaseDelayMs: 1,
  });
}

describe('LlmStructuredCompletion', () => {
  it('returns a valid response from the first call', async () => {
    const provider = new ScriptedProvider(['{"ok": true}']);

    const result = await completion(provider).complete({ system: 'Check it.', user: 'input', shape });

    expect(result).toEqual({ ok: true });
    expect(provider.requests).toHaveLength(1);
    expect(provider.requests[0]?.model).toBe('test-model');
    expect(provider.requests[0]?.system.startsWith('Check it.\n\nOUTPUT FORMAT:')).toBe(true);
    expect(provider.requests[0]?.system.endsWith('{"ok": true}')).toBe(true);
    expect(provider.requests[0]?.messages).toEqual([{ role: 'user', content: 'input' }]);
  });

  it('repairs fenced JSON', async () => {
    const provider = new ScriptedProvider(['```json\n{"ok": false}\n```']);
    await expect(completion(provider).complete({ system: 's', user: 'u', shape })).resolves.toEqual({ ok: false });
  });

  it('re-prompts with the validation problem', async () => {
    const provider = new ScriptedProvider(['{"ok": "yes"}', '{"ok": true}']);

    const result = await completion(provider).complete({ system: 's', user: 'u', shape });

    expect(result).toEqual({ ok: true });
    expect(provider.requests).toHaveLength(2);
    const retryMessages = provider.requests[1]?.messages ?? [];
    expect(retryMessages).toHaveLength(3);
    expect(retryMessages[1]).toEqual({ role: 'assistant', content: '{"ok": "yes"}' });
    expect(retryMessages[2]?.content).toContain('ok: Expected boolean, received string');
  });

  it('gives up after the allowed repair attempts', async () => {
    const provider = new ScriptedProvider(['not json']);

    const error = await completion(provider, 1).complete({ system: 's', user: 'u', shape }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CompletionError);
    expect(error instanceof Error ? error.message : '').toBe(
      'probe: no valid response after 2 attempts (the response was not valid JSON)',
    );
    expect(provider.requests).toHaveLength(2);
  });

  it('retries transient provider errors', async () => {
    const provider = new ScriptedProvider([statusError('overloaded', 529), '{"ok": true}']);
    await expect(completion(provider).complete({ system: 's', user: 'u', shape })).resolves.toEqual({ ok: true });
    expect(provider.requests).toHaveLength(2);
  });

  it('fails without retrying a non-transient provider error', async () => {
    const provider = new ScriptedProvider([statusError('bad request', 400)]);

    const error = await completion(provider).complete({ system: 's', user: 'u', shape }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CompletionError);
    expect(error instanceof Error ? error.message : '').toBe('probe: model call failed: bad request');
    expect(provider.requests).toHaveLength(1);
  });

  it('does not call the provider once aborted', async () => {
    const provider = new ScriptedProvider(['{"ok": true}']);
    const controller = new AbortController();
    controller.abort();

    await expect(
      completion(provider).complete({ system: 's', user: 'u', shape, signal: controller.signal }),
    ).rejects.toThrow('probe: request aborted');
    expect(provider.requests).toHaveLength(0);
  });
});

import type { z } from 'zod';
import { repairJSON } from './json-repair.js';
import { withRetry } from './retry.js';
import { CompletionError, errorMessage } from './errors.js';
import { MAX_TOKENS } from './config.js';
import defaultLogger, { type Logger } from './logger.js';
import type { ChatMessage, ChatResponse, LLMProvider } from './llm-provider.js';

/**
 * A response shape the model must produce: the zod schema that validates it
 * and the JSON template shown to the model.
 */
export interface ResponseShape<T> {
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  example: string;
}

export interface CompletionRequest<T> {
  system: string;
  user: string;
  shape: ResponseShape<T>;
  signal?: AbortSignal;
}

/**
 * Schema-constrained completion. Resolves with a value that satisfies
 * `shape.schema` or rejects with a terminal `CompletionError`.
 */
export interface StructuredCompletion {
  readonly model: string;
  complete<T>(request: CompletionRequest<T>): Promise<T>;
}

export interface LlmStructuredCompletionOptions {
  /** Re-prompts after a response fails JSON parsing or schema validation. */
  repairAttempts?: number;
  /** Attempts per model call for transient provider errors. */
  transientAttempts?: number;
  retryBaseDelayMs?: number;
  maxTokens?: number;
  logger?: Logger;
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .slice(0, 10)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export class LlmStructuredCompletion implements StructuredCompletion {
  private readonly repairAttempts: number;
  private readonly transientAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly maxTokens: number;
  private readonly log: Logger;

  constructor(
    private readonly provider: LLMProvider,
    readonly model: string,
    options: LlmStructuredCompletionOptions = {},
  ) {
    this.repairAttempts = options.repairAttempts ?? 2;
    this.transientAttempts = options.transientAttempts ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1_250;
    this.maxTokens = options.maxTokens ?? MAX_TOKENS;
    this.log = options.logger ?? defaultLogger;
  }

  async complete<T>(request: CompletionRequest<T>): Promise<T> {
    const { shape, signal } = request;
    const system = `${request.system}

OUTPUT FORMAT:
Return ONLY a JSON object with this exact shape. No markdown fences, no commentary.
${shape.example}`;
    const messages: ChatMessage[] = [{ role: 'user', content: request.user }];
    const maxAttempts = 1 + this.repairAttempts;
    let lastProblem = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw new CompletionError(shape.name, `${shape.name}: request aborted`, { cause: signal.reason });
      }

      let response: ChatResponse;
      try {
        response = await withRetry(
          () => this.provider.chat({
            model: this.model,
            max_tokens: this.maxTokens,
            system,
            messages: [...messages],
            signal,
          }),
          {
            maxAttempts: this.transientAttempts,
            baseDelay: this.retryBaseDelayMs,
            signal,
            onRetry: (retry, error) => {
              this.log.warn({ shape: shape.name, attempt: retry, error: error.message }, 'Transient LLM error, retrying');
            },
          },
        );
      } catch (err) {
        throw new CompletionError(shape.name, `${shape.name}: model call failed: ${errorMessage(err)}`, { cause: err });
      }

      const raw = repairJSON(response.text);
      if (raw === undefined) {
        lastProblem = 'the response was not valid JSON';
      } else {
        const parsed = shape.schema.safeParse(raw);
        if (parsed.success) {
          this.log.debug({ shape: shape.name, attempt, usage: response.usage }, 'Structured completion accepted');
          return parsed.data;
        }
        lastProblem = formatIssues(parsed.error.issues);
      }

      this.log.warn({ shape: shape.name, attempt, problem: lastProblem }, 'Structured completion rejected');
      messages.push(
        { role: 'assistant', content: response.text },
        {
          role: 'user',
          content: `Your previous response did not match the required shape (${lastProblem}). Return the corrected JSON object only.`,
        },
      );
    }

    throw new CompletionError(
      shape.name,
      `${shape.name}: no valid response after ${maxAttempts} attempts (${lastProblem})`,
    );
  }
}

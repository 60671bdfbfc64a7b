// packages/llm/src/client.ts
import OpenAI from 'openai';
import {
  CancelledError,
  CollaboratorUnavailableError,
  ProposalInvalidError,
  ShadowError,
  TimeoutError,
  errorMessage
} from '@shadowsql/core';
import type { ChatMessage } from './prompts';

export interface CompletionRequest {
  messages: ChatMessage[];
}

export interface CompletionOptions {
  signal?: AbortSignal;
  timeoutMs: number;
}

/** The one call the proposal source needs; tests substitute a scripted client. */
export interface CompletionClient {
  readonly model: string;
  complete(req: CompletionRequest, opts: CompletionOptions): Promise<string | null>;
  ping(): Promise<void>;
}

export interface OpenAIClientOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  temperature: number;
  maxRetries: number;
}

// 400/422: the request itself was refused (context too long, bad params); another attempt may fare better.
const RETRYABLE_REQUEST_STATUSES = new Set([400, 422]);

export function classifyLlmError(e: unknown, timeoutMs: number): ShadowError {
  if (e instanceof ShadowError) return e;
  if (e instanceof OpenAI.APIUserAbortError) return new CancelledError('llm request aborted');
  if (e instanceof OpenAI.APIConnectionTimeoutError) return new TimeoutError('llm completion', timeoutMs);
  if (e instanceof OpenAI.APIConnectionError) {
    return new CollaboratorUnavailableError('llm', `llm unreachable: ${e.message}`);
  }
  if (e instanceof OpenAI.APIError) {
    if (e.status !== undefined && RETRYABLE_REQUEST_STATUSES.has(e.status)) {
      return new ProposalInvalidError(`llm rejected the request (${e.status}): ${e.message}`, { status: e.status });
    }
    return new CollaboratorUnavailableError('llm', `llm API error (${e.status ?? 'unknown status'}): ${e.message}`, { status: e.status });
  }
  return new CollaboratorUnavailableError('llm', errorMessage(e));
}

export class OpenAICompletionClient implements CompletionClient {
  readonly model: string;
  private client?: OpenAI;

  constructor(private readonly opts: OpenAIClientOptions) {
    this.model = opts.model;
  }

  // Built on first use so a missing key surfaces as an unavailable collaborator, not a crash at startup.
  private sdk(): OpenAI {
    if (this.client) return this.client;
    if (!this.opts.apiKey) throw new CollaboratorUnavailableError('llm', 'LLM API key is not configured');
    this.client = new OpenAI({
      apiKey: this.opts.apiKey,
      baseURL: this.opts.baseURL,
      maxRetries: this.opts.maxRetries
    });
    return this.client;
  }

  async complete(req: CompletionRequest, opts: CompletionOptions): Promise<string | null> {
    try {
      const completion = await this.sdk().chat.completions.create(
        {
          model: this.model,
          temperature: this.opts.temperature,
          messages: req.messages.map((m) =>
            m.role === 'system' ? { role: 'system' as const, content: m.content } : { role: 'user' as const, content: m.content }
          ),
          response_format: { type: 'json_object' }
        },
        { signal: opts.signal, timeout: opts.timeoutMs }
      );
      return completion.choices[0]?.message?.content ?? null;
    } catch (e) {
      throw classifyLlmError(e, opts.timeoutMs);
    }
  }

  async ping(): Promise<void> {
    try {
      await this.sdk().models.retrieve(this.model);
    } catch (e) {
      throw classifyLlmError(e, 0);
    }
  }
}

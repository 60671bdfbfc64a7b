// packages/llm/src/index.ts
import {
  errorMessage,
  silentLogger,
  type HealthStatus,
  type Logger,
  type ProposalInput,
  type ProposalSource,
  type ProposeOptions,
  type ShadowConfig
} from '@shadowsql/core';
import { OpenAICompletionClient, type CompletionClient } from './client';
import { buildMessages } from './prompts';
import { parseProposalJson } from './parse';

export { OpenAICompletionClient, classifyLlmError } from './client';
export type { CompletionClient, CompletionOptions, CompletionRequest, OpenAIClientOptions } from './client';
export { buildMessages, systemPrompt, userPrompt } from './prompts';
export type { ChatMessage } from './prompts';
export { parseProposalJson } from './parse';

/** Asks a chat model for one candidate per attempt; validation is left to the engine. */
export class LlmProposalSource implements ProposalSource {
  readonly name: string;
  private readonly log: Logger;

  constructor(private readonly client: CompletionClient, logger?: Logger) {
    this.name = `llm:${client.model}`;
    this.log = logger ?? silentLogger();
  }

  async propose(input: ProposalInput, opts: ProposeOptions): Promise<unknown> {
    const messages = buildMessages(input);
    const started = Date.now();
    const text = await this.client.complete({ messages }, { signal: opts.signal, timeoutMs: opts.timeoutMs });
    this.log.debug({ attempt: input.attempt, model: this.client.model, ms: Date.now() - started, chars: text?.length ?? 0 }, 'completion received');
    return parseProposalJson(text);
  }

  async health(): Promise<HealthStatus> {
    try {
      await this.client.ping();
      return { ok: true, version: this.client.model };
    } catch (e) {
      return { ok: false, error: errorMessage(e) };
    }
  }
}

export function createProposalSource(cfg: ShadowConfig['llm'], logger?: Logger): LlmProposalSource {
  const client = new OpenAICompletionClient({
    apiKey: cfg.api_key,
    baseURL: cfg.base_url,
    model: cfg.model,
    temperature: cfg.temperature,
    maxRetries: cfg.max_retries
  });
  return new LlmProposalSource(client, logger);
}

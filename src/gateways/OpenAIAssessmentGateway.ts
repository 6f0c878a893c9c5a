/**
 * OpenAI-compatible assessment gateway.
 * Talks to any chat-completions endpoint the openai SDK can reach
 * (OpenAI itself, or a compatible host via baseURL).
 * Streamed answers are drained completely before anything is returned.
 */

import OpenAI from 'openai';
import type { IAssessmentGateway } from './IAssessmentGateway.js';
import type { EnrichmentContext } from '../types/models.js';
import { renderAssessmentPrompt } from '../prompts/assessment.js';
import { TextAccumulator } from './TextAccumulator.js';
import { AssessmentError, errorMessage } from '../errors.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_MAX_TOKENS = 300;
const DEFAULT_TIMEOUT_MS = 60_000;

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface OpenAIAssessmentGatewayOptions {
  apiKey: string;
  baseURL?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Request a streamed answer. Default: true. */
  stream?: boolean;
  timeoutMs?: number;
  /** Retries performed inside the SDK. Default: 0. */
  maxRetries?: number;
  /** Replacement fetch, e.g. for tests. */
  fetch?: FetchLike;
}

export class OpenAIAssessmentGateway implements IAssessmentGateway {
  readonly name = 'openai';
  private client: OpenAI;
  private model: string;
  private maxTokens: number;
  private temperature: number;
  private stream: boolean;

  constructor(opts: OpenAIAssessmentGatewayOptions) {
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseURL,
      timeout: opts.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: opts.maxRetries ?? 0,
      ...(opts.fetch && { fetch: opts.fetch }),
    });
    this.model = opts.model ?? DEFAULT_MODEL;
    this.maxTokens = opts.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = opts.temperature ?? 0;
    this.stream = opts.stream ?? true;
  }

  async assess(context: EnrichmentContext): Promise<string> {
    const prompt = renderAssessmentPrompt(context);

    try {
      return this.stream ? await this.streamed(prompt) : await this.single(prompt);
    } catch (err) {
      throw new AssessmentError(
        `Assessment request failed: ${errorMessage(err)}`,
        { address: context.record.address, model: this.model },
        { cause: err }
      );
    }
  }

  private async single(prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      messages: [{ role: 'user', content: prompt }],
    });

    return response.choices[0]?.message?.content ?? '';
  }

  private async streamed(prompt: string): Promise<string> {
    const stream = await this.client.chat.completions.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      stream: true,
      messages: [{ role: 'user', content: prompt }],
    });

    const buffer = new TextAccumulator();
    for await (const chunk of stream) {
      const content = chunk.choices[0]?.delta?.content;
      if (content) buffer.append(content);
    }
    // Reached only when the SDK saw the end of the stream; a broken
    // connection throws out of the loop above instead.
    buffer.complete();
    return buffer.text();
  }
}

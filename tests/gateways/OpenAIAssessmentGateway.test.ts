import { describe, it, expect, beforeEach, vi } from 'vitest';
import { OpenAIAssessmentGateway } from '../../src/gateways/OpenAIAssessmentGateway.js';
import { buildInstructions } from '../../src/prompts/assessment.js';
import { AssessmentError } from '../../src/errors.js';
import type { EnrichmentContext } from '../../src/types/models.js';
import { makeRecord } from '../mocks/MockRecordStore.js';

const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function chunk(content: string | null) {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion.chunk',
    created: 1700000000,
    model: 'gpt-4o-mini',
    choices: [{ index: 0, delta: content === null ? { role: 'assistant' } : { content }, finish_reason: null }],
  };
}

function sseResponse(contents: Array<string | null>): Response {
  const body =
    contents.map((c) => `data: ${JSON.stringify(chunk(c))}\n\n`).join('') + 'data: [DONE]\n\n';
  return new Response(body, {
    status: 200,
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

function completionResponse(content: string | null): Response {
  return new Response(
    JSON.stringify({
      id: 'chatcmpl-test',
      object: 'chat.completion',
      created: 1700000000,
      model: 'gpt-4o-mini',
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content, refusal: null },
          finish_reason: 'stop',
          logprobs: null,
        },
      ],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    }),
    { status: 200, headers: { 'Content-Type': 'application/json' } }
  );
}

function requestBody(call: number): Record<string, unknown> {
  const init = mockFetch.mock.calls[call][1];
  return JSON.parse(String(init?.body));
}

const context: EnrichmentContext = {
  record: makeRecord('10.0.0.5'),
  lookup: { country: 'US', organization: 'ExampleOrg' },
  instructions: buildInstructions(),
};

describe('OpenAIAssessmentGateway', () => {
  let gateway: OpenAIAssessmentGateway;

  beforeEach(() => {
    mockFetch.mockReset();
    gateway = new OpenAIAssessmentGateway({ apiKey: 'test-key', fetch: mockFetch });
  });

  describe('streamed responses', () => {
    it('concatenates chunks in arrival order', async () => {
      mockFetch.mockResolvedValueOnce(
        sseResponse([null, 'Trustworthiness: 8', '0\nPrimary Purpose: ', 'backup', ''])
      );

      await expect(gateway.assess(context)).resolves.toBe('Trustworthiness: 80\nPrimary Purpose: backup');
    });

    it('sends a streamed chat completion request with the rendered prompt', async () => {
      mockFetch.mockResolvedValueOnce(sseResponse(['ok']));
      await gateway.assess(context);

      const [url] = mockFetch.mock.calls[0];
      expect(String(url)).toBe('https://api.openai.com/v1/chat/completions');

      const body = requestBody(0);
      expect(body).toMatchObject({
        model: 'gpt-4o-mini',
        max_tokens: 300,
        temperature: 0,
        stream: true,
      });
      const messages = body.messages;
      expect(Array.isArray(messages) && messages.length).toBe(1);
      expect(JSON.stringify(messages)).toContain('IP address: 10.0.0.5');
    });

    it('uses a configured base URL and model', async () => {
      gateway = new OpenAIAssessmentGateway({
        apiKey: 'test-key',
        baseURL: 'https://llm.example.test/v1',
        model: 'example-instruct',
        fetch: mockFetch,
      });
      mockFetch.mockResolvedValueOnce(sseResponse(['ok']));
      await gateway.assess(context);

      expect(String(mockFetch.mock.calls[0][0])).toBe('https://llm.example.test/v1/chat/completions');
      expect(requestBody(0).model).toBe('example-instruct');
    });

    it('fails when the stream breaks before completion', async () => {
      const broken = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode(`data: ${JSON.stringify(chunk('Trust'))}\n\n`));
          controller.error(new Error('socket hang up'));
        },
      });
      mockFetch.mockResolvedValueOnce(
        new Response(broken, { status: 200, headers: { 'Content-Type': 'text/event-stream' } })
      );

      await expect(gateway.assess(context)).rejects.toThrow(AssessmentError);
    });
  });

  describe('single responses', () => {
    beforeEach(() => {
      gateway = new OpenAIAssessmentGateway({ apiKey: 'test-key', stream: false, fetch: mockFetch });
    });

    it('returns the message content', async () => {
      mockFetch.mockResolvedValueOnce(completionResponse('Trustworthiness: 90'));

      await expect(gateway.assess(context)).resolves.toBe('Trustworthiness: 90');
    });

    it('returns an empty string for null content', async () => {
      mockFetch.mockResolvedValueOnce(completionResponse(null));
      await expect(gateway.assess(context)).resolves.toBe('');
    });
  });

  describe('failures', () => {
    it('wraps API errors without retrying', async () => {
      mockFetch.mockResolvedValue(
        new Response(JSON.stringify({ error: { message: 'overloaded', type: 'server_error' } }), {
          status: 500,
          headers: { 'Content-Type': 'application/json' },
        })
      );

      const err = await gateway.assess(context).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(AssessmentError);
      expect(err).toMatchObject({ code: 'ASSESSMENT_FAILED', details: { address: '10.0.0.5' } });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('wraps connection errors', async () => {
      mockFetch.mockRejectedValue(new Error('socket hang up'));

      await expect(gateway.assess(context)).rejects.toThrow(/^Assessment request failed: /);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });
  });
});

import { beforeEach, describe, expect, it, vi } from 'vitest';

const { parse, clientOptions } = vi.hoisted(() => {
  const clientOptions: unknown[] = [];
  return { parse: vi.fn(), clientOptions };
});

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { parse } };

    constructor(options: unknown) {
      clientOptions.push(options);
    }
  },
}));

import { OpenAILanguageClient } from './openai.js';

function completion(parsed: unknown) {
  return { choices: [{ message: { content: JSON.stringify(parsed), parsed } }] };
}

describe('OpenAILanguageClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    clientOptions.length = 0;
  });

  it('creates the SDK client from the platform config', () => {
    const client = new OpenAILanguageClient(
      { apiKey: 'test-key', apiUrl: 'http://localhost:11434/v1' },
      'gpt-4o-mini'
    );

    expect(clientOptions).toEqual([{ apiKey: 'test-key', baseURL: 'http://localhost:11434/v1' }]);
    expect(client.getName()).toBe('openai:gpt-4o-mini');
  });

  it('requires an API key', () => {
    expect(() => new OpenAILanguageClient({ apiKey: '' }, 'gpt-4o-mini')).toThrow(
      'OPENAI_API_KEY env variable is not configured.'
    );
  });

  it('requests sentiment with the body as the user message', async () => {
    parse.mockResolvedValue(completion({
      documentSentiment: { score: 0.6, magnitude: 0.6 },
      sentences: [{ text: 'What a match.', score: 0.6, magnitude: 0.6 }]
    }));
    const client = new OpenAILanguageClient({ apiKey: 'test-key' }, 'gpt-4o-mini');

    const result = await client.analyzeSentiment({ content: 'What a match.', type: 'PLAIN_TEXT' });

    expect(parse).toHaveBeenCalledTimes(1);
    expect(parse.mock.calls[0][0]).toMatchObject({
      model: 'gpt-4o-mini',
      temperature: 0,
      messages: [
        { role: 'system', content: expect.stringContaining('sentiment') },
        { role: 'user', content: 'What a match.' }
      ],
      response_format: { type: 'json_schema' }
    });
    expect(result).toEqual({
      documentSentiment: { score: 0.6, magnitude: 0.6 },
      sentences: [{ text: { content: 'What a match.' }, sentiment: { score: 0.6, magnitude: 0.6 } }]
    });
  });

  it('clamps out-of-range scores', async () => {
    parse.mockResolvedValue(completion({
      documentSentiment: { score: 1.3, magnitude: -0.2 },
      sentences: [{ text: 'Best. Day. Ever.', score: -1.7, magnitude: 2.5 }]
    }));
    const client = new OpenAILanguageClient({ apiKey: 'test-key' }, 'gpt-4o-mini');

    const result = await client.analyzeSentiment({ content: 'Best. Day. Ever.', type: 'PLAIN_TEXT' });

    expect(result).toEqual({
      documentSentiment: { score: 1, magnitude: 0 },
      sentences: [{ text: { content: 'Best. Day. Ever.' }, sentiment: { score: -1, magnitude: 2.5 } }]
    });
  });

  it('fails when no sentiment is parsed', async () => {
    parse.mockResolvedValue({ choices: [{ message: { content: null, parsed: null } }] });
    const client = new OpenAILanguageClient({ apiKey: 'test-key' }, 'gpt-4o-mini');

    await expect(client.analyzeSentiment({ content: 'Hello.', type: 'PLAIN_TEXT' })).rejects.toThrow(
      'No sentiment returned from OpenAI'
    );
  });

  it('maps categories, dropping blank names', async () => {
    parse.mockResolvedValue(completion({
      categories: [
        { name: ' /Sports/Team Sports/Soccer ', confidence: 1.2 },
        { name: '   ', confidence: 0.4 },
        { name: '/News', confidence: 0.35 }
      ]
    }));
    const client = new OpenAILanguageClient({ apiKey: 'test-key' }, 'gpt-4o-mini');

    const result = await client.classifyText({ content: 'Match report.', type: 'PLAIN_TEXT' });

    expect(result).toEqual({
      categories: [
        { name: '/Sports/Team Sports/Soccer', confidence: 1 },
        { name: '/News', confidence: 0.35 }
      ]
    });
  });

  it('fails when no choice is returned', async () => {
    parse.mockResolvedValue({ choices: [] });
    const client = new OpenAILanguageClient({ apiKey: 'test-key' }, 'gpt-4o-mini');

    await expect(client.classifyText({ content: 'Match report.', type: 'PLAIN_TEXT' })).rejects.toThrow(
      'No categories returned from OpenAI'
    );
  });
});

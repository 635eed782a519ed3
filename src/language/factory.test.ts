import { describe, expect, it } from 'vitest';
import { LanguageClientFactory } from './factory.js';
import { GoogleLanguageClient } from './clients/google.js';
import { OpenAILanguageClient } from './clients/openai.js';
import type { Config } from '../config/types.js';

function createConfig(overrides: Partial<Config> = {}): Config {
  return {
    logging: { level: 'error' },
    language: { provider: 'google:v1', maxContentBytes: 1000 },
    platforms: {
      google: { apiKey: 'test-google-key' },
      openai: { apiKey: 'test-openai-key' }
    },
    ...overrides
  };
}

describe('LanguageClientFactory', () => {
  it('creates the configured provider by default', () => {
    const client = new LanguageClientFactory(createConfig()).create();

    expect(client).toBeInstanceOf(GoogleLanguageClient);
    expect(client.getName()).toBe('google:v1');
  });

  it('creates an OpenAI client for openai models', () => {
    const client = new LanguageClientFactory(createConfig()).create('OpenAI: gpt-4o-mini');

    expect(client).toBeInstanceOf(OpenAILanguageClient);
    expect(client.getName()).toBe('openai:gpt-4o-mini');
  });

  it.each(['google', 'google:', ':v1'])('rejects malformed provider string %j', providerModel => {
    expect(() => new LanguageClientFactory(createConfig()).create(providerModel)).toThrow(
      /^Invalid provider:model format/
    );
  });

  it('rejects unknown providers', () => {
    expect(() => new LanguageClientFactory(createConfig()).create('azure:text-analytics')).toThrow(
      'Unsupported language provider: azure'
    );
  });

  it('fails when the provider has no API key', () => {
    const factory = new LanguageClientFactory(createConfig({ platforms: {} }));

    expect(() => factory.create('google:v1')).toThrow('GOOGLE_API_KEY env variable is not configured.');
    expect(() => factory.create('openai:gpt-4o-mini')).toThrow('OPENAI_API_KEY env variable is not configured.');
  });

  it('lists the supported providers', () => {
    expect(new LanguageClientFactory(createConfig()).getSupportedProviders()).toEqual(['google', 'openai']);
  });
});

import type { LanguageClient } from './types.js';
import { GoogleLanguageClient } from './clients/google.js';
import { OpenAILanguageClient } from './clients/openai.js';
import type { Config, PlatformConfig } from '../config/types.js';

export class LanguageClientFactory {
  private config: Config;

  constructor(config: Config) {
    this.config = config;
  }

  create(providerModel: string = this.config.language.provider): LanguageClient {
    const parsed = this.parseProviderModel(providerModel);
    const providerConfig = this.getProviderConfig(parsed.provider);
    const options = { maxContentBytes: this.config.language.maxContentBytes };

    switch (parsed.provider) {
      case 'google':
        return new GoogleLanguageClient(providerConfig, parsed.model, options);
      case 'openai':
        return new OpenAILanguageClient(providerConfig, parsed.model, options);
      default:
        throw new Error(`Unsupported language provider: ${parsed.provider}`);
    }
  }

  private parseProviderModel(providerModel: string): { provider: string; model: string } {
    const firstColon = providerModel.indexOf(':');
    if (firstColon === -1 || firstColon === providerModel.length - 1) {
      throw new Error(
        `Invalid provider:model format: ${providerModel}. Expected format: "provider:model"`
      );
    }

    const provider = providerModel.slice(0, firstColon).trim().toLowerCase();
    const model = providerModel.slice(firstColon + 1).trim();

    if (!provider || !model) {
      throw new Error(
        `Invalid provider:model format: ${providerModel}. Both provider and model must be non-empty`
      );
    }

    return { provider, model };
  }

  private getProviderConfig(provider: string): PlatformConfig {
    switch (provider) {
      case 'google':
        return this.config.platforms.google ?? { apiKey: '' };
      case 'openai':
        return this.config.platforms.openai ?? { apiKey: '' };
      default:
        throw new Error(`Unsupported language provider: ${provider}`);
    }
  }

  getSupportedProviders(): string[] {
    return ['google', 'openai'];
  }
}

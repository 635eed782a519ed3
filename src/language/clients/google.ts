import { google } from 'googleapis';
import type { language_v1 } from 'googleapis';
import { BaseLanguageClient, type LanguageClientOptions } from './base.js';
import type {
  ClassificationResult,
  LanguageDocument,
  SentimentAnnotations,
  SentimentScore
} from '../types.js';
import type { PlatformConfig } from '../../config/types.js';

export const SUPPORTED_GOOGLE_VERSIONS = ['v1'] as const;

/**
 * Google Cloud Natural Language (REST v1) through the `googleapis` client,
 * authenticated with an API key.
 */
export class GoogleLanguageClient extends BaseLanguageClient {
  private language: language_v1.Language;

  constructor(config: PlatformConfig, version: string, options?: LanguageClientOptions) {
    super(config, version, options);

    if (!SUPPORTED_GOOGLE_VERSIONS.some(supported => supported === version)) {
      throw new Error(
        `Unsupported Natural Language API version: ${version}. Supported: ${SUPPORTED_GOOGLE_VERSIONS.join(', ')}`
      );
    }
    if (!config.apiKey) {
      throw new Error('GOOGLE_API_KEY env variable is not configured.');
    }

    this.language = google.language({ version: 'v1', auth: config.apiKey });
  }

  protected getProviderName(): string {
    return 'google';
  }

  protected async requestSentiment(document: LanguageDocument): Promise<SentimentAnnotations> {
    const response = await this.language.documents.analyzeSentiment({
      requestBody: {
        document: { content: document.content, type: document.type },
        encodingType: 'UTF8'
      }
    });

    const sentences = response.data.sentences ?? [];
    this.logger.debug(`Received sentiment for ${sentences.length} sentences`);

    return {
      documentSentiment: this.toScore(response.data.documentSentiment),
      sentences: sentences.map(sentence => ({
        text: { content: sentence.text?.content ?? '' },
        sentiment: this.toScore(sentence.sentiment)
      }))
    };
  }

  protected async requestClassification(document: LanguageDocument): Promise<ClassificationResult> {
    const response = await this.language.documents.classifyText({
      requestBody: {
        document: { content: document.content, type: document.type }
      }
    });

    const categories = response.data.categories ?? [];
    this.logger.debug(`Received ${categories.length} categories`);

    return {
      categories: categories.map(category => ({
        name: category.name ?? '',
        confidence: category.confidence ?? 0
      }))
    };
  }

  private toScore(sentiment: language_v1.Schema$Sentiment | undefined): SentimentScore {
    return {
      score: sentiment?.score ?? 0,
      magnitude: sentiment?.magnitude ?? 0
    };
  }
}

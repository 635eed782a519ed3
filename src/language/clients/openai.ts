import OpenAI from 'openai';
import { zodResponseFormat } from 'openai/helpers/zod';
import { z } from 'zod';
import { BaseLanguageClient, type LanguageClientOptions } from './base.js';
import type {
  ClassificationResult,
  LanguageDocument,
  SentimentAnnotations,
  SentimentScore
} from '../types.js';
import type { PlatformConfig } from '../../config/types.js';

const SentimentResponseSchema = z.object({
  documentSentiment: z.object({
    score: z.number(),
    magnitude: z.number()
  }),
  sentences: z.array(
    z.object({
      text: z.string(),
      score: z.number(),
      magnitude: z.number()
    })
  )
});

const ClassificationResponseSchema = z.object({
  categories: z.array(
    z.object({
      name: z.string(),
      confidence: z.number()
    })
  )
});

const SENTIMENT_PROMPT = [
  'You score the sentiment of the text the user sends.',
  'Return the sentiment of the whole text and of every sentence in it, in order, quoting each sentence verbatim.',
  '"score" ranges from -1.0 (negative) to 1.0 (positive).',
  '"magnitude" is the non-negative strength of emotion regardless of sign and grows with the length of the text.'
].join('\n');

const CLASSIFICATION_PROMPT = [
  'You classify the text the user sends into content categories.',
  'Use hierarchical category names such as "/Arts & Entertainment/Music" or "/Science/Computer Science".',
  '"confidence" ranges from 0.0 to 1.0. Return an empty list when no category applies.'
].join('\n');

/**
 * Sentiment and classification answered by an OpenAI-compatible chat model
 * through structured outputs, shaped like Natural Language API responses.
 */
export class OpenAILanguageClient extends BaseLanguageClient {
  private client: OpenAI;

  constructor(config: PlatformConfig, modelName: string, options?: LanguageClientOptions) {
    super(config, modelName, options);

    if (!config.apiKey) {
      throw new Error('OPENAI_API_KEY env variable is not configured.');
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiUrl
    });
  }

  protected getProviderName(): string {
    return 'openai';
  }

  protected async requestSentiment(document: LanguageDocument): Promise<SentimentAnnotations> {
    const completion = await this.client.chat.completions.parse({
      model: this.modelName,
      temperature: 0,
      messages: [
        { role: 'system', content: SENTIMENT_PROMPT },
        { role: 'user', content: document.content }
      ],
      response_format: zodResponseFormat(SentimentResponseSchema, 'sentiment'),
    });

    const parsed = completion.choices[0]?.message.parsed;
    if (!parsed) {
      throw new Error('No sentiment returned from OpenAI');
    }

    return {
      documentSentiment: clampScore(parsed.documentSentiment),
      sentences: parsed.sentences.map(sentence => ({
        text: { content: sentence.text },
        sentiment: clampScore(sentence)
      }))
    };
  }

  protected async requestClassification(document: LanguageDocument): Promise<ClassificationResult> {
    const completion = await this.client.chat.completions.parse({
      model: this.modelName,
      temperature: 0,
      messages: [
        { role: 'system', content: CLASSIFICATION_PROMPT },
        { role: 'user', content: document.content }
      ],
      response_format: zodResponseFormat(ClassificationResponseSchema, 'classification'),
    });

    const parsed = completion.choices[0]?.message.parsed;
    if (!parsed) {
      throw new Error('No categories returned from OpenAI');
    }

    return {
      categories: parsed.categories
        .filter(category => category.name.trim().length > 0)
        .map(category => ({
          name: category.name.trim(),
          confidence: clamp(category.confidence, 0, 1)
        }))
    };
  }
}

function clampScore(value: SentimentScore): SentimentScore {
  return {
    score: clamp(value.score, -1, 1),
    magnitude: Math.max(0, value.magnitude)
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

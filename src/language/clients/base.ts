import type {
  ClassificationResult,
  LanguageClient,
  LanguageDocument,
  SentimentAnnotations
} from '../types.js';
import type { PlatformConfig } from '../../config/types.js';
import { Logger } from '../../utils/logger.js';
import { truncateUtf8, utf8ByteLength } from '../../utils/text.js';

// Natural Language API request size limit
export const DEFAULT_MAX_CONTENT_BYTES = 1_000_000;

export interface LanguageClientOptions {
  maxContentBytes?: number;
}

export abstract class BaseLanguageClient implements LanguageClient {
  protected config: PlatformConfig;
  protected modelName: string;
  protected logger: Logger;
  protected maxContentBytes: number;

  constructor(config: PlatformConfig, modelName: string, options: LanguageClientOptions = {}) {
    this.config = config;
    this.modelName = modelName;
    this.maxContentBytes = options.maxContentBytes ?? DEFAULT_MAX_CONTENT_BYTES;
    this.logger = new Logger(`Language:${this.getProviderName()}`);

    if (!Number.isInteger(this.maxContentBytes) || this.maxContentBytes <= 0) {
      throw new Error(`maxContentBytes must be a positive integer, got ${this.maxContentBytes}`);
    }
  }

  protected abstract getProviderName(): string;

  protected abstract requestSentiment(document: LanguageDocument): Promise<SentimentAnnotations>;

  protected abstract requestClassification(document: LanguageDocument): Promise<ClassificationResult>;

  getName(): string {
    return `${this.getProviderName()}:${this.modelName}`;
  }

  async analyzeSentiment(document: LanguageDocument): Promise<SentimentAnnotations> {
    const prepared = this.prepareDocument(document);
    this.logger.debug(`Analysing sentiment of ${utf8ByteLength(prepared.content)} bytes`);
    return this.requestSentiment(prepared);
  }

  async classifyText(document: LanguageDocument): Promise<ClassificationResult> {
    const prepared = this.prepareDocument(document);
    this.logger.debug(`Classifying ${utf8ByteLength(prepared.content)} bytes`);
    return this.requestClassification(prepared);
  }

  protected prepareDocument(document: LanguageDocument): LanguageDocument {
    this.validateDocument(document);

    const content = truncateUtf8(document.content, this.maxContentBytes);
    if (content.length !== document.content.length) {
      this.logger.warn(
        `Document exceeds ${this.maxContentBytes} bytes, truncated from ${utf8ByteLength(document.content)} bytes`
      );
    }

    return { ...document, content };
  }

  protected validateDocument(document: LanguageDocument): void {
    if (typeof document.content !== 'string' || document.content.trim().length === 0) {
      throw new Error('Document content cannot be empty');
    }

    if (document.type !== 'PLAIN_TEXT') {
      throw new Error(`Unsupported document type: ${String(document.type)}`);
    }
  }
}

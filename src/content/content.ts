import type { LanguageClient, LanguageDocument } from '../language/types.js';
import { decodeUtf8, toList } from '../utils/text.js';
import { InvalidDateError, MissingSentimentError } from './errors.js';
import type {
  CategoryConfidence,
  ContentInit,
  ContentJson,
  ContentSentiment,
  ContentSource
} from './types.js';

/**
 * Web content (article, tweet, post) to be analysed and classified.
 *
 * `source` holds the metadata and body as given at construction, with
 * `author`, `tags` and `misc` always stored as lists and the body as text.
 * `sentiment` starts empty and is filled by {@link Content.analyse} and
 * {@link Content.classify}, or both at once through
 * `jsonify(client, true)`.
 */
export class Content {
  private _source: ContentSource;
  private _sentiment: ContentSentiment;

  constructor(init: ContentInit) {
    this._source = {
      title: init.title,
      author: toList(init.author),
      date: formatDate(init.date),
      url: init.url,
      body: decodeUtf8(init.body),
      origin: init.origin,
      tags: toList(init.tags),
      misc: toList(init.misc)
    };
    this._sentiment = {};
  }

  get source(): ContentSource {
    return this._source;
  }

  set source(data: ContentSource) {
    assertRecord(data, 'source');
    this._source = data;
  }

  get sentiment(): ContentSentiment {
    return this._sentiment;
  }

  set sentiment(data: ContentSentiment) {
    assertRecord(data, 'sentiment');
    this._sentiment = data;
  }

  /**
   * Scores the body as a whole (`sentiment.overall`) and sentence by
   * sentence (`sentiment.content`). Client errors propagate.
   */
  async analyse(client: LanguageClient): Promise<ContentSentiment> {
    const annotations = await client.analyzeSentiment(this.toDocument());

    this.sentiment.overall = {
      score: annotations.documentSentiment.score,
      magnitude: annotations.documentSentiment.magnitude
    };

    this.sentiment.content = annotations.sentences.map(sentence => ({
      text: sentence.text.content,
      score: sentence.sentiment.score,
      magnitude: sentence.sentiment.magnitude
    }));

    return this.sentiment;
  }

  /**
   * Stores the body's categories under `sentiment.overall.categories`.
   * When the service finds none, a single `{category: '', confidence: 1}`
   * entry is stored instead.
   *
   * @throws MissingSentimentError when `sentiment.overall` is not set yet
   */
  async classify(client: LanguageClient): Promise<ContentSentiment> {
    const overall = this.sentiment.overall;
    if (!overall) {
      throw new MissingSentimentError('overall');
    }

    const result = await client.classifyText(this.toDocument());

    const categories: CategoryConfidence[] = result.categories.map(category => ({
      category: category.name,
      confidence: category.confidence
    }));

    // no category found
    if (categories.length === 0) {
      categories.push({ category: '', confidence: 1 });
    }

    overall.categories = categories;
    return this.sentiment;
  }

  async jsonify(client: LanguageClient, automagic = false): Promise<ContentJson> {
    if (automagic) {
      await this.analyse(client);
      await this.classify(client);
    }

    return { source: this.source, sentiment: this.sentiment };
  }

  private toDocument(): LanguageDocument {
    return { content: this.source.body, type: 'PLAIN_TEXT' };
  }
}

function formatDate(date: Date | string): string {
  if (typeof date === 'string') {
    return date;
  }
  if (Number.isNaN(date.getTime())) {
    throw new InvalidDateError();
  }
  return date.toISOString();
}

function assertRecord(data: unknown, attribute: string): void {
  if (!isRecord(data)) {
    throw new TypeError(
      `Expected dictionary-like object for ${attribute} attribute, but got ${describeKind(data)}.`
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function describeKind(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

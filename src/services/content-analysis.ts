import { z } from 'zod';
import { Content } from '../content/content.js';
import type { ContentJson } from '../content/types.js';
import type { LanguageClient } from '../language/types.js';
import { Logger } from '../utils/logger.js';

const OneOrManyStrings = z.union([z.string(), z.array(z.string())]);

export const ContentInputSchema = z.object({
  title: z.string(),
  author: OneOrManyStrings,
  date: z.string(),
  url: z.string(),
  body: z.string().refine(body => body.trim().length > 0, 'Body cannot be blank'),
  origin: z.string(),
  tags: OneOrManyStrings.default([]),
  misc: OneOrManyStrings.default([])
});

export const ContentInputListSchema = z.array(ContentInputSchema);

export type ContentInput = z.infer<typeof ContentInputSchema>;

export class ContentAnalysisService {
  private readonly client: LanguageClient;
  private readonly logger = new Logger('ContentAnalysis');

  constructor(client: LanguageClient) {
    this.client = client;
  }

  /**
   * Analyses and classifies every item, one at a time. The first failure
   * aborts the batch.
   */
  async analyseAll(items: readonly ContentInput[]): Promise<ContentJson[]> {
    this.logger.info(`Analysing ${items.length} item${items.length === 1 ? '' : 's'} with ${this.client.getName()}`);

    const results = await this.logger.withProgress('Analysing', items, item => this.analyseOne(item));

    this.logger.info(`Analysed ${results.length} item${results.length === 1 ? '' : 's'}`);
    return results;
  }

  async analyseOne(item: ContentInput): Promise<ContentJson> {
    const content = new Content(item);

    try {
      const json = await content.jsonify(this.client, true);
      const categories = json.sentiment.overall?.categories?.map(c => c.category || '(none)').join(', ');
      this.logger.debug(`'${item.title}' scored ${json.sentiment.overall?.score}, categories: ${categories}`);
      return json;
    } catch (error) {
      this.logger.error(`Analysis failed for '${item.title}':`, error);
      throw error;
    }
  }
}

export type DocumentType = 'PLAIN_TEXT';

export interface LanguageDocument {
  content: string;
  type: DocumentType;
}

export interface SentimentScore {
  score: number;
  magnitude: number;
}

export interface SentenceAnnotation {
  text: {
    content: string;
  };
  sentiment: SentimentScore;
}

export interface SentimentAnnotations {
  documentSentiment: SentimentScore;
  sentences: SentenceAnnotation[];
}

export interface CategoryAnnotation {
  name: string;
  confidence: number;
}

export interface ClassificationResult {
  categories: CategoryAnnotation[];
}

/**
 * Remote natural-language service consumed by `Content`.
 * Transport, auth and timeouts are the implementation's business.
 */
export interface LanguageClient {
  analyzeSentiment(document: LanguageDocument): Promise<SentimentAnnotations>;
  classifyText(document: LanguageDocument): Promise<ClassificationResult>;
  getName(): string;
}

import type { OneOrMany } from '../utils/text.js';

export interface ContentSource {
  title: string;
  author: string[];
  date: string;
  url: string;
  body: string;
  origin: string;
  tags: string[];
  misc: string[];
}

export interface ContentInit {
  title: string;
  author: OneOrMany<string>;
  date: Date | string;
  url: string;
  body: string | Uint8Array;
  origin: string;
  tags: OneOrMany<string>;
  misc: OneOrMany<string>;
}

export interface CategoryConfidence {
  category: string;
  confidence: number;
}

export interface OverallSentiment {
  score: number;
  magnitude: number;
  categories?: CategoryConfidence[];
}

export interface TextSentiment {
  text: string;
  score: number;
  magnitude: number;
}

export interface ContentSentiment {
  overall?: OverallSentiment;
  content?: TextSentiment[];
}

export interface ContentJson {
  source: ContentSource;
  sentiment: ContentSentiment;
}

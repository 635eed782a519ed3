import type { LogLevel } from '../utils/logger.js';

export interface Config {
  logging: LoggingConfig;
  language: LanguageConfig;
  platforms: PlatformsConfig;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface LanguageConfig {
  // "provider:model", e.g. "google:v1" or "openai:gpt-4o-mini"
  provider: string;
  maxContentBytes: number;
}

export interface PlatformsConfig {
  google?: PlatformConfig;
  openai?: PlatformConfig;
}

export interface PlatformConfig {
  apiUrl?: string;
  apiKey: string;
}

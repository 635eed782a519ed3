import { readFileSync } from 'fs';
import * as YAML from 'yaml';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { Logger } from '../utils/logger.js';
import { DEFAULT_MAX_CONTENT_BYTES } from '../language/clients/base.js';
import { type Config } from './types.js';

const logger = new Logger('Config');

const FileConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info')
  }).default({}),
  language: z.object({
    provider: z.string().min(1).default('google:v1'),
    maxContentBytes: z.number().int().positive().default(DEFAULT_MAX_CONTENT_BYTES)
  }).default({})
});

export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Config {
  // Load .env file if it exists
  dotenvConfig({ override: false });

  const fileConfig = loadYamlConfig(configPath);
  const config: Config = { ...fileConfig, platforms: {} };

  // API keys only ever come from the environment
  if (env.GOOGLE_API_KEY) {
    config.platforms.google = { apiKey: env.GOOGLE_API_KEY };
  }
  if (env.OPENAI_API_KEY) {
    config.platforms.openai = { apiKey: env.OPENAI_API_KEY, apiUrl: env.OPENAI_API_URL || undefined };
  }

  logger.debug('Resolved configuration', {
    logging: config.logging,
    language: config.language,
    platforms: Object.keys(config.platforms)
  });
  return config;
}

function loadYamlConfig(configPath: string): z.infer<typeof FileConfigSchema> {
  let raw: unknown;
  try {
    const fileContent = readFileSync(configPath, 'utf8');
    raw = YAML.parse(fileContent) ?? {};
    logger.info(`Loaded configuration from ${configPath}`);
  } catch (error) {
    logger.error(`Failed to load config file ${configPath}:`, error);
    throw error;
  }

  const result = FileConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration in ${configPath}: ${issues}`);
  }
  return result.data;
}

import { readFile, writeFile } from 'fs/promises';
import { resolve } from 'path';
import { Logger } from './utils/logger.js';
import { loadConfig } from './config/config.js';
import { LanguageClientFactory } from './language/factory.js';
import { ContentAnalysisService, ContentInputListSchema } from './services/content-analysis.js';
import type { ContentJson } from './content/types.js';

const logger = new Logger('Main');

export const USAGE = 'Usage: sentiscope <input.json> <output.json>';

export const DEFAULT_CONFIG_PATH = 'config/sentiscope.yaml';

/**
 * Reads content items from `inputPath`, analyses and classifies each one and
 * writes the `jsonify` results as a JSON array to `outputPath`.
 */
export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<ContentJson[]> {
  const [inputPath, outputPath] = argv;
  if (!inputPath || !outputPath) {
    throw new Error(USAGE);
  }

  const configPath = resolve(process.cwd(), env.SENTISCOPE_CONFIG || DEFAULT_CONFIG_PATH);
  const config = loadConfig(configPath, env);
  Logger.setDefaultLevel(config.logging.level);
  logger.info('✅ Configuration loaded successfully');

  const items = ContentInputListSchema.parse(JSON.parse(await readFile(inputPath, 'utf8')));
  logger.info(`Read ${items.length} items from ${inputPath}`);

  const client = new LanguageClientFactory(config).create();
  const service = new ContentAnalysisService(client);
  const results = await service.analyseAll(items);

  await writeFile(outputPath, `${JSON.stringify(results, null, 2)}\n`, 'utf8');
  logger.info(`🎉 Results written to ${outputPath}`);
  return results;
}

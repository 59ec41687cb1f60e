import type { Readable } from 'node:stream';
import { CONFIG } from './config.js';
import { loadApiKey } from './credentials.js';
import { describeError } from './errors.js';
import type { Logger } from './logger.js';
import { createBanner } from './pipeline.js';
import { collectPrompt } from './prompt.js';
import type { ImageProvider, SizedImage } from './services/ai.js';

export interface AppOptions {
  outDir: string;
  prefix: string;
  ext: string;
  keyFile: string;
  model: string;
}

export interface AppDeps<T extends SizedImage> {
  input: Readable;
  /** Plain user-facing lines (prompt text, final result). */
  print: (line: string) => void;
  logger: Logger;
  createProvider: (apiKey: string, model: string) => ImageProvider<T>;
}

/**
 * One full run. Resolves to the process exit code; never throws.
 */
export async function runApp<T extends SizedImage>(options: AppOptions, deps: AppDeps<T>): Promise<number> {
  const { print, logger } = deps;

  // 1. Credential first: no stdin and no network without it
  let apiKey: string;
  try {
    apiKey = await loadApiKey(options.keyFile, CONFIG.defaults.apiKeyName);
  } catch (error) {
    logger.error(describeError(error));
    return 1;
  }

  // 2. Prompt
  print('Enter your image prompt (finish by entering an empty line):');
  let prompt: string;
  try {
    prompt = await collectPrompt(deps.input);
  } catch (error) {
    logger.error(`${describeError(error)}; exiting.`);
    return 1;
  }

  // 3. Generate, resize, save
  try {
    print('Generating image…');
    const provider = deps.createProvider(apiKey, options.model);
    const result = await createBanner({
      provider,
      prompt,
      outDir: options.outDir,
      prefix: options.prefix,
      ext: options.ext,
      logger,
    });
    print(`Saved as ${result.filename} (${result.width}×${result.height})`);
    return 0;
  } catch (error) {
    logger.error(`Image generation process failed: ${describeError(error)}`);
    return 1;
  }
}

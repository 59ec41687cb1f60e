#!/usr/bin/env node
import { Command } from 'commander';
import { runApp } from './app.js';
import { CONFIG, VERSION } from './config.js';
import { createLogger } from './logger.js';
import { GeminiImageProvider } from './services/ai.js';

const { defaults, banner } = CONFIG;

const program = new Command();

program
  .name('banner-gen')
  .description(`Generate a ${banner.width}×${banner.height} banner image from a text prompt`)
  .version(VERSION)
  .option('-o, --out-dir <dir>', 'Directory images are saved into', defaults.outDir)
  .option('-p, --prefix <prefix>', 'Filename prefix of the output series', defaults.prefix)
  .option('-e, --ext <ext>', 'Output extension; selects the encoding', defaults.ext)
  .option('-k, --key-file <file>', `File holding ${defaults.apiKeyName}`, defaults.keyFile)
  .option('-m, --model <model>', 'Gemini model used for generation', defaults.model)
  .action(async (opts: { outDir: string; prefix: string; ext: string; keyFile: string; model: string }) => {
    const logger = createLogger();

    process.exitCode = await runApp(opts, {
      input: process.stdin,
      print: (line) => console.log(line),
      logger,
      createProvider: (apiKey, model) => new GeminiImageProvider({ apiKey, model, logger }),
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('\n❌ Fatal Error:', error);
  process.exit(1);
});

import path from 'node:path';
import { CONFIG } from './config.js';
import { silentLogger, type Logger } from './logger.js';
import { nextFilename } from './namer.js';
import { formatForExtension, type ImageProvider, type SizedImage } from './services/ai.js';

export interface BannerOptions<T extends SizedImage> {
  provider: ImageProvider<T>;
  prompt: string;
  outDir?: string;
  prefix?: string;
  ext?: string;
  logger?: Logger;
}

export interface BannerResult {
  filename: string;
  path: string;
  width: number;
  height: number;
}

/**
 * generate -> stretch to banner size -> pick next name -> save.
 * The extension is checked up front; the name is only chosen once a resized
 * image exists, so a failed request never reserves or writes anything.
 */
export async function createBanner<T extends SizedImage>(options: BannerOptions<T>): Promise<BannerResult> {
  const {
    provider,
    prompt,
    outDir = CONFIG.defaults.outDir,
    prefix = CONFIG.defaults.prefix,
    ext = CONFIG.defaults.ext,
    logger = silentLogger,
  } = options;
  const { width, height } = CONFIG.banner;

  // fail on an unwritable extension before paying for a request
  formatForExtension(ext);

  const original = await provider.generate(prompt);

  const banner = await provider.resize(original, width, height);
  logger.info(`Resized image to fixed banner size: ${banner.width}x${banner.height}`);

  const filename = await nextFilename(outDir, prefix, ext);
  const filePath = path.join(outDir, filename);
  await provider.save(banner, filePath);

  return { filename, path: filePath, width: banner.width, height: banner.height };
}

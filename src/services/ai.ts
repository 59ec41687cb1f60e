import { GoogleGenAI, Modality, type Part } from '@google/genai';
import { createCanvas, loadImage, type Canvas, type Image } from '@napi-rs/canvas';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { CONFIG } from '../config.js';
import { describeError, IOError, ProviderError, TransportError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

// --- types ---

export interface SizedImage {
  readonly width: number;
  readonly height: number;
}

/**
 * Everything the pipeline needs from an image backend. Swap in a fake
 * for tests; the Gemini one below talks to the network.
 */
export interface ImageProvider<T extends SizedImage = SizedImage> {
  generate(prompt: string): Promise<T>;
  /** Stretches to exactly width × height, ignoring aspect ratio. */
  resize(image: T, width: number, height: number): Promise<T>;
  /** Format follows the file extension. */
  save(image: T, filePath: string): Promise<void>;
}

export type Bitmap = Image | Canvas;

export interface GeminiProviderConfig {
  apiKey: string;
  model?: string;
  logger?: Logger;
}

// --- internals ---

const toCanvas = (image: Bitmap, width = image.width, height = image.height): Canvas => {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');
  ctx.imageSmoothingEnabled = true;
  ctx.imageSmoothingQuality = 'high';
  ctx.drawImage(image, 0, 0, width, height);
  return canvas;
};

export type ImageFormat = 'png' | 'jpeg' | 'webp' | 'avif';

const FORMATS: Record<string, ImageFormat> = {
  '.png': 'png',
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.webp': 'webp',
  '.avif': 'avif',
};

/** Case-insensitive; anything outside the table is an IOError. */
export function formatForExtension(ext: string): ImageFormat {
  const format = FORMATS[ext.toLowerCase()];
  if (!format) throw new IOError(`Unsupported image extension "${ext}"`);
  return format;
}

export async function encodeForPath(canvas: Canvas, filePath: string): Promise<Buffer> {
  switch (formatForExtension(path.extname(filePath) || filePath)) {
    case 'png':
      return canvas.encode('png');
    case 'jpeg':
      return canvas.encode('jpeg', 95);
    case 'webp':
      return canvas.encode('webp', 95);
    case 'avif':
      return canvas.encode('avif');
  }
}

// --- provider ---

export class GeminiImageProvider implements ImageProvider<Bitmap> {
  private ai: GoogleGenAI;
  private model: string;
  private logger: Logger;

  constructor(config: GeminiProviderConfig) {
    this.ai = new GoogleGenAI({ apiKey: config.apiKey });
    this.model = config.model ?? CONFIG.defaults.model;
    this.logger = config.logger ?? silentLogger;
    this.logger.info(`Initialized image provider with model: ${this.model}`);
  }

  async generate(prompt: string): Promise<Bitmap> {
    this.logger.info(`Sending image generation request with prompt: ${prompt}`);

    let parts: Part[];
    try {
      const res = await this.ai.models.generateContent({
        model: this.model,
        contents: prompt,
        config: { responseModalities: [Modality.TEXT, Modality.IMAGE] },
      });
      parts = res.candidates?.[0]?.content?.parts ?? [];
    } catch (error) {
      throw new TransportError('Image request failed', { cause: error });
    }
    this.logger.info('Received response from Gemini API.');

    for (const part of parts) {
      if (part.text) this.logger.info(`Model says: ${part.text.trim()}`);
    }

    const data = parts.find((p) => p.inlineData?.data)?.inlineData?.data;
    if (!data) throw new ProviderError('No image data found in API response.');

    let image: Image;
    try {
      image = await loadImage(Buffer.from(data, 'base64'));
    } catch (error) {
      throw new ProviderError('API returned image data that could not be decoded', { cause: error });
    }

    this.logger.info(`Image generated successfully (original size: ${image.width}x${image.height}).`);
    return image;
  }

  async resize(image: Bitmap, width: number, height: number): Promise<Bitmap> {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Invalid target size ${width}x${height}`);
    }
    return toCanvas(image, width, height);
  }

  async save(image: Bitmap, filePath: string): Promise<void> {
    const canvas = 'getContext' in image ? image : toCanvas(image);
    const buffer = await encodeForPath(canvas, filePath);

    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, buffer);
    } catch (error) {
      // never leave a half-written image behind
      await rm(filePath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.error(`Could not remove partial file ${filePath}: ${describeError(cleanupError)}`);
      });
      throw new IOError(`Failed to save image to ${filePath}`, { cause: error });
    }
    this.logger.info(`Image saved to ${filePath} (${image.width}x${image.height})`);
  }
}

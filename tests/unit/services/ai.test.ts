import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createCanvas, loadImage } from '@napi-rs/canvas';
import { Modality } from '@google/genai';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { formatForExtension, GeminiImageProvider } from '../../../src/services/ai.js';
import { describeError, IOError, ProviderError, TransportError } from '../../../src/errors.js';

// Mock the Google SDK
const { mockGenerateContent } = vi.hoisted(() => ({ mockGenerateContent: vi.fn() }));

vi.mock('@google/genai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@google/genai')>();
  return {
    ...actual,
    GoogleGenAI: vi.fn(function () {
      return { models: { generateContent: mockGenerateContent } };
    }),
  };
});

async function pngBase64(width: number, height: number): Promise<string> {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');
  ctx.fillStyle = '#c00';
  ctx.fillRect(0, 0, width, height);
  return (await canvas.encode('png')).toString('base64');
}

const reply = (parts: unknown[]) => ({ candidates: [{ content: { parts } }] });

describe('GeminiImageProvider', () => {
  let provider: GeminiImageProvider;
  let root: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    provider = new GeminiImageProvider({ apiKey: 'test-secret', model: 'test-model' });
    root = await mkdtemp(path.join(tmpdir(), 'banner-ai-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('generate', () => {
    it('requests text and image output and decodes the inline image', async () => {
      const data = await pngBase64(512, 512);
      mockGenerateContent.mockResolvedValue(
        reply([{ text: 'Here is your banner.' }, { inlineData: { mimeType: 'image/png', data } }]),
      );

      const image = await provider.generate('A red can');

      expect(image.width).toBe(512);
      expect(image.height).toBe(512);
      expect(mockGenerateContent).toHaveBeenCalledTimes(1);
      expect(mockGenerateContent).toHaveBeenCalledWith({
        model: 'test-model',
        contents: 'A red can',
        config: { responseModalities: [Modality.TEXT, Modality.IMAGE] },
      });
    });

    it('fails with ProviderError when no image part is returned', async () => {
      mockGenerateContent.mockResolvedValue(reply([{ text: 'I cannot draw that.' }]));

      await expect(provider.generate('A red can')).rejects.toThrow(
        new ProviderError('No image data found in API response.'),
      );
    });

    it('fails with ProviderError when there are no candidates', async () => {
      mockGenerateContent.mockResolvedValue({});

      await expect(provider.generate('A red can')).rejects.toBeInstanceOf(ProviderError);
    });

    it('fails with ProviderError when the bytes are not an image', async () => {
      const data = Buffer.from('not an image').toString('base64');
      mockGenerateContent.mockResolvedValue(reply([{ inlineData: { mimeType: 'image/png', data } }]));

      await expect(provider.generate('A red can')).rejects.toBeInstanceOf(ProviderError);
    });

    it('wraps SDK failures in TransportError and keeps the cause', async () => {
      const cause = new Error('API key not valid');
      mockGenerateContent.mockRejectedValue(cause);

      const error = await provider.generate('A red can').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: 'Image request failed', cause });
      expect(describeError(error)).toBe('Image request failed: caused by API key not valid');
    });
  });

  describe('formatForExtension', () => {
    it('maps extensions case-insensitively', () => {
      expect(formatForExtension('.png')).toBe('png');
      expect(formatForExtension('.JPEG')).toBe('jpeg');
      expect(formatForExtension('.jpg')).toBe('jpeg');
      expect(formatForExtension('.webp')).toBe('webp');
      expect(formatForExtension('.avif')).toBe('avif');
    });

    it('rejects anything else', () => {
      expect(() => formatForExtension('.gif')).toThrow(new IOError('Unsupported image extension ".gif"'));
    });
  });

  describe('resize', () => {
    it('stretches to the exact target size', async () => {
      const source = createCanvas(512, 512);

      const resized = await provider.resize(source, 1200, 628);

      expect(resized.width).toBe(1200);
      expect(resized.height).toBe(628);
    });

    it('rejects non-positive sizes', async () => {
      await expect(provider.resize(createCanvas(10, 10), 0, 628)).rejects.toBeInstanceOf(RangeError);
    });
  });

  describe('save', () => {
    it('writes a PNG that decodes at the saved size', async () => {
      const filePath = path.join(root, 'out', 'img1.png');

      await provider.save(createCanvas(1200, 628), filePath);

      const saved = await loadImage(filePath);
      expect(saved.width).toBe(1200);
      expect(saved.height).toBe(628);
    });

    it('picks JPEG from the extension', async () => {
      const filePath = path.join(root, 'img1.JPG');

      await provider.save(createCanvas(40, 20), filePath);

      const bytes = await readFile(filePath);
      expect([bytes[0], bytes[1]]).toEqual([0xff, 0xd8]);
    });

    it('saves a decoded image without resizing it', async () => {
      const image = await loadImage(Buffer.from(await pngBase64(30, 15), 'base64'));
      const filePath = path.join(root, 'raw.png');

      await provider.save(image, filePath);

      const saved = await loadImage(filePath);
      expect([saved.width, saved.height]).toEqual([30, 15]);
    });

    it('rejects unknown extensions without writing anything', async () => {
      await expect(provider.save(createCanvas(10, 10), path.join(root, 'img1.gif'))).rejects.toBeInstanceOf(IOError);
      expect(await readdir(root)).toEqual([]);
    });

    it('throws IOError when the target directory cannot be created', async () => {
      const blocker = path.join(root, 'blocker');
      await writeFile(blocker, '');

      await expect(provider.save(createCanvas(10, 10), path.join(blocker, 'img1.png'))).rejects.toBeInstanceOf(IOError);
    });
  });
});

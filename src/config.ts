// --- Configuration ---
// Banner size is fixed at build time; everything else has a CLI override.
export const CONFIG = {
  banner: {
    width: 1200,
    height: 628,
  },

  defaults: {
    outDir: 'images',
    prefix: 'img',
    ext: '.png',
    keyFile: 'GEMINI_API_KEY.env',
    apiKeyName: 'GEMINI_API_KEY',
    model: 'gemini-2.0-flash-preview-image-generation',
  },
} as const;

export const VERSION = '1.0.0';

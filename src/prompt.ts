import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { EmptyPromptError } from './errors.js';

/**
 * Reads lines until the first empty one (or end of input) and returns them
 * joined with newlines and trimmed.
 *
 * Whitespace-only lines are not terminators; they are kept and only the
 * outer whitespace of the final prompt is trimmed.
 */
export async function collectPrompt(input: Readable): Promise<string> {
  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
  const lines: string[] = [];

  try {
    for await (const line of rl) {
      if (line.length === 0) break;
      lines.push(line);
    }
  } finally {
    rl.close();
  }

  const prompt = lines.join('\n').trim();
  if (!prompt) throw new EmptyPromptError('No prompt provided');
  return prompt;
}

import { mkdir, readdir } from 'node:fs/promises';
import { IOError } from './errors.js';

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Highest index in `names` of the form `<prefix><digits><extension>`, or 0n.
 * Leading zeros are allowed: `img007.png` counts as 7. Indices are bigints
 * so arbitrarily long digit runs still compare and increment exactly.
 */
export function maxSeriesIndex(names: Iterable<string>, prefix: string, extension: string): bigint {
  const pattern = new RegExp(`^${escapeRegExp(prefix)}(\\d+)${escapeRegExp(extension)}$`);
  let max = 0n;

  for (const name of names) {
    const match = pattern.exec(name);
    if (!match) continue;
    const index = BigInt(match[1]);
    if (index > max) max = index;
  }

  return max;
}

/**
 * Returns the next filename in the `<prefix><n><extension>` series inside
 * `directory`, creating the directory if needed. Gaps are never refilled:
 * only the running maximum matters.
 *
 * The scan and the later write are separate steps, so two concurrent runs
 * against the same directory can pick the same name. No locking is done.
 */
export async function nextFilename(directory: string, prefix = 'img', extension = '.png'): Promise<string> {
  let names: string[];
  try {
    await mkdir(directory, { recursive: true });
    names = await readdir(directory);
  } catch (error) {
    throw new IOError(`Cannot read output directory ${directory}`, { cause: error });
  }

  return `${prefix}${maxSeriesIndex(names, prefix, extension) + 1n}${extension}`;
}

import { readFile } from 'node:fs/promises';
import { parse } from 'dotenv';
import { CONFIG } from './config.js';
import { CredentialMissingError } from './errors.js';

/**
 * Reads a single API key out of a dotenv-style file. Only the file counts;
 * the process environment is not consulted.
 */
export async function loadApiKey(envFile: string, key: string = CONFIG.defaults.apiKeyName): Promise<string> {
  let content: string;
  try {
    content = await readFile(envFile, 'utf-8');
  } catch (error) {
    throw new CredentialMissingError(`${key} not found: cannot read ${envFile}`, { cause: error });
  }

  const value = parse(content)[key]?.trim();
  if (!value) {
    throw new CredentialMissingError(`${key} not found in ${envFile}. Please add it and try again.`);
  }
  return value;
}

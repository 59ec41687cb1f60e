/**
 * Base class for every failure that ends a run.
 */
export class BannerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Credential file absent, or the key inside it unset or blank. */
export class CredentialMissingError extends BannerError {}

/** Nothing but blank input before the terminating empty line. */
export class EmptyPromptError extends BannerError {}

/** The SDK call itself failed (network, auth, API status). */
export class TransportError extends BannerError {}

/** The provider answered, but without a usable image. */
export class ProviderError extends BannerError {}

/** Directory or file write failure. */
export class IOError extends BannerError {}

/**
 * Flattens an error and its `cause` chain into one log line.
 * e.g. "Image request failed: caused by fetch failed"
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }

  return parts.join(': caused by ');
}

import { stringify } from 'lossless-json';
import { QueueItem } from '../shared/interfaces/record.interface';

// scheme "://" authority, written out literally
const SCHEME_AND_AUTHORITY = /^[A-Za-z][A-Za-z0-9+.-]*:\/\/[^/?#\s]+/;

export type InvalidUrlReason = 'missing' | 'not-a-string' | 'unparseable';

/**
 * Raised (as a value, not thrown) when a queue item has no usable `link`.
 */
export class InvalidUrlError extends Error {
  constructor(
    readonly reason: InvalidUrlReason,
    readonly value: unknown,
  ) {
    super(`Invalid URL in message: ${InvalidUrlError.render(reason, value)}`);
    this.name = 'InvalidUrlError';
  }

  private static render(reason: InvalidUrlReason, value: unknown): string {
    if (reason === 'missing') return 'Missing';
    if (typeof value === 'string') return value;
    return stringify(value) ?? String(value);
  }
}

export type LinkValidationResult =
  | { valid: true; link: string }
  | { valid: false; error: InvalidUrlError };

/**
 * Whether `value` parses to an absolute URL with both a scheme and a host.
 *
 * `mailto:` or `file:///` style URLs parse but carry no host, so they fail.
 * The authority must appear as written: `new URL` would otherwise repair
 * `http:example.com` or surrounding whitespace, while the API receives the
 * raw string.
 */
export const isAbsoluteUrl = (value: string): boolean => {
  if (!SCHEME_AND_AUTHORITY.test(value) || value !== value.trim()) {
    return false;
  }

  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return false;
  }
  return parsed.protocol.length > 1 && parsed.host !== '';
};

export const validateQueueItem = (item: QueueItem): LinkValidationResult => {
  if (!Object.prototype.hasOwnProperty.call(item, 'link')) {
    return { valid: false, error: new InvalidUrlError('missing', undefined) };
  }

  const link = item.link;
  if (typeof link !== 'string') {
    return { valid: false, error: new InvalidUrlError('not-a-string', link) };
  }

  if (!isAbsoluteUrl(link)) {
    return { valid: false, error: new InvalidUrlError('unparseable', link) };
  }

  return { valid: true, link };
};

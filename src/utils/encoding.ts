import libmime from 'libmime';
import { DecodeResult } from '../types/email';
import { describeError } from '../types/errors';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const ENCODED_WORD_PATTERN = /=\?[^?\s]+\?[bq]\?[^?\s]*\?=/i;

/**
 * Decodes Gmail's URL-safe base64 body data into UTF-8 text. Missing padding
 * is restored; invalid UTF-8 sequences come back as U+FFFD. Malformed input
 * yields an empty value and `ok: false`.
 */
export function decodeBase64Url(data: string): DecodeResult {
  const normalized = data.replace(/\s+/g, '').replace(/-/g, '+').replace(/_/g, '/');

  const remainder = normalized.length % 4;
  if (remainder === 1) {
    return { ok: false, value: '', reason: `Invalid base64url length ${normalized.length}` };
  }

  const padded = remainder === 0 ? normalized : normalized + '='.repeat(4 - remainder);
  if (!BASE64_PATTERN.test(padded)) {
    return { ok: false, value: '', reason: 'Invalid base64url character' };
  }

  return { ok: true, value: Buffer.from(padded, 'base64').toString('utf-8') };
}

/**
 * Decodes RFC 2047 encoded-words (`=?charset?B|Q?...?=`) in a header value.
 * Values without encoded-words pass through; on failure the raw value is kept.
 */
export function decodeHeaderValue(value: string): DecodeResult {
  if (!ENCODED_WORD_PATTERN.test(value)) {
    return { ok: true, value };
  }

  try {
    return { ok: true, value: libmime.decodeWords(value) };
  } catch (error) {
    return { ok: false, value, reason: describeError(error) };
  }
}

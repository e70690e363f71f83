/**
 * Text encodings for file reads and writes, backed by iconv-lite.
 *
 * Decoding is strict: the decoded text must encode back to the exact input
 * bytes, otherwise the file is not valid under that encoding.
 */

import iconv from 'iconv-lite';
import { DecodeError, ValidationError } from '../../gateway/errors.js';

export const DEFAULT_ENCODING = 'utf-8';

/**
 * Lowercase and check an encoding label.
 *
 * @throws ValidationError for labels iconv-lite does not know
 */
export function normalizeEncoding(encoding: string): string {
  const label = encoding.trim().toLowerCase();
  if (!label || !iconv.encodingExists(label)) {
    throw new ValidationError(`unsupported encoding: ${encoding}`);
  }
  return label;
}

/**
 * Decode `buffer`, rejecting bytes that do not survive a round trip.
 *
 * A byte-order mark is kept as U+FEFF so it is written back unchanged.
 */
export function decodeStrict(buffer: Buffer, encoding: string, path: string): string {
  const text = iconv.decode(buffer, encoding, { stripBOM: false });
  const reencoded = iconv.encode(text, encoding, { addBOM: false });
  if (!reencoded.equals(buffer)) {
    throw new DecodeError(path, encoding);
  }
  return text;
}

export function encodeText(text: string, encoding: string): Buffer {
  return iconv.encode(text, encoding, { addBOM: false });
}

/**
 * Text-file test used by the search walker: no NUL byte and valid UTF-8.
 */
export function isUtf8Text(buffer: Buffer): boolean {
  if (buffer.includes(0)) return false;
  const text = iconv.decode(buffer, 'utf-8', { stripBOM: false });
  return iconv.encode(text, 'utf-8', { addBOM: false }).equals(buffer);
}

/**
 * Base64 helpers for license payloads.
 *
 * Decoding is permissive: characters outside the base64 alphabet (line breaks,
 * indentation, stray markup) are skipped rather than rejected. What remains
 * must be padded base64.
 */

const OUTSIDE_ALPHABET = /[^A-Za-z0-9+/=]/g;
const PADDED_BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Returns undefined when the payload, once cleaned, is not a whole number of
 * padded base64 quads.
 */
export function decodeBase64Permissive(text: string): Uint8Array | undefined {
  const cleaned = text.replace(OUTSIDE_ALPHABET, '');
  if (cleaned.length % 4 !== 0 || !PADDED_BASE64.test(cleaned)) {
    return undefined;
  }
  return Uint8Array.from(Buffer.from(cleaned, 'base64'));
}

export function encodeBase64(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
}

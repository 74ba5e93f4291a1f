// CHANGE: Decode the content hasher's base32 digests and re-encode them as base64.
// WHY: The persisted database stores SRI-style base64 digests.

const ALPHABET = "0123456789abcdfghijklmnpqrsvwxyz";

/** Length of a sha256 digest in nix base32. */
export const SHA256_BASE32_LENGTH = 52;

/**
 * Decode a nix base32 string into raw bytes.
 *
 * The encoding is little-endian over the whole digest: the last character carries the
 * lowest five bits of the first byte.
 *
 * @param encoded - Base32 text, e.g. a 52-character sha256 digest.
 * @returns Decoded bytes, or undefined when the input holds a foreign character or stray bits.
 */
export function decodeNixBase32(encoded: string): Buffer | undefined {
  const length = Math.floor((encoded.length * 5) / 8);
  const out = Buffer.alloc(length);
  for (let n = 0; n < encoded.length; n += 1) {
    const digit = ALPHABET.indexOf(encoded.charAt(encoded.length - n - 1));
    if (digit < 0) {
      return undefined;
    }
    const bit = n * 5;
    const index = Math.floor(bit / 8);
    const shift = bit % 8;
    if (index < length) {
      out[index] = (out[index] ?? 0) | ((digit << shift) & 0xff);
    }
    const carry = digit >> (8 - shift);
    if (index + 1 < length) {
      out[index + 1] = (out[index + 1] ?? 0) | carry;
    } else if (carry !== 0 || (index >= length && digit !== 0)) {
      return undefined;
    }
  }
  return out;
}

/**
 * Convert a nix base32 digest into standard base64.
 *
 * @returns Base64 text, or undefined when the digest cannot be decoded.
 */
export function nixBase32ToBase64(encoded: string): string | undefined {
  return decodeNixBase32(encoded)?.toString("base64");
}

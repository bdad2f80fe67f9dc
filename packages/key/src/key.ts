/**
 * @otptoken/key - Key material codec
 *
 * Shared secrets are handled as raw bytes and exchanged as RFC 4648
 * base32 text.
 *
 * @packageDocumentation
 */

import crypto from "crypto";
import {
  EncodingError,
  MismatchError,
  ValidationError,
  type KeyInput,
  type KeyParam,
} from "@otptoken/common";

/**
 * Length of generated keys, in bytes. A multiple of 5 so that the base32
 * form needs no padding.
 */
export const KEY_LENGTH = 20;

/**
 * Base32 alphabet (RFC 4648)
 */
const BASE32_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

/**
 * Lengths of a valid trailing group of base32 characters
 */
const VALID_TAIL_LENGTHS = [0, 2, 4, 5, 7];

/**
 * Generate a random key
 */
export function generateKey(length: number = KEY_LENGTH): Uint8Array {
  return new Uint8Array(crypto.randomBytes(length));
}

/**
 * Encode bytes to base32, without padding
 */
export function base32Encode(bytes: Uint8Array): string {
  let bits = 0;
  let value = 0;
  let output = "";

  for (const byte of bytes) {
    value = ((value << 8) | byte) & 0xfff;
    bits += 8;

    while (bits >= 5) {
      output += BASE32_ALPHABET[(value >>> (bits - 5)) & 31];
      bits -= 5;
    }
  }

  if (bits > 0) {
    output += BASE32_ALPHABET[(value << (5 - bits)) & 31];
  }

  return output;
}

/**
 * Decode base32 text (case-insensitive, padded or not)
 * @throws Error describing the first defect found
 */
export function base32Decode(input: string): Uint8Array {
  const upper = input.toUpperCase();
  const padStart = upper.indexOf("=");
  const data = padStart === -1 ? upper : upper.slice(0, padStart);

  if (padStart !== -1) {
    if (!/^=+$/.test(upper.slice(padStart)) || upper.length % 8 !== 0) {
      throw new Error("Incorrect padding");
    }
  }
  if (!VALID_TAIL_LENGTHS.includes(data.length % 8)) {
    throw new Error("Incorrect padding");
  }

  const bytes: number[] = [];
  let bits = 0;
  let value = 0;

  for (const c of data) {
    const idx = BASE32_ALPHABET.indexOf(c);
    if (idx === -1) {
      throw new Error(`Non-base32 digit found: ${c}`);
    }

    value = ((value << 5) | idx) & 0xfff;
    bits += 5;

    if (bits >= 8) {
      bytes.push((value >>> (bits - 8)) & 255);
      bits -= 8;
    }
  }

  return Uint8Array.from(bytes);
}

function keyBytes(value: KeyInput): Uint8Array {
  return typeof value === "string" ? new TextEncoder().encode(value) : value;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

/**
 * Convert a key parameter to raw bytes
 *
 * A (value, confirmation) pair must be byte-identical; text is decoded
 * as base32.
 *
 * @param value Key, or key and confirmation
 * @param name Parameter name used in errors
 */
export function convertKey(value: KeyParam, name = "key"): Uint8Array {
  let key: KeyInput;
  if (typeof value === "string" || value instanceof Uint8Array) {
    key = value;
  } else {
    const [first, second] = value;
    if (!sameBytes(keyBytes(first), keyBytes(second))) {
      throw new MismatchError(name);
    }
    key = first;
  }

  let bytes: Uint8Array;
  if (typeof key === "string") {
    try {
      bytes = base32Decode(key);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new EncodingError(name, message, { cause: e });
    }
  } else {
    bytes = Uint8Array.from(key);
  }

  if (bytes.length === 0 || bytes.length % 5 !== 0) {
    throw new ValidationError(name, "length must be a non-zero multiple of 5 bytes");
  }
  return bytes;
}

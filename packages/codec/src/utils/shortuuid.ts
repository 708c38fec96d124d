/**
 * Short UUID Codec Module
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SINGLE SOURCE OF TRUTH
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * This file is the only implementation of the UUID <-> short code conversion.
 * Everything else in the package (ShortUuid, createCodec, config) composes
 * these functions.
 *
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ RESPONSIBILITIES                                                        │
 * ├─────────────────────────────────────────────────────────────────────────┤
 * │ 1. UUID TEXT   - Canonical text <-> 128-bit bigint                      │
 * │ 2. BASE-N      - bigint <-> digit string over an alphabet               │
 * │ 3. CODEC       - encode / decode / generate / validate                  │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * Digit order: least-significant digit FIRST. Index 0 of a short code is the
 * units place.
 *
 * Fixed length:
 * - Shorter codes are padded at the END with the alphabet's first character.
 *   The end is the most-significant side, so this is not a conventional
 *   leading-zero pad, but the digit value is still zero.
 * - Longer codes are cut to their first `length` characters. High-order
 *   digits are dropped and the UUID can no longer be recovered.
 *
 * Existing codes depend on both rules. Do not change them.
 */

import { randomUUID } from "node:crypto";
import { Alphabet, defaultAlphabet } from "../alphabet.js";
import { SHORTUUID_CONFIG } from "../constants/index.js";
import { ShortUuidError } from "../errors.js";
import type { AlphabetInput, Uuid, ValidationResult } from "../types/index.js";

const UUID_PATTERN = /^(?:[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}|[0-9a-f]{32})$/i;

// =============================================================================
// SECTION 1: UUID TEXT
// =============================================================================

/**
 * Check whether a string is UUID text: 32 hex digits, hyphenated 8-4-4-4-12
 * or compact, any case.
 */
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/**
 * Parse UUID text into its 128-bit value.
 *
 * @throws ShortUuidError (INVALID_UUID) if the text is not a UUID
 *
 * @example
 * ```ts
 * uuidToBigInt("00000000-0000-0000-0000-0000000000ff") // 255n
 * ```
 */
export function uuidToBigInt(uuid: Uuid): bigint {
  if (!isUuid(uuid)) {
    throw new ShortUuidError(`Invalid UUID: '${uuid}'`, "INVALID_UUID", { uuid });
  }
  return BigInt(`0x${uuid.replace(/-/g, "")}`);
}

/**
 * Format a 128-bit value as canonical lowercase UUID text.
 *
 * @throws ShortUuidError (VALUE_OUT_OF_RANGE) outside 0 .. 2^128 - 1
 */
export function bigIntToUuid(value: bigint): Uuid {
  if (value < 0n || value > SHORTUUID_CONFIG.MAX_UUID_VALUE) {
    throw new ShortUuidError(
      "Value out of range: a UUID holds exactly 128 bits",
      "VALUE_OUT_OF_RANGE",
      { value: value.toString(16) }
    );
  }

  const hex = value.toString(16).padStart(SHORTUUID_CONFIG.UUID_HEX_LENGTH, "0");
  const groups: string[] = [];
  let start = 0;

  for (const end of [...SHORTUUID_CONFIG.UUID_GROUP_BOUNDARIES, SHORTUUID_CONFIG.UUID_HEX_LENGTH]) {
    groups.push(hex.slice(start, end));
    start = end;
  }

  return groups.join("-");
}

// =============================================================================
// SECTION 2: BASE-N
// =============================================================================

/**
 * Minimum code length that holds all 128 bits of a UUID:
 * ceil(log(256) / log(size) * 16).
 *
 * @throws ShortUuidError (INVALID_ALPHABET) for sizes below 2
 *
 * @example
 * ```ts
 * calculateLength(16) // 32
 * calculateLength(58) // 22
 * calculateLength(62) // 22
 * ```
 */
export function calculateLength(alphabetSize: number): number {
  if (!Number.isInteger(alphabetSize) || alphabetSize < SHORTUUID_CONFIG.MIN_ALPHABET_SIZE) {
    throw new ShortUuidError(
      `Alphabet size must be an integer of at least ${SHORTUUID_CONFIG.MIN_ALPHABET_SIZE}, got ${alphabetSize}`,
      "INVALID_ALPHABET",
      { size: alphabetSize }
    );
  }

  const factor = Math.log(256) / Math.log(alphabetSize);
  return Math.ceil(factor * SHORTUUID_CONFIG.UUID_BYTES);
}

function assertLength(length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new ShortUuidError(
      `Length must be a non-negative integer, got ${length}`,
      "INVALID_LENGTH",
      { length }
    );
  }
}

/**
 * Write a non-negative integer in base = alphabet size, least-significant
 * digit first.
 *
 * Without `length` the natural digits are returned (zero is ""). With
 * `length` the result is padded or truncated as described at the top of
 * this file.
 *
 * @example
 * ```ts
 * toBaseN(6n, "01")     // "011"
 * toBaseN(6n, "01", 5)  // "01100"
 * toBaseN(6n, "01", 2)  // "01"
 * ```
 */
export function toBaseN(
  value: bigint,
  alphabet: AlphabetInput = defaultAlphabet(),
  length?: number
): string {
  if (value < 0n) {
    throw new ShortUuidError("Cannot encode a negative value", "VALUE_OUT_OF_RANGE", {
      value: value.toString(),
    });
  }
  if (length !== undefined) {
    assertLength(length);
  }

  const digits = Alphabet.from(alphabet);
  const encoded: string[] = [];
  let remaining = value;

  while (remaining > 0n) {
    encoded.push(digits.characterAt(Number(remaining % digits.base)));
    remaining /= digits.base;
  }

  if (length === undefined) {
    return encoded.join("");
  }

  while (encoded.length < length) {
    encoded.push(digits.characterAt(0));
  }

  return encoded.slice(0, length).join("");
}

/**
 * Read a least-significant-digit-first string back into an integer.
 *
 * The result is unbounded; range checks belong to the caller.
 *
 * @throws ShortUuidError (INVALID_CHARACTER) naming the first character that
 *   is not in the alphabet and its position
 */
export function fromBaseN(code: string, alphabet: AlphabetInput = defaultAlphabet()): bigint {
  const digits = Alphabet.from(alphabet);
  let sum = 0n;
  let place = 1n;

  for (const [position, char] of Array.from(code).entries()) {
    const digit = digits.digitOf(char);
    if (digit === undefined) {
      throw new ShortUuidError(
        `Invalid character '${char}' at position ${position}`,
        "INVALID_CHARACTER",
        { character: char, position }
      );
    }

    sum += BigInt(digit) * place;
    place *= digits.base;
  }

  return sum;
}

// =============================================================================
// SECTION 3: CODEC
// =============================================================================

/**
 * Encode a UUID as a short code.
 *
 * @param uuid - UUID text (hyphenated or compact, any case)
 * @param alphabet - Digit set (default: 58-character alphabet)
 * @param length - Output length (default: lossless length for the alphabet).
 *   Shorter lengths are accepted and lose the high-order digits.
 * @returns Exactly `length` alphabet characters
 *
 * @example
 * ```ts
 * encode("123e4567-e89b-12d3-a456-426614174000") // "fkn2bydeDFVvMwv43KGfF3"
 * ```
 */
export function encode(
  uuid: Uuid,
  alphabet: AlphabetInput = defaultAlphabet(),
  length?: number
): string {
  const digits = Alphabet.from(alphabet);
  return toBaseN(uuidToBigInt(uuid), digits, length ?? calculateLength(digits.size));
}

/**
 * Decode a short code back into canonical UUID text.
 *
 * The alphabet must be the one used to encode. A different alphabet that
 * happens to contain every character decodes to a different UUID without
 * error.
 *
 * @throws ShortUuidError (INVALID_CHARACTER) for characters outside the alphabet
 * @throws ShortUuidError (VALUE_OUT_OF_RANGE) if the value needs more than 128 bits
 *
 * @example
 * ```ts
 * decode("fkn2bydeDFVvMwv43KGfF3") // "123e4567-e89b-12d3-a456-426614174000"
 * decode("")                       // "00000000-0000-0000-0000-000000000000"
 * ```
 */
export function decode(code: string, alphabet: AlphabetInput = defaultAlphabet()): Uuid {
  return bigIntToUuid(fromBaseN(code, alphabet));
}

/**
 * Encode a fresh random UUID (default: at the lossless length).
 */
export function generate(alphabet: AlphabetInput = defaultAlphabet(), length?: number): string {
  return encode(randomUUID(), alphabet, length);
}

/**
 * Validate a short code without throwing.
 *
 * Rules:
 * - Exactly `length` characters, when a length is given
 * - Only alphabet characters
 * - Value fits in 128 bits
 *
 * @example
 * ```ts
 * validateShortCode("fkn2bydeDFVvMwv43KGfF3", undefined, 22) // { valid: true }
 * validateShortCode("0OIl")  // { valid: false, error: "Invalid character '0' at position 0" }
 * ```
 */
export function validateShortCode(
  code: string,
  alphabet: AlphabetInput = defaultAlphabet(),
  length?: number
): ValidationResult {
  const digits = Alphabet.from(alphabet);
  const chars = Array.from(code);

  if (length !== undefined && chars.length !== length) {
    return {
      valid: false,
      error: `Short code must be exactly ${length} characters`,
    };
  }

  for (const [position, char] of chars.entries()) {
    if (!digits.has(char)) {
      return {
        valid: false,
        error: `Invalid character '${char}' at position ${position}`,
      };
    }
  }

  if (fromBaseN(code, digits) > SHORTUUID_CONFIG.MAX_UUID_VALUE) {
    return {
      valid: false,
      error: "Short code does not fit in 128 bits",
    };
  }

  return { valid: true };
}

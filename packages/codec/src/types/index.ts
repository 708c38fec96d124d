/**
 * Codec Type Definitions
 */

import type { Logger } from "@uuid-shortener/logger";
import type { Alphabet } from "../alphabet.js";
import type { ShortUuid } from "../short-uuid.js";

// =============================================================================
// Value Types
// =============================================================================

/**
 * Canonical UUID text: 8-4-4-4-12 lowercase hex digits.
 * Inputs may also be uppercase or unhyphenated.
 */
export type Uuid = string;

/**
 * Anything an Alphabet can be built from. Arrays are copied, so later
 * mutation by the caller has no effect.
 */
export type AlphabetInput = string | readonly string[] | Alphabet;

/**
 * Result of a non-throwing validation
 */
export interface ValidationResult {
  /** Whether the input is valid */
  valid: boolean;
  /** Human-readable error message if invalid */
  error?: string;
}

// =============================================================================
// Bound Codec
// =============================================================================

export interface CodecOptions {
  /** Digit set (default: 58-character alphabet) */
  alphabet?: AlphabetInput;

  /** Fixed output length (default: lossless length for the alphabet) */
  length?: number;

  /** Logger for configuration diagnostics (default: "codec" logger) */
  logger?: Logger;
}

/**
 * Resolved configuration read from the environment
 */
export interface CodecConfig {
  alphabet: string;
  length: number | undefined;
}

/**
 * A codec bound to one alphabet and one output length.
 */
export interface ShortUuidCodec {
  readonly alphabet: Alphabet;
  readonly length: number;

  /** False when `length` truncates some UUIDs */
  readonly lossless: boolean;

  encode(uuid: Uuid): string;
  decode(code: string): Uuid;
  generate(): string;
  validate(code: string): ValidationResult;

  /** Encode into a ShortUuid value carrying this codec's alphabet */
  shortUuid(uuid: Uuid): ShortUuid;
}

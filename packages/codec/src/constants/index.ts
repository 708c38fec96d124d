/**
 * Codec Configuration Constants
 *
 * Single source of truth for the fixed parameters of the UUID codec.
 */
export const SHORTUUID_CONFIG = {
  /**
   * Default alphabet: 1-9, A-Z without I/O, a-z without l.
   * 58 characters, none of them visually ambiguous.
   * Order defines digit values and must never change.
   */
  DEFAULT_ALPHABET: "123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz",

  /** An alphabet needs at least two digits for base conversion */
  MIN_ALPHABET_SIZE: 2,

  /** Bytes in a UUID; log(256^16) is the information content to encode */
  UUID_BYTES: 16,

  /** Hex digits in a UUID without separators */
  UUID_HEX_LENGTH: 32,

  /** Hex-digit offsets after which canonical text carries a hyphen */
  UUID_GROUP_BOUNDARIES: [8, 12, 16, 20],

  /** Largest 128-bit value: ffffffff-ffff-ffff-ffff-ffffffffffff */
  MAX_UUID_VALUE: (1n << 128n) - 1n,

  /** The all-zero UUID */
  NIL_UUID: "00000000-0000-0000-0000-000000000000",
} as const;

/**
 * Environment variables read by loadCodecConfig().
 */
export const CONFIG_ENV = {
  ALPHABET: "SHORTUUID_ALPHABET",
  LENGTH: "SHORTUUID_LENGTH",
} as const;

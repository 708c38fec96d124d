/**
 * @uuid-shortener/codec - Public API
 *
 * Converts UUIDs to short codes over any alphabet and back.
 * This is the ONLY public entry point of the package; do not deep-import.
 *
 * ```ts
 * import { encode, decode, ShortUuid, createCodec } from "@uuid-shortener/codec";
 * ```
 */

// Types (Uuid, AlphabetInput, CodecOptions, ShortUuidCodec, ...)
export * from "./types/index.js";

// Constants (SHORTUUID_CONFIG, CONFIG_ENV)
export * from "./constants/index.js";

// Errors
export { ShortUuidError, isShortUuidError } from "./errors.js";
export type { ShortUuidErrorCode, ShortUuidErrorDetails } from "./errors.js";

// Alphabet model
export { Alphabet, defaultAlphabet } from "./alphabet.js";

// Core codec functions (encode, decode, calculateLength, base-N helpers)
export * from "./utils/index.js";

// Value object
export { ShortUuid } from "./short-uuid.js";

// Bound codec and environment configuration
export { createCodec } from "./codec.js";
export { loadCodecConfig, createCodecFromEnv } from "./config.js";

/**
 * Bound Codec
 *
 * Validates alphabet and length once, then hands out encode/decode closures
 * over them. Use this where one service encodes many UUIDs the same way.
 *
 * @example
 * ```ts
 * const codec = createCodec({ alphabet: "0123456789abcdefghijklmnopqrstuvwxyz" });
 * const code = codec.encode(uuid); // 25 characters
 * codec.decode(code) === uuid;     // true
 * ```
 */

import { z } from "zod";
import { createLogger, type Logger } from "@uuid-shortener/logger";
import { Alphabet, defaultAlphabet } from "./alphabet.js";
import { ShortUuidError } from "./errors.js";
import { ShortUuid } from "./short-uuid.js";
import type { CodecOptions, ShortUuidCodec } from "./types/index.js";
import {
  calculateLength,
  decode,
  encode,
  generate,
  validateShortCode,
} from "./utils/shortuuid.js";

const lengthSchema = z
  .number({ invalid_type_error: "Length must be a number" })
  .int("Length must be an integer")
  .nonnegative("Length must not be negative")
  .optional();

let codecLogger: Logger | undefined;

function defaultLogger(): Logger {
  if (!codecLogger) {
    codecLogger = createLogger("codec");
  }
  return codecLogger;
}

/**
 * Create a codec bound to one alphabet and length.
 *
 * A length below calculateLength(alphabet size) is allowed but lossy; a
 * warning is logged once here rather than on every encode.
 *
 * @throws ShortUuidError (INVALID_ALPHABET | INVALID_LENGTH)
 */
export function createCodec(options: CodecOptions = {}): ShortUuidCodec {
  const alphabet = Alphabet.from(options.alphabet ?? defaultAlphabet());
  const minimumLength = calculateLength(alphabet.size);

  const parsedLength = lengthSchema.safeParse(options.length);
  if (!parsedLength.success) {
    const reasons = parsedLength.error.issues.map((issue) => issue.message).join("; ");
    throw new ShortUuidError(`Invalid length: ${reasons}`, "INVALID_LENGTH", {
      length: String(options.length),
    });
  }

  const length = parsedLength.data ?? minimumLength;
  const lossless = length >= minimumLength;
  const log = options.logger ?? defaultLogger();

  log.debug({ alphabetSize: alphabet.size, length, lossless }, "Codec created");

  if (!lossless) {
    log.warn(
      { alphabetSize: alphabet.size, length, minimumLength },
      "Code length is below the lossless minimum; decoding will not restore the original UUID"
    );
  }

  return {
    alphabet,
    length,
    lossless,
    encode: (uuid) => encode(uuid, alphabet, length),
    decode: (code) => decode(code, alphabet),
    generate: () => generate(alphabet, length),
    validate: (code) => validateShortCode(code, alphabet, length),
    shortUuid: (uuid) => ShortUuid.encode(uuid, alphabet, length),
  };
}

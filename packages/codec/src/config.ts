/**
 * Configuration Module
 *
 * Loads codec settings from environment variables.
 * Fails fast: a bad alphabet or length is an error at startup, not at the
 * first encode.
 */

import { z } from "zod";
import type { Logger } from "@uuid-shortener/logger";
import { Alphabet } from "./alphabet.js";
import { createCodec } from "./codec.js";
import { CONFIG_ENV, SHORTUUID_CONFIG } from "./constants/index.js";
import { ShortUuidError, isShortUuidError } from "./errors.js";
import type { CodecConfig, ShortUuidCodec } from "./types/index.js";

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Get optional environment variable with default.
 */
function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

/**
 * Get optional environment variable, undefined when unset or empty.
 */
function optionalRaw(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

const configSchema = z.object({
  alphabet: z.string(),
  length: z.coerce
    .number()
    .int(`${CONFIG_ENV.LENGTH} must be an integer`)
    .nonnegative(`${CONFIG_ENV.LENGTH} must not be negative`)
    .optional(),
});

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load codec configuration from the environment.
 *
 * @returns Alphabet (default when unset) and length (undefined = lossless)
 * @throws ShortUuidError (INVALID_CONFIG) naming the offending variable
 */
export function loadCodecConfig(env: Env = process.env): CodecConfig {
  const parsed = configSchema.safeParse({
    alphabet: optional(env, CONFIG_ENV.ALPHABET, SHORTUUID_CONFIG.DEFAULT_ALPHABET),
    length: optionalRaw(env, CONFIG_ENV.LENGTH),
  });

  if (!parsed.success) {
    const reasons = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new ShortUuidError(`Invalid configuration: ${reasons}`, "INVALID_CONFIG", {
      variable: CONFIG_ENV.LENGTH,
    });
  }

  try {
    Alphabet.from(parsed.data.alphabet);
  } catch (error) {
    if (isShortUuidError(error)) {
      throw new ShortUuidError(
        `Invalid configuration: ${CONFIG_ENV.ALPHABET}: ${error.message}`,
        "INVALID_CONFIG",
        { variable: CONFIG_ENV.ALPHABET }
      );
    }
    throw error;
  }

  return {
    alphabet: parsed.data.alphabet,
    length: parsed.data.length,
  };
}

/**
 * Create a codec from environment configuration.
 */
export function createCodecFromEnv(env: Env = process.env, logger?: Logger): ShortUuidCodec {
  const config = loadCodecConfig(env);
  return createCodec({ alphabet: config.alphabet, length: config.length, logger });
}

/**
 * Alphabet Model
 *
 * An alphabet is the digit set of the base-N representation: the character
 * at position i denotes digit value i. Instances are immutable and own a
 * private copy of their characters, so a caller mutating the array it passed
 * in cannot change how existing short codes decode.
 *
 * Characters are Unicode code points, not UTF-16 units.
 */

import { z } from "zod";
import { SHORTUUID_CONFIG } from "./constants/index.js";
import { ShortUuidError } from "./errors.js";
import type { AlphabetInput } from "./types/index.js";

// =============================================================================
// Validation Schema
// =============================================================================

const characterSchema = z
  .string()
  .refine((char) => Array.from(char).length === 1, {
    message: "Alphabet entries must be single characters",
  });

const alphabetSchema = z
  .array(characterSchema)
  .min(
    SHORTUUID_CONFIG.MIN_ALPHABET_SIZE,
    `Alphabet must contain at least ${SHORTUUID_CONFIG.MIN_ALPHABET_SIZE} characters`
  )
  .superRefine((chars, ctx) => {
    const firstSeen = new Map<string, number>();

    chars.forEach((char, index) => {
      const first = firstSeen.get(char);
      if (first === undefined) {
        firstSeen.set(char, index);
        return;
      }

      // A repeated character would make digit lookup ambiguous
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate character '${char}' at positions ${first} and ${index}`,
        path: [index],
      });
    });
  });

// =============================================================================
// Alphabet
// =============================================================================

export class Alphabet {
  /** Digit characters, index = digit value */
  readonly characters: readonly string[];

  /** Number of digits (the base) */
  readonly size: number;

  /** The base as a bigint, for arithmetic */
  readonly base: bigint;

  private readonly digits: ReadonlyMap<string, number>;

  private constructor(characters: readonly string[]) {
    this.characters = Object.freeze([...characters]);
    this.size = characters.length;
    this.base = BigInt(characters.length);
    this.digits = new Map(characters.map((char, index) => [char, index]));
  }

  /**
   * Build a validated alphabet.
   *
   * @throws ShortUuidError (INVALID_ALPHABET) for fewer than 2 characters,
   *   multi-character entries or duplicates
   *
   * @example
   * ```ts
   * Alphabet.from("0123456789abcdef").size  // 16
   * Alphabet.from("abca")                   // throws: Duplicate character 'a'
   * ```
   */
  static from(input: AlphabetInput): Alphabet {
    if (input instanceof Alphabet) {
      return input;
    }

    const chars = typeof input === "string" ? Array.from(input) : [...input];
    const parsed = alphabetSchema.safeParse(chars);

    if (!parsed.success) {
      const reasons = parsed.error.issues.map((issue) => issue.message).join("; ");
      throw new ShortUuidError(`Invalid alphabet: ${reasons}`, "INVALID_ALPHABET", {
        alphabet: chars.join(""),
      });
    }

    return new Alphabet(parsed.data);
  }

  /**
   * Character for a digit value.
   */
  characterAt(digit: number): string {
    if (!Number.isInteger(digit) || digit < 0 || digit >= this.size) {
      throw new RangeError(`Digit ${digit} is outside alphabet of size ${this.size}`);
    }
    return this.characters[digit];
  }

  /**
   * Digit value of a character, or undefined if it is not in the alphabet.
   */
  digitOf(char: string): number | undefined {
    return this.digits.get(char);
  }

  has(char: string): boolean {
    return this.digits.has(char);
  }

  toString(): string {
    return this.characters.join("");
  }
}

// =============================================================================
// Default Alphabet
// =============================================================================

let defaultInstance: Alphabet | undefined;

/**
 * The shared 58-character default alphabet.
 */
export function defaultAlphabet(): Alphabet {
  if (!defaultInstance) {
    defaultInstance = Alphabet.from(SHORTUUID_CONFIG.DEFAULT_ALPHABET);
  }
  return defaultInstance;
}

/**
 * ShortUuid Value Object
 *
 * A short code together with the alphabet it was written in. Identity is the
 * visible string only: two instances with the same text are equal and hash
 * the same, whichever alphabet instance produced them.
 *
 * @example
 * ```ts
 * const id = ShortUuid.random();
 * id.toString(); // e.g. "fkn2bydeDFVvMwv43KGfF3"
 * id.decode();   // the original UUID
 *
 * const hex = ShortUuid.random("abcdef1234567890");
 * hex.decode();  // decodes with the alphabet it was built with
 * ```
 */

import { Alphabet, defaultAlphabet } from "./alphabet.js";
import type { AlphabetInput, Uuid } from "./types/index.js";
import { decode, encode, generate } from "./utils/shortuuid.js";

export class ShortUuid {
  private readonly value: string;
  private readonly alphabet: Alphabet;

  /**
   * Wrap an existing short code. The text is not checked until decode().
   */
  constructor(value: string, alphabet: AlphabetInput = defaultAlphabet()) {
    this.value = value;
    this.alphabet = Alphabet.from(alphabet);
  }

  static random(alphabet: AlphabetInput = defaultAlphabet()): ShortUuid {
    const digits = Alphabet.from(alphabet);
    return new ShortUuid(generate(digits), digits);
  }

  static encode(uuid: Uuid, alphabet: AlphabetInput = defaultAlphabet(), length?: number): ShortUuid {
    const digits = Alphabet.from(alphabet);
    return new ShortUuid(encode(uuid, digits, length), digits);
  }

  static decode(code: string, alphabet: AlphabetInput = defaultAlphabet()): Uuid {
    return decode(code, alphabet);
  }

  /**
   * The UUID this code stands for, decoded with the code's own alphabet.
   */
  decode(): Uuid {
    return decode(this.value, this.alphabet);
  }

  /** Code length in characters */
  get length(): number {
    return Array.from(this.value).length;
  }

  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof ShortUuid)) return false;
    return other.toString() === this.value;
  }

  /**
   * 32-bit string hash (h = 31 * h + unit), stable across processes.
   */
  hashCode(): number {
    let hash = 0;
    for (let i = 0; i < this.value.length; i++) {
      hash = (Math.imul(31, hash) + this.value.charCodeAt(i)) | 0;
    }
    return hash;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

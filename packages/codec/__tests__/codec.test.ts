/**
 * Bound Codec Tests
 *
 * @see packages/codec/src/codec.ts
 */

import { describe, it, expect, afterEach, jest } from "@jest/globals";
import { createLogger, type Logger } from "@uuid-shortener/logger";
import { createCodec, ShortUuid, ShortUuidError } from "../src/index.js";

const SAMPLE_UUID = "123e4567-e89b-12d3-a456-426614174000";
const HEX_ALPHABET = "abcdef1234567890";
const LOWERCASE_ALPHABET = "abcdefghijklmnopqrstuvwxyz";

interface CapturedLogger {
  logger: Logger;
  entries: () => Array<Record<string, unknown>>;
}

/**
 * Logger writing JSON lines to memory instead of stdout.
 */
function captureLogger(): CapturedLogger {
  const lines: string[] = [];
  const logger = createLogger("codec-test", {
    level: "debug",
    destination: {
      write: (line: string) => {
        lines.push(line);
      },
    },
  });

  return {
    logger,
    entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

function codecError(fn: () => unknown): ShortUuidError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ShortUuidError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a ShortUuidError to be thrown");
}

describe("createCodec", () => {
  describe("defaults", () => {
    it("should use the default alphabet at its lossless length", () => {
      const { logger } = captureLogger();
      const codec = createCodec({ logger });

      expect(codec.alphabet.size).toBe(58);
      expect(codec.length).toBe(22);
      expect(codec.lossless).toBe(true);
      expect(codec.encode(SAMPLE_UUID)).toBe("fkn2bydeDFVvMwv43KGfF3");
      expect(codec.decode("fkn2bydeDFVvMwv43KGfF3")).toBe(SAMPLE_UUID);
    });

    it("should log its configuration at debug level", () => {
      const { logger, entries } = captureLogger();
      createCodec({ logger });

      expect(entries()).toHaveLength(1);
      expect(entries()[0]).toMatchObject({
        level: "debug",
        msg: "Codec created",
        alphabetSize: 58,
        length: 22,
        lossless: true,
      });
    });
  });

  describe("custom settings", () => {
    it("should bind a custom alphabet", () => {
      const { logger } = captureLogger();
      const codec = createCodec({ alphabet: HEX_ALPHABET, logger });

      expect(codec.length).toBe(32);
      expect(codec.encode(SAMPLE_UUID)).toBe("aaae2beb11ce1fe5d8cb643921fe9dcb");
      expect(codec.decode("aaae2beb11ce1fe5d8cb643921fe9dcb")).toBe(SAMPLE_UUID);
    });

    it("should pad codes longer than the lossless length", () => {
      const { logger } = captureLogger();
      const codec = createCodec({ alphabet: HEX_ALPHABET, length: 34, logger });
      const code = codec.encode(SAMPLE_UUID);

      expect(code).toBe("aaae2beb11ce1fe5d8cb643921fe9dcbaa");
      expect(codec.decode(code)).toBe(SAMPLE_UUID);
      expect(codec.lossless).toBe(true);
    });

    it("should warn once when the length is lossy", () => {
      const { logger, entries } = captureLogger();
      const codec = createCodec({ alphabet: LOWERCASE_ALPHABET, length: 12, logger });

      expect(codec.lossless).toBe(false);
      expect(codec.encode(SAMPLE_UUID)).toBe("gvgktqtryuau");
      codec.encode(SAMPLE_UUID);

      const warnings = entries().filter((entry) => entry.level === "warn");
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toMatchObject({
        alphabetSize: 26,
        length: 12,
        minimumLength: 28,
      });
    });
  });

  describe("bound operations", () => {
    it("should generate codes of the bound length", () => {
      const { logger } = captureLogger();
      const codec = createCodec({ alphabet: HEX_ALPHABET, length: 10, logger });
      const code = codec.generate();

      expect(code).toHaveLength(10);
      expect(codec.validate(code)).toEqual({ valid: true });
    });

    it("should validate against the bound length", () => {
      const { logger } = captureLogger();
      const codec = createCodec({ logger });

      expect(codec.validate("fkn2b")).toEqual({
        valid: false,
        error: "Short code must be exactly 22 characters",
      });
    });

    it("should build ShortUuid values with its alphabet", () => {
      const { logger } = captureLogger();
      const codec = createCodec({ alphabet: HEX_ALPHABET, logger });
      const shortUuid = codec.shortUuid(SAMPLE_UUID);

      expect(shortUuid.equals(ShortUuid.encode(SAMPLE_UUID, HEX_ALPHABET))).toBe(true);
      expect(shortUuid.decode()).toBe(SAMPLE_UUID);
    });
  });

  describe("option validation", () => {
    it.each([-1, 2.5, Number.NaN])("should reject length %p", (length) => {
      const { logger } = captureLogger();
      expect(codecError(() => createCodec({ length, logger })).code).toBe("INVALID_LENGTH");
    });

    it("should explain an invalid length", () => {
      const { logger } = captureLogger();
      expect(codecError(() => createCodec({ length: -1, logger })).message).toBe(
        "Invalid length: Length must not be negative"
      );
    });

    it("should reject invalid alphabets", () => {
      const { logger } = captureLogger();
      expect(codecError(() => createCodec({ alphabet: "aa", logger })).code).toBe("INVALID_ALPHABET");
    });
  });
});

describe("module loading", () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    if (originalEnv === undefined) {
      delete process.env.NODE_ENV;
    } else {
      process.env.NODE_ENV = originalEnv;
    }
  });

  it("should not create a logger transport on import in development", () => {
    process.env.NODE_ENV = "development";
    const messagePorts = () =>
      process.getActiveResourcesInfo().filter((resource) => resource === "MessagePort").length;
    const before = messagePorts();

    jest.isolateModules(() => {
      require("../src/index");
    });

    expect(messagePorts()).toBe(before);
  });
});

import { describe, it, expect, vi } from "vitest";
import {
  ConfigError,
  DuplicateOptionError,
  ExpectedOptionError,
  InvalidOptionKeyError,
  MissingValueError,
  UnexpectedValueError,
  UnknownOptionError,
} from "@dashopt/sdk";
import type { ParseResult } from "@dashopt/sdk";
import type { Logger } from "@dashopt/shared";
import { createOptionParser } from "./option-parser.js";

function createTestLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
    setContext: vi.fn(),
    time: () => () => 0,
  };
  return logger;
}

function expectFailure(result: ParseResult) {
  if (result.success) {
    throw new Error("expected parse to fail");
  }
  return result.error;
}

describe("OptionParser", () => {
  describe("successful parses", () => {
    it("succeeds on empty input", () => {
      const parser = createOptionParser();
      parser.declare("v");
      const result = parser.parse([]);
      expect(result.success).toBe(true);
      expect(parser.has("v")).toBe(false);
    });

    it("reports exactly the keys that appeared", () => {
      const parser = createOptionParser();
      parser.declare("h");
      parser.declare("v");
      parser.declare("f", true);

      const result = parser.parse(["-v", "-fin.txt"]);

      expect(result.success).toBe(true);
      expect(parser.has("v")).toBe(true);
      expect(parser.has("f")).toBe(true);
      expect(parser.has("h")).toBe(false);
    });

    it("returns an inline value once", () => {
      const parser = createOptionParser();
      parser.declare("f", true);
      parser.parse(["-fhello"]);

      expect(parser.has("f")).toBe(true);
      expect(parser.popValue("f")).toBe("hello");
      expect(parser.popValue("f")).toBeUndefined();
      expect(parser.has("f")).toBe(false);
    });

    it("drains a repeated option in arrival order", () => {
      const parser = createOptionParser();
      parser.declare("f", true);
      const result = parser.parse(["-fa", "-fb"]);
      expect(result.success).toBe(true);

      const values: Array<string | undefined> = [];
      while (parser.has("f")) {
        values.push(parser.popValue("f"));
      }
      expect(values).toEqual(["a", "b"]);
    });

    it("records flags without a value", () => {
      const parser = createOptionParser();
      parser.declare("v");
      const result = parser.parse(["-v", "-v"]);

      if (!result.success) throw result.error;
      expect(result.options.pending()).toEqual([{ key: "v" }, { key: "v" }]);
      expect(result.options.count("v")).toBe(2);
    });

    it("exposes the same store through the result and the parser", () => {
      const parser = createOptionParser();
      parser.declare("f", true);
      const result = parser.parse(["-fa", "-fb"]);

      if (!result.success) throw result.error;
      expect(result.options.popValue("f")).toBe("a");
      expect(parser.popValue("f")).toBe("b");
      expect(parser.has("f")).toBe(false);
    });

    it("has() is idempotent", () => {
      const parser = createOptionParser();
      parser.declare("v");
      parser.declare("f", true);
      parser.parse(["-v", "-fx"]);

      for (let i = 0; i < 3; i++) {
        expect(parser.has("v")).toBe(true);
        expect(parser.has("f")).toBe(true);
      }
      expect(parser.popValue("f")).toBe("x");
    });

    it("never consumes the next token as a value", () => {
      const parser = createOptionParser();
      parser.declare("f", true);
      const error = expectFailure(parser.parse(["-f", "hello"]));
      expect(error).toBeInstanceOf(MissingValueError);
    });

    it("uses the first declaration of a duplicated key", () => {
      const parser = createOptionParser();
      parser.declare("f", true);
      parser.declare("f", false);

      expect(parser.parse(["-fvalue"]).success).toBe(true);
      expect(parser.popValue("f")).toBe("value");
    });

    it("clears declarations after a successful parse", () => {
      const parser = createOptionParser();
      parser.declare("v");
      expect(parser.parse(["-v"]).success).toBe(true);

      const error = expectFailure(parser.parse(["-v"]));
      expect(error).toBeInstanceOf(UnknownOptionError);
    });
  });

  describe("parse errors", () => {
    it("fails with ExpectedOption for a token without a dash", () => {
      const parser = createOptionParser();
      parser.declare("v");
      const error = expectFailure(parser.parse(["bare"]));

      expect(error).toBeInstanceOf(ExpectedOptionError);
      expect(error.kind).toBe("expected-option");
      expect(error.token).toBe("bare");
      expect(error.message).toBe('Expected an option, found "bare"');
    });

    it("fails with ExpectedOption for an empty token and a lone dash", () => {
      const parser = createOptionParser();
      parser.declare("v");
      expect(expectFailure(parser.parse([""])).kind).toBe("expected-option");
      expect(expectFailure(parser.parse(["-"])).token).toBe("-");
    });

    it("fails with UnknownOption for an undeclared key", () => {
      const parser = createOptionParser();
      parser.declare("v");
      const error = expectFailure(parser.parse(["-x"]));

      expect(error).toBeInstanceOf(UnknownOptionError);
      expect(error instanceof UnknownOptionError && error.key).toBe("x");
      expect(error.message).toBe('Unknown option "-x"');
    });

    it("fails with UnexpectedValue for an inline value on a flag", () => {
      const parser = createOptionParser();
      parser.declare("v");
      const error = expectFailure(parser.parse(["-vyes"]));

      expect(error).toBeInstanceOf(UnexpectedValueError);
      expect(error instanceof UnexpectedValueError && error.key).toBe("v");
      expect(error.token).toBe("-vyes");
    });

    it("fails with MissingValue for a value option without inline value", () => {
      const parser = createOptionParser();
      parser.declare("f", true);
      const error = expectFailure(parser.parse(["-f"]));

      expect(error).toBeInstanceOf(MissingValueError);
      expect(error instanceof MissingValueError && error.key).toBe("f");
      expect(error.message).toBe('Option "-f" expects a value');
    });

    it("stops at the first bad token", () => {
      const parser = createOptionParser();
      parser.declare("v");
      const error = expectFailure(parser.parse(["-v", "-x", "bare"]));
      expect(error.kind).toBe("unknown-option");
    });

    it("publishes no partial results and keeps declarations", () => {
      const parser = createOptionParser();
      parser.declare("v");
      parser.declare("f", true);

      expectFailure(parser.parse(["-v", "-f"]));
      expect(parser.has("v")).toBe(false);

      const retry = parser.parse(["-v", "-fok"]);
      expect(retry.success).toBe(true);
      expect(parser.popValue("f")).toBe("ok");
    });

    it("drops the previous store after a failed parse", () => {
      const parser = createOptionParser();
      parser.declare("v");
      parser.parse(["-v"]);
      expect(parser.has("v")).toBe(true);

      expectFailure(parser.parse(["-v"]));
      expect(parser.has("v")).toBe(false);
    });
  });

  describe("declarations", () => {
    it("rejects multi-character keys", () => {
      const parser = createOptionParser();
      expect(() => parser.declare("file", true)).toThrow(InvalidOptionKeyError);
    });

    it("rejects duplicates under the reject policy", () => {
      const parser = createOptionParser({ duplicateKeys: "reject" });
      parser.declare("f", true);
      expect(() => parser.declare("f")).toThrow(DuplicateOptionError);
    });

    it("declareAll() declares validated entries in order", () => {
      const parser = createOptionParser();
      parser.declareAll([{ key: "v" }, { key: "f", expectsValue: true }]);

      expect(parser.parse(["-v", "-fa"]).success).toBe(true);
      expect(parser.popValue("f")).toBe("a");
    });

    it("declareAll() throws ConfigError on invalid input", () => {
      const parser = createOptionParser();
      expect(() => parser.declareAll([{ key: "verbose" }])).toThrow(
        "Invalid option declarations: 0.key: Option key must be a single character",
      );
      expect(() => parser.declareAll({ key: "v" })).toThrow(ConfigError);
    });

    it("declareAll() declares nothing when a duplicate is rejected", () => {
      const parser = createOptionParser({ duplicateKeys: "reject" });
      expect(() =>
        parser.declareAll([{ key: "v" }, { key: "f", expectsValue: true }, { key: "v" }]),
      ).toThrow(DuplicateOptionError);

      const error = expectFailure(parser.parse(["-v"]));
      expect(error).toBeInstanceOf(UnknownOptionError);
    });
  });

  describe("configuration", () => {
    it("throws ConfigError for an unknown duplicate policy", () => {
      const options = JSON.parse('{"duplicateKeys":"last-wins"}');
      expect(() => createOptionParser(options)).toThrow(ConfigError);
    });

    it("reports the validation code", () => {
      try {
        createOptionParser(JSON.parse('{"duplicateKeys":1}'));
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        expect(err instanceof ConfigError && err.code).toBe("CONFIG_VALIDATION_ERROR");
      }
    });
  });

  describe("debug tracing", () => {
    it("traces recognized options and values", () => {
      const logger = createTestLogger();
      const parser = createOptionParser({ logger });
      parser.declare("v");
      parser.declare("f", true);
      parser.parse(["-v", "-fdata"]);

      expect(logger.debug).toHaveBeenCalledWith("Found option", { key: "v" });
      expect(logger.debug).toHaveBeenCalledWith("Found option", { key: "f" });
      expect(logger.debug).toHaveBeenCalledWith("Found value", { key: "f", value: "data" });
      expect(logger.debug).toHaveBeenCalledWith("Parsed arguments", { count: 2 });
    });

    it("traces the failing token without printing the error", () => {
      const logger = createTestLogger();
      const parser = createOptionParser({ logger });
      parser.parse(["-x"]);

      expect(logger.debug).toHaveBeenCalledWith("Parse failed", {
        code: "UNKNOWN_OPTION",
        token: "-x",
      });
      expect(logger.error).not.toHaveBeenCalled();
    });
  });
});

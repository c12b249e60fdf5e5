/**
 * OptionParser — short-flag parser with inline values.
 *
 * Usage:
 *   const parser = createOptionParser();
 *   parser.declare("v");
 *   parser.declare("f", true);
 *   const result = parser.parse(process.argv.slice(2));
 *   if (!result.success) { console.error(result.error.message); ... }
 *   while (parser.has("f")) handle(parser.popValue("f"));
 *
 * The scan stops at the first bad token and returns the error as data.
 * Declarations are cleared after a successful parse only.
 */

import type {
  DuplicateKeyPolicy,
  IOptionParser,
  IParsedOptions,
  ParsedOccurrence,
  ParseResult,
} from "@dashopt/sdk";
import {
  ConfigError,
  DuplicateOptionError,
  ErrorCode,
  ExpectedOptionError,
  MissingValueError,
  UnexpectedValueError,
  UnknownOptionError,
} from "@dashopt/sdk";
import {
  createLogger,
  OptionDeclarationsSchema,
  ParserConfigSchema,
  validateInput,
  type Logger,
} from "@dashopt/shared";
import { createOptionRegistry } from "../registry/option-registry.js";
import { createParsedOptions } from "../result/parsed-options.js";
import { readOptionToken } from "./token.js";

export interface ParserOptions {
  /** Default "first-wins". */
  duplicateKeys?: DuplicateKeyPolicy;
  /** Receives debug traces of each recognized token. */
  logger?: Logger;
}

export function createOptionParser(options: ParserOptions = {}): IOptionParser {
  const { logger = createLogger("dashopt:parser"), ...config } = options;
  const validated = validateInput(ParserConfigSchema, config);
  if (!validated.success) {
    throw new ConfigError(`Invalid parser options: ${validated.error}`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }

  const duplicateKeys = validated.data.duplicateKeys;
  const registry = createOptionRegistry({ duplicateKeys, logger: logger.child("registry") });
  let current: IParsedOptions = createParsedOptions();

  function scan(args: readonly string[]): ParseResult {
    const occurrences: ParsedOccurrence[] = [];

    for (const token of args) {
      const optionToken = readOptionToken(token);
      if (!optionToken) {
        return { success: false, error: new ExpectedOptionError(token) };
      }

      const { key, inlineValue } = optionToken;
      const spec = registry.find(key);
      if (!spec) {
        return { success: false, error: new UnknownOptionError(key, token) };
      }
      logger.debug("Found option", { key });

      if (inlineValue !== undefined && !spec.expectsValue) {
        return { success: false, error: new UnexpectedValueError(key, token) };
      }
      if (inlineValue === undefined && spec.expectsValue) {
        return { success: false, error: new MissingValueError(key, token) };
      }

      if (inlineValue !== undefined) {
        logger.debug("Found value", { key, value: inlineValue });
        occurrences.push({ key, value: inlineValue });
      } else {
        occurrences.push({ key });
      }
    }

    return { success: true, options: createParsedOptions(occurrences) };
  }

  return {
    declare(key: string, expectsValue = false): void {
      registry.declare(key, expectsValue);
    },

    declareAll(declarations: unknown): void {
      const result = validateInput(OptionDeclarationsSchema, declarations);
      if (!result.success) {
        throw new ConfigError(`Invalid option declarations: ${result.error}`, {
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
        });
      }

      if (duplicateKeys === "reject") {
        const seen = new Set<string>();
        for (const { key } of result.data) {
          if (seen.has(key) || registry.find(key)) {
            throw new DuplicateOptionError(key);
          }
          seen.add(key);
        }
      }

      for (const { key, expectsValue } of result.data) {
        registry.declare(key, expectsValue);
      }
    },

    parse(args: readonly string[]): ParseResult {
      const stop = logger.time("parse");
      const result = scan(args);
      stop();

      if (!result.success) {
        current = createParsedOptions();
        logger.debug("Parse failed", { code: result.error.code, token: result.error.token });
        return result;
      }

      current = result.options;
      registry.clear();
      logger.debug("Parsed arguments", { count: result.options.size });
      return result;
    },

    has(key: string): boolean {
      return current.has(key);
    },

    popValue(key: string): string | undefined {
      return current.popValue(key);
    },
  };
}

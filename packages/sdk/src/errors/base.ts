/**
 * Error hierarchy for option declaration and parsing.
 */

import { ErrorCode } from "./codes.js";

export class OptionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "OptionError";
  }
}

export type ParseErrorKind =
  | "expected-option"
  | "unknown-option"
  | "unexpected-value"
  | "missing-value";

/**
 * Failure of a single parse call. Returned as data from parse(), never thrown.
 * `token` is the argument that stopped the scan.
 */
export abstract class OptionParseError extends OptionError {
  abstract readonly kind: ParseErrorKind;

  constructor(
    public readonly token: string,
    message: string,
    code: string,
  ) {
    super(message, code);
    this.name = "OptionParseError";
  }
}

export class ExpectedOptionError extends OptionParseError {
  readonly kind = "expected-option";

  constructor(token: string) {
    super(token, `Expected an option, found "${token}"`, ErrorCode.EXPECTED_OPTION);
    this.name = "ExpectedOptionError";
  }
}

export class UnknownOptionError extends OptionParseError {
  readonly kind = "unknown-option";

  constructor(
    public readonly key: string,
    token: string = `-${key}`,
  ) {
    super(token, `Unknown option "-${key}"`, ErrorCode.UNKNOWN_OPTION);
    this.name = "UnknownOptionError";
  }
}

export class UnexpectedValueError extends OptionParseError {
  readonly kind = "unexpected-value";

  constructor(
    public readonly key: string,
    token: string,
  ) {
    super(token, `Option "-${key}" doesn't expect a value`, ErrorCode.UNEXPECTED_VALUE);
    this.name = "UnexpectedValueError";
  }
}

export class MissingValueError extends OptionParseError {
  readonly kind = "missing-value";

  constructor(
    public readonly key: string,
    token: string = `-${key}`,
  ) {
    super(token, `Option "-${key}" expects a value`, ErrorCode.MISSING_VALUE);
    this.name = "MissingValueError";
  }
}

/**
 * Thrown by declare() when the key is not exactly one character.
 */
export class InvalidOptionKeyError extends OptionError {
  constructor(public readonly key: string) {
    super(`Option key must be a single character, got "${key}"`, ErrorCode.INVALID_OPTION_KEY);
    this.name = "InvalidOptionKeyError";
  }
}

/**
 * Thrown by declare() under the "reject" duplicate-key policy.
 */
export class DuplicateOptionError extends OptionError {
  constructor(public readonly key: string) {
    super(`Option "-${key}" is already declared`, ErrorCode.DUPLICATE_OPTION);
    this.name = "DuplicateOptionError";
  }
}

export class ConfigError extends OptionError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

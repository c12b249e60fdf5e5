/**
 * Option declaration, parse result and parser contracts.
 * Implementations live in packages/core.
 */

import type { OptionParseError } from "../errors/base.js";

/** A declared option. `key` is a single character. */
export interface OptionSpec {
  readonly key: string;
  readonly expectsValue: boolean;
}

/**
 * One recognized option token. `value` is set only when the matching
 * spec expects a value.
 */
export interface ParsedOccurrence {
  readonly key: string;
  readonly value?: string;
}

/** How declare() treats a key that is already declared. */
export type DuplicateKeyPolicy = "first-wins" | "reject";

/**
 * Declarations consulted by parse(). Cleared wholesale after a successful parse.
 */
export interface IOptionRegistry {
  /** Append a spec. Throws InvalidOptionKeyError / DuplicateOptionError. */
  declare(key: string, expectsValue?: boolean): void;

  /** First-declared spec for the key, or undefined. */
  find(key: string): OptionSpec | undefined;

  /** Declared specs in declaration order. */
  list(): OptionSpec[];

  clear(): void;

  readonly size: number;
}

/**
 * Pending occurrences produced by one successful parse.
 */
export interface IParsedOptions {
  /** True if at least one occurrence of the key is pending. Never mutates. */
  has(key: string): boolean;

  /**
   * Remove the oldest pending occurrence of the key and return its value.
   * Returns undefined when nothing is pending or the occurrence has no value.
   */
  popValue(key: string): string | undefined;

  /** Number of pending occurrences of the key. */
  count(key: string): number;

  /** All pending occurrences in arrival order. */
  pending(): ParsedOccurrence[];

  readonly size: number;
}

export type ParseResult =
  | { success: true; options: IParsedOptions }
  | { success: false; error: OptionParseError };

export interface IOptionParser {
  declare(key: string, expectsValue?: boolean): void;

  /** Validate and declare a list of `{ key, expectsValue? }` objects. */
  declareAll(declarations: unknown): void;

  /** Parse the argument vector, program name already stripped. */
  parse(args: readonly string[]): ParseResult;

  /** Query the store of the most recent successful parse. */
  has(key: string): boolean;
  popValue(key: string): string | undefined;
}

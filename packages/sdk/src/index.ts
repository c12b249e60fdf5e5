// Types
export type {
  OptionSpec,
  ParsedOccurrence,
  DuplicateKeyPolicy,
  IOptionRegistry,
  IParsedOptions,
  IOptionParser,
  ParseResult,
} from "./types/option.js";

// Errors
export {
  OptionError,
  OptionParseError,
  ExpectedOptionError,
  UnknownOptionError,
  UnexpectedValueError,
  MissingValueError,
  InvalidOptionKeyError,
  DuplicateOptionError,
  ConfigError,
} from "./errors/base.js";
export type { ParseErrorKind } from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";

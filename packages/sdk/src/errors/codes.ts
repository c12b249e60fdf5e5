/**
 * Error code constants shared by every OptionError subclass.
 */

export const ErrorCode = {
  EXPECTED_OPTION: "EXPECTED_OPTION",
  UNKNOWN_OPTION: "UNKNOWN_OPTION",
  UNEXPECTED_VALUE: "UNEXPECTED_VALUE",
  MISSING_VALUE: "MISSING_VALUE",
  INVALID_OPTION_KEY: "INVALID_OPTION_KEY",
  DUPLICATE_OPTION: "DUPLICATE_OPTION",
  CONFIG_ERROR: "CONFIG_ERROR",
  CONFIG_VALIDATION_ERROR: "CONFIG_VALIDATION_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

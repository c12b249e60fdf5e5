export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  DuplicateKeyPolicySchema,
  ParserConfigSchema,
  OptionDeclarationSchema,
  OptionDeclarationsSchema,
} from "./utils/config-schema.js";
export type {
  ValidatedParserConfig,
  ValidatedOptionDeclaration,
} from "./utils/config-schema.js";

// Parser
export { createOptionParser } from "./parser/option-parser.js";
export type { ParserOptions } from "./parser/option-parser.js";
export { readOptionToken } from "./parser/token.js";
export type { OptionToken } from "./parser/token.js";

// Registry
export { createOptionRegistry } from "./registry/option-registry.js";
export type { OptionRegistryOptions } from "./registry/option-registry.js";

// Results
export { createParsedOptions } from "./result/parsed-options.js";

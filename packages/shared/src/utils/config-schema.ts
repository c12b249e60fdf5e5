/**
 * Zod schemas for parser options and option declaration lists.
 *
 * Declaration lists are what a caller loads from JSON instead of
 * calling declare() by hand.
 */

import { z } from "zod";

export const DuplicateKeyPolicySchema = z.enum(["first-wins", "reject"]);

export const ParserConfigSchema = z.object({
  duplicateKeys: DuplicateKeyPolicySchema.optional().default("first-wins"),
});

export const OptionDeclarationSchema = z.object({
  key: z.string().length(1, "Option key must be a single character"),
  expectsValue: z.boolean().optional().default(false),
});

export const OptionDeclarationsSchema = z.array(OptionDeclarationSchema);

export type ValidatedParserConfig = z.infer<typeof ParserConfigSchema>;
export type ValidatedOptionDeclaration = z.infer<typeof OptionDeclarationSchema>;

/**
 * Demo caller — declares -h, -v and -f<file>, parses, then queries.
 *
 *   dashopt-demo -h               → usage
 *   dashopt-demo -v               → version
 *   dashopt-demo -fa.txt -fb.txt  → processing 'a.txt', processing 'b.txt'
 */

import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { createOptionParser } from "@dashopt/core";
import { createLogger, validateInput } from "@dashopt/shared";

export const PROGRAM_NAME = "dashopt-demo";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const PackageJsonSchema = z.object({ version: z.string() });

export function readVersion(pkgPath = resolve(__dirname, "../package.json")): string {
  try {
    const result = validateInput(PackageJsonSchema, JSON.parse(readFileSync(pkgPath, "utf-8")));
    return result.success ? result.data.version : "unknown";
  } catch {
    return "unknown";
  }
}

export function printUsage(): void {
  console.log(`Usage: ${PROGRAM_NAME} [OPTION]`);
  console.log("  -h        show this help message");
  console.log("  -v        show version information");
  console.log("  -f<file>  process <file> (repeatable)");
}

/** Run the demo against argv (program name stripped). Returns the exit code. */
export function runDemo(argv: readonly string[]): number {
  const logger = createLogger(PROGRAM_NAME);
  logger.setContext({ program: PROGRAM_NAME });

  const parser = createOptionParser({ logger: logger.child("parser") });
  parser.declare("h");
  parser.declare("v");
  parser.declare("f", true);

  const result = parser.parse(argv);
  if (!result.success) {
    console.error(`${PROGRAM_NAME}: ${result.error.message}`);
    console.error(`Try '${PROGRAM_NAME} -h' for more information.`);
    return 1;
  }

  if (parser.has("h")) {
    printUsage();
    return 0;
  }

  if (parser.has("v")) {
    console.log(`${PROGRAM_NAME} v${readVersion()}`);
  }

  let processed = 0;
  while (parser.has("f")) {
    const filename = parser.popValue("f");
    console.log(`processing '${filename}'`);
    processed++;
  }
  logger.debug("Done", { processed });

  return 0;
}

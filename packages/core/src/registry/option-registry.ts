/**
 * OptionRegistry — declarations consulted by the parser.
 *
 * Duplicate keys are appended but never shadow the first declaration:
 * find() always returns the first-declared spec for a key. Under the
 * "reject" policy a duplicate throws instead.
 */

import type { DuplicateKeyPolicy, IOptionRegistry, OptionSpec } from "@dashopt/sdk";
import { DuplicateOptionError, InvalidOptionKeyError } from "@dashopt/sdk";
import { createLogger, type Logger } from "@dashopt/shared";

export interface OptionRegistryOptions {
  duplicateKeys?: DuplicateKeyPolicy;
  logger?: Logger;
}

export function createOptionRegistry(options: OptionRegistryOptions = {}): IOptionRegistry {
  const duplicateKeys = options.duplicateKeys ?? "first-wins";
  const logger = options.logger ?? createLogger("dashopt:registry");
  let specs: OptionSpec[] = [];
  const byKey = new Map<string, OptionSpec>();

  return {
    declare(key: string, expectsValue = false): void {
      if (key.length !== 1) {
        throw new InvalidOptionKeyError(key);
      }

      const spec: OptionSpec = { key, expectsValue };
      if (byKey.has(key)) {
        if (duplicateKeys === "reject") {
          throw new DuplicateOptionError(key);
        }
        logger.debug(`Duplicate declaration of -${key} ignored by lookup`, { key });
      } else {
        byKey.set(key, spec);
      }
      specs.push(spec);
    },

    find(key: string): OptionSpec | undefined {
      return byKey.get(key);
    },

    list(): OptionSpec[] {
      return [...specs];
    },

    clear(): void {
      specs = [];
      byKey.clear();
    },

    get size(): number {
      return specs.length;
    },
  };
}

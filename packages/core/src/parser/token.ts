/**
 * Short-option token reader.
 *
 * Accepted forms:
 *   -v        → { key: "v" }
 *   -fhello   → { key: "f", inlineValue: "hello" }
 *
 * Anything shorter than two characters or without a leading dash is not
 * an option token. `--name` reads as key "-" with inline value "name";
 * long options are not recognized.
 */

export interface OptionToken {
  key: string;
  inlineValue?: string;
}

export function readOptionToken(token: string): OptionToken | undefined {
  if (token.length < 2 || token[0] !== "-") {
    return undefined;
  }

  const key = token[1];
  if (token.length === 2) {
    return { key };
  }
  return { key, inlineValue: token.slice(2) };
}

/**
 * Tokenizer for comma-separated parameter value lists.
 *
 * A backslash escapes a comma or another backslash (`\,` and `\\`).
 * Any other backslash sequence is kept verbatim, so `\n` stays two
 * characters long.
 */

const SEPARATOR = ',';
const ESCAPE = '\\';

/**
 * Split a raw value list into its tokens.
 *
 * The last buffer is always emitted, so the empty string yields `['']`
 * and a leading or trailing comma yields an empty token on that side.
 * The result always has `count(unescaped commas) + 1` entries.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let buffer = '';

  const chars = input[Symbol.iterator]();
  for (let next = chars.next(); !next.done; next = chars.next()) {
    const char = next.value;

    if (char === ESCAPE) {
      const escaped = chars.next();
      if (escaped.done) {
        buffer += ESCAPE;
        break;
      }
      if (escaped.value === SEPARATOR || escaped.value === ESCAPE) {
        buffer += escaped.value;
      } else {
        buffer += ESCAPE + escaped.value;
      }
      continue;
    }

    if (char === SEPARATOR) {
      tokens.push(buffer);
      buffer = '';
      continue;
    }

    buffer += char;
  }

  tokens.push(buffer);
  return tokens;
}

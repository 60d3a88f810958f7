/**
 * Low-level case conversion utilities.
 *
 * These functions perform the raw lowerCamelCase transformation used by
 * `toElementName`. They know nothing about markup rules (leading digits,
 * renames) - use `toElementName` / `domKey` or the NamingManager instead.
 */

/** Anything that is neither alphabetic nor numeric separates words */
const SEPARATOR = /[^\p{Alphabetic}\p{N}]/u;

const LOWERCASE = /^\p{Lowercase}$/u;
const UPPERCASE = /^\p{Uppercase}$/u;

type WordMode = 'boundary' | 'lowercase' | 'uppercase';

function isLowercase(char: string): boolean {
  return LOWERCASE.test(char);
}

function isUppercase(char: string): boolean {
  return UPPERCASE.test(char);
}

/**
 * Split an identifier into words
 *
 * Words are separated by non-alphanumeric characters and by case changes:
 * - lower -> upper starts a new word ("myPlaylist" -> "my", "Playlist")
 * - the last capital of an upper-case run followed by a lower-case letter
 *   starts a new word ("HTTPServer" -> "HTTP", "Server")
 *
 * Digits and other caseless characters stay in the current word.
 *
 * @example
 * splitWords('field_name')   // ['field', 'name']
 * splitWords('HTTPServer')   // ['HTTP', 'Server']
 * splitWords('field2Name')   // ['field2', 'Name']
 * splitWords('__')           // []
 */
export function splitWords(str: string): string[] {
  const words: string[] = [];

  for (const segment of str.split(SEPARATOR)) {
    // Work on code points so astral characters are never cut in half
    const chars = Array.from(segment);
    let start = 0;
    let mode: WordMode = 'boundary';

    chars.forEach((current, index) => {
      const next = chars[index + 1];

      // Trailing characters form the last word of the segment
      if (next === undefined) {
        words.push(chars.slice(start).join(''));
        return;
      }

      const nextMode: WordMode = isLowercase(current)
        ? 'lowercase'
        : isUppercase(current)
          ? 'uppercase'
          : mode;

      if (nextMode === 'lowercase' && isUppercase(next)) {
        // Boundary after the current character
        words.push(chars.slice(start, index + 1).join(''));
        start = index + 1;
        mode = 'boundary';
      } else if (mode === 'uppercase' && isUppercase(current) && isLowercase(next)) {
        // Boundary before the current character
        words.push(chars.slice(start, index).join(''));
        start = index;
        mode = 'boundary';
      } else {
        mode = nextMode;
      }
    });
  }

  return words;
}

/**
 * Upper-case the first character, lower-case the rest
 *
 * @example
 * capitalize('playlist')  // 'Playlist'
 * capitalize('HTTP')      // 'Http'
 */
export function capitalize(word: string): string {
  const [first, ...rest] = Array.from(word);
  if (first === undefined) return word;

  return first.toUpperCase() + rest.join('').toLowerCase();
}

/**
 * Convert any identifier to lowerCamelCase
 *
 * @example
 * toLowerCamelCase('MyPlaylist')  // 'myPlaylist'
 * toLowerCamelCase('field_name')  // 'fieldName'
 * toLowerCamelCase('XML_HTTP')    // 'xmlHttp'
 * toLowerCamelCase('myPlaylist')  // 'myPlaylist' (no change)
 */
export function toLowerCamelCase(str: string): string {
  return splitWords(str)
    .map((word, index) => (index === 0 ? word.toLowerCase() : capitalize(word)))
    .join('');
}

/**
 * Element and attribute names for markup serialization.
 *
 * lowerCamelCase is the default convention, as in most XML vocabularies
 * (SVG, Atom):
 * - `Banana`      -> `<banana>`
 * - `MyPlaylist`  -> `<myPlaylist>`
 * - `field_name`  -> `<fieldName>`
 * - tuple field 0 -> `<_0>` (names cannot start with a digit)
 */

import { toLowerCamelCase } from './converters.js';
import type { ElementName } from './types.js';
import { startsWithAsciiDigit } from './validators.js';

function borrowed(value: string): ElementName {
  const result: ElementName = { kind: 'borrowed', value };
  return Object.freeze(result);
}

function owned(value: string): ElementName {
  const result: ElementName = { kind: 'owned', value };
  return Object.freeze(result);
}

/**
 * Convert an identifier to an element name, reporting whether the input
 * could be reused unchanged
 *
 * Identifiers starting with an ASCII digit (tuple fields like "0", "1") are
 * prefixed with an underscore and not case-converted. Everything else goes
 * through lowerCamelCase.
 *
 * @example
 * convertElementName('myPlaylist')  // { kind: 'borrowed', value: 'myPlaylist' }
 * convertElementName('MyPlaylist')  // { kind: 'owned', value: 'myPlaylist' }
 * convertElementName('0')           // { kind: 'owned', value: '_0' }
 */
export function convertElementName(name: string): ElementName {
  if (startsWithAsciiDigit(name)) {
    return owned(`_${name}`);
  }

  let converted = toLowerCamelCase(name);
  // Dropping leading separators can expose a digit ("_0" -> "0")
  if (startsWithAsciiDigit(converted)) {
    converted = `_${converted}`;
  }

  return converted === name ? borrowed(name) : owned(converted);
}

/**
 * Convert an identifier to a valid element name in lowerCamelCase
 *
 * @example
 * toElementName('Banana')      // 'banana'
 * toElementName('field_name')  // 'fieldName'
 * toElementName('0')           // '_0'
 */
export function toElementName(name: string): string {
  return convertElementName(name).value;
}

/**
 * Resolve the key for a field, keeping track of reuse
 *
 * An explicit rename wins and is used verbatim; otherwise the raw name is
 * converted with `convertElementName`.
 */
export function resolveFieldKey(name: string, rename?: string): ElementName {
  if (rename !== undefined) {
    return borrowed(rename);
  }
  return convertElementName(name);
}

/**
 * Compute the element/attribute key for a field
 *
 * @param name - Raw field identifier
 * @param rename - Explicit rename (attribute or rename-all result), used as-is
 *
 * @example
 * domKey('field_name')            // 'fieldName'
 * domKey('field_name', 'custom')  // 'custom'
 */
export function domKey(name: string, rename?: string): string {
  return resolveFieldKey(name, rename).value;
}

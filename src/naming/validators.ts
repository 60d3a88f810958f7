/**
 * Validation functions for element names.
 *
 * Only the leading-character rule is checked: markup names must not be
 * empty and must not start with an ASCII digit. The rest of the XML name
 * grammar is left to the serializer.
 */

import type { FieldKey, ValidationResult } from './types.js';

/**
 * Check if a name starts with an ASCII digit (0-9)
 *
 * Digits from other scripts do not count.
 *
 * @example
 * startsWithAsciiDigit('0')      // true
 * startsWithAsciiDigit('_0')     // false
 * startsWithAsciiDigit('٣') // false (Arabic-Indic three)
 */
export function startsWithAsciiDigit(name: string): boolean {
  const first = name.charCodeAt(0);
  return first >= 0x30 && first <= 0x39;
}

/**
 * Validate an element or attribute name
 *
 * @example
 * validateElementName('fieldName')  // { valid: true, errors: [] }
 * validateElementName('0')          // { valid: false, errors: [...] }
 */
export function validateElementName(name: string): ValidationResult {
  const errors: string[] = [];

  if (name.length === 0) {
    errors.push('Element name cannot be empty');
  }

  if (startsWithAsciiDigit(name)) {
    errors.push(`Element name '${name}' must not start with a digit`);
  }

  return Object.freeze({
    valid: errors.length === 0,
    errors: Object.freeze(errors),
  });
}

/**
 * Check that no two fields resolve to the same key
 *
 * @example
 * validateFieldKeys([
 *   { name: 'field_name', key: 'fieldName', source: 'convention' },
 *   { name: 'fieldName', key: 'fieldName', source: 'convention' },
 * ])
 * // { valid: false, errors: ["Duplicate key 'fieldName' for fields: field_name, fieldName"] }
 */
export function validateFieldKeys(keys: readonly FieldKey[]): ValidationResult {
  const fieldsByKey = new Map<string, string[]>();

  for (const field of keys) {
    const fields = fieldsByKey.get(field.key);
    if (fields) {
      fields.push(field.name);
    } else {
      fieldsByKey.set(field.key, [field.name]);
    }
  }

  const errors: string[] = [];
  for (const [key, fields] of fieldsByKey) {
    if (fields.length > 1) {
      errors.push(`Duplicate key '${key}' for fields: ${fields.join(', ')}`);
    }
  }

  return Object.freeze({
    valid: errors.length === 0,
    errors: Object.freeze(errors),
  });
}

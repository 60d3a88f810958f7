import { describe, expect, test } from 'vitest';
import { startsWithAsciiDigit, validateElementName, validateFieldKeys } from '../validators.js';

describe('startsWithAsciiDigit', () => {
  test('detects leading ASCII digits', () => {
    expect(startsWithAsciiDigit('0')).toBe(true);
    expect(startsWithAsciiDigit('9abc')).toBe(true);
  });

  test('ignores other leading characters', () => {
    expect(startsWithAsciiDigit('_0')).toBe(false);
    expect(startsWithAsciiDigit('a1')).toBe(false);
    expect(startsWithAsciiDigit('')).toBe(false);
  });

  test('ignores digits from other scripts', () => {
    expect(startsWithAsciiDigit('٣')).toBe(false);
    expect(startsWithAsciiDigit('３')).toBe(false);
  });
});

describe('validateElementName', () => {
  test('accepts valid names', () => {
    expect(validateElementName('fieldName')).toEqual({ valid: true, errors: [] });
    expect(validateElementName('_0')).toEqual({ valid: true, errors: [] });
  });

  test('rejects empty names', () => {
    expect(validateElementName('')).toEqual({
      valid: false,
      errors: ['Element name cannot be empty'],
    });
  });

  test('rejects names starting with a digit', () => {
    expect(validateElementName('0')).toEqual({
      valid: false,
      errors: ["Element name '0' must not start with a digit"],
    });
  });

  test('returns frozen results', () => {
    const result = validateElementName('');
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.errors)).toBe(true);
  });
});

describe('validateFieldKeys', () => {
  test('accepts distinct keys', () => {
    const result = validateFieldKeys([
      { name: 'field_name', key: 'fieldName', source: 'convention' },
      { name: '0', key: '_0', source: 'convention' },
    ]);
    expect(result).toEqual({ valid: true, errors: [] });
  });

  test('reports fields sharing a key', () => {
    const result = validateFieldKeys([
      { name: 'field_name', key: 'fieldName', source: 'convention' },
      { name: 'fieldName', key: 'fieldName', source: 'convention' },
      { name: 'other', key: 'other', source: 'convention' },
    ]);
    expect(result).toEqual({
      valid: false,
      errors: ["Duplicate key 'fieldName' for fields: field_name, fieldName"],
    });
  });

  test('reports renames clashing with converted names', () => {
    const result = validateFieldKeys([
      { name: 'a', rename: 'b', key: 'b', source: 'rename' },
      { name: 'b', key: 'b', source: 'convention' },
    ]);
    expect(result.errors).toEqual(["Duplicate key 'b' for fields: a, b"]);
  });
});

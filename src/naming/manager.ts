/**
 * Naming manager for element and attribute names.
 *
 * Serializers call this once per structure, field and variant, so results are
 * memoized per raw identifier.
 *
 * Features:
 * - Immutable result objects
 * - Duplicate key detection per structure
 * - Memoization
 *
 * @example
 * const naming = getNamingManager();
 * const names = naming.getStructureNames({
 *   name: 'MyPlaylist',
 *   fields: [{ name: 'track_list', rename: 'tracks' }, { name: 'created_at' }],
 * });
 * console.log(names.element);          // 'myPlaylist'
 * console.log(names.fields[0]?.key);   // 'tracks' (explicit rename)
 * console.log(names.fields[1]?.key);   // 'createdAt'
 */

import { debugLog, debugVerbose } from '../utils/debug.js';
import { convertElementName } from './element-name.js';
import type {
  ElementName,
  FieldDescriptor,
  FieldKey,
  StructureDescriptor,
  StructureNames,
} from './types.js';
import { validateFieldKeys } from './validators.js';

/**
 * Naming manager class - resolves and caches element names
 */
export class NamingManager {
  private elementCache = new Map<string, ElementName>();

  /**
   * Convert a raw identifier to its element name
   *
   * @example
   * manager.getElementName('MyPlaylist')  // 'myPlaylist'
   * manager.getElementName('1')           // '_1'
   */
  getElementName(name: string): string {
    return this.resolveElementName(name).value;
  }

  /**
   * Convert a raw identifier, keeping track of whether it was reused unchanged
   *
   * @example
   * manager.resolveElementName('fieldName')   // { kind: 'borrowed', value: 'fieldName' }
   * manager.resolveElementName('field_name')  // { kind: 'owned', value: 'fieldName' }
   */
  resolveElementName(name: string): ElementName {
    const cached = this.elementCache.get(name);
    if (cached) return cached;

    const result = convertElementName(name);
    debugVerbose(`Element name '${name}' -> '${result.value}' (${result.kind})`);

    this.elementCache.set(name, result);
    return result;
  }

  /**
   * Resolve the key for a field
   *
   * @example
   * manager.getFieldKey({ name: 'field_name' })
   * // { name: 'field_name', key: 'fieldName', source: 'convention' }
   *
   * manager.getFieldKey({ name: 'field_name', rename: 'custom' })
   * // { name: 'field_name', rename: 'custom', key: 'custom', source: 'rename' }
   */
  getFieldKey(field: FieldDescriptor): FieldKey {
    const result: FieldKey =
      field.rename !== undefined
        ? { name: field.name, rename: field.rename, key: field.rename, source: 'rename' }
        : { name: field.name, key: this.getElementName(field.name), source: 'convention' };

    return Object.freeze(result);
  }

  /**
   * Resolve the element name of a structure and the keys of all its fields
   *
   * @throws Error if two fields resolve to the same key
   */
  getStructureNames(structure: StructureDescriptor): StructureNames {
    const fields = Object.freeze(structure.fields.map((field) => this.getFieldKey(field)));

    const validation = validateFieldKeys(fields);
    if (!validation.valid) {
      throw new Error(
        `Conflicting field keys in '${structure.name}': ${validation.errors.join('; ')}`,
      );
    }

    debugLog(`Resolved ${fields.length} field key(s) for ${structure.name}`);

    return Object.freeze({
      name: structure.name,
      element: this.getElementName(structure.name),
      fields,
    });
  }

  /**
   * Clear all caches (useful for testing)
   */
  clearCache(): void {
    this.elementCache.clear();
  }

  /**
   * Number of cached identifiers
   */
  get cacheSize(): number {
    return this.elementCache.size;
  }
}

/**
 * Global singleton instance
 */
let globalInstance: NamingManager | undefined;

/**
 * Get global NamingManager instance
 */
export function getNamingManager(): NamingManager {
  if (!globalInstance) {
    globalInstance = new NamingManager();
  }
  return globalInstance;
}

/**
 * Reset global instance (for testing)
 */
export function resetNamingManager(): void {
  globalInstance = undefined;
}

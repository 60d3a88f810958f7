/**
 * Element and attribute naming for markup serialization
 *
 * Collaborators (serializers walking a structure's fields) call in here for
 * every name they emit. Nothing in this module does I/O or keeps state beyond
 * the NamingManager's memo cache.
 *
 * @example
 * import { domKey, toElementName } from './naming/index.js';
 *
 * toElementName('MyPlaylist');            // 'myPlaylist'
 * toElementName('0');                     // '_0'
 * domKey('field_name');                   // 'fieldName'
 * domKey('field_name', 'custom');         // 'custom'
 */

// Conversion utilities (for advanced use cases)
export { capitalize, splitWords, toLowerCamelCase } from './converters.js';
// Element names and field keys
export { convertElementName, domKey, resolveFieldKey, toElementName } from './element-name.js';
// Cached manager
export { getNamingManager, NamingManager, resetNamingManager } from './manager.js';
// Type definitions
export type {
  ElementName,
  FieldDescriptor,
  FieldKey,
  StructureDescriptor,
  StructureNames,
  ValidationResult,
} from './types.js';
// Validation functions
export { startsWithAsciiDigit, validateElementName, validateFieldKeys } from './validators.js';

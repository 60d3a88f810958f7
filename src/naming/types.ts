/**
 * Type definitions for markup name resolution.
 *
 * All resolution results are immutable objects of these types.
 */

/**
 * Result of converting an identifier to an element name.
 *
 * `borrowed` means the input already was the element name and is handed back
 * as-is; `owned` means a new string was built.
 */
export type ElementName =
  | { readonly kind: 'borrowed'; readonly value: string }
  | { readonly kind: 'owned'; readonly value: string };

/**
 * A field as seen by the serializer: its raw identifier plus an optional
 * explicit rename (from an attribute or a rename-all rule applied upstream).
 */
export interface FieldDescriptor {
  /** Raw identifier: "field_name", or a tuple index such as "0" */
  readonly name: string;

  /** Explicit element name, used verbatim when present */
  readonly rename?: string;
}

/**
 * A structure (or variant) and its fields
 */
export interface StructureDescriptor {
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
}

/**
 * Resolved key for a single field
 */
export interface FieldKey {
  /** Raw identifier: "track_list" */
  readonly name: string;

  /** Explicit rename, if one was given: "tracks" */
  readonly rename?: string;

  /** Element/attribute name to emit: "tracks" */
  readonly key: string;

  /** Where the key came from */
  readonly source: 'rename' | 'convention';
}

/**
 * Resolved names for a structure and all of its fields
 */
export interface StructureNames {
  /** Raw structure name: "MyPlaylist" */
  readonly name: string;

  /** Element name of the structure: "myPlaylist" */
  readonly element: string;

  readonly fields: readonly FieldKey[];
}

/**
 * Validation result
 */
export interface ValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import type { StructureDescriptor } from '../naming/types.js';
import { debugLog } from '../utils/debug.js';
import { validateStructureDocument } from './schema-validator.js';

/**
 * Read and validate a structure document from disk
 *
 * @throws Error if the file is missing, is not JSON, or does not match the schema
 */
export async function readStructureDocument(filePath: string): Promise<StructureDescriptor> {
  if (!existsSync(filePath)) {
    throw new Error(`Structure document '${filePath}' not found`);
  }

  const content = await readFile(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Invalid JSON in '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = validateStructureDocument(parsed);
  if (!result.valid) {
    throw new Error(
      `Invalid structure document '${filePath}':\n${result.errors.map((e) => `  - ${e}`).join('\n')}`,
    );
  }

  debugLog(`Loaded structure '${result.document.name}' from ${filePath}`);
  return result.document;
}

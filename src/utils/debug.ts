/**
 * Debug utility for markup-names
 * Controlled by MARKUP_NAMES_DEBUG environment variable:
 * - 0 or undefined: No debug output (default)
 * - 1: Basic debug information
 * - 2: Detailed debug information including every name conversion
 */

const DEBUG_LEVEL = parseInt(process.env.MARKUP_NAMES_DEBUG || '0', 10);

export function debugLog(message: string, ...args: unknown[]): void {
  if (DEBUG_LEVEL > 0) {
    console.error(`[MARKUP-NAMES] ${message}`, ...args);
  }
}

export function debugVerbose(message: string, ...args: unknown[]): void {
  if (DEBUG_LEVEL >= 2) {
    console.error(`[MARKUP-NAMES:VERBOSE] ${message}`, ...args);
  }
}

export function debugError(message: string, error: unknown): void {
  if (DEBUG_LEVEL > 0) {
    console.error(`[MARKUP-NAMES:ERROR] ${message}`);
    if (error instanceof Error) {
      console.error(`  Message: ${error.message}`);
      if (DEBUG_LEVEL >= 2 && error.stack) {
        console.error(`  Stack: ${error.stack}`);
      }
    } else {
      console.error(`  Error: ${String(error)}`);
    }
  }
}

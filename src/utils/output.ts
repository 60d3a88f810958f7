/**
 * Output manager for controlling console output verbosity
 *
 * Supports three levels:
 * - quiet: Only errors and command results
 * - normal: Errors, info, and command results (default)
 * - verbose: All output including debug messages
 */

export type OutputLevel = 'quiet' | 'normal' | 'verbose';

class OutputManager {
  private static instance: OutputManager | null = null;
  private level: OutputLevel = 'normal';

  private constructor() {
    // Check environment variables
    if (process.env.MARKUP_NAMES_QUIET === '1') {
      this.level = 'quiet';
    } else if (process.env.MARKUP_NAMES_VERBOSE === '1') {
      this.level = 'verbose';
    }
  }

  static getInstance(): OutputManager {
    if (!OutputManager.instance) {
      OutputManager.instance = new OutputManager();
    }
    return OutputManager.instance;
  }

  /**
   * Set output level (CLI flags override environment variables)
   */
  setLevel(level: OutputLevel): void {
    this.level = level;
  }

  /**
   * Command result - always shown, goes to stdout
   */
  result(message: string): void {
    console.log(message);
  }

  /**
   * Info message - shown in normal and verbose modes
   */
  info(message: string): void {
    if (this.level !== 'quiet') {
      console.error(message);
    }
  }

  /**
   * Error message - always shown
   */
  error(message: string): void {
    console.error(message);
  }

  /**
   * Debug message - only shown in verbose mode
   */
  debug(message: string): void {
    if (this.level === 'verbose') {
      console.error(`[DEBUG] ${message}`);
    }
  }
}

// Export singleton instance
export const output = OutputManager.getInstance();

/**
 * Output manager for controlling console output verbosity
 *
 * Supports three levels:
 * - quiet: Only errors and command results
 * - normal: Errors, warnings, and command results (default)
 * - verbose: All output including resolved options
 */

export type OutputLevel = 'quiet' | 'normal' | 'verbose';

class OutputManager {
  private static instance: OutputManager | null = null;
  private level: OutputLevel = 'normal';

  private constructor() {
    // Check environment variables
    if (process.env.GROUPNAME_QUIET === '1') {
      this.level = 'quiet';
    } else if (process.env.GROUPNAME_VERBOSE === '1') {
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
   * Command result - always shown, one value per line
   */
  result(value: string): void {
    console.log(value);
  }

  /**
   * Warning message - shown in normal and verbose modes
   */
  warn(message: string): void {
    if (this.level !== 'quiet') {
      console.warn(message);
    }
  }

  /**
   * Error message - always shown
   */
  error(message: string): void {
    console.error(message);
  }

  /**
   * Verbose message - only shown in verbose mode
   */
  verbose(message: string): void {
    if (this.level === 'verbose') {
      console.error(message);
    }
  }
}

// Export singleton instance
export const output = OutputManager.getInstance();

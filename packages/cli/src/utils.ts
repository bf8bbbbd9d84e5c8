import chalk from 'chalk';

/**
 * Wrap a command action so a thrown error is printed in red and turns into
 * exit code 1 instead of a stack trace.
 */
export function withErrorHandling<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    }
  };
}

/** True when prompts can be shown: stdin is a terminal, or the user asked for prompts anyway. */
export function isInteractive(forced: boolean | undefined): boolean {
  return forced === true || process.stdin.isTTY === true;
}

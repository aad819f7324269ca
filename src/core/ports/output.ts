/**
 * Output Port Interface
 *
 * Everything a command shows the user goes through here; diagnostics go to
 * the logger instead.
 *
 * Implementations:
 *   - createClackOutput (TTY): @clack/prompts
 *   - consoleOutput (pipes, CI): plain lines, errors on stderr
 */

/**
 * Spinner for one long-running step, such as following a daemon change.
 * Ends with exactly one of stop() or fail().
 */
export interface UnifiedSpinner {
  start(message: string): void;
  message(text: string): void;
  stop(finalMessage?: string): void;
  fail(finalMessage: string): void;
}

export interface OutputPort {
  info(message: string): void;

  /** A sub-step of the current command */
  step(message: string): void;

  message(message: string): void;

  success(message: string): void;

  error(message: string): void;

  warn(message: string): void;

  /** A titled block, e.g. a package summary */
  note(content: string, title?: string): void;

  /** Yes/no question; non-interactive outputs answer with `initial` */
  confirm(message: string, options?: { initial?: boolean }): Promise<boolean>;

  spinner(): UnifiedSpinner;
}

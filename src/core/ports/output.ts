/**
 * Output Port Interface
 *
 * Defines the contract for all user-facing output operations.
 * Pipelines use this interface instead of console.log directly, so tests
 * can capture exactly what a command prints.
 *
 * Implementations:
 *   - consoleOutput (CLI): routes to plain console.log
 *   - recording adapters in tests
 */

export interface OutputPort {
  /** Display an informational line, printed as is */
  info(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Display an error message */
  error(message: string): void;
}

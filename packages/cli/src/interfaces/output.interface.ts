/**
 * Output Service Interface
 *
 * Console output used by command handlers. Handlers only talk to this
 * interface so tests can record what would have been printed.
 */

export interface IOutputService {
  success(message: string): void;
  warn(message: string): void;
  /** Written to stderr */
  error(message: string): void;
  /** Secondary detail, e.g. verbose progress */
  dim(message: string): void;
  /** Pretty-printed JSON on stdout */
  json(value: unknown): void;

  startSpinner(text: string): void;
  succeedSpinner(text?: string): void;
  failSpinner(text?: string): void;
}

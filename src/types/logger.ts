/**
 * Sink for progress and warning lines written by the orchestration helpers.
 * `console` satisfies it.
 */
export interface Logger {
  log: (message: string) => void;
  warn: (message: string) => void;
}

/**
 * EFFECTS LAYER
 *
 * The menu only talks to the outside world through these interfaces:
 * reading a line from the operator, printing a line back, and logging.
 * Tests provide plain jest.fn() implementations instead of a real terminal.
 */

import {Maybe} from 'purify-ts';

// ============================================================================
// Effect Interfaces
// ============================================================================

export interface Terminal {
  /** Nothing once the input stream has ended. */
  prompt(question: string): Promise<Maybe<string>>;
  print(text: string): void;
  close(): void;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, cause?: unknown): void;
}

// ============================================================================
// Combined Dependencies
//
// Group all effects together. This makes it easy to provide real or test
// implementations. No complex DI framework needed - just an object.
// ============================================================================

export type AppEffects = {
  readonly terminal: Terminal;
  readonly logger: Logger;
}

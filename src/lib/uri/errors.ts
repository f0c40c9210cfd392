/**
 * Grammar Errors and Results
 */

/**
 * Outcome of an operation that can fail in an expected way
 */
export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * - mismatch: the input does not start with what the rule expects
 * - leftover: the rule matched but characters remain after it
 * - bad-pct-encoding: a "%" is not followed by two hex digits
 * - invalid: the input matched syntactically but failed a semantic check
 */
export type GrammarErrorCode = 'mismatch' | 'leftover' | 'bad-pct-encoding' | 'invalid';

/**
 * Error produced by a grammar rule
 */
export class GrammarError extends Error {
  readonly code: GrammarErrorCode;
  /** Offset in the input where the rule gave up */
  readonly position: number;

  constructor(code: GrammarErrorCode, position: number, message?: string) {
    super(message ?? `${code} at offset ${position}`);
    this.name = 'GrammarError';
    this.code = code;
    this.position = position;
  }
}

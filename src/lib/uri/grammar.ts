/**
 * Grammar Rules
 *
 * A rule consumes a prefix of its input starting at an offset and
 * reports where it stopped. Rules compose by feeding one rule's end
 * offset into the next.
 */

import { GrammarError, err, ok, type Result } from './errors';

export type RuleResult<T> =
  | { ok: true; value: T; end: number }
  | { ok: false; error: GrammarError };

export interface Rule<T> {
  parse(input: string, start: number): RuleResult<T>;
}

/**
 * Run a rule over the whole input
 *
 * Characters left over after the rule matched are an error.
 */
export function parseWithRule<T>(input: string, rule: Rule<T>): Result<T, GrammarError> {
  const result = rule.parse(input, 0);
  if (!result.ok) {
    return err(result.error);
  }
  if (result.end !== input.length) {
    return err(new GrammarError('leftover', result.end, `Unexpected "${input[result.end]}" at offset ${result.end}`));
  }
  return ok(result.value);
}

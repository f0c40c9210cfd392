/**
 * Magnet Link Errors
 */

import { GrammarError } from '../uri';

/**
 * The text is a syntactically valid URI but not a magnet link: there is
 * no exact topic, or an exact topic is not a URI.
 */
export class InvalidMagnetLinkError extends GrammarError {
  constructor(message: string, position = 0) {
    super('invalid', position, message);
    this.name = 'InvalidMagnetLinkError';
  }
}

/**
 * A transform was applied to a parameter its predicate would have
 * rejected. Indicates a bug in the caller, never bad input.
 */
export class ContractViolationError extends Error {
  readonly code = 'contract-violation';

  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

/**
 * Query Parameter Sequence
 *
 * Splits an encoded query on "&" and "=" as it is iterated. Keys and
 * values stay encoded; no "+" to space conversion is applied.
 */

import { PctString } from './pct-string';

export interface QueryParam {
  key: PctString;
  /** False when the parameter has no "=" */
  hasValue: boolean;
  /** Empty when hasValue is false */
  value: PctString;
}

function toParam(segment: string): QueryParam {
  const eq = segment.indexOf('=');
  if (eq === -1) {
    return { key: new PctString(segment), hasValue: false, value: new PctString('') };
  }
  return {
    key: new PctString(segment.slice(0, eq)),
    hasValue: true,
    value: new PctString(segment.slice(eq + 1)),
  };
}

/**
 * Restartable sequence of the parameters in a query
 *
 * A missing query has no parameters; an empty query ("?") has one
 * parameter with an empty key and no value.
 */
export class QueryParams implements Iterable<QueryParam> {
  /** Encoded query without the leading "?", or undefined when absent */
  readonly encoded: string | undefined;

  constructor(encoded: string | undefined) {
    this.encoded = encoded;
  }

  *[Symbol.iterator](): Iterator<QueryParam> {
    const query = this.encoded;
    if (query === undefined) return;
    let start = 0;
    for (;;) {
      const amp = query.indexOf('&', start);
      if (amp === -1) {
        yield toParam(query.slice(start));
        return;
      }
      yield toParam(query.slice(start, amp));
      start = amp + 1;
    }
  }

  /**
   * First parameter whose decoded key equals `key`
   */
  find(key: string): QueryParam | undefined {
    for (const param of this) {
      if (param.key.equals(key)) return param;
    }
    return undefined;
  }
}

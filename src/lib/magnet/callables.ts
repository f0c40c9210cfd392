/**
 * Magnet Parameter Predicates and Transforms
 *
 * Building blocks for the filtered views exposed by MagnetLinkView.
 * Predicates decide which query parameters belong to a field; transforms
 * turn an accepted parameter into the field's value.
 */

import type { Predicate, Transform } from '../filtered-view';
import { parseUri, type PctString, type QueryParam, type ScratchBuffer, type UriView } from '../uri';
import { ContractViolationError } from './errors';

function isAsciiDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

/**
 * Accepts "xt" and "xt.1", "xt.2", ...
 *
 * Keys are compared decoded, so "%78%74" is an exact topic too.
 */
export function isExactTopic(p: QueryParam): boolean {
  if (p.key.equals('xt')) return true;
  const index = p.key.stripPrefix('xt.');
  return index !== undefined && !index.isEmpty && index.everyByte(isAsciiDigit);
}

/**
 * Parse an exact topic's value as a URI, as it appears in the link
 *
 * Topics are URNs encoded once, like the rest of the query, so the
 * encoded value is already the URI text. `urn%3Abtih%3A...` is not a URI.
 */
export function parseTopicUrl(p: QueryParam): UriView | undefined {
  const result = parseUri(p.value.encoded);
  return result.ok ? result.value : undefined;
}

/**
 * Accepts parameters named `key` whose value is a URI once decoded.
 *
 * URLs inside magnet links are percent-encoded twice, so the value is
 * decoded into `buffer` before it is parsed. The key is checked first;
 * the buffer is overwritten for every parameter with a matching key,
 * whether or not it is accepted.
 */
export function isUrlWithKey(key: string, buffer: ScratchBuffer): Predicate<QueryParam> {
  return (p) => {
    if (!p.key.equals(key)) return false;
    if (!p.value.decodeInto(buffer)) return false;
    return parseUri(buffer.value).ok;
  };
}

export const toUrl: Transform<QueryParam, UriView> = (p) => {
  const url = parseTopicUrl(p);
  if (!url) {
    throw new ContractViolationError(`Parameter "${p.key.decode()}" does not hold a URI: "${p.value.encoded}"`);
  }
  return url;
};

/**
 * Hash part of an exact topic: whatever follows the last ":" of its
 * path, still encoded
 *
 * `urn:btih:c12fe1c0...` → `c12fe1c0...`
 */
export const toInfohash: Transform<QueryParam, string> = (p) => {
  const path = toUrl(p).path;
  const colon = path.lastIndexOf(':');
  return colon === -1 ? path : path.slice(colon + 1);
};

/**
 * Protocol of an exact topic: the topic up to the last ":" of its path,
 * or "" when the path has no ":".
 *
 * `urn:btih:c12fe1c0...` → `urn:btih`
 */
export const toProtocol: Transform<QueryParam, string> = (p) => {
  const topic = toUrl(p);
  const colon = topic.path.lastIndexOf(':');
  if (colon === -1) return '';
  return topic.buffer.slice(0, topic.pathOffset + colon);
};

export const toDecodedValue: Transform<QueryParam, PctString> = (p) => p.value;

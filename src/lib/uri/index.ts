/**
 * URI Module
 *
 * RFC 3986 grammar rules, parsed URI views and lazily decoded
 * percent-encoded strings.
 */

export { GrammarError, ok, err } from './errors';
export type { Result, GrammarErrorCode } from './errors';

export { parseWithRule } from './grammar';
export type { Rule, RuleResult } from './grammar';

export {
  absoluteUriRule,
  uriRule,
  schemeRule,
  parseAbsoluteUri,
  parseUri,
  isIpv4Address,
  isIpv6Address,
} from './rfc3986';

export { UriView } from './uri-view';
export type { UriParts } from './uri-view';

export { QueryParams } from './query-params';
export type { QueryParam } from './query-params';

export { PctString } from './pct-string';
export { ScratchBuffer } from './scratch-buffer';

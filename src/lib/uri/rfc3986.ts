/**
 * RFC 3986 URI Rules
 *
 * Syntax checks and component extraction for the absolute forms:
 *
 *   URI          = scheme ":" hier-part [ "?" query ] [ "#" fragment ]
 *   absolute-URI = scheme ":" hier-part [ "?" query ]
 *
 * https://www.rfc-editor.org/rfc/rfc3986#appendix-A
 */

import { GrammarError, err, type Result } from './errors';
import { parseWithRule, type Rule, type RuleResult } from './grammar';
import { UriView, type UriParts } from './uri-view';

const UNRESERVED_PUNCT = '-._~';
const SUB_DELIMS = "!$&'()*+,;=";

function isAlpha(c: string): boolean {
  return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z');
}

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

function isHexDigit(c: string | undefined): boolean {
  return c !== undefined && /^[0-9A-Fa-f]$/.test(c);
}

function isUnreserved(c: string): boolean {
  return isAlpha(c) || isDigit(c) || UNRESERVED_PUNCT.includes(c);
}

function isSubDelim(c: string): boolean {
  return SUB_DELIMS.includes(c);
}

function isPchar(c: string): boolean {
  return isUnreserved(c) || isSubDelim(c) || c === ':' || c === '@';
}

function isPathChar(c: string): boolean {
  return isPchar(c) || c === '/';
}

function isQueryChar(c: string): boolean {
  return isPchar(c) || c === '/' || c === '?';
}

function isRegNameChar(c: string): boolean {
  return isUnreserved(c) || isSubDelim(c);
}

function isUserinfoChar(c: string): boolean {
  return isUnreserved(c) || isSubDelim(c) || c === ':';
}

type Scan = { ok: true; end: number } | { ok: false; error: GrammarError };

/**
 * Consume characters accepted by `allowed`, plus "%XX" escapes, stopping
 * at the first other character or at `limit`.
 */
function scanEncoded(input: string, start: number, allowed: (c: string) => boolean, limit = input.length): Scan {
  let i = start;
  while (i < limit) {
    const c = input[i];
    if (c === '%') {
      if (i + 2 >= limit) {
        return err(new GrammarError('bad-pct-encoding', i, `Incomplete escape at offset ${i}`));
      }
      if (!isHexDigit(input[i + 1]) || !isHexDigit(input[i + 2])) {
        return err(new GrammarError('bad-pct-encoding', i, `Invalid escape at offset ${i}`));
      }
      i += 3;
      continue;
    }
    if (!allowed(c)) break;
    i++;
  }
  return { ok: true, end: i };
}

/**
 * Scan a whole range; any character outside the class is a mismatch
 */
function scanAll(input: string, start: number, end: number, allowed: (c: string) => boolean): GrammarError | undefined {
  const scan = scanEncoded(input, start, allowed, end);
  if (!scan.ok) return scan.error;
  if (scan.end !== end) {
    return new GrammarError('mismatch', scan.end, `Unexpected "${input[scan.end]}" at offset ${scan.end}`);
  }
  return undefined;
}

function isDecOctet(text: string): boolean {
  return /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)$/.test(text);
}

export function isIpv4Address(text: string): boolean {
  const octets = text.split('.');
  return octets.length === 4 && octets.every(isDecOctet);
}

// Number of 16-bit pieces, or -1 when a group is malformed
function countPieces(groups: string[], ipv4Last: boolean): number {
  let pieces = 0;
  for (let i = 0; i < groups.length; i++) {
    const group = groups[i];
    if (ipv4Last && i === groups.length - 1 && group.includes('.')) {
      if (!isIpv4Address(group)) return -1;
      pieces += 2;
      continue;
    }
    if (!/^[0-9A-Fa-f]{1,4}$/.test(group)) return -1;
    pieces++;
  }
  return pieces;
}

export function isIpv6Address(text: string): boolean {
  const gap = text.indexOf('::');
  if (gap === -1) {
    return countPieces(text.split(':'), true) === 8;
  }
  if (gap !== text.lastIndexOf('::')) return false;
  const head = text.slice(0, gap);
  const tail = text.slice(gap + 2);
  const headPieces = head === '' ? 0 : countPieces(head.split(':'), false);
  const tailPieces = tail === '' ? 0 : countPieces(tail.split(':'), true);
  if (headPieces < 0 || tailPieces < 0) return false;
  return headPieces + tailPieces <= 7;
}

function isIpvFuture(text: string): boolean {
  return /^[vV][0-9A-Fa-f]+\.[A-Za-z0-9\-._~!$&'()*+,;=:]+$/.test(text);
}

type AuthorityParse =
  | { ok: true; authority: NonNullable<UriParts['authority']> }
  | { ok: false; error: GrammarError };

/**
 *   authority = [ userinfo "@" ] host [ ":" port ]
 */
function parseAuthority(input: string, start: number, end: number): AuthorityParse {
  let hostStart = start;
  let userinfo: string | undefined;

  const at = input.indexOf('@', start);
  if (at !== -1 && at < end) {
    const error = scanAll(input, start, at, isUserinfoChar);
    if (error) return err(error);
    userinfo = input.slice(start, at);
    hostStart = at + 1;
  }

  let hostEnd: number;
  if (input[hostStart] === '[') {
    const close = input.indexOf(']', hostStart);
    if (close === -1 || close >= end) {
      return err(new GrammarError('mismatch', hostStart, 'Unterminated IP literal'));
    }
    const literal = input.slice(hostStart + 1, close);
    if (!isIpv6Address(literal) && !isIpvFuture(literal)) {
      return err(new GrammarError('invalid', hostStart, `Invalid IP literal "${literal}"`));
    }
    hostEnd = close + 1;
  } else {
    const scan = scanEncoded(input, hostStart, isRegNameChar, end);
    if (!scan.ok) return scan;
    hostEnd = scan.end;
  }

  const host = input.slice(hostStart, hostEnd);
  if (hostEnd === end) {
    return { ok: true, authority: { userinfo, host } };
  }
  if (input[hostEnd] !== ':') {
    return err(new GrammarError('mismatch', hostEnd, `Unexpected "${input[hostEnd]}" at offset ${hostEnd}`));
  }
  for (let i = hostEnd + 1; i < end; i++) {
    if (!isDigit(input[i])) {
      return err(new GrammarError('mismatch', i, `Invalid port character at offset ${i}`));
    }
  }
  return { ok: true, authority: { userinfo, host, port: input.slice(hostEnd + 1, end) } };
}

/**
 *   scheme = ALPHA *( ALPHA / DIGIT / "+" / "-" / "." )
 */
export const schemeRule: Rule<string> = {
  parse(input: string, start: number): RuleResult<string> {
    if (start >= input.length || !isAlpha(input[start])) {
      return err(new GrammarError('mismatch', start, 'Expected a scheme'));
    }
    let i = start + 1;
    while (i < input.length && (isAlpha(input[i]) || isDigit(input[i]) || '+-.'.includes(input[i]))) {
      i++;
    }
    return { ok: true, value: input.slice(start, i), end: i };
  },
};

function parseAbsolute(input: string, start: number, allowFragment: boolean): RuleResult<UriView> {
  const scheme = schemeRule.parse(input, start);
  if (!scheme.ok) return scheme;

  let pos = scheme.end;
  if (input[pos] !== ':') {
    return err(new GrammarError('mismatch', pos, 'Expected ":" after scheme'));
  }
  pos++;

  const parts: UriParts = { scheme: scheme.value, path: '', pathOffset: 0 };

  if (input.startsWith('//', pos)) {
    const authorityStart = pos + 2;
    let authorityEnd = authorityStart;
    while (authorityEnd < input.length && !'/?#'.includes(input[authorityEnd])) {
      authorityEnd++;
    }
    const authority = parseAuthority(input, authorityStart, authorityEnd);
    if (!authority.ok) return authority;
    parts.authority = authority.authority;
    pos = authorityEnd;
  }

  // path-abempty after an authority, else path-absolute / path-rootless / path-empty
  const path = scanEncoded(input, pos, isPathChar);
  if (!path.ok) return path;
  parts.path = input.slice(pos, path.end);
  parts.pathOffset = pos - start;
  pos = path.end;

  if (input[pos] === '?') {
    const query = scanEncoded(input, pos + 1, isQueryChar);
    if (!query.ok) return query;
    parts.query = input.slice(pos + 1, query.end);
    pos = query.end;
  }

  if (allowFragment && input[pos] === '#') {
    const fragment = scanEncoded(input, pos + 1, isQueryChar);
    if (!fragment.ok) return fragment;
    parts.fragment = input.slice(pos + 1, fragment.end);
    pos = fragment.end;
  }

  return { ok: true, value: new UriView(input.slice(start, pos), parts), end: pos };
}

/**
 * Rule for `absolute-URI`: no fragment
 */
export const absoluteUriRule: Rule<UriView> = {
  parse(input: string, start: number): RuleResult<UriView> {
    return parseAbsolute(input, start, false);
  },
};

/**
 * Rule for `URI`: absolute-URI with an optional fragment
 */
export const uriRule: Rule<UriView> = {
  parse(input: string, start: number): RuleResult<UriView> {
    return parseAbsolute(input, start, true);
  },
};

export function parseAbsoluteUri(text: string): Result<UriView, GrammarError> {
  return parseWithRule(text, absoluteUriRule);
}

export function parseUri(text: string): Result<UriView, GrammarError> {
  return parseWithRule(text, uriRule);
}

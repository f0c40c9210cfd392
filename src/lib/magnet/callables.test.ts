import { describe, it, expect } from 'vitest';
import { QueryParams, ScratchBuffer, type QueryParam } from '../uri';
import {
  isExactTopic,
  isUrlWithKey,
  parseTopicUrl,
  toDecodedValue,
  toInfohash,
  toProtocol,
  toUrl,
} from './callables';
import { ContractViolationError } from './errors';

function paramOf(segment: string): QueryParam {
  const [param] = new QueryParams(segment);
  return param;
}

describe('isExactTopic', () => {
  it('should accept "xt" and numbered topics', () => {
    expect(isExactTopic(paramOf('xt=urn:btih:abc'))).toBe(true);
    expect(isExactTopic(paramOf('xt.1=urn:btih:abc'))).toBe(true);
    expect(isExactTopic(paramOf('xt.12=urn:btih:abc'))).toBe(true);
  });

  it('should compare keys decoded', () => {
    expect(isExactTopic(paramOf('%78%74=urn:btih:abc'))).toBe(true);
    expect(isExactTopic(paramOf('xt%2E2=urn:btih:abc'))).toBe(true);
  });

  it('should only look at the key', () => {
    expect(isExactTopic(paramOf('xt'))).toBe(true);
    expect(isExactTopic(paramOf('xt=not a uri'))).toBe(true);
  });

  it('should reject other keys', () => {
    expect(isExactTopic(paramOf('xt.=urn:btih:abc'))).toBe(false);
    expect(isExactTopic(paramOf('xt.1a=urn:btih:abc'))).toBe(false);
    expect(isExactTopic(paramOf('xtx=urn:btih:abc'))).toBe(false);
    expect(isExactTopic(paramOf('XT=urn:btih:abc'))).toBe(false);
    expect(isExactTopic(paramOf('x=urn:btih:abc'))).toBe(false);
  });
});

describe('isUrlWithKey', () => {
  it('should accept an encoded URL under the key and decode it into the buffer', () => {
    const buffer = new ScratchBuffer();
    const isTracker = isUrlWithKey('tr', buffer);

    expect(isTracker(paramOf('tr=udp%3A%2F%2Ftracker.example.com%3A80'))).toBe(true);
    expect(buffer.value).toBe('udp://tracker.example.com:80');
  });

  it('should not touch the buffer for other keys', () => {
    const buffer = new ScratchBuffer();
    buffer.assign('untouched');

    expect(isUrlWithKey('tr', buffer)(paramOf('ws=http%3A%2F%2Fexample.com'))).toBe(false);
    expect(buffer.value).toBe('untouched');
  });

  it('should overwrite the buffer even when the value is not a URL', () => {
    const buffer = new ScratchBuffer();

    expect(isUrlWithKey('tr', buffer)(paramOf('tr=not%20a%20url'))).toBe(false);
    expect(buffer.value).toBe('not a url');
  });

  it('should reject values that do not decode', () => {
    const buffer = new ScratchBuffer();
    buffer.assign('stale');

    expect(isUrlWithKey('tr', buffer)(paramOf('tr=%FF'))).toBe(false);
    expect(buffer.value).toBe('');
  });
});

describe('toUrl', () => {
  it('should parse the value as a URI', () => {
    const url = toUrl(paramOf('xt=urn:btih:abc'));

    expect(url.scheme).toBe('urn');
    expect(url.path).toBe('btih:abc');
  });

  it('should parse the value as it appears in the link', () => {
    expect(toUrl(paramOf('xt=urn:btih:ABC%20DEF')).toString()).toBe('urn:btih:ABC%20DEF');
  });

  it('should not decode the value before parsing', () => {
    expect(() => toUrl(paramOf('xt=urn%3Abtih%3Aabc'))).toThrow(
      'Parameter "xt" does not hold a URI: "urn%3Abtih%3Aabc"'
    );
  });

  it('should throw a contract violation for a value that is not a URI', () => {
    expect(() => toUrl(paramOf('xt=nope'))).toThrow(ContractViolationError);
    expect(() => toUrl(paramOf('xt=nope'))).toThrow('Parameter "xt" does not hold a URI: "nope"');
  });
});

describe('parseTopicUrl', () => {
  it('should accept escapes that do not decode to valid UTF-8', () => {
    expect(parseTopicUrl(paramOf('xt=urn:btih:%FF'))?.path).toBe('btih:%FF');
    expect(parseTopicUrl(paramOf('xt=urn:btih:%25'))?.path).toBe('btih:%25');
  });

  it('should return undefined for values that do not parse', () => {
    expect(parseTopicUrl(paramOf('xt=%FF'))).toBeUndefined();
    expect(parseTopicUrl(paramOf('xt=nope'))).toBeUndefined();
    expect(parseTopicUrl(paramOf('xt=urn%3Abtih%3Aabc'))).toBeUndefined();
    expect(parseTopicUrl(paramOf('xt'))).toBeUndefined();
  });
});

describe('toInfohash and toProtocol', () => {
  it('should split a URN at its last colon', () => {
    const p = paramOf('xt=urn:btih:ABC123');

    expect(toInfohash(p)).toBe('ABC123');
    expect(toProtocol(p)).toBe('urn:btih');
  });

  it('should use the last colon of multi-part URNs', () => {
    const p = paramOf('xt=urn:tree:tiger:ABC');

    expect(toInfohash(p)).toBe('ABC');
    expect(toProtocol(p)).toBe('urn:tree:tiger');
  });

  it('should keep the hash encoded', () => {
    const p = paramOf('xt=urn:btih:ABC%20DEF');

    expect(toInfohash(p)).toBe('ABC%20DEF');
    expect(toProtocol(p)).toBe('urn:btih');
  });

  it('should return the whole path and no protocol when the path has no colon', () => {
    const p = paramOf('xt=urn:abc');

    expect(toInfohash(p)).toBe('abc');
    expect(toProtocol(p)).toBe('');
  });

  it('should only look for colons in the path', () => {
    const p = paramOf('xt=http://example.com/a:b');

    expect(toInfohash(p)).toBe('b');
    expect(toProtocol(p)).toBe('http://example.com/a');
  });
});

describe('toDecodedValue', () => {
  it('should return the value view itself', () => {
    const p = paramOf('tr=udp%3A%2F%2Fx');

    expect(toDecodedValue(p)).toBe(p.value);
    expect(toDecodedValue(p).toString()).toBe('udp://x');
  });
});

/**
 * Percent-Encoded String View
 *
 * Wraps an encoded string and decodes it on demand. Comparisons against
 * plain strings walk the decoded bytes one at a time, so nothing is
 * allocated unless the caller asks for the decoded text.
 */

import type { ScratchBuffer } from './scratch-buffer';

const encoder = new TextEncoder();
const strictDecoder = new TextDecoder('utf-8', { fatal: true });
const lenientDecoder = new TextDecoder('utf-8');

function hexValue(code: number): number {
  if (code >= 0x30 && code <= 0x39) return code - 0x30;
  if (code >= 0x41 && code <= 0x46) return code - 0x41 + 10;
  if (code >= 0x61 && code <= 0x66) return code - 0x61 + 10;
  return -1;
}

/**
 * A unit of encoded text: either one "%XX" escape or one literal code point
 */
interface EncodedUnit {
  /** Offset of the unit in the encoded text */
  start: number;
  /** Offset just past the unit */
  end: number;
  bytes: readonly number[];
}

function* encodedUnits(text: string): Generator<EncodedUnit> {
  let i = 0;
  while (i < text.length) {
    if (text[i] === '%') {
      const hi = hexValue(text.charCodeAt(i + 1));
      const lo = hexValue(text.charCodeAt(i + 2));
      if (hi >= 0 && lo >= 0) {
        yield { start: i, end: i + 3, bytes: [hi * 16 + lo] };
        i += 3;
        continue;
      }
    }
    const codePoint = text.codePointAt(i) ?? 0;
    const width = codePoint > 0xffff ? 2 : 1;
    const code = text.charCodeAt(i);
    // ASCII needs no encoder round trip
    const bytes = code < 0x80 ? [code] : Array.from(encoder.encode(text.slice(i, i + width)));
    yield { start: i, end: i + width, bytes };
    i += width;
  }
}

/**
 * Lazily decodable view over percent-encoded text
 */
export class PctString {
  readonly encoded: string;

  constructor(encoded: string) {
    this.encoded = encoded;
  }

  /**
   * Decoded bytes, produced one at a time
   */
  *decodedBytes(): Generator<number> {
    for (const unit of encodedUnits(this.encoded)) {
      yield* unit.bytes;
    }
  }

  get isEmpty(): boolean {
    return this.encoded.length === 0;
  }

  /**
   * Compare the decoded content with a plain string
   *
   * `new PctString('%78%74').equals('xt')` is true.
   */
  equals(plain: string): boolean {
    const expected = encoder.encode(plain);
    let index = 0;
    for (const byte of this.decodedBytes()) {
      if (index >= expected.length || expected[index] !== byte) return false;
      index++;
    }
    return index === expected.length;
  }

  /**
   * If the decoded content starts with `prefix`, return a view over the
   * rest of the encoded text; otherwise undefined.
   *
   * The split happens on unit boundaries, so a prefix ending inside a
   * multi-byte literal character never matches.
   */
  stripPrefix(prefix: string): PctString | undefined {
    const expected = encoder.encode(prefix);
    if (expected.length === 0) return this;
    let index = 0;
    for (const unit of encodedUnits(this.encoded)) {
      for (const byte of unit.bytes) {
        if (index >= expected.length || expected[index] !== byte) return undefined;
        index++;
      }
      if (index === expected.length) {
        return new PctString(this.encoded.slice(unit.end));
      }
    }
    return undefined;
  }

  /**
   * Test every decoded byte against a predicate
   */
  everyByte(predicate: (byte: number) => boolean): boolean {
    for (const byte of this.decodedBytes()) {
      if (!predicate(byte)) return false;
    }
    return true;
  }

  /**
   * Decode as UTF-8, or undefined when the bytes are not valid UTF-8
   */
  tryDecode(): string | undefined {
    const bytes = Uint8Array.from(this.decodedBytes());
    try {
      return strictDecoder.decode(bytes);
    } catch {
      return undefined;
    }
  }

  /**
   * Decode as UTF-8, replacing invalid sequences with U+FFFD
   */
  decode(): string {
    return lenientDecoder.decode(Uint8Array.from(this.decodedBytes()));
  }

  /**
   * Decode into a caller-owned buffer
   *
   * The buffer is always overwritten: with the decoded text on success,
   * emptied on failure.
   */
  decodeInto(buffer: ScratchBuffer): boolean {
    const decoded = this.tryDecode();
    if (decoded === undefined) {
      buffer.clear();
      return false;
    }
    buffer.assign(decoded);
    return true;
  }

  /**
   * Decoded text, for printing and template literals
   */
  toString(): string {
    return this.decode();
  }
}

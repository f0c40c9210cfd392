/**
 * Magnet Link View
 *
 * Magnet-specific reading of a parsed URI. The general URI syntax knows
 * nothing about trackers or info hashes; this view projects those fields
 * out of the query parameters and ignores the rest.
 *
 * References:
 * - https://www.bittorrent.org/beps/bep_0009.html
 * - https://www.bittorrent.org/beps/bep_0053.html
 * - https://en.wikipedia.org/wiki/Magnet_URI_scheme
 */

import { filtered, type FilteredView } from '../filtered-view';
import type { PctString, QueryParam, ScratchBuffer, UriView } from '../uri';
import {
  isExactTopic,
  isUrlWithKey,
  toDecodedValue,
  toInfohash,
  toProtocol,
  toUrl,
} from './callables';

export type TopicsView = FilteredView<QueryParam, UriView>;
export type InfoHashesView = FilteredView<QueryParam, string>;
export type ProtocolsView = FilteredView<QueryParam, string>;
export type KeysView = FilteredView<QueryParam, PctString>;

/**
 * View over a validated magnet link
 *
 * Obtain one from `parseMagnetLink` or `magnetLinkRule`; the accessors
 * assume the link holds at least one exact topic and that every exact
 * topic is a URI, which only the rule checks.
 *
 * Accessors taking a `ScratchBuffer` decode each candidate URL into it
 * while filtering. Don't interleave two iterations that share a buffer.
 */
export class MagnetLinkView {
  readonly uri: UriView;

  constructor(uri: UriView) {
    this.uri = uri;
  }

  /**
   * URNs of the file or files: every "xt" or "xt.N" parameter, in order.
   * There is always at least one.
   */
  exactTopics(): TopicsView {
    return filtered(this.uri.params(), isExactTopic, toUrl);
  }

  /**
   * Hash of each exact topic
   */
  infoHashes(): InfoHashesView {
    return filtered(this.uri.params(), isExactTopic, toInfohash);
  }

  /**
   * Protocol of each exact topic, such as "urn:btih"
   */
  protocols(): ProtocolsView {
    return filtered(this.uri.params(), isExactTopic, toProtocol);
  }

  /** Tracker URLs ("tr") */
  addressTrackers(buffer: ScratchBuffer): KeysView {
    return this.urlsWithKey('tr', buffer);
  }

  /** Direct download links ("xs") */
  exactSources(buffer: ScratchBuffer): KeysView {
    return this.urlsWithKey('xs', buffer);
  }

  /** Fallback download links ("as") */
  acceptableSources(buffer: ScratchBuffer): KeysView {
    return this.urlsWithKey('as', buffer);
  }

  /**
   * Links to manifests listing further magnet links ("mt")
   *
   * http://rakjar.de/gnuticles/MAGMA-Specsv22.txt
   */
  manifestTopics(buffer: ScratchBuffer): KeysView {
    return this.urlsWithKey('mt', buffer);
  }

  /** Payload served over HTTP(S) ("ws") */
  webSeed(buffer: ScratchBuffer): KeysView {
    return this.urlsWithKey('ws', buffer);
  }

  /**
   * Search keywords ("kt"), e.g. `kt=martin+luther+king+mp3`
   */
  keywordTopic(): PctString | undefined {
    return this.decodedParam('kt');
  }

  /**
   * File name to show the user ("dn")
   */
  displayName(): PctString | undefined {
    return this.decodedParam('dn');
  }

  /**
   * Informal "x.<key>" parameter. These names are never standardized.
   *
   * Returns the first parameter with a value whose key is "x." followed
   * by `key`, compared decoded.
   */
  param(key: string): PctString | undefined {
    for (const p of this.uri.params()) {
      if (!p.hasValue) continue;
      const suffix = p.key.stripPrefix('x.');
      if (suffix !== undefined && suffix.equals(key)) {
        return p.value;
      }
    }
    return undefined;
  }

  toString(): string {
    return this.uri.toString();
  }

  // First parameter named `key`; undefined if it has no value
  private decodedParam(key: string): PctString | undefined {
    const p = this.uri.params().find(key);
    return p?.hasValue ? p.value : undefined;
  }

  private urlsWithKey(key: string, buffer: ScratchBuffer): KeysView {
    return filtered(this.uri.params(), isUrlWithKey(key, buffer), toDecodedValue);
  }
}

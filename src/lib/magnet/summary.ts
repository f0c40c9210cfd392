/**
 * Magnet Link Summary
 *
 * Plain-object snapshot of every field of a magnet link, and the line
 * format the CLI prints it in.
 */

import { ScratchBuffer } from '../uri';
import type { MagnetLinkView } from './magnet-link-view';

export interface MagnetLinkSummary {
  /** The link as given */
  link: string;
  /** Exact topic URNs */
  topics: string[];
  infoHashes: string[];
  protocols: string[];
  /** Decoded tracker URLs */
  trackers: string[];
  exactSources: string[];
  acceptableSources: string[];
  manifestTopics: string[];
  webSeeds: string[];
  keywordTopic?: string;
  displayName?: string;
}

function strings(values: Iterable<{ toString(): string }>): string[] {
  return Array.from(values, (value) => value.toString());
}

/**
 * Collect every field of the link, decoding values once
 */
export function summarizeMagnetLink(
  magnet: MagnetLinkView,
  buffer: ScratchBuffer = new ScratchBuffer()
): MagnetLinkSummary {
  const summary: MagnetLinkSummary = {
    link: magnet.toString(),
    topics: strings(magnet.exactTopics()),
    infoHashes: magnet.infoHashes().toArray(),
    protocols: magnet.protocols().toArray(),
    trackers: strings(magnet.addressTrackers(buffer)),
    exactSources: strings(magnet.exactSources(buffer)),
    acceptableSources: strings(magnet.acceptableSources(buffer)),
    manifestTopics: strings(magnet.manifestTopics(buffer)),
    webSeeds: strings(magnet.webSeed(buffer)),
  };

  const keywordTopic = magnet.keywordTopic();
  if (keywordTopic) {
    summary.keywordTopic = keywordTopic.decode();
  }

  const displayName = magnet.displayName();
  if (displayName) {
    summary.displayName = displayName.decode();
  }

  return summary;
}

/**
 * One "label: value" line per field value
 */
export function formatMagnetLink(summary: MagnetLinkSummary): string[] {
  const lines = [`link: ${summary.link}`];
  const push = (label: string, values: string[]) => {
    for (const value of values) lines.push(`${label}: ${value}`);
  };

  push('topic', summary.topics);
  push('hash', summary.infoHashes);
  push('protocol', summary.protocols);
  push('tracker', summary.trackers);
  push('exact source', summary.exactSources);
  push('acceptable source', summary.acceptableSources);
  push('manifest topic', summary.manifestTopics);
  push('web seed', summary.webSeeds);

  if (summary.keywordTopic !== undefined) {
    lines.push(`keyword topic: ${summary.keywordTopic}`);
  }
  if (summary.displayName !== undefined) {
    lines.push(`display name: ${summary.displayName}`);
  }

  return lines;
}

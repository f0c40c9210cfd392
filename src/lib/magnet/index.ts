/**
 * Magnet Link Module
 *
 * Magnet links as a view over the general URI syntax.
 */

export { MagnetLinkView } from './magnet-link-view';
export type { TopicsView, InfoHashesView, ProtocolsView, KeysView } from './magnet-link-view';

export { magnetLinkRule, parseMagnetLink, validateMagnetLink } from './magnet-link-rule';

export {
  isExactTopic,
  isUrlWithKey,
  parseTopicUrl,
  toUrl,
  toInfohash,
  toProtocol,
  toDecodedValue,
} from './callables';

export { InvalidMagnetLinkError, ContractViolationError } from './errors';

export { summarizeMagnetLink, formatMagnetLink } from './summary';
export type { MagnetLinkSummary } from './summary';

export { runMagnetCli, USAGE, EXAMPLE_LINK } from './cli';
export type { CliOutput } from './cli';

/**
 * Magnet Link Rule
 *
 * Parses with the general absolute-URI syntax, then checks the one
 * field magnet links require: at least one exact topic, and every exact
 * topic must be a URI. All other fields are optional and unchecked.
 */

import { filtered } from '../filtered-view';
import { createLogger } from '../logger';
import {
  absoluteUriRule,
  err,
  parseWithRule,
  type GrammarError,
  type Result,
  type Rule,
  type RuleResult,
} from '../uri';
import { isExactTopic, parseTopicUrl } from './callables';
import { InvalidMagnetLinkError } from './errors';
import { MagnetLinkView } from './magnet-link-view';

const logger = createLogger('MagnetLinkRule');

export const magnetLinkRule: Rule<MagnetLinkView> = {
  parse(input: string, start: number): RuleResult<MagnetLinkView> {
    const parsed = absoluteUriRule.parse(input, start);
    if (!parsed.ok) {
      logger.debug('Not a URI', { code: parsed.error.code, position: parsed.error.position });
      return parsed;
    }

    const topics = filtered(parsed.value.params(), isExactTopic);
    const cursor = topics.begin();
    if (cursor.done) {
      logger.debug('No exact topic', { link: parsed.value.buffer });
      return err(new InvalidMagnetLinkError('Invalid magnet link: missing xt parameter', start));
    }

    for (; !cursor.done; cursor.advance()) {
      if (!parseTopicUrl(cursor.element)) {
        const value = cursor.element.value.encoded;
        logger.debug('Exact topic is not a URI', { value });
        return err(new InvalidMagnetLinkError(`Invalid magnet link: exact topic "${value}" is not a URI`, start));
      }
    }

    return { ok: true, value: new MagnetLinkView(parsed.value), end: parsed.end };
  },
};

/**
 * Parse a whole string as a magnet link
 *
 * Fails with a GrammarError when the text is not an absolute URI, or an
 * InvalidMagnetLinkError when it lacks a valid exact topic.
 */
export function parseMagnetLink(text: string): Result<MagnetLinkView, GrammarError> {
  return parseWithRule(text, magnetLinkRule);
}

/**
 * Validate a magnet link without keeping the result
 */
export function validateMagnetLink(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  return parseMagnetLink(value).ok;
}

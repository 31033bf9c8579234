/**
 * RSS parsing for release feeds.
 *
 * Turns an RSS 2.0 document into plain item objects. Only the fields the
 * resolver needs are extracted; missing elements come back as null (or
 * empty lists) so the resolver can name exactly what was absent.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';

export interface FeedHash {
  /** `algo` attribute, e.g. "md5" */
  algo: string | null;
  value: string | null;
}

export interface FeedMediaContent {
  hashes: FeedHash[];
}

export interface FeedItem {
  title: string | null;
  link: string | null;
  pubDate: string | null;
  mediaContent: FeedMediaContent[];
}

export interface ParsedFeed {
  /** Items in document order */
  items: FeedItem[];
}

export class FeedParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FeedParseError';
  }
}

const ARRAY_TAGS = new Set(['item', 'media:content', 'media:hash']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (name: string): boolean => ARRAY_TAGS.has(name),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Text of an element: plain string, or `#text` when it carries attributes */
function textOf(node: unknown): string | null {
  let text: unknown = node;
  if (isRecord(node)) {
    text = node['#text'];
  }
  if (typeof text === 'number' || typeof text === 'boolean') {
    text = String(text);
  }
  if (typeof text !== 'string') return null;
  const trimmed = text.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function attributeOf(node: unknown, name: string): string | null {
  if (!isRecord(node)) return null;
  return textOf(node[`@_${name}`]);
}

function listOf(node: unknown): unknown[] {
  if (node === undefined || node === null) return [];
  return Array.isArray(node) ? node : [node];
}

function toMediaContent(node: unknown): FeedMediaContent {
  const hashes = isRecord(node)
    ? listOf(node['media:hash']).map((hash) => ({
        algo: attributeOf(hash, 'algo'),
        value: textOf(hash),
      }))
    : [];

  return { hashes };
}

function toItem(node: unknown): FeedItem {
  if (!isRecord(node)) {
    return { title: null, link: null, pubDate: null, mediaContent: [] };
  }

  return {
    title: textOf(node['title']),
    link: textOf(node['link']),
    pubDate: textOf(node['pubDate']),
    mediaContent: listOf(node['media:content']).map(toMediaContent),
  };
}

/**
 * Parse an RSS 2.0 document.
 * Throws FeedParseError if the XML is malformed or has no `rss > channel`.
 */
export function parseFeed(xml: string): ParsedFeed {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new FeedParseError(`Malformed feed XML at line ${line}: ${msg}`);
  }

  const doc: unknown = parser.parse(xml);
  const rss = isRecord(doc) ? doc['rss'] : undefined;
  const channel = isRecord(rss) ? rss['channel'] : undefined;
  if (channel === '') {
    // <channel/> with no children
    return { items: [] };
  }
  if (!isRecord(channel)) {
    throw new FeedParseError('Document is not an RSS feed: rss > channel not found');
  }

  return {
    items: listOf(channel['item']).map(toItem),
  };
}

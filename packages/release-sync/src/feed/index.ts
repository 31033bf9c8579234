export { FeedEntryResolver, recordFromItem, fileNameFromTitle } from './feed-resolver.js';
export { parseFeed, FeedParseError } from './feed-parser.js';
export type { ParsedFeed, FeedItem, FeedMediaContent, FeedHash } from './feed-parser.js';

/**
 * FeedEntryResolver - turns the newest feed item into an ArtifactRecord.
 *
 * The origin is trusted to publish newest-first, so the first item in
 * document order is the latest release. No ranking is attempted.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import type { HttpClient } from '../http/http-client.js';
import { isSuccessStatus, readBody } from '../http/http-client.js';
import { ArtifactRecord } from '../release/artifact-record.js';
import { ResolutionError, errorMessage } from '../errors.js';
import { FeedParseError, parseFeed } from './feed-parser.js';
import type { FeedItem } from './feed-parser.js';

/**
 * Reduce a title to its last path segment. Titles are often full project
 * paths ("/device/14/build.zip"); returns null when nothing usable is left.
 */
export function fileNameFromTitle(title: string): string | null {
  const name = path.posix.basename(title.trim());
  if (!name || name === '.' || name === '..') return null;
  return name;
}

/**
 * Extract an ArtifactRecord from a single feed item.
 *
 * Fields are checked in a fixed order and the first missing one is
 * reported; nothing is constructed until all of them are present.
 */
export function recordFromItem(item: FeedItem, publicUrlPrefix: string): ArtifactRecord {
  const pubDate = item.pubDate;
  if (!pubDate) throw ResolutionError.missing('pubDate');

  const downloadUrl = item.link;
  if (!downloadUrl) throw ResolutionError.missing('link');

  const content = item.mediaContent[0];
  if (!content) throw ResolutionError.missing('media:content');

  const hash = content.hashes[0];
  if (!hash) throw ResolutionError.missing('media:hash');
  if (!hash.value) throw ResolutionError.missing('hash value');

  if (!item.title) throw ResolutionError.missing('title');

  const fileName = fileNameFromTitle(item.title);
  if (!fileName) throw ResolutionError.missing('file name');

  const prefix = publicUrlPrefix.replace(/\/+$/, '');

  return ArtifactRecord.fromFeedFields({
    pubDate,
    downloadUrl,
    contentHash: hash.value,
    fileName,
    publicUrl: `${prefix}/${fileName}`,
  });
}

export class FeedEntryResolver {
  private readonly http: HttpClient;
  private readonly publicUrlPrefix: string;
  private readonly logger: Logger;

  constructor(http: HttpClient, publicUrlPrefix: string, logger: Logger) {
    this.http = http;
    this.publicUrlPrefix = publicUrlPrefix;
    this.logger = logger.child({ component: 'feed-resolver' });
  }

  /**
   * Fetch the feed and resolve its newest item.
   * Rejects with ResolutionError only.
   */
  async resolve(feedUrl: string): Promise<ArtifactRecord> {
    const xml = await this.fetchFeed(feedUrl);

    let items: FeedItem[];
    try {
      items = parseFeed(xml).items;
    } catch (err) {
      if (err instanceof FeedParseError) {
        throw new ResolutionError('parse_failed', 'feed', err.message, { cause: err });
      }
      throw err;
    }

    const latest = items[0];
    if (!latest) {
      throw new ResolutionError('not_found', 'item', 'latest release not found: feed has no items');
    }

    const record = recordFromItem(latest, this.publicUrlPrefix);

    this.logger.debug(
      {
        fileName: record.fileName,
        publishedAt: record.publishedAt.toISOString(),
        contentHash: record.contentHash,
        hashAlgo: latest.mediaContent[0]?.hashes[0]?.algo ?? null,
      },
      'Resolved latest release'
    );

    return record;
  }

  private async fetchFeed(feedUrl: string): Promise<string> {
    try {
      const response = await this.http.get(feedUrl);
      if (!isSuccessStatus(response.status)) {
        await response.discard();
        throw new ResolutionError(
          'fetch_failed',
          'feed',
          `Feed request failed with HTTP ${response.status}`
        );
      }
      const body = await readBody(response);
      return body.toString('utf-8');
    } catch (err) {
      if (err instanceof ResolutionError) throw err;
      throw new ResolutionError(
        'fetch_failed',
        'feed',
        `Feed request failed: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }
}

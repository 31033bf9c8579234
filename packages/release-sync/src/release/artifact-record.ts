/**
 * ArtifactRecord - the release a feed entry points at.
 *
 * Created fresh on every sync cycle from live feed data and discarded when
 * the cycle (and any transfer it spawned) is done. Never persisted.
 */

import { ResolutionError } from '../errors.js';

export interface ArtifactRecordFields {
  publishedAt: Date;
  downloadUrl: string;
  /** Content hash published alongside the file; may be empty */
  contentHash: string;
  fileName: string;
  /** Where the static server exposes the file once it is saved */
  publicUrl: string;
}

/** Raw strings as they appear in a feed entry */
export interface FeedFields {
  pubDate: string;
  downloadUrl: string;
  contentHash: string;
  fileName: string;
  publicUrl: string;
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

/** Named zones from RFC-2822 section 4.3, in minutes east of UTC */
const ZONE_OFFSETS: Readonly<Record<string, number>> = {
  UT: 0,
  GMT: 0,
  EST: -300,
  EDT: -240,
  CST: -360,
  CDT: -300,
  MST: -420,
  MDT: -360,
  PST: -480,
  PDT: -420,
};

const RFC2822_DATE =
  /^\s*(?:(Mon|Tue|Wed|Thu|Fri|Sat|Sun),\s*)?(\d{1,2})\s+(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+(\d{2,4})\s+(\d{2}):(\d{2})(?::(\d{2}))?\s+([+-]\d{4}|UT|GMT|[ECMP][SD]T|[A-IK-Za-ik-z])\s*$/;

/**
 * Offset of a zone in minutes east of UTC. Single-letter military zones
 * carry no reliable offset and count as zero.
 */
function zoneOffset(zone: string): number | null {
  const numeric = /^([+-])(\d{2})(\d{2})$/.exec(zone);
  if (numeric) {
    const [, sign, hours, minutes] = numeric;
    if (Number(minutes) > 59) return null;
    const total = Number(hours) * 60 + Number(minutes);
    return sign === '-' ? -total : total;
  }
  return ZONE_OFFSETS[zone] ?? 0;
}

/** Two- and three-digit years, per the obsolete RFC-2822 year syntax */
function fullYear(text: string): number {
  const year = Number(text);
  if (text.length === 2) return year < 50 ? 2000 + year : 1900 + year;
  if (text.length === 3) return 1900 + year;
  return year;
}

/**
 * Parse an RFC-2822 date ("Mon, 01 Jan 2024 00:00:00 GMT").
 *
 * Returns null for anything else, including ISO-8601 strings, dates that
 * do not exist (31 Feb) and a weekday that does not match the date.
 */
export function parseRfc2822Date(value: string): Date | null {
  const match = RFC2822_DATE.exec(value);
  if (!match) return null;

  const [, weekday, dayText, monthText, yearText, hourText, minuteText, secondText, zone] = match;
  if (!dayText || !monthText || !yearText || !hourText || !minuteText || !zone) return null;

  const year = fullYear(yearText);
  const month = MONTHS.indexOf(monthText);
  const day = Number(dayText);
  const hours = Number(hourText);
  const minutes = Number(minuteText);
  const seconds = secondText ? Number(secondText) : 0;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  const offset = zoneOffset(zone);
  if (offset === null) return null;

  // Wall-clock time in the given zone, built in UTC so nothing rolls over unseen
  const local = new Date(0);
  local.setUTCFullYear(year, month, day);
  local.setUTCHours(hours, minutes, seconds, 0);
  if (
    local.getUTCFullYear() !== year ||
    local.getUTCMonth() !== month ||
    local.getUTCDate() !== day
  ) {
    return null;
  }
  if (weekday && WEEKDAYS[local.getUTCDay()] !== weekday) return null;

  return new Date(local.getTime() - offset * 60_000);
}

export class ArtifactRecord implements Readonly<ArtifactRecordFields> {
  readonly publishedAt: Date;
  readonly downloadUrl: string;
  readonly contentHash: string;
  readonly fileName: string;
  readonly publicUrl: string;

  constructor(fields: ArtifactRecordFields) {
    // Own copy so the caller's Date cannot mutate the record
    this.publishedAt = new Date(fields.publishedAt.getTime());
    this.downloadUrl = fields.downloadUrl;
    this.contentHash = fields.contentHash;
    this.fileName = fields.fileName;
    this.publicUrl = fields.publicUrl;
    Object.freeze(this);
  }

  /**
   * Build a record from feed strings. Throws ResolutionError if the
   * publish date is not RFC-2822.
   */
  static fromFeedFields(fields: FeedFields): ArtifactRecord {
    const publishedAt = parseRfc2822Date(fields.pubDate);
    if (!publishedAt) {
      throw new ResolutionError(
        'invalid_field',
        'pubDate',
        `pubDate is not an RFC-2822 date: ${fields.pubDate}`
      );
    }

    return new ArtifactRecord({
      publishedAt,
      downloadUrl: fields.downloadUrl,
      contentHash: fields.contentHash,
      fileName: fields.fileName,
      publicUrl: fields.publicUrl,
    });
  }

  /**
   * Same release: both hashes non-empty and identical. Every other field
   * is ignored.
   */
  equals(other: ArtifactRecord): boolean {
    return this.contentHash.length > 0 && this.contentHash === other.contentHash;
  }

  /**
   * Order by publish time: -1 older, 0 same instant, 1 newer.
   * Records that compare 0 are not necessarily equal().
   */
  compare(other: ArtifactRecord): -1 | 0 | 1 {
    const a = this.publishedAt.getTime();
    const b = other.publishedAt.getTime();
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  isNewerThan(other: ArtifactRecord): boolean {
    return this.compare(other) > 0;
  }

  describe(): string {
    return [
      `file name: ${this.fileName}`,
      `pub date: ${this.publishedAt.toISOString()}`,
      `download url: ${this.downloadUrl}`,
      `md5: ${this.contentHash}`,
      `static file url: ${this.publicUrl}`,
    ].join('\n');
  }

  toJSON(): Record<keyof ArtifactRecordFields, string> {
    return {
      publishedAt: this.publishedAt.toISOString(),
      downloadUrl: this.downloadUrl,
      contentHash: this.contentHash,
      fileName: this.fileName,
      publicUrl: this.publicUrl,
    };
  }
}

/**
 * DedupGate - has this release already been fetched?
 *
 * The destination file's existence is the only "already fetched" marker.
 * No size or hash check is made, so a partial file left by a failed
 * transfer also counts as fetched.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export function destinationPathFor(saveDir: string, fileName: string): string {
  return path.join(saveDir, fileName);
}

// TODO: download to `<name>.part` and rename on completion so existence
// here means a finished transfer.
export function alreadyFetched(saveDir: string, fileName: string): boolean {
  return fs.existsSync(destinationPathFor(saveDir, fileName));
}

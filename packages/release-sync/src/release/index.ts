export { ArtifactRecord, parseRfc2822Date } from './artifact-record.js';
export type { ArtifactRecordFields, FeedFields } from './artifact-record.js';

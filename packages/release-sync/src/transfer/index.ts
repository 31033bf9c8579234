export { alreadyFetched, destinationPathFor } from './dedup-gate.js';
export { ResumableTransfer, completionMessage, DEFAULT_RETRY_LIMIT } from './resumable-transfer.js';
export type { TransferResult, ResumableTransferOptions } from './resumable-transfer.js';

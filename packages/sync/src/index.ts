/**
 * @otptoken/sync
 *
 * @packageDocumentation
 */

export {
  TokenSyncClient,
  SyncConfigurationError,
  SYNC_STATUSES,
  SYNC_MESSAGES,
  isSyncStatus,
  escapeDnValue,
  syncUri,
  type SyncStatus,
  type SyncParams,
  type SyncResult,
  type FetchLike,
  type TokenSyncClientOptions,
} from "./sync";


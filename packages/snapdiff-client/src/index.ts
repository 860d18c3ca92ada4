export { SnapdiffClient, SnapdiffApiError } from './client.js';
export type {
  BaselineDetail,
  BaselineInfo,
  ChangeRecord,
  ChangeType,
  DataIntegrityWarning,
  FetchLike,
  RunSummary,
  SnapdiffClientConfig,
  TableStatus,
} from './client.js';

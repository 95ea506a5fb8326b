export {
  SyncError,
  SyncErrorCode,
  ConfigError,
  AuthError,
  RemoteError,
  StoreError,
  describeError,
} from './sync.errors';

/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export {
  CREDENTIAL_PROVIDER_PORT,
  type CredentialProviderPort,
  type SessionCredentialRequest,
} from './credential-provider.port';
export { TASK_API_PORT, type TaskApiPort } from './task-api.port';
export {
  ASSET_STORE_PORT,
  type AssetStorePort,
  type UploadObjectRequest,
  type UploadObjectResult,
} from './asset-store.port';
export { EVENT_PUBLISHER_PORT, type EventPublisherPort } from './event-publisher.port';

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import { SharedModule } from '../shared/shared.module';

import { CREDENTIAL_PROVIDER_PORT } from '../application/ports/output/credential-provider.port';
import { TASK_API_PORT } from '../application/ports/output/task-api.port';
import { ASSET_STORE_PORT, AssetStorePort } from '../application/ports/output/asset-store.port';
import { EVENT_PUBLISHER_PORT } from '../application/ports/output/event-publisher.port';

// Adapters (implementations)
import { WorkfrontCredentialProviderAdapter } from './adapters/auth/workfront-credential-provider.adapter';
import { WorkfrontTaskApiAdapter } from './adapters/workfront/workfront-task-api.adapter';
import { CloudinaryAssetStoreAdapter } from './adapters/storage/cloudinary-asset-store.adapter';
import { S3AssetStoreAdapter } from './adapters/storage/s3-asset-store.adapter';
import { LoggingEventPublisherAdapter } from './adapters/events/logging-event-publisher.adapter';

/**
 * Picks the asset store named by the `ASSET_STORE` setting.
 */
export function selectAssetStore(
  configService: ConfigService<AppConfig, true>,
  cloudinaryStore: CloudinaryAssetStoreAdapter,
  s3Store: S3AssetStoreAdapter,
): AssetStorePort {
  switch (configService.get('assets', { infer: true }).provider) {
    case 'cloudinary':
      return cloudinaryStore;
    case 's3':
      return s3Store;
  }
}

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 */
@Module({
  imports: [SharedModule],
  providers: [
    {
      provide: CREDENTIAL_PROVIDER_PORT,
      useClass: WorkfrontCredentialProviderAdapter,
    },
    {
      provide: TASK_API_PORT,
      useClass: WorkfrontTaskApiAdapter,
    },
    CloudinaryAssetStoreAdapter,
    S3AssetStoreAdapter,
    {
      provide: ASSET_STORE_PORT,
      inject: [ConfigService, CloudinaryAssetStoreAdapter, S3AssetStoreAdapter],
      useFactory: selectAssetStore,
    },
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: LoggingEventPublisherAdapter,
    },
  ],
  exports: [
    CREDENTIAL_PROVIDER_PORT,
    TASK_API_PORT,
    ASSET_STORE_PORT,
    EVENT_PUBLISHER_PORT,
  ],
})
export class InfrastructureModule {}

import { Injectable, Logger } from '@nestjs/common';
import {
  AssetStorePort,
  UploadObjectRequest,
  UploadObjectResult,
} from '../../../application/ports/output/asset-store.port';
import { StoreError, describeError } from '../../../domain/errors';
import { CloudinaryService } from '../../../shared/cloudinary/cloudinary.service';

/**
 * Cloudinary Asset Store Adapter
 * Implements AssetStorePort on a Cloudinary media library; the object key
 * becomes the public id and the secure delivery URL is the durable URL
 */
@Injectable()
export class CloudinaryAssetStoreAdapter implements AssetStorePort {
  private readonly logger = new Logger(CloudinaryAssetStoreAdapter.name);

  constructor(private readonly cloudinaryService: CloudinaryService) {}

  async uploadObject(request: UploadObjectRequest): Promise<UploadObjectResult> {
    this.logger.debug(
      `Uploading ${request.filePath} to Cloudinary: ${this.cloudinaryService.cloud}/${request.objectKey}`,
    );

    try {
      const asset = await this.cloudinaryService.uploadFile(request.filePath, {
        publicId: request.objectKey,
        displayName: request.displayLabel,
        folder: request.folder,
      });

      return {
        durableUrl: asset.secureUrl,
        key: asset.publicId,
        etag: asset.etag,
        sizeBytes: asset.bytes,
      };
    } catch (error) {
      throw new StoreError(
        `Upload of ${request.objectKey} to Cloudinary failed: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}

import { Injectable, Logger } from '@nestjs/common';
import {
  AssetStorePort,
  UploadObjectRequest,
  UploadObjectResult,
} from '../../../application/ports/output/asset-store.port';
import { StoreError, describeError } from '../../../domain/errors';
import { S3Service } from '../../../shared/aws/s3/s3.service';

/**
 * S3 Asset Store Adapter
 * Implements AssetStorePort on an S3 bucket served from a public base URL
 */
@Injectable()
export class S3AssetStoreAdapter implements AssetStorePort {
  private readonly logger = new Logger(S3AssetStoreAdapter.name);

  constructor(private readonly s3Service: S3Service) {}

  static objectKey(folder: string, objectKey: string): string {
    const prefix = folder.replace(/^\/+|\/+$/g, '');
    return prefix === '' ? objectKey : `${prefix}/${objectKey}`;
  }

  async uploadObject(request: UploadObjectRequest): Promise<UploadObjectResult> {
    const key = S3AssetStoreAdapter.objectKey(request.folder, request.objectKey);
    const encodedLabel = encodeURIComponent(request.displayLabel);

    this.logger.debug(`Uploading ${request.filePath} to S3: ${this.s3Service.bucket}/${key}`);

    try {
      const result = await this.s3Service.uploadFile(key, request.filePath, {
        contentDisposition: `inline; filename*=UTF-8''${encodedLabel}`,
        metadata: {
          'display-name': encodedLabel,
          'source-id': encodeURIComponent(request.objectKey),
        },
      });

      return {
        durableUrl: this.s3Service.getObjectUrl(result.key),
        key: result.key,
        etag: result.etag,
        sizeBytes: result.size,
      };
    } catch (error) {
      throw new StoreError(`Upload of ${key} failed: ${describeError(error)}`, { cause: error });
    }
  }
}

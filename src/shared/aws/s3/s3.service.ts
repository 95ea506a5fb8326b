import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { createReadStream, promises as fs } from 'fs';
import { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../logging/pino-logger.service';

export interface UploadOptions {
  contentDisposition?: string;
  metadata?: Record<string, string>;
}

export interface UploadedObject {
  key: string;
  etag: string;
  size: number;
}

@Injectable()
export class S3Service implements OnModuleDestroy {
  private readonly client: S3Client;
  private readonly bucketName: string;
  private readonly objectBaseUrl: string;
  private readonly logger: PinoLoggerService;

  constructor(configService: ConfigService<AppConfig, true>, logger: PinoLoggerService) {
    const awsConfig = configService.get('aws', { infer: true });
    const s3Config = configService.get('assets', { infer: true }).s3;

    this.logger = logger.child(S3Service.name);

    this.client = new S3Client({
      region: awsConfig.region,
      ...(awsConfig.endpoint ? { endpoint: awsConfig.endpoint, forcePathStyle: true } : {}),
      ...(awsConfig.credentials ? { credentials: awsConfig.credentials } : {}),
    });

    this.bucketName = s3Config.bucketName;
    this.objectBaseUrl = S3Service.resolveObjectBaseUrl(
      s3Config.bucketName,
      awsConfig.region,
      s3Config.publicBaseUrl,
      awsConfig.endpoint,
    );
  }

  /**
   * Base URL objects are publicly served from: the configured CDN, the
   * path-style endpoint (LocalStack), or the bucket's virtual-hosted address.
   */
  static resolveObjectBaseUrl(
    bucketName: string,
    region: string,
    publicBaseUrl?: string,
    endpoint?: string,
  ): string {
    if (publicBaseUrl) {
      return publicBaseUrl.replace(/\/+$/, '');
    }
    if (endpoint) {
      return `${endpoint.replace(/\/+$/, '')}/${bucketName}`;
    }
    return `https://${bucketName}.s3.${region}.amazonaws.com`;
  }

  get bucket(): string {
    return this.bucketName;
  }

  async uploadFile(
    key: string,
    filePath: string,
    options?: UploadOptions,
  ): Promise<UploadedObject> {
    const stats = await fs.stat(filePath);
    const fileStream = createReadStream(filePath);

    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucketName,
        Key: key,
        Body: fileStream,
        ContentDisposition: options?.contentDisposition,
        Metadata: options?.metadata,
      },
      queueSize: 4,
      partSize: 10 * 1024 * 1024, // 10MB parts
      leavePartsOnError: false,
    });

    upload.on('httpUploadProgress', (progress) => {
      this.logger.debug(
        { key, loaded: progress.loaded, total: progress.total },
        'Upload progress',
      );
    });

    try {
      const result = await upload.done();

      this.logger.info({ key, size: stats.size }, 'File uploaded successfully');

      return {
        key,
        etag: result.ETag || '',
        size: stats.size,
      };
    } finally {
      fileStream.destroy();
    }
  }

  getObjectUrl(key: string): string {
    const encodedKey = key.split('/').map(encodeURIComponent).join('/');
    return `${this.objectBaseUrl}/${encodedKey}`;
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}

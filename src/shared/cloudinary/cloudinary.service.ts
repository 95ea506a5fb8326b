import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v2 as cloudinary } from 'cloudinary';
import { AppConfig } from '../../config/configuration';
import { PinoLoggerService } from '../logging/pino-logger.service';

export interface CloudinaryUploadOptions {
  publicId: string;
  displayName: string;
  /** Asset folder shown in the media library */
  folder: string;
}

export interface UploadedAsset {
  publicId: string;
  secureUrl: string;
  etag: string;
  bytes: number;
}

@Injectable()
export class CloudinaryService {
  private readonly cloudName: string;
  private readonly logger: PinoLoggerService;

  constructor(configService: ConfigService<AppConfig, true>, logger: PinoLoggerService) {
    const { cloudName, apiKey, apiSecret } = configService.get('assets', { infer: true }).cloudinary;

    this.logger = logger.child(CloudinaryService.name);
    this.cloudName = cloudName;

    cloudinary.config({
      cloud_name: cloudName,
      api_key: apiKey,
      api_secret: apiSecret,
      secure: true,
    });
  }

  get cloud(): string {
    return this.cloudName;
  }

  /**
   * Uploads a local file, letting Cloudinary detect the resource type.
   * Rejects with the SDK's error when the upload API refuses the file.
   */
  async uploadFile(filePath: string, options: CloudinaryUploadOptions): Promise<UploadedAsset> {
    const response = await cloudinary.uploader.upload(filePath, {
      public_id: options.publicId,
      display_name: options.displayName,
      asset_folder: options.folder,
      resource_type: 'auto',
    });

    this.logger.info(
      { publicId: response.public_id, bytes: response.bytes },
      'File uploaded successfully',
    );

    return {
      publicId: response.public_id,
      secureUrl: response.secure_url,
      etag: response.etag,
      bytes: response.bytes,
    };
  }
}

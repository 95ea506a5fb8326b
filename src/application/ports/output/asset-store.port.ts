export const ASSET_STORE_PORT = 'AssetStorePort';

/**
 * Upload Object Request
 */
export interface UploadObjectRequest {
  /** Local path of the staged file */
  filePath: string;
  objectKey: string;
  displayLabel: string;
  folder: string;
}

/**
 * Upload Object Result
 */
export interface UploadObjectResult {
  durableUrl: string;
  key: string;
  etag: string;
  sizeBytes: number;
}

/**
 * Asset Store Port (Driven Port)
 * Destination storage that hosts uploaded documents behind a durable URL
 */
export interface AssetStorePort {
  /**
   * @throws StoreError on transport failure or provider-side rejection
   */
  uploadObject(request: UploadObjectRequest): Promise<UploadObjectResult>;
}

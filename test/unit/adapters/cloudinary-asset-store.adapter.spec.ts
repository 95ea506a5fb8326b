import { describe, it, expect, beforeEach } from 'vitest';
import { CloudinaryAssetStoreAdapter } from '../../../src/infrastructure/adapters/storage/cloudinary-asset-store.adapter';
import { StoreError } from '../../../src/domain/errors';
import { CloudinaryService } from '../../../src/shared/cloudinary/cloudinary.service';
import { createMockCloudinaryService } from '../helpers/mock-factories';

describe('CloudinaryAssetStoreAdapter', () => {
  let adapter: CloudinaryAssetStoreAdapter;
  let mockCloudinaryService: ReturnType<typeof createMockCloudinaryService>;

  const request = {
    filePath: '/tmp/staging/Q3 report.pdf',
    objectKey: 'doc-1',
    displayLabel: 'Q3 report.pdf',
    folder: 'workfront',
  };

  beforeEach(() => {
    mockCloudinaryService = createMockCloudinaryService();
    mockCloudinaryService.uploadFile.mockResolvedValue({
      publicId: 'doc-1',
      secureUrl: 'https://res.cloudinary.test/test-cloud/raw/upload/v1/doc-1',
      etag: 'etag-1',
      bytes: 42,
    });

    adapter = new CloudinaryAssetStoreAdapter(mockCloudinaryService as unknown as CloudinaryService);
  });

  it('should upload under the document id with its display name and folder', async () => {
    await adapter.uploadObject(request);

    expect(mockCloudinaryService.uploadFile).toHaveBeenCalledWith('/tmp/staging/Q3 report.pdf', {
      publicId: 'doc-1',
      displayName: 'Q3 report.pdf',
      folder: 'workfront',
    });
  });

  it('should use the secure URL as the durable URL', async () => {
    const result = await adapter.uploadObject(request);

    expect(result).toEqual({
      durableUrl: 'https://res.cloudinary.test/test-cloud/raw/upload/v1/doc-1',
      key: 'doc-1',
      etag: 'etag-1',
      sizeBytes: 42,
    });
  });

  it('should wrap an SDK rejection in StoreError', async () => {
    const cause = { message: 'Invalid Signature', http_code: 401 };
    mockCloudinaryService.uploadFile.mockRejectedValue(cause);

    const error = await adapter.uploadObject(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({
      message: 'Upload of doc-1 to Cloudinary failed: Invalid Signature',
      cause,
    });
  });

  it('should wrap a transport failure in StoreError', async () => {
    mockCloudinaryService.uploadFile.mockRejectedValue(new Error('socket hang up'));

    await expect(adapter.uploadObject(request)).rejects.toThrow(
      'Upload of doc-1 to Cloudinary failed: socket hang up',
    );
  });
});

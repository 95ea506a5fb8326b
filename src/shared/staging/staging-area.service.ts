import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { AppConfig } from '../../config/configuration';

const STAGING_PREFIX = 'task-asset-sync-';

/**
 * Scoped staging of downloaded bytes on local disk.
 *
 * Each call gets its own `mkdtemp` directory, so concurrent or repeated
 * documents never share a path. The directory is removed when the action
 * settles, whatever the outcome.
 */
@Injectable()
export class StagingAreaService {
  private readonly logger = new Logger(StagingAreaService.name);
  private readonly rootDir: string;

  constructor(configService: ConfigService<AppConfig, true>) {
    this.rootDir = configService.get('workflow', { infer: true }).tempDir;
  }

  async withStagedFile<T>(
    fileName: string,
    contents: Buffer,
    action: (filePath: string) => Promise<T>,
  ): Promise<T> {
    await fs.mkdir(this.rootDir, { recursive: true });
    const stagingDir = await fs.mkdtemp(path.join(this.rootDir, STAGING_PREFIX));

    try {
      const filePath = path.join(stagingDir, this.safeFileName(fileName));
      await fs.writeFile(filePath, contents);
      this.logger.debug(`Staged ${contents.length} bytes at ${filePath}`);

      return await action(filePath);
    } finally {
      await this.release(stagingDir);
    }
  }

  private async release(stagingDir: string): Promise<void> {
    try {
      await fs.rm(stagingDir, { recursive: true, force: true });
      this.logger.debug(`Cleaned up staging directory: ${stagingDir}`);
    } catch (error) {
      this.logger.warn(
        `Failed to clean up staging directory ${stagingDir}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  private safeFileName(fileName: string): string {
    const base = path.basename(fileName).replace(/[^\w.-]+/g, '_').replace(/^\.+/, '');
    return base === '' ? 'document' : base.slice(0, 200);
  }
}

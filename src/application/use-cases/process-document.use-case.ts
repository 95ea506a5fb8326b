import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { TaskDocument, documentLabel } from '../../domain/entities/work-task.entity';
import { ProcessingOutcome } from '../../domain/value-objects/processing-outcome.vo';
import { SessionCredentialVO } from '../../domain/value-objects/session-credential.vo';
import { TaskStatusCodesVO } from '../../domain/value-objects/task-status-codes.vo';
import { DocumentFailedEvent, DocumentProcessingStage } from '../../domain/events/document-failed.event';
import { DocumentUploadedEvent } from '../../domain/events/document-uploaded.event';
import { SyncError, describeError } from '../../domain/errors';
import { ProcessDocumentPort } from '../ports/input/process-document.port';
import { ASSET_STORE_PORT, AssetStorePort } from '../ports/output/asset-store.port';
import { EVENT_PUBLISHER_PORT, EventPublisherPort } from '../ports/output/event-publisher.port';
import { TASK_API_PORT, TaskApiPort } from '../ports/output/task-api.port';
import { StagingAreaService } from '../../shared/staging/staging-area.service';

/** Document field that receives the asset URL */
export const DOCUMENT_URL_FIELD = 'description';

/**
 * Process Document Use Case
 * Download → stage → upload → link the durable URL back onto the document
 */
@Injectable()
export class ProcessDocumentUseCase implements ProcessDocumentPort {
  private readonly logger = new Logger(ProcessDocumentUseCase.name);
  private readonly statusCodes: TaskStatusCodesVO;
  private readonly assetFolder: string;

  constructor(
    @Inject(TASK_API_PORT) private readonly taskApi: TaskApiPort,
    @Inject(ASSET_STORE_PORT) private readonly assetStore: AssetStorePort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    private readonly stagingArea: StagingAreaService,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.statusCodes = TaskStatusCodesVO.create(
      configService.get('workflow', { infer: true }).statusCodes,
    );
    this.assetFolder = configService.get('assets', { infer: true }).folder;
  }

  async execute(
    document: TaskDocument,
    credential: SessionCredentialVO,
  ): Promise<ProcessingOutcome> {
    const startTime = Date.now();
    const documentName = documentLabel(document);
    let stage: DocumentProcessingStage = 'download';

    this.logger.log(`Processing document ${document.id} (${documentName})`);

    try {
      const contents = await this.taskApi.fetchDocumentBytes(document.id, credential);
      this.logger.debug(`Downloaded document ${document.id}: ${contents.length} bytes`);

      stage = 'upload';
      const upload = await this.stagingArea.withStagedFile(documentName, contents, (filePath) =>
        this.assetStore.uploadObject({
          filePath,
          objectKey: document.id,
          displayLabel: documentName,
          folder: this.assetFolder,
        }),
      );
      this.logger.log(`Document ${document.id} uploaded: ${upload.durableUrl}`);

      stage = 'link';
      await this.taskApi.updateDocumentField(document.id, DOCUMENT_URL_FIELD, upload.durableUrl);

      const processingDurationMs = Date.now() - startTime;
      this.logger.log(
        `Linked document ${document.id} to ${upload.durableUrl} in ${processingDurationMs}ms`,
      );

      this.eventPublisher.publishAsync(
        new DocumentUploadedEvent({
          documentId: document.id,
          documentName,
          objectKey: upload.key,
          url: upload.durableUrl,
          sizeBytes: upload.sizeBytes,
          processingDurationMs,
        }),
      );

      return {
        succeeded: true,
        statusCode: this.statusCodes.complete,
        documentId: document.id,
        url: upload.durableUrl,
      };
    } catch (error) {
      const errorMessage = describeError(error);

      this.logger.error(`Failed to process document ${document.id} during ${stage}: ${errorMessage}`);

      this.eventPublisher.publishAsync(
        new DocumentFailedEvent({
          documentId: document.id,
          documentName,
          stage,
          errorMessage,
          errorCode: error instanceof SyncError ? error.code : undefined,
        }),
      );

      return {
        succeeded: false,
        statusCode: this.statusCodes.error,
        documentId: document.id,
        errorMessage,
      };
    }
  }
}

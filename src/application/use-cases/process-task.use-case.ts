import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { WorkTask } from '../../domain/entities/work-task.entity';
import { SessionCredentialVO } from '../../domain/value-objects/session-credential.vo';
import { TaskStatusCodesVO } from '../../domain/value-objects/task-status-codes.vo';
import { TaskFinishedEvent } from '../../domain/events/task-finished.event';
import { PROCESS_DOCUMENT_PORT, ProcessDocumentPort } from '../ports/input/process-document.port';
import { ProcessTaskPort } from '../ports/input/process-task.port';
import { EVENT_PUBLISHER_PORT, EventPublisherPort } from '../ports/output/event-publisher.port';

/**
 * Process Task Use Case
 * Runs every document of a task in order and reduces the outcomes with logical AND.
 *
 * Returns the status code without persisting it; the run orchestrator owns the
 * task status write. Documents that succeeded stay uploaded and linked even
 * when a sibling fails.
 */
@Injectable()
export class ProcessTaskUseCase implements ProcessTaskPort {
  private readonly logger = new Logger(ProcessTaskUseCase.name);
  private readonly statusCodes: TaskStatusCodesVO;

  constructor(
    @Inject(PROCESS_DOCUMENT_PORT) private readonly processDocument: ProcessDocumentPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.statusCodes = TaskStatusCodesVO.create(
      configService.get('workflow', { infer: true }).statusCodes,
    );
  }

  async execute(task: WorkTask, credential: SessionCredentialVO): Promise<string> {
    if (task.documents.length === 0) {
      this.logger.warn(`Task ${task.id} has no documents to process`);
      return this.statusCodes.error;
    }

    this.logger.log(`Processing ${task.documents.length} documents for task ${task.id}`);

    const results: boolean[] = [];
    for (const document of task.documents) {
      const outcome = await this.processDocument.execute(document, credential);
      results.push(outcome.succeeded);
    }

    const finalStatus = this.statusCodes.reduce(results);
    const succeededDocuments = results.filter(Boolean).length;
    const succeeded = this.statusCodes.isComplete(finalStatus);

    if (succeeded) {
      this.logger.log(`All documents processed successfully for task ${task.id}`);
    } else {
      this.logger.warn(
        `Task ${task.id} partially failed: ${succeededDocuments}/${results.length} documents processed successfully`,
      );
    }

    this.eventPublisher.publishAsync(
      new TaskFinishedEvent({
        taskId: task.id,
        statusCode: finalStatus,
        succeeded,
        totalDocuments: results.length,
        succeededDocuments,
      }),
    );

    return finalStatus;
  }
}

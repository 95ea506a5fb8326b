import { TaskDocument } from '../../../domain/entities/work-task.entity';
import { ProcessingOutcome } from '../../../domain/value-objects/processing-outcome.vo';
import { SessionCredentialVO } from '../../../domain/value-objects/session-credential.vo';

export const PROCESS_DOCUMENT_PORT = 'ProcessDocumentPort';

/**
 * Process Document Port (Driving Port / Use Case Interface)
 * Downloads one document, uploads it to the asset store and links the URL back
 */
export interface ProcessDocumentPort {
  /**
   * Never throws: every failure is reported as an unsuccessful outcome
   */
  execute(document: TaskDocument, credential: SessionCredentialVO): Promise<ProcessingOutcome>;
}

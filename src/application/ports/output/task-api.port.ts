import { WorkTask } from '../../../domain/entities/work-task.entity';
import { SessionCredentialVO } from '../../../domain/value-objects/session-credential.vo';

export const TASK_API_PORT = 'TaskApiPort';

/**
 * Task API Port (Driven Port)
 * Operations over the work-management API. Every method throws RemoteError on
 * a non-2xx response or a transport failure.
 */
export interface TaskApiPort {
  searchTasks(statusCode: string, limit: number, includeDocuments: boolean): Promise<WorkTask[]>;

  fetchDocumentBytes(documentId: string, credential: SessionCredentialVO): Promise<Buffer>;

  /**
   * @returns the HTTP status code of the update
   */
  updateDocumentField(documentId: string, field: string, value: string): Promise<number>;

  /**
   * @returns the HTTP status code of the update
   */
  updateTaskStatus(taskId: string, statusCode: string): Promise<number>;
}

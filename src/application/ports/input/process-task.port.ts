import { WorkTask } from '../../../domain/entities/work-task.entity';
import { SessionCredentialVO } from '../../../domain/value-objects/session-credential.vo';

export const PROCESS_TASK_PORT = 'ProcessTaskPort';

/**
 * Process Task Port (Driving Port / Use Case Interface)
 * Runs every document of a task and reduces the outcomes to one status code
 */
export interface ProcessTaskPort {
  /**
   * @returns the complete status code iff every document succeeded, else the error code
   */
  execute(task: WorkTask, credential: SessionCredentialVO): Promise<string>;
}

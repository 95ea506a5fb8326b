import { DomainEvent } from './base.event';

/**
 * Task Finished Event
 * Emitted when every document of a task has been attempted
 */
export interface TaskFinishedEventPayload {
  taskId: string;
  statusCode: string;
  succeeded: boolean;
  totalDocuments: number;
  succeededDocuments: number;
}

export class TaskFinishedEvent extends DomainEvent {
  constructor(public readonly payload: TaskFinishedEventPayload) {
    super();
  }

  get eventName(): string {
    return this.payload.succeeded ? 'task.completed' : 'task.failed';
  }

  get isPartialFailure(): boolean {
    return !this.payload.succeeded && this.payload.succeededDocuments > 0;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: { ...this.payload, partialFailure: this.isPartialFailure },
    };
  }
}

import { DomainEvent } from './base.event';

export type DocumentProcessingStage = 'download' | 'upload' | 'link';

/**
 * Document Failed Event
 * Emitted when any step of moving a document fails
 */
export interface DocumentFailedEventPayload {
  documentId: string;
  documentName: string;
  stage: DocumentProcessingStage;
  errorMessage: string;
  errorCode?: string;
}

export class DocumentFailedEvent extends DomainEvent {
  constructor(public readonly payload: DocumentFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'document.failed';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}

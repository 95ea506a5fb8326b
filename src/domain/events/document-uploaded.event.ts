import { DomainEvent } from './base.event';

/**
 * Document Uploaded Event
 * Emitted once a document is in the asset store and its URL is linked back
 */
export interface DocumentUploadedEventPayload {
  documentId: string;
  documentName: string;
  objectKey: string;
  url: string;
  sizeBytes: number;
  processingDurationMs: number;
}

export class DocumentUploadedEvent extends DomainEvent {
  constructor(public readonly payload: DocumentUploadedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'document.uploaded';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}

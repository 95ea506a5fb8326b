export { DomainEvent } from './base.event';
export { DocumentUploadedEvent, type DocumentUploadedEventPayload } from './document-uploaded.event';
export {
  DocumentFailedEvent,
  type DocumentFailedEventPayload,
  type DocumentProcessingStage,
} from './document-failed.event';
export { TaskFinishedEvent, type TaskFinishedEventPayload } from './task-finished.event';
export { RunCompletedEvent, type RunCompletedEventPayload } from './run-completed.event';

/**
 * Use Cases Barrel Export
 */
export { ProcessDocumentUseCase, DOCUMENT_URL_FIELD } from './process-document.use-case';
export { ProcessTaskUseCase } from './process-task.use-case';
export { RunSyncUseCase } from './run-sync.use-case';

/**
 * Input Ports (Driving Ports) Barrel Export
 */
export { PROCESS_DOCUMENT_PORT, type ProcessDocumentPort } from './process-document.port';
export { PROCESS_TASK_PORT, type ProcessTaskPort } from './process-task.port';
export { ExitCode, type RunSyncPort, type RunSyncCommand, type RunSyncResult } from './run-sync.port';

/**
 * Domain Layer Barrel Export
 *
 * The domain layer has no dependency on Nest, HTTP or storage libraries.
 */

// Entities
export { type WorkTask, type TaskDocument, documentLabel } from './entities/work-task.entity';

// Value Objects
export { TaskStatusCodesVO, type TaskStatusCodesProps } from './value-objects/task-status-codes.vo';
export { SessionCredentialVO } from './value-objects/session-credential.vo';
export { RunStatisticsVO, type RunStatisticsProps } from './value-objects/run-statistics.vo';
export { type ProcessingOutcome } from './value-objects/processing-outcome.vo';

// Errors
export * from './errors';

// Events
export * from './events';

import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { StagingModule } from '../shared/staging/staging.module';
import { PROCESS_DOCUMENT_PORT } from './ports/input/process-document.port';
import { PROCESS_TASK_PORT } from './ports/input/process-task.port';

// Use Cases
import { ProcessDocumentUseCase, ProcessTaskUseCase, RunSyncUseCase } from './use-cases';

/**
 * Application Module
 * Contains all use cases
 *
 * Use cases depend on output ports (interfaces) only. The implementations
 * (adapters) are provided by the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule, StagingModule],
  providers: [
    ProcessDocumentUseCase,
    {
      provide: PROCESS_DOCUMENT_PORT,
      useExisting: ProcessDocumentUseCase,
    },
    ProcessTaskUseCase,
    {
      provide: PROCESS_TASK_PORT,
      useExisting: ProcessTaskUseCase,
    },
    RunSyncUseCase,
  ],
  exports: [RunSyncUseCase],
})
export class ApplicationModule {}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { WorkTask } from '../../domain/entities/work-task.entity';
import { RunStatisticsVO } from '../../domain/value-objects/run-statistics.vo';
import { SessionCredentialVO } from '../../domain/value-objects/session-credential.vo';
import { TaskStatusCodesVO } from '../../domain/value-objects/task-status-codes.vo';
import { RunCompletedEvent } from '../../domain/events/run-completed.event';
import { describeError } from '../../domain/errors';
import { PROCESS_TASK_PORT, ProcessTaskPort } from '../ports/input/process-task.port';
import { ExitCode, RunSyncCommand, RunSyncPort, RunSyncResult } from '../ports/input/run-sync.port';
import {
  CREDENTIAL_PROVIDER_PORT,
  CredentialProviderPort,
  SessionCredentialRequest,
} from '../ports/output/credential-provider.port';
import { EVENT_PUBLISHER_PORT, EventPublisherPort } from '../ports/output/event-publisher.port';
import { TASK_API_PORT, TaskApiPort } from '../ports/output/task-api.port';

/**
 * Run Sync Use Case
 * One pass over every task waiting for upload:
 *
 * 1. Issue a session credential (fatal on failure)
 * 2. Search for tasks in the ready status (fatal on failure)
 * 3. Skip tasks without documents; they keep their status
 * 4. Aggregate each remaining task and persist its final status
 * 5. Summarize and map the run to a process exit code
 *
 * A fault inside one task never stops the run: the task is counted as failed
 * and marked with the error status before moving on.
 */
@Injectable()
export class RunSyncUseCase implements RunSyncPort {
  private readonly logger = new Logger(RunSyncUseCase.name);
  private readonly statusCodes: TaskStatusCodesVO;
  private readonly maxTasksPerRun: number;
  private readonly credentialRequest: SessionCredentialRequest;

  constructor(
    @Inject(CREDENTIAL_PROVIDER_PORT) private readonly credentialProvider: CredentialProviderPort,
    @Inject(TASK_API_PORT) private readonly taskApi: TaskApiPort,
    @Inject(PROCESS_TASK_PORT) private readonly processTask: ProcessTaskPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    configService: ConfigService<AppConfig, true>,
  ) {
    const workflow = configService.get('workflow', { infer: true });
    const auth = configService.get('auth', { infer: true });

    this.statusCodes = TaskStatusCodesVO.create(workflow.statusCodes);
    this.maxTasksPerRun = workflow.maxTasksPerRun;
    this.credentialRequest = {
      identity: {
        instance: auth.instance,
        clientId: auth.clientId,
        clientSecret: auth.clientSecret,
      },
      signingKey: auth.privateKey,
      issuer: auth.issuer,
      subject: auth.subject,
    };
  }

  async execute(command: RunSyncCommand = {}): Promise<RunSyncResult> {
    const startTime = Date.now();
    const interrupted = () => command.signal?.aborted === true;
    let statistics = RunStatisticsVO.empty();

    try {
      const credential = await this.obtainCredential();
      if (interrupted()) {
        return this.interrupt(statistics, 'before the task search', startTime);
      }
      if (!credential) {
        return this.finish(statistics, ExitCode.FAILURE, false, startTime);
      }

      const search = await this.findTasksForUpload();
      if (interrupted()) {
        return this.interrupt(statistics, 'after the task search', startTime);
      }
      if (!search) {
        return this.finish(statistics, ExitCode.FAILURE, false, startTime);
      }

      statistics = statistics.withSkipped(search.skipped);
      const tasks = search.tasks;

      if (tasks.length === 0) {
        this.logger.log('No tasks to process. Workflow complete.');
        return this.finish(statistics, ExitCode.SUCCESS, false, startTime);
      }

      this.logger.log(`Processing ${tasks.length} tasks...`);

      for (const [index, task] of tasks.entries()) {
        if (interrupted()) {
          return this.interrupt(
            statistics,
            `with ${tasks.length - index} tasks left untouched`,
            startTime,
          );
        }

        statistics = statistics.withTaskStarted(task.documents.length);
        const succeeded = await this.runTask(task, credential, index + 1, tasks.length);
        statistics = succeeded ? statistics.withTaskSucceeded() : statistics.withTaskFailed();
      }

      if (interrupted()) {
        return this.interrupt(statistics, 'during the last task', startTime);
      }

      const exitCode = statistics.hasFailures() ? ExitCode.FAILURE : ExitCode.SUCCESS;
      return this.finish(statistics, exitCode, false, startTime);
    } catch (error) {
      this.logger.error(
        `Unexpected error in workflow: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      if (interrupted()) {
        return this.finish(statistics, ExitCode.INTERRUPTED, true, startTime);
      }
      return this.finish(statistics, ExitCode.FAILURE, false, startTime);
    }
  }

  private interrupt(
    statistics: RunStatisticsVO,
    detail: string,
    startTime: number,
  ): RunSyncResult {
    this.logger.warn(`Workflow interrupted ${detail}`);
    return this.finish(statistics, ExitCode.INTERRUPTED, true, startTime);
  }

  private async obtainCredential(): Promise<SessionCredentialVO | null> {
    this.logger.log('Authenticating with Workfront...');

    try {
      const credential = await this.credentialProvider.issueSessionCredential(
        this.credentialRequest,
      );
      this.logger.log('Authentication successful');
      return credential;
    } catch (error) {
      this.logger.error(`Authentication failed: ${describeError(error)}`);
      return null;
    }
  }

  private async findTasksForUpload(): Promise<{ tasks: WorkTask[]; skipped: number } | null> {
    this.logger.log(`Searching for tasks with status '${this.statusCodes.ready}'...`);

    let found: WorkTask[];
    try {
      found = await this.taskApi.searchTasks(this.statusCodes.ready, this.maxTasksPerRun, true);
    } catch (error) {
      this.logger.error(`Failed to search for tasks: ${describeError(error)}`);
      return null;
    }

    if (found.length === 0) {
      this.logger.log('No tasks found for processing');
      return { tasks: [], skipped: 0 };
    }

    this.logger.log(`Found ${found.length} tasks for processing`);

    const tasks = found.filter((task) => task.hasDocuments);
    const skipped = found.length - tasks.length;

    if (skipped > 0) {
      const skippedIds = found.filter((task) => !task.hasDocuments).map((task) => task.id);
      this.logger.warn(
        `${skipped} tasks have no documents and will be skipped: ${skippedIds.join(', ')}`,
      );
    }

    return { tasks, skipped };
  }

  /**
   * @returns whether the task ended with the complete status
   */
  private async runTask(
    task: WorkTask,
    credential: SessionCredentialVO,
    position: number,
    total: number,
  ): Promise<boolean> {
    this.logger.log(
      `Processing task ${position}/${total}: ${task.id} (${task.documents.length} documents)`,
    );

    if (credential.isExpired()) {
      this.logger.warn(
        `Session credential expired at ${credential.expiresAt?.toISOString()}; downloads for task ${task.id} may be rejected`,
      );
    }

    try {
      const finalStatus = await this.processTask.execute(task, credential);
      await this.taskApi.updateTaskStatus(task.id, finalStatus);
      this.logger.log(`Task ${task.id} updated to status '${finalStatus}'`);

      return this.statusCodes.isComplete(finalStatus);
    } catch (error) {
      this.logger.error(`Unexpected error processing task ${task.id}: ${describeError(error)}`);
      await this.markTaskFailed(task.id);
      return false;
    }
  }

  private async markTaskFailed(taskId: string): Promise<void> {
    try {
      await this.taskApi.updateTaskStatus(taskId, this.statusCodes.error);
      this.logger.log(`Task ${taskId} updated to status '${this.statusCodes.error}'`);
    } catch (error) {
      this.logger.error(`Failed to update task ${taskId} status: ${describeError(error)}`);
    }
  }

  private finish(
    statistics: RunStatisticsVO,
    exitCode: ExitCode,
    interrupted: boolean,
    startTime: number,
  ): RunSyncResult {
    const durationMs = Date.now() - startTime;

    this.logger.log(
      `Workflow summary: total tasks ${statistics.totalTasks}, successful ${statistics.successfulTasks}, ` +
        `failed ${statistics.failedTasks}, skipped ${statistics.skippedTasks}, documents ${statistics.totalDocuments}`,
    );

    if (interrupted) {
      this.logger.warn('Workflow ended early after an interrupt');
    } else if (exitCode === ExitCode.SUCCESS) {
      this.logger.log('Workflow completed successfully');
    } else {
      this.logger.warn('Workflow completed with failures');
    }

    this.eventPublisher.publishAsync(
      new RunCompletedEvent({
        statistics: statistics.toJSON(),
        exitCode,
        interrupted,
        durationMs,
      }),
    );

    return { exitCode, statistics, interrupted, durationMs };
  }
}

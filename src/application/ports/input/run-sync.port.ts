import { RunStatisticsVO } from '../../../domain/value-objects/run-statistics.vo';

export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  INTERRUPTED = 130,
}

/**
 * Run Sync Command
 */
export interface RunSyncCommand {
  /** Aborted on external interruption; checked before each task */
  signal?: AbortSignal;
}

/**
 * Run Sync Result
 */
export interface RunSyncResult {
  exitCode: ExitCode;
  statistics: RunStatisticsVO;
  interrupted: boolean;
  durationMs: number;
}

/**
 * Run Sync Port (Driving Port / Use Case Interface)
 * One complete pass over the tasks that are ready for upload
 */
export interface RunSyncPort {
  execute(command?: RunSyncCommand): Promise<RunSyncResult>;
}

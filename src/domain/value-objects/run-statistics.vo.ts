import { produce } from 'immer';

/**
 * Run Statistics Value Object
 * Counters accumulated across one run. Every operation returns a new instance.
 */
export interface RunStatisticsProps {
  totalTasks: number;
  successfulTasks: number;
  failedTasks: number;
  totalDocuments: number;
  skippedTasks: number;
}

export class RunStatisticsVO {
  private constructor(private readonly props: RunStatisticsProps) {}

  static empty(): RunStatisticsVO {
    return new RunStatisticsVO({
      totalTasks: 0,
      successfulTasks: 0,
      failedTasks: 0,
      totalDocuments: 0,
      skippedTasks: 0,
    });
  }

  get totalTasks(): number {
    return this.props.totalTasks;
  }

  get successfulTasks(): number {
    return this.props.successfulTasks;
  }

  get failedTasks(): number {
    return this.props.failedTasks;
  }

  get totalDocuments(): number {
    return this.props.totalDocuments;
  }

  get skippedTasks(): number {
    return this.props.skippedTasks;
  }

  withSkipped(count: number): RunStatisticsVO {
    this.assertNonNegative(count);
    return this.update((draft) => {
      draft.skippedTasks += count;
    });
  }

  withTaskStarted(documentCount: number): RunStatisticsVO {
    this.assertNonNegative(documentCount);
    return this.update((draft) => {
      draft.totalTasks += 1;
      draft.totalDocuments += documentCount;
    });
  }

  withTaskSucceeded(): RunStatisticsVO {
    return this.update((draft) => {
      draft.successfulTasks += 1;
    });
  }

  withTaskFailed(): RunStatisticsVO {
    return this.update((draft) => {
      draft.failedTasks += 1;
    });
  }

  hasFailures(): boolean {
    return this.props.failedTasks > 0;
  }

  toJSON(): RunStatisticsProps {
    return { ...this.props };
  }

  private update(recipe: (draft: RunStatisticsProps) => void): RunStatisticsVO {
    return new RunStatisticsVO(produce(this.props, recipe));
  }

  private assertNonNegative(count: number): void {
    if (count < 0) {
      throw new Error('Run statistics cannot decrease');
    }
  }
}

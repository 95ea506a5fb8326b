import { DomainEvent } from './base.event';
import { RunStatisticsProps } from '../value-objects/run-statistics.vo';

export interface RunCompletedEventPayload {
  statistics: RunStatisticsProps;
  exitCode: number;
  interrupted: boolean;
  durationMs: number;
}

export class RunCompletedEvent extends DomainEvent {
  constructor(public readonly payload: RunCompletedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'run.completed';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}

/**
 * Task Status Codes Value Object
 * The configured status codes a task moves through during a run
 */
export interface TaskStatusCodesProps {
  ready: string;
  complete: string;
  error: string;
}

export class TaskStatusCodesVO {
  private constructor(private readonly props: TaskStatusCodesProps) {}

  static create(props: TaskStatusCodesProps): TaskStatusCodesVO {
    for (const name of ['ready', 'complete', 'error'] as const) {
      if (props[name].trim() === '') {
        throw new Error(`Task status code "${name}" cannot be empty`);
      }
    }
    if (props.complete === props.error) {
      throw new Error('Complete and error status codes must differ');
    }
    return new TaskStatusCodesVO({ ...props });
  }

  get ready(): string {
    return this.props.ready;
  }

  get complete(): string {
    return this.props.complete;
  }

  get error(): string {
    return this.props.error;
  }

  isComplete(code: string): boolean {
    return code === this.props.complete;
  }

  /**
   * Logical AND over every document outcome.
   */
  reduce(outcomes: readonly boolean[]): string {
    return outcomes.every(Boolean) ? this.props.complete : this.props.error;
  }
}

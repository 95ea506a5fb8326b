import { randomUUID } from 'crypto';

/**
 * Base Domain Event
 * Every step of a sync run that is worth an audit line extends this class
 */
export abstract class DomainEvent {
  public readonly occurredAt: Date;
  public readonly eventId: string;

  protected constructor() {
    this.occurredAt = new Date();
    this.eventId = randomUUID();
  }

  abstract get eventName(): string;

  toJSON(): Record<string, unknown> {
    return {
      eventId: this.eventId,
      eventName: this.eventName,
      occurredAt: this.occurredAt.toISOString(),
    };
  }
}

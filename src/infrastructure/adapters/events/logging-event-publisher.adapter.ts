import { Injectable } from '@nestjs/common';
import { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import { DomainEvent } from '../../../domain/events/base.event';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Logging Event Publisher Adapter
 * Implements EventPublisherPort by writing each event as a structured log line
 */
@Injectable()
export class LoggingEventPublisherAdapter implements EventPublisherPort {
  private readonly logger: PinoLoggerService;

  constructor(logger: PinoLoggerService) {
    this.logger = logger.child(LoggingEventPublisherAdapter.name);
  }

  async publish(event: DomainEvent): Promise<void> {
    this.logger.info({ event: event.toJSON() }, `[EVENT] ${event.eventName}`);
  }

  publishAsync(event: DomainEvent): void {
    // Fire and forget
    this.publish(event).catch((error: unknown) => {
      this.logger.error(
        { eventName: event.eventName, error: error instanceof Error ? error.message : String(error) },
        'Failed to publish event',
      );
    });
  }
}

import { Injectable } from '@nestjs/common';
import type { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import type { DomainEvent } from '../../../domain/events/base.event';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { errorMessage } from '../../../domain/errors/signing-service.errors';

/**
 * Logging Event Publisher Adapter
 * Implements EventPublisherPort by writing each event as a structured log
 * line, so job lifecycle events can be picked up by log-based tooling.
 */
@Injectable()
export class LoggingEventPublisherAdapter implements EventPublisherPort {
  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(LoggingEventPublisherAdapter.name);
  }

  async publish(event: DomainEvent): Promise<void> {
    this.logger.info({ event: event.toJSON() }, `[EVENT] ${event.eventName}`);
  }

  publishAsync(event: DomainEvent): void {
    // Fire and forget
    this.publish(event).catch((error: unknown) => {
      this.logger.error({ eventName: event.eventName, error: errorMessage(error) }, 'Failed to publish event');
    });
  }
}

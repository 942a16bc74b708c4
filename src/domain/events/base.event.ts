import { v4 as uuidv4 } from 'uuid';

/**
 * Base Domain Event
 * All domain events extend this class and expose their data as `payload`.
 */
export abstract class DomainEvent<TPayload extends object = object> {
  public readonly occurredAt: Date;
  public readonly eventId: string;

  protected constructor(public readonly payload: TPayload) {
    this.occurredAt = new Date();
    this.eventId = uuidv4();
  }

  abstract get eventName(): string;

  toJSON(): Record<string, unknown> {
    return {
      eventId: this.eventId,
      eventName: this.eventName,
      occurredAt: this.occurredAt.toISOString(),
      payload: this.payload,
    };
  }
}

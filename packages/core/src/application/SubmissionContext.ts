import { randomUUID } from 'node:crypto';
import type { DomainEvent } from '../domain/events/DomainEvents.js';
import type { SubmissionStatus } from '../domain/model/SubmissionStatus.js';
import { canTransition } from '../domain/model/SubmissionStatus.js';
import type { EventBus } from './EventBus.js';

/**
 * State of a single pipeline run.
 *
 * A fresh context is created for every `run()` call, so concurrent runs of the
 * same pipeline share nothing but the (stateless) stages and the event bus.
 */
export class SubmissionContext {
  readonly submissionId: string;
  readonly startedAt: number;
  status: SubmissionStatus = 'CREATED';

  constructor(
    private readonly eventBus: EventBus,
    readonly signal?: AbortSignal,
  ) {
    this.submissionId = randomUUID();
    this.startedAt = Date.now();
  }

  transitionTo(newStatus: SubmissionStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid submission transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  elapsedMs(): number {
    return Date.now() - this.startedAt;
  }

  emit(event: DomainEvent): void {
    this.eventBus.emit(event);
  }
}

import type { EventOutcome, EventOutcomeRepository, OutcomeStatus } from '../../domain/index.js';

/**
 * In-memory outcome repository.
 *
 * Used when no DATABASE_URL is configured, and by tests. Keeps the most
 * recent `capacity` outcomes so a long-running process does not grow
 * without bound.
 */
export class InMemoryOutcomeRepository implements EventOutcomeRepository {
  private readonly outcomes: EventOutcome[] = [];

  constructor(private readonly capacity = 10_000) {}

  async record(outcome: EventOutcome): Promise<void> {
    this.outcomes.push(outcome);
    if (this.outcomes.length > this.capacity) {
      this.outcomes.splice(0, this.outcomes.length - this.capacity);
    }
  }

  /** All retained outcomes, oldest first. */
  getAll(): readonly EventOutcome[] {
    return [...this.outcomes];
  }

  countByStatus(status: OutcomeStatus): number {
    return this.outcomes.filter((o) => o.status === status).length;
  }
}

/**
 * Monotonic ticket source. Each layout change takes a ticket; steps queued
 * under an older ticket stop running once a newer one has been issued.
 */
export class TicketCounter {
  private current = 0;

  get latest(): number {
    return this.current;
  }

  next(): number {
    this.current += 1;
    return this.current;
  }

  isCurrent(ticket: number): boolean {
    return ticket === this.current;
  }
}
